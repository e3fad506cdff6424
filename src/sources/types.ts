export type FolderCategory = "whatsapp_images" | "whatsapp_videos" | "image_folders";

export type MediaKind = "image" | "video";

export interface MediaFile {
  path: string;
  filename: string;
  extension: string;  // lowercased, with leading dot
  kind: MediaKind;
  category: FolderCategory;
  effectiveDate: Date;
}

export interface FolderGroup {
  category: FolderCategory;
  folders: string[];
}

export interface MediaSource {
  folder: string;
  scan(): Generator<MediaFile>;
}
