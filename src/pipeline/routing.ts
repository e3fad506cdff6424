import type { FolderCategory, MediaKind } from "../sources/types";
import type { CategoryCounter } from "./context";

export const SUBFOLDERS = {
  images: "Bilder",
  videos: "Videos",
  whatsappImages: "Whatsapp-Bilder",
} as const;

export type Subfolder = (typeof SUBFOLDERS)[keyof typeof SUBFOLDERS];

export interface Route {
  subfolder: Subfolder;
  counter: CategoryCounter;
}

/**
 * Destination subfolder and statistics counter for a file.
 * Folder category decides for WhatsApp sources; regular folders route by kind.
 */
export function routeMedia(category: FolderCategory, kind: MediaKind): Route {
  switch (category) {
    case "whatsapp_images":
      return { subfolder: SUBFOLDERS.whatsappImages, counter: "whatsappImages" };
    case "whatsapp_videos":
      return { subfolder: SUBFOLDERS.videos, counter: "whatsappVideos" };
    case "image_folders":
      return kind === "video"
        ? { subfolder: SUBFOLDERS.videos, counter: "regularVideos" }
        : { subfolder: SUBFOLDERS.images, counter: "regularImages" };
  }
}
