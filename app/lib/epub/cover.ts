import { findItemById } from "./manifest";
import type { Item } from "./types";

// Manifest ids conventionally used for the cover image, in lookup order
export const COVER_IDS = ["cover", "cover-image", "cover-img"];

const IMAGE_EXTENSIONS = [".jpg", ".jpeg", ".png", ".gif"];

function looksLikeImage(item: Item): boolean {
  if (item.mediaType.startsWith("image/")) return true;
  const href = item.href.toLowerCase();
  return IMAGE_EXTENSIONS.some((ext) => href.endsWith(ext));
}

/**
 * Find the cover image among the manifest items, if any
 */
export function findCoverItem(manifest: Item[]): Item | null {
  for (const id of COVER_IDS) {
    const item = findItemById(manifest, id);
    if (item && looksLikeImage(item)) {
      return item;
    }
  }
  return null;
}
