import type { Item } from "./types";
import { toSlash } from "./utils";

// Duplicate ids are not an error: the first item in document order wins.
export function findItemById(manifest: Item[], id: string): Item | undefined {
  return manifest.find((item) => item.id === id);
}

export function findItemByMediaType(manifest: Item[], mediaType: string): Item | undefined {
  return manifest.find((item) => item.mediaType === mediaType);
}

export function findItemByHref(manifest: Item[], href: string): Item | undefined {
  const wanted = toSlash(href);
  return manifest.find((item) => toSlash(item.href) === wanted);
}

/** Whether a manifest item carries (X)HTML content */
export function isHtmlItem(item: Item): boolean {
  return item.mediaType.includes("html");
}

export function hasProperty(item: Item, property: string): boolean {
  return item.properties?.split(/\s+/).includes(property) ?? false;
}
