export interface Metadata {
  title: string;
  creator: string;
  subject: string;
  description: string;
  publisher: string;
  contributor: string;
  date: string;
  type: string;
  format: string;
  identifier: string;
  language: string;
  rights: string;
}

export type MetadataField = keyof Metadata;

/** Manifest entry. `href` is relative to the package document's directory. */
export interface Item {
  id: string;
  href: string;
  mediaType: string;
  properties?: string;
}

/** Spine entry */
export interface ItemRef {
  idref: string;
  linear: string; // "yes" | "no" | "" when absent; not used to gate chapters
}

export interface NavPoint {
  id: string;
  playOrder: string;
  label: string;
  src: string;
  children: NavPoint[];
}

export interface Toc {
  title: string;
  navMap: NavPoint[];
}

export type TocFormat = "ncx" | "navigation-document" | "none";

export interface Chapter {
  title: string;
  content: string;
  order: number; // 1-based spine position, not output position
}

export interface PackageDocument {
  metadata: Metadata;
  manifest: Item[];
  spine: ItemRef[];
}

export interface EpubDocument {
  title: string;
  author: string;
  chapters: Chapter[];
  toc: Toc | null;
  metadata?: Metadata;
  cover?: Buffer | null;
}
