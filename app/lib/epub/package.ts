import type { ArchiveAccessor } from "./archive";
import type { Item, ItemRef, Metadata, MetadataField, PackageDocument } from "./types";
import { attr, child, children, decodeXml, text } from "./xml";

const METADATA_FIELDS: MetadataField[] = [
  "title",
  "creator",
  "subject",
  "description",
  "publisher",
  "contributor",
  "date",
  "type",
  "format",
  "identifier",
  "language",
  "rights",
];

export function emptyMetadata(): Metadata {
  return {
    title: "",
    creator: "",
    subject: "",
    description: "",
    publisher: "",
    contributor: "",
    date: "",
    type: "",
    format: "",
    identifier: "",
    language: "",
    rights: "",
  };
}

function parseMetadata(node: unknown): Metadata {
  const metadata = emptyMetadata();
  for (const field of METADATA_FIELDS) {
    metadata[field] = text(child(node, field));
  }
  return metadata;
}

function parseItem(node: unknown): Item {
  const item: Item = {
    id: attr(node, "id"),
    href: attr(node, "href"),
    mediaType: attr(node, "media-type"),
  };
  const properties = attr(node, "properties");
  if (properties) item.properties = properties;
  return item;
}

function parseItemRef(node: unknown): ItemRef {
  return {
    idref: attr(node, "idref"),
    linear: attr(node, "linear"),
  };
}

/**
 * Parse the package document (.opf) into metadata, manifest and spine.
 * Manifest and spine keep document order; nothing is validated here.
 */
export async function parsePackage(
  archive: ArchiveAccessor,
  packagePath: string,
): Promise<PackageDocument> {
  const doc = decodeXml(await archive.getBytes(packagePath), "package document");
  const pkg = doc.package;

  return {
    metadata: parseMetadata(child(pkg, "metadata")),
    manifest: children(child(pkg, "manifest"), "item").map(parseItem),
    spine: children(child(pkg, "spine"), "itemref").map(parseItemRef),
  };
}
