import type { ArchiveAccessor } from "./archive";
import { findItemByMediaType, hasProperty, isHtmlItem } from "./manifest";
import type { Item, NavPoint, Toc } from "./types";
import { resolveHref } from "./utils";
import { attr, child, children, decodeXml, text } from "./xml";

export const NCX_MEDIA_TYPE = "application/x-dtbncx+xml";

export type TocResolution =
  | { format: "ncx"; toc: Toc }
  | { format: "navigation-document"; toc: null }
  | { format: "none"; toc: null };

type TocStrategy = (
  archive: ArchiveAccessor,
  packagePath: string,
  manifest: Item[],
) => Promise<TocResolution | null>;

function parseNavPoint(node: unknown): NavPoint {
  return {
    id: attr(node, "id"),
    playOrder: attr(node, "playOrder"),
    label: text(child(child(node, "navLabel"), "text")),
    src: attr(child(node, "content"), "src"),
    children: children(node, "navPoint").map(parseNavPoint),
  };
}

/**
 * EPUB 2: the NCX file, located by its manifest media type
 */
const resolveNcx: TocStrategy = async (archive, packagePath, manifest) => {
  const item = findItemByMediaType(manifest, NCX_MEDIA_TYPE);
  if (!item) return null;

  const doc = decodeXml(await archive.getBytes(resolveHref(packagePath, item.href)), "NCX");
  const ncx = doc.ncx;

  return {
    format: "ncx",
    toc: {
      title: text(child(child(ncx, "docTitle"), "text")),
      navMap: children(child(ncx, "navMap"), "navPoint").map(parseNavPoint),
    },
  };
};

/**
 * EPUB 3: the XHTML navigation document. It is detected but not parsed yet,
 * so no tree is produced.
 */
const detectNavigationDocument: TocStrategy = async (_archive, _packagePath, manifest) => {
  const item = manifest.find((candidate) => isHtmlItem(candidate) && hasProperty(candidate, "nav"));
  if (!item) return null;

  console.log(`[Epub] Navigation document ${item.href} found; EPUB 3 navigation is not parsed`);
  return { format: "navigation-document", toc: null };
};

function cloneNavPoint(point: NavPoint): NavPoint {
  return { ...point, children: point.children.map(cloneNavPoint) };
}

export function cloneToc(toc: Toc): Toc {
  return { title: toc.title, navMap: toc.navMap.map(cloneNavPoint) };
}

const TOC_STRATEGIES: TocStrategy[] = [resolveNcx, detectNavigationDocument];

/**
 * Resolve the table of contents. A book without one is not an error.
 */
export async function resolveToc(
  archive: ArchiveAccessor,
  packagePath: string,
  manifest: Item[],
): Promise<TocResolution> {
  for (const strategy of TOC_STRATEGIES) {
    const resolution = await strategy(archive, packagePath, manifest);
    if (resolution) return resolution;
  }
  return { format: "none", toc: null };
}
