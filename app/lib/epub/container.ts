import type { ArchiveAccessor } from "./archive";
import { attr, child, children, decodeXml } from "./xml";

export const CONTAINER_PATH = "META-INF/container.xml";

/**
 * Parse container.xml to find the package document path.
 * The first rootfile wins; an empty string comes back when none is listed.
 */
export async function resolveContainer(archive: ArchiveAccessor): Promise<string> {
  const doc = decodeXml(await archive.getBytes(CONTAINER_PATH), "container.xml");
  const rootfiles = children(child(doc.container, "rootfiles"), "rootfile");
  return rootfiles.length > 0 ? attr(rootfiles[0], "full-path") : "";
}
