import type { ArchiveAccessor } from "./archive";
import { EpubError, isEpubError } from "./errors";
import { findItemById, isHtmlItem } from "./manifest";
import { checkSignal } from "./options";
import type { EpubOptions } from "./options";
import type { Chapter, Item, ItemRef, Toc } from "./types";
import { resolveHref, yieldToEventLoop } from "./utils";

// Cancellation is polled once every CANCEL_CHECK_INTERVAL spine entries
export const CANCEL_CHECK_INTERVAL = 5;

export interface ChapterSource {
  archive: ArchiveAccessor;
  packagePath: string;
  manifest: Item[];
  spine: ItemRef[];
  toc: Toc | null;
}

function exceedsMaxLength(content: Buffer, options: EpubOptions): boolean {
  return options.maxContentLength > 0 && content.length > options.maxContentLength;
}

/**
 * Title for the chapter at spine position `index`.
 *
 * Matches the top-level navMap entry at the same position, not by href, so a
 * TOC that is nested or ordered differently from the spine can mislabel.
 */
export function chapterTitle(toc: Toc | null, index: number): string {
  return toc?.navMap[index]?.label ?? `Chapter ${index + 1}`;
}

/**
 * Read all HTML chapters in spine order.
 *
 * Entries that are missing from the manifest, not HTML, unreadable, over the
 * length limit or rejected by the chapter filter are skipped. Cancellation
 * fails the whole call and drops what was collected.
 */
export async function getChapters(source: ChapterSource, options: EpubOptions): Promise<Chapter[]> {
  checkSignal(options);

  const chapters: Chapter[] = [];

  for (let i = 0; i < source.spine.length; i++) {
    if (i % CANCEL_CHECK_INTERVAL === 0) {
      if (i > 0) await yieldToEventLoop();
      checkSignal(options);
    }

    const item = findItemById(source.manifest, source.spine[i].idref);
    if (!item || !isHtmlItem(item)) continue;

    const path = resolveHref(source.packagePath, item.href);
    let content: Buffer;
    try {
      content = await source.archive.getBytes(path);
    } catch (err) {
      console.warn(`[Epub] Skipping spine entry ${i + 1} (${path}):`, err);
      continue;
    }

    if (exceedsMaxLength(content, options)) continue;

    const chapter: Chapter = {
      title: chapterTitle(source.toc, i),
      content: content.toString("utf-8"),
      order: i + 1,
    };

    if (options.filterChapters && !options.filterChapters(chapter)) continue;

    chapters.push(chapter);
  }

  return chapters;
}

/**
 * Read one chapter by spine index.
 *
 * Unlike `getChapters`, every problem is reported, including content over
 * the length limit.
 */
export async function getChapterContent(
  source: ChapterSource,
  index: number,
  options: EpubOptions,
): Promise<string> {
  checkSignal(options);

  if (!Number.isInteger(index) || index < 0 || index >= source.spine.length) {
    throw new EpubError("out-of-range", `chapter index ${index} out of range`);
  }

  const item = findItemById(source.manifest, source.spine[index].idref);
  if (!item) {
    throw new EpubError("not-found", `chapter item not found: ${source.spine[index].idref}`);
  }
  if (!isHtmlItem(item)) {
    throw new EpubError("unsupported-content", `chapter is not an HTML document: ${item.mediaType}`);
  }

  let content: Buffer;
  try {
    content = await source.archive.getBytes(resolveHref(source.packagePath, item.href));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new EpubError(
      isEpubError(err) ? err.code : "read-failed",
      `failed to get chapter content: ${reason}`,
      { cause: err },
    );
  }

  if (exceedsMaxLength(content, options)) {
    throw new EpubError(
      "content-too-large",
      `chapter content is ${content.length} bytes, over the ${options.maxContentLength} byte limit`,
    );
  }

  return content.toString("utf-8");
}
