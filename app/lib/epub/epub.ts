import { readFile } from "fs/promises";
import { Readable } from "stream";
import type JSZip from "jszip";
import { ArchiveAccessor, loadArchive } from "./archive";
import { getChapterContent, getChapters } from "./chapters";
import type { ChapterSource } from "./chapters";
import { resolveContainer } from "./container";
import { findCoverItem } from "./cover";
import { EpubError } from "./errors";
import { findItemByHref, findItemById, findItemByMediaType } from "./manifest";
import { applyOptions } from "./options";
import type { EpubOption } from "./options";
import { parsePackage } from "./package";
import { cloneToc, resolveToc } from "./toc";
import type { TocResolution } from "./toc";
import type {
  Chapter,
  EpubDocument,
  Item,
  ItemRef,
  Metadata,
  PackageDocument,
  Toc,
  TocFormat,
} from "./types";
import { resolveHref } from "./utils";

function copyItem(item: Item | undefined): Item | undefined {
  return item ? { ...item } : undefined;
}

/**
 * An opened EPUB: metadata, manifest, spine and table of contents, plus
 * read access to the files in the archive.
 *
 * Everything except the archive reads is resolved once when the book is
 * opened. Call `close()` when done; archive reads after that fail with a
 * `closed` error while the parsed metadata stays available.
 *
 * @example
 * const epub = await Epub.open("book.epub");
 * try {
 *   console.log(epub.getTitle(), epub.getAuthor());
 *   for (const chapter of await epub.getChapters()) {
 *     console.log(chapter.order, chapter.title);
 *   }
 * } finally {
 *   epub.close();
 * }
 */
export class Epub {
  private readonly archive: ArchiveAccessor;
  private readonly packagePath: string;
  private readonly metadata: Metadata;
  private readonly manifest: Item[];
  private readonly spine: ItemRef[];
  private readonly tocResolution: TocResolution;

  private constructor(
    archive: ArchiveAccessor,
    packagePath: string,
    pkg: PackageDocument,
    tocResolution: TocResolution,
    private readonly label: string,
  ) {
    this.archive = archive;
    this.packagePath = packagePath;
    this.metadata = pkg.metadata;
    this.manifest = pkg.manifest;
    this.spine = pkg.spine;
    this.tocResolution = tocResolution;
  }

  /** Open and parse the EPUB file at `path` */
  static async open(path: string): Promise<Epub> {
    const buffer = await readFile(path);
    return Epub.load(await loadArchive(buffer), path);
  }

  static async fromBuffer(buffer: Buffer): Promise<Epub> {
    return Epub.load(await loadArchive(buffer), "buffer");
  }

  /**
   * Parse an already loaded archive. The zip stays the caller's: closing
   * the Epub leaves it untouched.
   */
  static async fromZip(zip: JSZip): Promise<Epub> {
    return Epub.load(zip, "archive");
  }

  private static async load(zip: JSZip, label: string): Promise<Epub> {
    const archive = new ArchiveAccessor(zip);
    try {
      const packagePath = await resolveContainer(archive);
      const pkg = await parsePackage(archive, packagePath);
      const tocResolution = await resolveToc(archive, packagePath, pkg.manifest);

      console.log(
        `[Epub] Opened ${label}: ${pkg.manifest.length} manifest items, ${pkg.spine.length} spine entries, TOC: ${tocResolution.format}`,
      );
      return new Epub(archive, packagePath, pkg, tocResolution, label);
    } catch (err) {
      archive.close();
      throw err;
    }
  }

  get isClosed(): boolean {
    return this.archive.isClosed;
  }

  /** Release the archive. Closing twice is a no-op. */
  close(): void {
    if (this.archive.isClosed) return;
    this.archive.close();
    console.log(`[Epub] Closed ${this.label}`);
  }

  getTitle(): string {
    return this.metadata.title;
  }

  getAuthor(): string {
    return this.metadata.creator;
  }

  getDescription(): string {
    return this.metadata.description;
  }

  getMetadata(): Metadata {
    return { ...this.metadata };
  }

  /** Manifest items in document order */
  getItems(): Item[] {
    return this.manifest.map((item) => ({ ...item }));
  }

  getSpine(): ItemRef[] {
    return this.spine.map((ref) => ({ ...ref }));
  }

  /** Archive path of the package document (.opf) */
  getPackagePath(): string {
    return this.packagePath;
  }

  /** The NCX table of contents, or null when the book has none */
  getToc(): Toc | null {
    return this.tocResolution.toc ? cloneToc(this.tocResolution.toc) : null;
  }

  getTocFormat(): TocFormat {
    return this.tocResolution.format;
  }

  getItemById(id: string): Item | undefined {
    return copyItem(findItemById(this.manifest, id));
  }

  getItemByHref(href: string): Item | undefined {
    return copyItem(findItemByHref(this.manifest, href));
  }

  getItemByMediaType(mediaType: string): Item | undefined {
    return copyItem(findItemByMediaType(this.manifest, mediaType));
  }

  /** All file names in the archive, with forward slashes */
  listFiles(): string[] {
    return this.archive.list();
  }

  /**
   * HTML chapters in spine order. Chapters that cannot be read, exceed
   * `withMaxContentLength` or fail `withChapterFilter` are left out.
   */
  async getChapters(...opts: EpubOption[]): Promise<Chapter[]> {
    return getChapters(this.chapterSource(), applyOptions(...opts));
  }

  /** Raw markup of the chapter at zero-based spine `index` */
  async getChapterContent(index: number, ...opts: EpubOption[]): Promise<string> {
    return getChapterContent(this.chapterSource(), index, applyOptions(...opts));
  }

  async getChapterStream(index: number, ...opts: EpubOption[]): Promise<Readable> {
    const content = await this.getChapterContent(index, ...opts);
    return Readable.from([content]);
  }

  /**
   * Stream of the cover image, or null when no conventional cover item
   * exists. A cover item whose file is missing is an error.
   */
  async getCover(): Promise<NodeJS.ReadableStream | null> {
    const item = findCoverItem(this.manifest);
    return item ? this.archive.getStream(this.resolve(item)) : null;
  }

  /** Bytes of any file in the archive, by archive path */
  async getResource(path: string): Promise<Buffer> {
    return this.archive.getBytes(path);
  }

  getResourceStream(path: string): NodeJS.ReadableStream {
    return this.archive.getStream(path);
  }

  /**
   * Everything at once. `withMetadata()` adds the full metadata record and
   * `withCover()` the cover bytes (null without a cover).
   */
  async extract(...opts: EpubOption[]): Promise<EpubDocument> {
    const options = applyOptions(...opts);
    const document: EpubDocument = {
      title: this.getTitle(),
      author: this.getAuthor(),
      chapters: await getChapters(this.chapterSource(), options),
      toc: this.getToc(),
    };

    if (options.includeMetadata) {
      document.metadata = this.getMetadata();
    }
    if (options.includeCover) {
      const item = findCoverItem(this.manifest);
      document.cover = item ? await this.archive.getBytes(this.resolve(item)) : null;
    }

    return document;
  }

  private resolve(item: Item): string {
    return resolveHref(this.packagePath, item.href);
  }

  private chapterSource(): ChapterSource {
    if (this.archive.isClosed) {
      throw new EpubError("closed", "epub is closed");
    }
    return {
      archive: this.archive,
      packagePath: this.packagePath,
      manifest: this.manifest,
      spine: this.spine,
      toc: this.tocResolution.toc,
    };
  }
}
