import JSZip from "jszip";
import { EpubError } from "./errors";
import { toSlash } from "./utils";

/**
 * Validate that a buffer looks like a valid ZIP file by checking:
 * 1. PK signature at the start
 * 2. End of Central Directory signature somewhere in the file
 */
export function isValidZipBuffer(buffer: Buffer): boolean {
  // Check minimum size (ZIP needs at least 22 bytes for EOCD)
  if (buffer.length < 22) return false;

  if (buffer[0] !== 0x50 || buffer[1] !== 0x4b) return false;

  // Search in the last 65KB + 22 bytes (max comment size + EOCD size)
  const searchStart = Math.max(0, buffer.length - 65557);
  for (let i = buffer.length - 22; i >= searchStart; i--) {
    if (
      buffer[i] === 0x50 &&
      buffer[i + 1] === 0x4b &&
      buffer[i + 2] === 0x05 &&
      buffer[i + 3] === 0x06
    ) {
      return true;
    }
  }

  return false;
}

export async function loadArchive(buffer: Buffer): Promise<JSZip> {
  if (!isValidZipBuffer(buffer)) {
    throw new EpubError("invalid-archive", "Not a ZIP archive");
  }
  try {
    return await JSZip.loadAsync(buffer);
  } catch (err) {
    throw new EpubError("invalid-archive", "Could not read ZIP archive", { cause: err });
  }
}

/**
 * Name-indexed access to the entries of an opened EPUB container.
 *
 * Lookups scan the entry list; names are compared case-sensitively after
 * converting backslashes to forward slashes.
 */
export class ArchiveAccessor {
  private zip: JSZip | null;

  constructor(zip: JSZip) {
    this.zip = zip;
  }

  get isClosed(): boolean {
    return this.zip === null;
  }

  /** Drop the archive. Later reads fail with a `closed` error. */
  close(): void {
    this.zip = null;
  }

  /** File entry names in archive order, directories omitted */
  list(): string[] {
    return Object.values(this.entries())
      .filter((entry) => !entry.dir)
      .map((entry) => toSlash(entry.name));
  }

  async getBytes(path: string): Promise<Buffer> {
    return this.find(path).async("nodebuffer");
  }

  /** The caller owns the returned stream and must consume or destroy it. */
  getStream(path: string): NodeJS.ReadableStream {
    return this.find(path).nodeStream("nodebuffer");
  }

  private find(path: string): JSZip.JSZipObject {
    const wanted = toSlash(path);
    for (const entry of Object.values(this.entries())) {
      if (!entry.dir && toSlash(entry.name) === wanted) {
        return entry;
      }
    }
    throw new EpubError("not-found", `file not found: ${wanted}`);
  }

  private entries(): Record<string, JSZip.JSZipObject> {
    if (!this.zip) {
      throw new EpubError("closed", "archive is closed");
    }
    return this.zip.files;
  }
}
