import { EpubError } from "./errors";
import type { Chapter } from "./types";

export type ChapterFilter = (chapter: Chapter) => boolean;

export interface EpubOptions {
  signal: AbortSignal | null;
  /** Include the cover bytes in `extract()` */
  includeCover: boolean;
  /** Include the full metadata record in `extract()` */
  includeMetadata: boolean;
  filterChapters: ChapterFilter | null;
  maxContentLength: number; // bytes, 0 = no limit
}

export type EpubOption = (options: EpubOptions) => void;

export const DEFAULT_OPTIONS: Readonly<EpubOptions> = Object.freeze({
  signal: null,
  includeCover: false,
  includeMetadata: false,
  filterChapters: null,
  maxContentLength: 0,
});

export function withSignal(signal: AbortSignal | undefined): EpubOption {
  return (options) => {
    if (signal) {
      options.signal = signal;
    }
  };
}

export function withCover(): EpubOption {
  return (options) => {
    options.includeCover = true;
  };
}

export function withMetadata(): EpubOption {
  return (options) => {
    options.includeMetadata = true;
  };
}

export function withChapterFilter(filter: ChapterFilter): EpubOption {
  return (options) => {
    options.filterChapters = filter;
  };
}

export function withMaxContentLength(maxLength: number): EpubOption {
  return (options) => {
    options.maxContentLength = maxLength;
  };
}

export function applyOptions(...adjustments: EpubOption[]): EpubOptions {
  const options: EpubOptions = { ...DEFAULT_OPTIONS };
  for (const adjust of adjustments) {
    adjust(options);
  }
  return options;
}

/**
 * Throw a `cancelled` error if the signal has fired
 */
export function checkSignal(options: EpubOptions): void {
  if (options.signal?.aborted) {
    throw new EpubError("cancelled", "Operation was cancelled", {
      cause: options.signal.reason,
    });
  }
}
