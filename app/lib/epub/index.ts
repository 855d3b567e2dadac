export { Epub } from "./epub";
export { EpubError, isEpubError } from "./errors";
export type { EpubErrorCode } from "./errors";
export {
  DEFAULT_OPTIONS,
  applyOptions,
  withChapterFilter,
  withCover,
  withMaxContentLength,
  withMetadata,
  withSignal,
} from "./options";
export type { ChapterFilter, EpubOption, EpubOptions } from "./options";
export { ArchiveAccessor, isValidZipBuffer } from "./archive";
export { CONTAINER_PATH } from "./container";
export { NCX_MEDIA_TYPE } from "./toc";
export { COVER_IDS } from "./cover";
export * from "./types";
