export type EpubErrorCode =
  | "not-found"
  | "decode"
  | "out-of-range"
  | "unsupported-content"
  | "content-too-large"
  | "cancelled"
  | "invalid-archive"
  | "read-failed"
  | "closed";

export class EpubError extends Error {
  constructor(
    public readonly code: EpubErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "EpubError";
  }
}

export function isEpubError(err: unknown, code?: EpubErrorCode): err is EpubError {
  return err instanceof EpubError && (code === undefined || err.code === code);
}
