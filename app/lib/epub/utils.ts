import { posix } from "path";

/**
 * Yield to the event loop so a pending abort can be observed between reads.
 */
export function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

/**
 * Normalize an archive path to forward slashes
 */
export function toSlash(path: string): string {
  return path.replace(/\\/g, "/");
}

/**
 * Resolve a manifest href against the package document's directory
 */
export function resolveHref(packagePath: string, href: string): string {
  return posix.join(posix.dirname(toSlash(packagePath)), toSlash(href));
}
