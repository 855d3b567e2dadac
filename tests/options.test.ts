import { describe, it, expect } from "vitest";
import {
  applyOptions,
  DEFAULT_OPTIONS,
  withChapterFilter,
  withCover,
  withMaxContentLength,
  withMetadata,
  withSignal,
} from "../app/lib/epub";
import { checkSignal } from "../app/lib/epub/options";

describe("applyOptions", () => {
  it("should start from the defaults", () => {
    expect(applyOptions()).toEqual({
      signal: null,
      includeCover: false,
      includeMetadata: false,
      filterChapters: null,
      maxContentLength: 0,
    });
  });

  it("should not share state between calls", () => {
    applyOptions(withCover(), withMaxContentLength(100));

    expect(applyOptions()).toEqual({ ...DEFAULT_OPTIONS });
  });

  it("should apply adjustments in order, later ones winning", () => {
    const filter = () => true;
    const options = applyOptions(
      withMaxContentLength(10),
      withMetadata(),
      withChapterFilter(filter),
      withMaxContentLength(2048),
    );

    expect(options.maxContentLength).toBe(2048);
    expect(options.includeMetadata).toBe(true);
    expect(options.includeCover).toBe(false);
    expect(options.filterChapters).toBe(filter);
  });

  it("should ignore an undefined signal", () => {
    const controller = new AbortController();

    const options = applyOptions(withSignal(controller.signal), withSignal(undefined));

    expect(options.signal).toBe(controller.signal);
  });
});

describe("cancellation", () => {
  it("should never cancel without a signal", () => {
    expect(() => checkSignal(applyOptions())).not.toThrow();
  });

  it("should throw a cancelled error carrying the abort reason", () => {
    const controller = new AbortController();
    const options = applyOptions(withSignal(controller.signal));
    const reason = new Error("deadline passed");

    controller.abort(reason);

    let thrown: unknown;
    try {
      checkSignal(options);
    } catch (err) {
      thrown = err;
    }
    expect(thrown).toMatchObject({ code: "cancelled", cause: reason });
  });
});
