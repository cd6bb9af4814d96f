import { describe, it, expect } from "vitest";
import path from "node:path";
import { computeTargetSize } from "../resizePolicy.js";
import { effectiveFormat, encodeParams, needsAlphaFlatten } from "../conversionPolicy.js";
import { isWithin, outputPath } from "../pathMirror.js";
import { PathError, ResizeError } from "../errors.js";
import type { ColorMode, ResizeMode } from "../types.js";

describe("computeTargetSize", () => {
  it("never resizes without a resize mode", () => {
    expect(computeTargetSize({ width: 4000, height: 3000 }, { kind: "none" })).toEqual({ kind: "none" });
  });

  describe("max dimension", () => {
    const mode: ResizeMode = { kind: "max-dimension", maxDimension: 1000 };

    it("scales the long edge down to the limit", () => {
      expect(computeTargetSize({ width: 4000, height: 3000 }, mode)).toEqual({
        kind: "resize",
        size: { width: 1000, height: 750 },
      });
      expect(computeTargetSize({ width: 3000, height: 4000 }, mode)).toEqual({
        kind: "resize",
        size: { width: 750, height: 1000 },
      });
    });

    it("leaves images within the limit alone", () => {
      expect(computeTargetSize({ width: 800, height: 600 }, mode)).toEqual({ kind: "none" });
      expect(computeTargetSize({ width: 1000, height: 500 }, mode)).toEqual({ kind: "none" });
    });

    it("keeps at least one pixel on the short edge", () => {
      expect(computeTargetSize({ width: 10000, height: 1 }, { kind: "max-dimension", maxDimension: 100 })).toEqual({
        kind: "resize",
        size: { width: 100, height: 1 },
      });
    });

    it("rejects a non-positive limit", () => {
      expect(() => computeTargetSize({ width: 10, height: 10 }, { kind: "max-dimension", maxDimension: 0 })).toThrow(
        ResizeError,
      );
    });
  });

  describe("exact size keeping aspect", () => {
    const mode: ResizeMode = { kind: "exact-size", width: 800, height: 600, maintainAspect: true };

    it("fits inside the box", () => {
      expect(computeTargetSize({ width: 4000, height: 3000 }, mode)).toEqual({
        kind: "resize",
        size: { width: 800, height: 600 },
      });
      expect(computeTargetSize({ width: 1600, height: 600 }, mode)).toEqual({
        kind: "resize",
        size: { width: 800, height: 300 },
      });
    });

    it("does not upscale small images", () => {
      expect(computeTargetSize({ width: 400, height: 300 }, mode)).toEqual({ kind: "none" });
    });
  });

  describe("exact size ignoring aspect", () => {
    const mode: ResizeMode = { kind: "exact-size", width: 800, height: 600, maintainAspect: false };

    it("always returns the requested size", () => {
      for (const size of [
        { width: 100, height: 50 },
        { width: 4000, height: 3000 },
        { width: 800, height: 600 },
      ]) {
        expect(computeTargetSize(size, mode)).toEqual({ kind: "resize", size: { width: 800, height: 600 } });
      }
    });

    it("rejects zero or negative dimensions", () => {
      expect(() =>
        computeTargetSize({ width: 10, height: 10 }, { kind: "exact-size", width: 0, height: 10, maintainAspect: false }),
      ).toThrow(ResizeError);
      expect(() =>
        computeTargetSize({ width: 10, height: 10 }, { kind: "exact-size", width: 10, height: -5, maintainAspect: true }),
      ).toThrow(ResizeError);
    });
  });

  it("only ever shrinks in the aspect-preserving modes", () => {
    const modes: ResizeMode[] = [
      { kind: "max-dimension", maxDimension: 500 },
      { kind: "exact-size", width: 300, height: 700, maintainAspect: true },
    ];
    const sizes = [
      { width: 1, height: 1 },
      { width: 499, height: 2000 },
      { width: 3000, height: 20 },
      { width: 640, height: 480 },
      { width: 300, height: 700 },
    ];

    for (const mode of modes) {
      for (const size of sizes) {
        const action = computeTargetSize(size, mode);
        if (action.kind === "resize") {
          expect(action.size.width).toBeLessThanOrEqual(size.width);
          expect(action.size.height).toBeLessThanOrEqual(size.height);
        }
      }
    }
  });
});

describe("effectiveFormat", () => {
  it("prefers the configured format", () => {
    expect(effectiveFormat(".png", "webp")).toBe("webp");
    expect(effectiveFormat(".png", "JPG")).toBe("jpg");
  });

  it("falls back to the lower-cased source extension", () => {
    expect(effectiveFormat(".JPEG")).toBe("jpeg");
    expect(effectiveFormat(".tiff", undefined)).toBe("tiff");
  });
});

describe("needsAlphaFlatten", () => {
  const formats = ["jpg", "jpeg", "JPG", "png", "webp", "tiff", "bmp"];
  const modes: ColorMode[] = ["palette", "grayscale", "grayscale-alpha", "rgb", "rgba", "cmyk"];
  const jpegFamily = new Set(["jpg", "jpeg", "JPG"]);
  const alphaModes = new Set<ColorMode>(["palette", "rgba", "grayscale-alpha"]);

  for (const format of formats) {
    for (const mode of modes) {
      const expected = jpegFamily.has(format) && alphaModes.has(mode);
      it(`${mode} -> ${format} is ${expected}`, () => {
        expect(needsAlphaFlatten(mode, format)).toBe(expected);
      });
    }
  }
});

describe("encodeParams", () => {
  it("passes quality to JPEG and WebP", () => {
    expect(encodeParams("jpg", 85)).toEqual({ quality: 85, optimize: true });
    expect(encodeParams("jpeg", 40)).toEqual({ quality: 40, optimize: true });
    expect(encodeParams("webp", 70)).toEqual({ quality: 70, optimize: true });
  });

  it("maps quality to a PNG compression level", () => {
    expect(encodeParams("png", 85)).toEqual({ compressionLevel: 1, optimize: true });
    expect(encodeParams("png", 0)).toEqual({ compressionLevel: 9, optimize: true });
    expect(encodeParams("png", 5)).toEqual({ compressionLevel: 9, optimize: true });
    expect(encodeParams("png", 50)).toEqual({ compressionLevel: 4, optimize: true });
    expect(encodeParams("png", 100)).toEqual({ compressionLevel: 0, optimize: true });
  });

  it("uses codec defaults for lossless formats", () => {
    expect(encodeParams("tiff", 85)).toEqual({ optimize: true });
    expect(encodeParams("bmp", 85)).toEqual({ optimize: true });
  });
});

describe("outputPath", () => {
  const inputRoot = path.join(path.sep, "photos");
  const outputRoot = path.join(path.sep, "out");

  it("mirrors the relative directory and swaps the extension", () => {
    expect(outputPath(inputRoot, path.join(inputRoot, "trip", "beach.PNG"), outputRoot, "webp")).toBe(
      path.join(outputRoot, "trip", "beach.webp"),
    );
  });

  it("lower-cases the format", () => {
    expect(outputPath(inputRoot, path.join(inputRoot, "cat.jpeg"), outputRoot, "JPG")).toBe(
      path.join(outputRoot, "cat.jpg"),
    );
  });

  it("keeps dots in the base name", () => {
    expect(outputPath(inputRoot, path.join(inputRoot, "v1.2.final.png"), outputRoot, "png")).toBe(
      path.join(outputRoot, "v1.2.final.png"),
    );
  });

  it("rejects files outside the input root", () => {
    expect(() => outputPath(inputRoot, path.join(path.sep, "elsewhere", "a.png"), outputRoot, "png")).toThrow(
      PathError,
    );
    expect(() => outputPath(inputRoot, inputRoot, outputRoot, "png")).toThrow(PathError);
  });
});

describe("isWithin", () => {
  const root = path.join(path.sep, "photos");

  it("accepts the root itself and paths below it", () => {
    expect(isWithin(root, root)).toBe(true);
    expect(isWithin(root, path.join(root, "out"))).toBe(true);
    expect(isWithin(root, path.join(root, "..out", "a.png"))).toBe(true);
  });

  it("rejects siblings and parents", () => {
    expect(isWithin(root, path.join(path.sep, "photos-out"))).toBe(false);
    expect(isWithin(root, path.sep)).toBe(false);
  });
});
