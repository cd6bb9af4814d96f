import type { ColorMode, EncodeParams } from "./types.js";

const JPEG_FORMATS = ["jpg", "jpeg"];
const PNG_FORMATS = ["png"];
const LOSSY_FORMATS = ["webp"];
const ALPHA_MODES: readonly ColorMode[] = ["palette", "rgba", "grayscale-alpha"];

export function isJpegFormat(format: string): boolean {
  return JPEG_FORMATS.includes(format.toLowerCase());
}

export function effectiveFormat(sourceExt: string, configFormat?: string): string {
  if (configFormat) {
    return configFormat.toLowerCase();
  }
  return sourceExt.toLowerCase().replace(/^\./, "");
}

/**
 * JPEG cannot store transparency or a palette, so such images are flattened
 * to opaque RGB before encoding.
 */
export function needsAlphaFlatten(colorMode: ColorMode, targetFormat: string): boolean {
  return isJpegFormat(targetFormat) && ALPHA_MODES.includes(colorMode);
}

/**
 * Derives encoder settings from the single 1-100 quality knob. PNG maps it
 * onto zlib levels, 9 at the low end down to 0 at 90 and above.
 */
export function encodeParams(targetFormat: string, quality: number): EncodeParams {
  const format = targetFormat.toLowerCase();

  if (JPEG_FORMATS.includes(format)) {
    return { quality, optimize: true };
  }

  if (PNG_FORMATS.includes(format)) {
    const level = 9 - Math.floor(quality / 10);
    return { compressionLevel: Math.min(9, Math.max(0, level)), optimize: true };
  }

  if (LOSSY_FORMATS.includes(format)) {
    return { quality, optimize: true };
  }

  return { optimize: true };
}
