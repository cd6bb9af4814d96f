import bmp from "bmp-js";

export interface RawImage {
  data: Buffer;
  width: number;
  height: number;
  channels: number;
}

// bmp-js stores each pixel as A, B, G, R.
const ABGR = { a: 0, b: 1, g: 2, r: 3 };

/** Decodes a BMP file into packed 3-channel RGB pixels. Alpha is dropped. */
export function decodeBmp(file: Buffer): RawImage {
  const decoded = bmp.decode(file);
  const { width, height } = decoded;
  const data = Buffer.alloc(width * height * 3);

  for (let i = 0; i < width * height; i++) {
    data[i * 3] = decoded.data[i * 4 + ABGR.r];
    data[i * 3 + 1] = decoded.data[i * 4 + ABGR.g];
    data[i * 3 + 2] = decoded.data[i * 4 + ABGR.b];
  }

  return { data, width, height, channels: 3 };
}

/** Encodes packed RGB (or RGBA, alpha ignored) pixels as a 24-bit BMP. */
export function encodeBmp(image: RawImage): Buffer {
  const { width, height, channels } = image;
  const data = Buffer.alloc(width * height * 4);

  for (let i = 0; i < width * height; i++) {
    data[i * 4 + ABGR.a] = 0xff;
    data[i * 4 + ABGR.r] = image.data[i * channels];
    data[i * 4 + ABGR.g] = image.data[i * channels + 1];
    data[i * 4 + ABGR.b] = image.data[i * channels + 2];
  }

  return bmp.encode({ data, width, height }).data;
}
