import sharp from "sharp";
import path from "node:path";
import fs from "node:fs/promises";
import { decodeBmp, encodeBmp } from "./bmp.js";
import type { RawImage } from "./bmp.js";
import { ConversionError, DecodeError, EncodeError, ResizeError, errorMessage } from "./errors.js";
import type { Codec, ColorMode, EncodeParams, ImageHandle, Size } from "./types.js";

const LIMIT_INPUT_PIXELS = 268402689; // 16384 x 16384

/** Background used when transparency has to be dropped. */
export const FLATTEN_BACKGROUND = "#ffffff";

type ModeMetadata = Pick<sharp.Metadata, "channels" | "space" | "hasAlpha" | "paletteBitDepth">;

export function colorModeOf(metadata: ModeMetadata): ColorMode {
  if (metadata.paletteBitDepth !== undefined) {
    return "palette";
  }
  if (metadata.space === "cmyk") {
    return "cmyk";
  }

  const grey = metadata.space === "b-w" || metadata.space === "grey16" || (metadata.channels ?? 3) <= 2;
  if (grey) {
    return metadata.hasAlpha ? "grayscale-alpha" : "grayscale";
  }
  return metadata.hasAlpha ? "rgba" : "rgb";
}

class SharpImageHandle implements ImageHandle {
  constructor(
    private readonly pipeline: sharp.Sharp,
    public width: number,
    public height: number,
    public colorMode: ColorMode,
  ) {}

  resize(size: Size): void {
    try {
      this.pipeline.resize(size.width, size.height, { fit: "fill", kernel: "lanczos3" });
    } catch (err) {
      throw new ResizeError(`cannot resize to ${size.width}x${size.height}: ${errorMessage(err)}`, { cause: err });
    }
    this.width = size.width;
    this.height = size.height;
  }

  convertMode(mode: ColorMode): void {
    switch (mode) {
      case "rgb":
        this.pipeline.flatten({ background: FLATTEN_BACKGROUND }).toColourspace("srgb");
        break;
      case "rgba":
        this.pipeline.ensureAlpha().toColourspace("srgb");
        break;
      case "grayscale":
        this.pipeline.flatten({ background: FLATTEN_BACKGROUND }).toColourspace("b-w");
        break;
      default:
        throw new ConversionError(`cannot convert ${this.colorMode} to ${mode}`);
    }
    this.colorMode = mode;
  }

  async encode(format: string, params: EncodeParams): Promise<Buffer> {
    // sharp validates format options synchronously, so they are set inside the try.
    try {
      switch (format.toLowerCase()) {
        case "jpg":
        case "jpeg":
          return await this.pipeline.jpeg({ quality: params.quality, optimiseCoding: params.optimize }).toBuffer();
        case "png":
          return await this.pipeline
            .png({ compressionLevel: params.compressionLevel, adaptiveFiltering: params.optimize })
            .toBuffer();
        case "webp":
          return await this.pipeline.webp({ quality: params.quality, effort: params.optimize ? 6 : 4 }).toBuffer();
        case "tiff":
          return await this.pipeline.tiff({ quality: params.quality }).toBuffer();
        case "bmp":
          return encodeBmp(await this.toRgb());
        default:
          throw new EncodeError(`unsupported output format: ${format}`);
      }
    } catch (err) {
      if (err instanceof EncodeError) throw err;
      throw new EncodeError(`cannot encode ${format}: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async toRgb(): Promise<RawImage> {
    const { data, info } = await this.pipeline
      .flatten({ background: FLATTEN_BACKGROUND })
      .toColourspace("srgb")
      .raw()
      .toBuffer({ resolveWithObject: true });
    return { data, width: info.width, height: info.height, channels: info.channels };
  }
}

export class SharpCodec implements Codec {
  constructor() {
    sharp.cache({ memory: 512 });
  }

  async decode(filePath: string): Promise<ImageHandle> {
    try {
      if (path.extname(filePath).toLowerCase() === ".bmp") {
        return await this.decodeBitmap(filePath);
      }

      const pipeline = sharp(filePath, {
        failOn: "error",
        limitInputPixels: LIMIT_INPUT_PIXELS,
        sequentialRead: true,
      });

      const metadata = await pipeline.metadata();
      if (metadata.width === undefined || metadata.height === undefined) {
        throw new Error("image has no dimensions");
      }

      // Auto-rotate based on EXIF; orientations 5-8 swap the axes.
      pipeline.rotate();
      const swapped = (metadata.orientation ?? 1) >= 5;
      const width = swapped ? metadata.height : metadata.width;
      const height = swapped ? metadata.width : metadata.height;

      return new SharpImageHandle(pipeline, width, height, colorModeOf(metadata));
    } catch (err) {
      throw new DecodeError(`cannot decode ${filePath}: ${errorMessage(err)}`, { cause: err });
    }
  }

  // libvips has no BMP loader; bmp-js supplies the pixels instead.
  private async decodeBitmap(filePath: string): Promise<ImageHandle> {
    const { data, width, height } = decodeBmp(await fs.readFile(filePath));
    const pipeline = sharp(data, {
      raw: { width, height, channels: 3 },
      limitInputPixels: LIMIT_INPUT_PIXELS,
    });
    return new SharpImageHandle(pipeline, width, height, "rgb");
  }
}
