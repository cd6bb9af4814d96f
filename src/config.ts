import os from "node:os";
import path from "node:path";
import { ConfigError } from "./errors.js";
import type { BatchConfig, ConfigInput, OutputFormat, ResizeMode } from "./types.js";

export const DEFAULT_QUALITY = 85;
export const OUTPUT_FORMATS: readonly OutputFormat[] = ["jpg", "png", "webp"];

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

function requireInteger(name: string, value: number): number {
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${name} must be an integer, got ${value}`);
  }
  return value;
}

function resolveResizeMode(input: ConfigInput): ResizeMode {
  if (input.maxSize !== undefined && input.exactSize !== undefined) {
    throw new ConfigError("--max-size and --exact-size are mutually exclusive");
  }

  if (input.maxSize !== undefined) {
    return { kind: "max-dimension", maxDimension: requireInteger("max size", input.maxSize) };
  }

  if (input.exactSize !== undefined) {
    const [width, height] = input.exactSize;
    return {
      kind: "exact-size",
      width: requireInteger("exact width", width),
      height: requireInteger("exact height", height),
      maintainAspect: input.maintainAspect ?? true,
    };
  }

  return { kind: "none" };
}

/**
 * Validates raw settings and freezes them into the configuration shared by
 * every task of a run. Quality is only checked for being an integer; its range
 * is left to the codec.
 */
export function createConfig(input: ConfigInput): BatchConfig {
  const quality = requireInteger("quality", input.quality ?? DEFAULT_QUALITY);
  const resize = resolveResizeMode(input);

  let targetFormat: OutputFormat | undefined;
  if (input.format !== undefined) {
    const format = input.format.toLowerCase();
    if (!isOutputFormat(format)) {
      throw new ConfigError(`unsupported output format: ${input.format} (choose from ${OUTPUT_FORMATS.join(", ")})`);
    }
    targetFormat = format;
  }

  const concurrency = requireInteger("jobs", input.concurrency ?? os.availableParallelism());
  if (concurrency < 1) {
    throw new ConfigError(`jobs must be at least 1, got ${concurrency}`);
  }

  return Object.freeze({
    inputDir: path.resolve(input.inputDir),
    outputDir: path.resolve(input.outputDir),
    quality,
    resize: Object.freeze(resize),
    targetFormat,
    recursive: input.recursive ?? false,
    concurrency,
  });
}
