export type OutputFormat = "jpg" | "png" | "webp";

export type ColorMode = "palette" | "grayscale" | "grayscale-alpha" | "rgb" | "rgba" | "cmyk";

export interface Size {
  width: number;
  height: number;
}

export type ResizeMode =
  | { kind: "none" }
  | { kind: "max-dimension"; maxDimension: number }
  | { kind: "exact-size"; width: number; height: number; maintainAspect: boolean };

export type ResizeAction = { kind: "none" } | { kind: "resize"; size: Size };

export interface EncodeParams {
  quality?: number;
  compressionLevel?: number;
  optimize: boolean;
}

export interface BatchConfig {
  readonly inputDir: string;
  readonly outputDir: string;
  readonly quality: number;
  readonly resize: ResizeMode;
  readonly targetFormat?: OutputFormat;
  readonly recursive: boolean;
  readonly concurrency: number;
}

/** Raw settings as they come from the command line, before validation. */
export interface ConfigInput {
  inputDir: string;
  outputDir: string;
  quality?: number;
  maxSize?: number;
  exactSize?: [number, number];
  maintainAspect?: boolean;
  format?: string;
  recursive?: boolean;
  concurrency?: number;
}

/**
 * Decoded image owned by a single task. Operations are recorded on the handle
 * and applied when it is encoded.
 */
export interface ImageHandle {
  readonly width: number;
  readonly height: number;
  readonly colorMode: ColorMode;
  resize(size: Size): void;
  convertMode(mode: ColorMode): void;
  encode(format: string, params: EncodeParams): Promise<Buffer>;
}

export interface Codec {
  decode(filePath: string): Promise<ImageHandle>;
}

export type TaskOutcome =
  | {
      kind: "success";
      sourcePath: string;
      outputPath: string;
      originalBytes: number;
      newBytes: number;
    }
  | {
      kind: "failure";
      sourcePath: string;
      error: string;
    };

export interface ConversionStats {
  processed: number;
  failed: number;
  originalBytes: number;
  outputBytes: number;
  startTime: number | null;
  endTime: number | null;
}

export interface ConversionResult {
  totalFiles: number;
  processed: number;
  failed: number;
  cancelled: boolean;
  /** Problems that did not stop the run, such as unreadable subdirectories. */
  warnings: string[];
  duration: string;
  totalSize: string;
  outputSize: string;
  savedRatio: string;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export type OutcomeListener = (outcome: TaskOutcome) => void;

export interface ParsedArgs {
  inputs: string[];
  quality: number;
  maxSize?: number;
  exactSize?: [number, number];
  maintainAspect: boolean;
  format?: string;
  recursive: boolean;
  jobs?: number;
  help: boolean;
  version: boolean;
}
