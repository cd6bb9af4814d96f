import path from "node:path";
import fs from "node:fs/promises";
import crypto from "node:crypto";
import pLimit from "p-limit";
import { discoverImages, snapshot } from "./discovery.js";
import { computeTargetSize } from "./resizePolicy.js";
import { effectiveFormat, encodeParams, needsAlphaFlatten } from "./conversionPolicy.js";
import { ensureDirectory, isWithin, outputPath } from "./pathMirror.js";
import { EncodeError, errorMessage } from "./errors.js";
import { SharpCodec } from "./sharpCodec.js";
import { TEMP_PREFIX, formatBytes, formatDuration } from "./utils.js";
import type {
  BatchConfig,
  Codec,
  ConversionResult,
  ConversionStats,
  OutcomeListener,
  RunOptions,
  TaskOutcome,
} from "./types.js";

// Tasks allowed to be queued or running per worker.
const QUEUE_FACTOR = 2;

export interface BatchConverterOptions {
  codec?: Codec;
  onOutcome?: OutcomeListener;
}

function emptyStats(): ConversionStats {
  return {
    processed: 0,
    failed: 0,
    originalBytes: 0,
    outputBytes: 0,
    startTime: null,
    endTime: null,
  };
}

export class BatchConverter {
  readonly config: BatchConfig;
  stats: ConversionStats = emptyStats();

  private readonly codec: Codec;
  private readonly onOutcome?: OutcomeListener;
  private directories = new Map<string, Promise<void>>();

  constructor(config: BatchConfig, options: BatchConverterOptions = {}) {
    this.config = config;
    this.codec = options.codec ?? new SharpCodec();
    this.onOutcome = options.onOutcome;
  }

  /**
   * Converts every discovered image and resolves once all of them have an
   * outcome. When `signal` aborts, no new file is started; files already being
   * converted are allowed to finish.
   */
  async run(options: RunOptions = {}): Promise<ConversionResult> {
    const { signal } = options;
    this.stats = emptyStats();
    this.directories = new Map();
    this.stats.startTime = Date.now();

    const limit = pLimit(this.config.concurrency);
    const maxQueued = this.config.concurrency * QUEUE_FACTOR;
    const inFlight = new Set<Promise<void>>();
    const warnings: string[] = [];
    let cancelled = false;

    const { inputDir, outputDir, recursive } = this.config;
    const discovered = discoverImages(inputDir, recursive, {
      exclude: [outputDir],
      onUnreadable: (dir, err) => warnings.push(`skipped unreadable directory ${dir}: ${errorMessage(err)}`),
    });
    // Outputs written into the tree being walked must not be discovered again.
    const sources = isWithin(inputDir, outputDir) ? snapshot(discovered) : discovered;

    try {
      for await (const sourcePath of sources) {
        if (signal?.aborted) {
          cancelled = true;
          break;
        }

        const task: Promise<void> = limit(async () => {
          if (signal?.aborted) {
            cancelled = true;
            return;
          }
          this.recordOutcome(await this.convertImage(sourcePath));
        }).then(() => {
          inFlight.delete(task);
        });
        inFlight.add(task);

        if (inFlight.size >= maxQueued) {
          await Promise.race(inFlight);
        }
      }
    } finally {
      await Promise.allSettled(inFlight);
    }

    this.stats.endTime = Date.now();
    return this.buildResult(cancelled, warnings);
  }

  /** Runs the full pipeline for one file. Never rejects. */
  async convertImage(sourcePath: string): Promise<TaskOutcome> {
    let tempOutput: string | undefined;

    try {
      const originalBytes = (await fs.stat(sourcePath)).size;
      const image = await this.codec.decode(sourcePath);

      const action = computeTargetSize({ width: image.width, height: image.height }, this.config.resize);
      if (action.kind === "resize") {
        image.resize(action.size);
      }

      const format = effectiveFormat(path.extname(sourcePath), this.config.targetFormat);
      if (needsAlphaFlatten(image.colorMode, format)) {
        image.convertMode("rgb");
      }

      const encoded = await image.encode(format, encodeParams(format, this.config.quality));

      const target = outputPath(this.config.inputDir, sourcePath, this.config.outputDir, format);
      await this.ensureDirectory(path.dirname(target));

      tempOutput = path.join(path.dirname(target), `${TEMP_PREFIX}${crypto.randomBytes(8).toString("hex")}.${format}`);
      try {
        await fs.writeFile(tempOutput, encoded);
        await fs.rename(tempOutput, target);
      } catch (err) {
        throw new EncodeError(`cannot write ${target}: ${errorMessage(err)}`, { cause: err });
      }
      tempOutput = undefined;

      return {
        kind: "success",
        sourcePath,
        outputPath: target,
        originalBytes,
        newBytes: encoded.length,
      };
    } catch (err) {
      if (tempOutput) {
        await this.removeTemp(tempOutput);
      }
      return { kind: "failure", sourcePath, error: errorMessage(err) };
    }
  }

  private async removeTemp(tempOutput: string): Promise<void> {
    try {
      await fs.rm(tempOutput, { force: true });
    } catch (err) {
      console.warn(`Warning: could not remove temporary file ${tempOutput}: ${errorMessage(err)}`);
    }
  }

  // Each output directory is created once; later tasks await the same promise.
  private ensureDirectory(dir: string): Promise<void> {
    let pending = this.directories.get(dir);
    if (!pending) {
      pending = ensureDirectory(dir);
      this.directories.set(dir, pending);
    }
    return pending;
  }

  private recordOutcome(outcome: TaskOutcome): void {
    if (outcome.kind === "success") {
      this.stats.processed++;
      this.stats.originalBytes += outcome.originalBytes;
      this.stats.outputBytes += outcome.newBytes;
    } else {
      this.stats.failed++;
    }
    try {
      this.onOutcome?.(outcome);
    } catch (err) {
      console.warn(`Warning: outcome listener failed for ${outcome.sourcePath}: ${errorMessage(err)}`);
    }
  }

  private buildResult(cancelled: boolean, warnings: string[]): ConversionResult {
    const duration = this.stats.startTime && this.stats.endTime
      ? formatDuration(this.stats.endTime - this.stats.startTime)
      : "0s";

    const saved = this.stats.originalBytes - this.stats.outputBytes;
    const ratio = this.stats.originalBytes > 0
      ? ((saved / this.stats.originalBytes) * 100).toFixed(2) + "%"
      : "0%";

    return {
      totalFiles: this.stats.processed + this.stats.failed,
      processed: this.stats.processed,
      failed: this.stats.failed,
      cancelled,
      warnings,
      duration,
      totalSize: formatBytes(this.stats.originalBytes),
      outputSize: formatBytes(this.stats.outputBytes),
      savedRatio: ratio,
    };
  }
}
