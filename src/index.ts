#!/usr/bin/env node

import { createRequire } from "node:module";
import fs from "node:fs/promises";
import { BatchConverter } from "./converter.js";
import { DEFAULT_QUALITY, createConfig } from "./config.js";
import { ConfigError, errorMessage } from "./errors.js";
import { ConsoleReporter } from "./reporter.js";
import { SUPPORTED_EXTENSIONS } from "./utils.js";
import type { BatchConfig, ParsedArgs } from "./types.js";

const require = createRequire(import.meta.url);
const { version: VERSION } = require("../package.json") as { version: string };

const HELP = `
imgbatch v${VERSION} — Batch resize and convert images

Usage:
  imgbatch <input_dir> <output_dir> [options]

Options:
  -q, --quality <n>        Quality 1-100 (default: ${DEFAULT_QUALITY}); sets the PNG compression level
  -s, --max-size <n>       Maximum width or height, keeps aspect ratio
  -e, --exact-size <w> <h> Fit within (or, with --no-aspect, resize to) w x h
      --no-aspect          Do not keep the aspect ratio (use with -e)
  -f, --format <fmt>       Convert all outputs to jpg, png or webp
  -r, --recursive          Process subdirectories recursively
  -j, --jobs <n>           Number of images converted at once (default: CPU count)
  -h, --help               Show this help message
  -v, --version            Show version number

Examples:
  imgbatch ./photos ./output -q 75
  imgbatch ./photos ./output -s 1920 -f webp
  imgbatch ./photos ./output -e 800 600 --no-aspect
  imgbatch ./photos ./output -r

Supported formats: ${SUPPORTED_EXTENSIONS.map((ext) => ext.slice(1)).join(", ")}
`.trim();

function fail(message: string): never {
  console.error(`Error: ${message}`);
  console.error("Run imgbatch --help for usage");
  process.exit(1);
}

function parseInteger(option: string, value: string | undefined): number {
  if (value === undefined) {
    fail(`${option} requires a numeric argument`);
  }
  if (!/^-?\d+$/.test(value)) {
    fail(`invalid ${option} value: ${value}`);
  }
  return parseInt(value, 10);
}

function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const result: ParsedArgs = {
    inputs: [],
    quality: DEFAULT_QUALITY,
    maintainAspect: true,
    recursive: false,
    help: false,
    version: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      result.help = true;
      return result;
    }

    if (arg === "-v" || arg === "--version") {
      result.version = true;
      return result;
    }

    if (arg === "-r" || arg === "--recursive") {
      result.recursive = true;
      continue;
    }

    if (arg === "--no-aspect") {
      result.maintainAspect = false;
      continue;
    }

    if (arg === "-q" || arg === "--quality") {
      result.quality = parseInteger("--quality", args[++i]);
      continue;
    }

    if (arg === "-s" || arg === "--max-size") {
      result.maxSize = parseInteger("--max-size", args[++i]);
      continue;
    }

    if (arg === "-e" || arg === "--exact-size") {
      const width = parseInteger("--exact-size", args[++i]);
      const height = parseInteger("--exact-size", args[++i]);
      result.exactSize = [width, height];
      continue;
    }

    if (arg === "-j" || arg === "--jobs") {
      result.jobs = parseInteger("--jobs", args[++i]);
      continue;
    }

    if (arg === "-f" || arg === "--format") {
      const next = args[++i];
      if (next === undefined) {
        fail("--format requires a format argument");
      }
      result.format = next;
      continue;
    }

    if (arg.startsWith("-")) {
      fail(`unknown option: ${arg}`);
    }

    result.inputs.push(arg);
  }

  return result;
}

async function buildConfig(parsed: ParsedArgs): Promise<BatchConfig> {
  const [inputDir, outputDir] = parsed.inputs;
  if (inputDir === undefined || outputDir === undefined) {
    throw new ConfigError("both <input_dir> and <output_dir> are required");
  }
  if (parsed.inputs.length > 2) {
    throw new ConfigError(`unexpected argument: ${parsed.inputs[2]}`);
  }

  const config = createConfig({
    inputDir,
    outputDir,
    quality: parsed.quality,
    maxSize: parsed.maxSize,
    exactSize: parsed.exactSize,
    maintainAspect: parsed.maintainAspect,
    format: parsed.format,
    recursive: parsed.recursive,
    concurrency: parsed.jobs,
  });

  let isDirectory: boolean;
  try {
    isDirectory = (await fs.stat(config.inputDir)).isDirectory();
  } catch (err) {
    throw new ConfigError(`cannot read input directory ${inputDir}: ${errorMessage(err)}`, { cause: err });
  }
  if (!isDirectory) {
    throw new ConfigError(`input path is not a directory: ${inputDir}`);
  }

  return config;
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv);

  if (parsed.help) {
    console.log(HELP);
    return;
  }

  if (parsed.version) {
    console.log(VERSION);
    return;
  }

  let config: BatchConfig;
  try {
    config = await buildConfig(parsed);
  } catch (err) {
    if (err instanceof ConfigError) {
      fail(err.message);
    }
    throw err;
  }

  const reporter = new ConsoleReporter(config.inputDir);
  const converter = new BatchConverter(config, {
    onOutcome: (outcome) => reporter.onOutcome(outcome),
  });

  const controller = new AbortController();
  const onInterrupt = (): void => {
    console.error("\nInterrupted: finishing images already in progress...");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  console.log(`Scanning for images in: ${config.inputDir}`);

  try {
    const results = await converter.run({ signal: controller.signal });

    if (results.totalFiles === 0 && !results.cancelled) {
      console.log("No supported images found");
      results.warnings.forEach((warning) => console.warn(`Warning: ${warning}`));
      return;
    }

    reporter.summary(results, config.outputDir);
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}

main().catch((err) => {
  console.error("Error:", errorMessage(err));
  process.exit(1);
});
