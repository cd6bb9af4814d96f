import path from "node:path";
import type { ConversionResult, TaskOutcome } from "./types.js";

export function formatOutcome(outcome: TaskOutcome, inputDir: string): string {
  if (outcome.kind === "failure") {
    return `✗ Failed: ${outcome.sourcePath} - ${outcome.error}`;
  }

  const relativePath = path.relative(inputDir, outcome.sourcePath);
  const originalKB = Math.floor(outcome.originalBytes / 1024);
  const newKB = Math.floor(outcome.newBytes / 1024);
  const saved = outcome.originalBytes > 0
    ? (1 - outcome.newBytes / outcome.originalBytes) * 100
    : 0;

  return `✓ ${relativePath} | ${originalKB}KB → ${newKB}KB (${saved.toFixed(1)}% saved)`;
}

export function formatSummary(result: ConversionResult, outputDir: string): string[] {
  const lines = [
    "",
    "Processing complete:",
    `  Processed:   ${result.processed}`,
    `  Failed:      ${result.failed}`,
    `  Duration:    ${result.duration}`,
    `  Input size:  ${result.totalSize}`,
    `  Output size: ${result.outputSize}`,
    `  Saved:       ${result.savedRatio}`,
    `  Output dir:  ${outputDir}`,
  ];

  if (result.warnings.length > 0) {
    lines.push("", "Warnings:", ...result.warnings.map((warning) => `  - ${warning}`));
  }

  if (result.cancelled) {
    lines.push("", "Cancelled: remaining files were not started");
  }

  return lines;
}

/**
 * Prints one line per finished file. The runner calls it from its aggregation
 * step, so lines from concurrent tasks never interleave.
 */
export class ConsoleReporter {
  constructor(
    private readonly inputDir: string,
    private readonly write: (line: string) => void = (line) => console.log(line),
  ) {}

  onOutcome(outcome: TaskOutcome): void {
    this.write(formatOutcome(outcome, this.inputDir));
  }

  summary(result: ConversionResult, outputDir: string): void {
    formatSummary(result, outputDir).forEach((line) => this.write(line));
  }
}
