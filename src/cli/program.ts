/**
 * pixeldiff command definition, kept apart from the bin entry so tests can
 * drive it with in-memory I/O.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import { readFile, writeFile } from 'node:fs/promises';
import { performance } from 'node:perf_hooks';
import { DimensionMismatchError, extractErrorMessage } from '../core/errors.js';
import { PixelComparator } from '../core/pixel-comparator.js';
import type { ImageDiffResult, RGBColor } from '../core/types.js';

export const VERSION = '0.1.0';

export const EXIT_CODES = {
  identical: 0,
  error: 1,
  dimensionMismatch: 65,
  different: 66,
} as const;

export type OutputFormat = 'text' | 'json';

export interface CliIO {
  readFile(path: string): Promise<Buffer>;
  writeFile(path: string, data: Buffer): Promise<void>;
  log(message: string): void;
  error(message: string): void;
  /** Milliseconds from a monotonic clock */
  now(): number;
}

export const nodeIO: CliIO = {
  readFile: (path) => readFile(path),
  writeFile: (path, data) => writeFile(path, data),
  log: (message) => console.log(message),
  error: (message) => console.error(message),
  now: () => performance.now(),
};

export interface CliFlags {
  threshold?: number;
  includeAa?: boolean;
  alpha?: number;
  diffMask?: boolean;
  aaColor?: RGBColor;
  diffColor?: RGBColor;
  diffColorAlt?: RGBColor;
  format: OutputFormat;
}

export interface DiffPaths {
  expected: string;
  actual: string;
  diff?: string;
}

export interface DiffReport {
  paths: DiffPaths;
  result: ImageDiffResult;
  elapsedMs: number;
}

// ── Argument Parsing ──

export function parseUnitInterval(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new InvalidArgumentError('Must be a number between 0 and 1.');
  }
  return parsed;
}

export function parseColor(value: string): RGBColor {
  const parts = value.split(',').map((part) => part.trim());
  const channels = parts.map(Number);
  if (
    parts.length !== 3 ||
    parts.some((part) => !/^\d+$/.test(part)) ||
    channels.some((channel) => channel > 255)
  ) {
    throw new InvalidArgumentError('Must be three comma-separated integers 0-255, e.g. 255,0,0.');
  }
  return [channels[0], channels[1], channels[2]];
}

// ── Running ──

export function exitCodeFor(diffPixels: number): number {
  return diffPixels === 0 ? EXIT_CODES.identical : EXIT_CODES.different;
}

export function errorPercentage(result: ImageDiffResult): number {
  if (result.totalPixels === 0) return 0;
  return Math.round((100 * 100 * result.diffPixels) / result.totalPixels) / 100;
}

/**
 * Read both images, compare them and write the diff image when a path is
 * given.
 */
export async function runDiff(paths: DiffPaths, flags: CliFlags, io: CliIO): Promise<DiffReport> {
  const [expectedImage, actualImage] = await Promise.all([
    io.readFile(paths.expected),
    io.readFile(paths.actual),
  ]);

  const comparator = new PixelComparator();
  const start = io.now();
  const result = comparator.compare(expectedImage, actualImage, {
    threshold: flags.threshold,
    includeAA: flags.includeAa,
    alpha: flags.alpha,
    diffMask: flags.diffMask,
    aaColor: flags.aaColor,
    diffColor: flags.diffColor,
    diffColorAlt: flags.diffColorAlt,
    output: paths.diff !== undefined,
  });
  const elapsedMs = io.now() - start;

  if (paths.diff !== undefined && result.diffImage) {
    await io.writeFile(paths.diff, result.diffImage);
  }

  return { paths, result, elapsedMs };
}

// ── Output Formatting ──

export function formatTextReport(report: DiffReport): string {
  const { result } = report;
  const lines: string[] = [];

  lines.push(chalk.bold('Pixel Difference Report'));
  lines.push(chalk.bold('======================='));
  lines.push('');
  lines.push(`matched in ${report.elapsedMs.toFixed(2)}ms`);

  const count = result.diffPixels === 0 ? chalk.green('0') : chalk.red(String(result.diffPixels));
  lines.push(`different pixels: ${count}`);
  lines.push(`error: ${errorPercentage(result)}%`);

  if (report.paths.diff !== undefined) {
    lines.push(chalk.green(`Diff image saved to ${report.paths.diff}`));
  }

  return lines.join('\n');
}

export function formatJsonReport(report: DiffReport): string {
  const { result } = report;
  return JSON.stringify(
    {
      expected: report.paths.expected,
      actual: report.paths.actual,
      diff: report.paths.diff ?? null,
      width: result.width,
      height: result.height,
      totalPixels: result.totalPixels,
      diffPixels: result.diffPixels,
      diffPercentage: result.diffPercentage,
      elapsedMs: report.elapsedMs,
    },
    null,
    2
  );
}

// ── Command ──

export function createProgram(
  io: CliIO = nodeIO,
  exit: (code: number) => void = (code) => process.exit(code)
): Command {
  const program = new Command();

  program
    .name('pixeldiff')
    .description('Compare two PNG images pixel by pixel')
    .version(VERSION)
    .argument('<expected>', 'Path to the expected PNG')
    .argument('<actual>', 'Path to the actual PNG')
    .argument('[diff]', 'Path to write the diff PNG')
    .option('-t, --threshold <number>', 'Matching threshold (0-1), smaller is more sensitive', parseUnitInterval)
    .option('--include-aa', 'Count anti-aliased pixels as differences')
    .option('--alpha <number>', 'Opacity of the original image in the diff (0-1)', parseUnitInterval)
    .option('--diff-mask', 'Draw the diff over a transparent background')
    .option('--aa-color <r,g,b>', 'Color of anti-aliased pixels', parseColor)
    .option('--diff-color <r,g,b>', 'Color of differing pixels', parseColor)
    .option('--diff-color-alt <r,g,b>', 'Color of differing pixels where the expected image is brighter', parseColor)
    .addOption(
      new Option('--format <format>', 'Output format').choices(['text', 'json']).default('text')
    )
    .action(async (expected: string, actual: string, diff: string | undefined, flags: CliFlags) => {
      try {
        const report = await runDiff({ expected, actual, diff }, flags, io);
        io.log(flags.format === 'json' ? formatJsonReport(report) : formatTextReport(report));
        exit(exitCodeFor(report.result.diffPixels));
      } catch (error) {
        io.error(`${chalk.red('Error:')} ${extractErrorMessage(error)}`);
        exit(
          error instanceof DimensionMismatchError ? EXIT_CODES.dimensionMismatch : EXIT_CODES.error
        );
      }
    });

  return program;
}
