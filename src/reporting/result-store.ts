/**
 * Persistence of benchmark result sets
 *
 * A result set is one system's BenchmarkResult list written as JSON, so a
 * comparison can be rendered later without re-running anything.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { toValidationIssues } from '../config/benchmark-config.js';
import { ResultSetFileSchema } from '../types/schemas/benchmark.js';
import type { BenchmarkResult, ResultSetFile } from '../types/benchmark.js';
import { ReportError, ValidationError, toError } from '../utils/errors.js';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `YYYYMMDD_HHMMSS` in UTC
 */
export function fileTimestamp(date: Date = new Date()): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export function reportFileName(date: Date = new Date(), extension = 'md'): string {
  return `benchmark_report_${fileTimestamp(date)}.${extension}`;
}

export async function writeTextFile(path: string, contents: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, contents, 'utf-8');
}

export async function saveResults(
  path: string,
  system: string,
  results: readonly BenchmarkResult[],
  generatedAt: Date = new Date()
): Promise<ResultSetFile> {
  const file: ResultSetFile = {
    system,
    generatedAt: generatedAt.toISOString(),
    results: [...results],
  };
  await writeTextFile(path, `${JSON.stringify(file, null, 2)}\n`);
  return file;
}

/**
 * Read and validate a saved result set
 *
 * @throws {ReportError} if the file cannot be read or is not JSON
 * @throws {ValidationError} if the contents do not match the schema
 */
export async function loadResults(path: string): Promise<ResultSetFile> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    const cause = toError(error);
    throw new ReportError(`Failed to read results from ${path}: ${cause.message}`, cause);
  }

  const parsed = ResultSetFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Invalid result file ${path}`, toValidationIssues(parsed.error));
  }
  return parsed.data;
}
