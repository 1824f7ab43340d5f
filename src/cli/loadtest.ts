#!/usr/bin/env node

/**
 * loadtest CLI
 *
 * Usage:
 *   loadtest compare --a-url <url> --b-url <url> [-u 50 -d 30 -r 5]   # both systems, comparison report
 *   loadtest single --url <url> --label <name> [--scenario "REST API"] # one system
 *   loadtest report --input-a a.json --input-b b.json [-f html -o out.html]
 */

import { readFileSync, realpathSync } from 'node:fs';
import { join, resolve } from 'node:path';
import process from 'node:process';
import { pathToFileURL } from 'node:url';
import { Command, InvalidArgumentError } from 'commander';
import { z } from 'zod';
import { findPackageRoot, findScenario, loadConfig, type LoadTestConfig, type RunDefaults } from '../config/loader.js';
import type { LoadTesterOptions } from '../core/load-tester.js';
import { compare, type ComparisonReport } from '../reporting/comparison.js';
import { renderMarkdown, renderReport } from '../reporting/renderers.js';
import { fileTimestamp, loadResults, reportFileName, saveResults, writeTextFile } from '../reporting/result-store.js';
import { BenchmarkSuite } from '../runner/benchmark-suite.js';
import type { BenchmarkResult } from '../types/benchmark.js';
import type { Sleeper } from '../utils/delay.js';
import { ValidationError, wrapError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

/**
 * Hooks for embedding the commands (tests swap the output and clocks)
 */
export interface CliRuntime {
  write?: (text: string) => void;
  loadTester?: LoadTesterOptions;
  sleep?: Sleeper;
  logger?: Logger;
  now?: () => Date;
}

interface RunOverrides {
  configPath?: string;
  users?: number;
  duration?: number;
  rampUp?: number;
}

export interface CompareCommandOptions extends RunOverrides {
  aUrl?: string;
  bUrl?: string;
  aLabel?: string;
  bLabel?: string;
  /** Seconds between the two systems */
  pause?: number;
  outDir: string;
}

export interface CompareCommandOutput {
  report: ComparisonReport;
  reportPath: string;
  resultPaths: [string, string];
}

export interface SingleCommandOptions extends RunOverrides {
  url?: string;
  label?: string;
  scenario?: string;
  /** Save the result set here, for a later `report` */
  output?: string;
}

export interface ReportCommandOptions {
  inputA: string;
  inputB: string;
  format: string;
  output?: string;
}

const PackageJsonSchema = z.object({ version: z.string() });

function packageVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(join(findPackageRoot(), 'package.json'), 'utf-8'));
  const parsed = PackageJsonSchema.safeParse(raw);
  return parsed.success ? parsed.data.version : '0.0.0';
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive number.');
  }
  return parsed;
}

function parseNonNegativeNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be zero or a positive number.');
  }
  return parsed;
}

function resolveRun(config: LoadTestConfig, overrides: RunOverrides): RunDefaults {
  return {
    concurrentUsers: overrides.users ?? config.defaults.concurrentUsers,
    durationSeconds: overrides.duration ?? config.defaults.durationSeconds,
    rampUpSeconds: overrides.rampUp ?? config.defaults.rampUpSeconds,
  };
}

function createSuite(
  config: LoadTestConfig,
  run: RunDefaults,
  runtime: CliRuntime,
  overrides: { scenarios?: LoadTestConfig['scenarios']; systemPauseMs?: number } = {}
): BenchmarkSuite {
  return new BenchmarkSuite({
    scenarios: overrides.scenarios ?? config.scenarios,
    run,
    scenarioPauseMs: config.timing.scenarioPauseMs,
    systemPauseMs: overrides.systemPauseMs ?? config.timing.systemPauseMs,
    loadTester: {
      requestTimeoutMs: config.timing.requestTimeoutMs,
      thinkTimeMs: config.timing.thinkTimeMs,
      ...runtime.loadTester,
    },
    logger: runtime.logger,
    sleep: runtime.sleep,
  });
}

/**
 * File-name-safe version of a system label
 */
export function slugify(label: string): string {
  const slug = label.replace(/[^A-Za-z0-9_-]+/g, '_').replace(/^_+|_+$/g, '');
  return slug.length > 0 ? slug : 'system';
}

export function formatResultLine(result: BenchmarkResult): string {
  return (
    `${result.testName}: ${result.requestsPerSecond.toFixed(2)} req/s, ` +
    `avg ${result.averageResponseTimeMs.toFixed(2)}ms, ` +
    `p95 ${result.p95ResponseTimeMs.toFixed(2)}ms, ` +
    `p99 ${result.p99ResponseTimeMs.toFixed(2)}ms`
  );
}

export async function runCompareCommand(
  options: CompareCommandOptions,
  runtime: CliRuntime = {}
): Promise<CompareCommandOutput> {
  const write = runtime.write ?? ((text: string) => process.stdout.write(text));
  const config = await loadConfig(options.configPath);

  const a = {
    label: options.aLabel ?? config.systems.a.label,
    url: options.aUrl ?? config.systems.a.url,
  };
  const b = {
    label: options.bLabel ?? config.systems.b.label,
    url: options.bUrl ?? config.systems.b.url,
  };

  const suite = createSuite(config, resolveRun(config, options), runtime, {
    systemPauseMs: options.pause === undefined ? undefined : Math.round(options.pause * 1000),
  });
  const run = await suite.runComparison(a, b);

  const finishedAt = runtime.now?.() ?? new Date();
  const report = compare(run.a, run.b, finishedAt);
  const markdown = renderMarkdown(report);

  const outDir = resolve(options.outDir);
  const reportPath = join(outDir, reportFileName(finishedAt));
  const stamp = fileTimestamp(finishedAt);
  const resultPaths: [string, string] = [
    join(outDir, `results_a_${slugify(a.label)}_${stamp}.json`),
    join(outDir, `results_b_${slugify(b.label)}_${stamp}.json`),
  ];

  await writeTextFile(reportPath, markdown);
  await saveResults(resultPaths[0], run.a.name, run.a.results, finishedAt);
  await saveResults(resultPaths[1], run.b.name, run.b.results, finishedAt);

  write(markdown);
  write(`\nReport saved to ${reportPath}\n`);

  return { report, reportPath, resultPaths };
}

export async function runSingleCommand(
  options: SingleCommandOptions,
  runtime: CliRuntime = {}
): Promise<BenchmarkResult[]> {
  const write = runtime.write ?? ((text: string) => process.stdout.write(text));
  const config = await loadConfig(options.configPath);

  const target = {
    label: options.label ?? config.systems.a.label,
    url: options.url ?? config.systems.a.url,
  };
  const scenarios = options.scenario === undefined ? config.scenarios : [findScenario(config, options.scenario)];

  const suite = createSuite(config, resolveRun(config, options), runtime, { scenarios });
  const results = await suite.runSystem(target);

  write(`Results for ${target.label}:\n`);
  for (const result of results) {
    write(`  ${formatResultLine(result)}\n`);
  }

  if (options.output !== undefined) {
    const path = resolve(options.output);
    await saveResults(path, target.label, results, runtime.now?.() ?? new Date());
    write(`Results saved to ${path}\n`);
  }

  return results;
}

export async function runReportCommand(options: ReportCommandOptions, runtime: CliRuntime = {}): Promise<string> {
  const write = runtime.write ?? ((text: string) => process.stdout.write(text));
  const [a, b] = await Promise.all([loadResults(options.inputA), loadResults(options.inputB)]);

  const report = compare(
    { name: a.system, results: a.results },
    { name: b.system, results: b.results },
    runtime.now?.() ?? new Date()
  );
  const content = renderReport(report, options.format);

  if (options.output === undefined) {
    write(content);
  } else {
    const path = resolve(options.output);
    await writeTextFile(path, content);
    write(`Report written to ${path}\n`);
  }

  return content;
}

function addRunOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Load-test configuration file (YAML)')
    .option('-u, --users <count>', 'Concurrent virtual users', parsePositiveInt)
    .option('-d, --duration <seconds>', 'Benchmark duration per scenario', parsePositiveNumber)
    .option('-r, --ramp-up <seconds>', 'Ramp-up period', parseNonNegativeNumber);
}

export function createProgram(runtime: CliRuntime = {}): Command {
  const program = new Command();
  program
    .name('loadtest')
    .description('Weighted HTTP load generator and side-by-side benchmark comparison')
    .version(packageVersion());

  addRunOptions(
    program
      .command('compare')
      .description('Run the scenario suite against two systems and write a comparison report')
      .option('--a-url <url>', 'Base URL of system A')
      .option('--b-url <url>', 'Base URL of system B')
      .option('--a-label <name>', 'Display name of system A')
      .option('--b-label <name>', 'Display name of system B')
      .option('--pause <seconds>', 'Cool-down between the two systems', parseNonNegativeNumber)
      .option('--out-dir <dir>', 'Directory for the report and result files', '.')
  ).action(async (cmdOptions: Omit<CompareCommandOptions, 'configPath'> & { config?: string }) => {
    await runCompareCommand({ ...cmdOptions, configPath: cmdOptions.config }, runtime);
  });

  addRunOptions(
    program
      .command('single')
      .description('Run the scenario suite (or one scenario) against one system')
      .option('--url <url>', 'Base URL of the system under test')
      .option('--label <name>', 'Display name of the system')
      .option('--scenario <name>', 'Run only this scenario')
      .option('-o, --output <file>', 'Save the result set as JSON')
  ).action(async (cmdOptions: Omit<SingleCommandOptions, 'configPath'> & { config?: string }) => {
    await runSingleCommand({ ...cmdOptions, configPath: cmdOptions.config }, runtime);
  });

  program
    .command('report')
    .description('Render a comparison from two saved result files')
    .requiredOption('--input-a <file>', 'Result set of system A')
    .requiredOption('--input-b <file>', 'Result set of system B')
    .option('-f, --format <format>', 'markdown | md | json | html', 'markdown')
    .option('-o, --output <file>', 'Write to a file instead of stdout')
    .action(async (cmdOptions: ReportCommandOptions) => {
      await runReportCommand(cmdOptions, runtime);
    });

  return program;
}

export async function runCli(argv: string[] = process.argv, runtime: CliRuntime = {}): Promise<void> {
  await createProgram(runtime).parseAsync(argv);
}

/**
 * Lines printed to stderr when a command fails
 */
export function formatCliError(error: unknown): string[] {
  const wrapped = wrapError(error);
  const lines = [`Error [${wrapped.code}]: ${wrapped.message}`];
  if (wrapped instanceof ValidationError) {
    wrapped.errors.forEach((issue) => lines.push(`  ${issue.path}: ${issue.message}`));
  }
  return lines;
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (entry === undefined) {
    return false;
  }
  try {
    return pathToFileURL(realpathSync(entry)).href === import.meta.url;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  runCli().catch((error: unknown) => {
    formatCliError(error).forEach((line) => console.error(line));
    process.exitCode = 1;
  });
}
