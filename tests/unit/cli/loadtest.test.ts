import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { stringify } from 'yaml';
import {
  createProgram,
  formatCliError,
  formatResultLine,
  runCli,
  runCompareCommand,
  runReportCommand,
  runSingleCommand,
  slugify,
  type CliRuntime,
} from '@/cli/loadtest.js';
import type { HttpTransport } from '@/core/http-transport.js';
import { loadResults, saveResults } from '@/reporting/result-store.js';
import { ConfigurationError, ReportError, ValidationError } from '@/utils/errors.js';
import { makeResult } from '../../helpers/results.js';

const finishedAt = new Date('2025-01-02T03:04:05.000Z');

describe('loadtest CLI', () => {
  let dir: string;
  let configPath: string;
  let output: string[];
  let runtime: CliRuntime;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'loadtest-cli-'));
    configPath = join(dir, 'loadtest.yaml');
    await writeFile(
      configPath,
      stringify({
        defaults: { concurrent_users: 2, duration_seconds: 0.05, ramp_up_seconds: 0 },
        timing: { think_time_ms: 1, scenario_pause_ms: 0, system_pause_ms: 0 },
        scenarios: [
          { name: 'Health Check', endpoints: [{ path: '/health' }] },
          { name: 'REST API', endpoints: [{ path: '/api/products' }] },
        ],
      })
    );

    const transport: HttpTransport = {
      send: async () => ({ statusCode: 200, contentLength: 10 }),
      close: () => undefined,
    };
    output = [];
    runtime = {
      write: (text) => output.push(text),
      loadTester: { transport },
      now: () => finishedAt,
    };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('compare', () => {
    it('writes the report and both result sets', async () => {
      const outDir = join(dir, 'out');
      const result = await runCompareCommand(
        {
          configPath,
          aUrl: 'http://alpha',
          bUrl: 'http://beta',
          aLabel: 'Alpha API',
          bLabel: 'beta',
          outDir,
        },
        runtime
      );

      expect(result.reportPath).toBe(join(outDir, 'benchmark_report_20250102_030405.md'));
      expect(result.resultPaths).toEqual([
        join(outDir, 'results_a_Alpha_API_20250102_030405.json'),
        join(outDir, 'results_b_beta_20250102_030405.json'),
      ]);

      const markdown = await readFile(result.reportPath, 'utf-8');
      expect(markdown.split('\n')[0]).toBe('# Alpha API vs beta Performance Comparison Report');
      expect(output).toEqual([markdown, `\nReport saved to ${result.reportPath}\n`]);

      const saved = await loadResults(result.resultPaths[0]);
      expect(saved.system).toBe('Alpha API');
      expect(saved.results.map((r) => r.testName)).toEqual(['Health Check', 'REST API']);
      expect(result.report.verdicts).toHaveLength(2);
    });

    it('keeps both result sets when the labels match', async () => {
      const outDir = join(dir, 'same');
      const result = await runCompareCommand(
        { configPath, aUrl: 'http://one', bUrl: 'http://two', aLabel: 'api', bLabel: 'api', outDir },
        runtime
      );

      expect(result.resultPaths).toEqual([
        join(outDir, 'results_a_api_20250102_030405.json'),
        join(outDir, 'results_b_api_20250102_030405.json'),
      ]);
      const [savedA, savedB] = await Promise.all(result.resultPaths.map((path) => loadResults(path)));
      expect(savedA?.results).toHaveLength(2);
      expect(savedB?.results).toHaveLength(2);
    });
  });

  describe('single', () => {
    it('runs one named scenario and saves its results', async () => {
      const savePath = join(dir, 'single.json');
      const results = await runSingleCommand(
        { configPath, url: 'http://alpha', label: 'alpha', scenario: 'rest api', output: savePath },
        runtime
      );

      expect(results.map((r) => r.testName)).toEqual(['REST API']);
      expect(output[0]).toBe('Results for alpha:\n');
      expect(output[1]?.startsWith('  REST API: ')).toBe(true);
      expect(output[2]).toBe(`Results saved to ${savePath}\n`);
      expect((await loadResults(savePath)).results).toHaveLength(1);
    });

    it('rejects an unknown scenario', async () => {
      await expect(runSingleCommand({ configPath, scenario: 'Soak' }, runtime)).rejects.toThrow(ConfigurationError);
    });
  });

  describe('report', () => {
    let inputA: string;
    let inputB: string;

    beforeEach(async () => {
      inputA = join(dir, 'a.json');
      inputB = join(dir, 'b.json');
      await saveResults(inputA, 'alpha', [makeResult({ requestsPerSecond: 200 })], finishedAt);
      await saveResults(inputB, 'beta', [makeResult({ system: 'beta', requestsPerSecond: 100 })], finishedAt);
    });

    it('prints the rendered report', async () => {
      const content = await runReportCommand({ inputA, inputB, format: 'md' }, runtime);

      expect(output).toEqual([content]);
      expect(content.split('\n')).toContain('🏆 **alpha wins in throughput** by 100.0% (200.00 vs 100.00 req/s)');
    });

    it('writes to a file when asked', async () => {
      const target = join(dir, 'report.html');
      await runReportCommand({ inputA, inputB, format: 'html', output: target }, runtime);

      expect(output).toEqual([`Report written to ${target}\n`]);
      expect(await readFile(target, 'utf-8')).toContain('<title>alpha vs beta Performance Comparison</title>');
    });

    it('rejects unknown formats', async () => {
      await expect(runReportCommand({ inputA, inputB, format: 'pdf' }, runtime)).rejects.toThrow(ReportError);
    });

    it('is reachable through the command line', async () => {
      await runCli(['node', 'loadtest', 'report', '--input-a', inputA, '--input-b', inputB, '-f', 'json'], runtime);

      const parsed: unknown = JSON.parse(output.join(''));
      expect(parsed).toMatchObject({ systemA: { name: 'alpha' }, systemB: { name: 'beta' } });
    });
  });

  it('reports the package version', () => {
    expect(createProgram().version()).toBe('0.1.0');
  });

  it('formats result lines', () => {
    expect(formatResultLine(makeResult())).toBe('Health Check: 100.00 req/s, avg 10.00ms, p95 20.00ms, p99 30.00ms');
  });

  describe('formatCliError', () => {
    it('lists validation issues under the message', () => {
      const error = new ValidationError('Configuration validation failed', [
        { path: 'defaults.concurrent_users', message: 'must be a positive integer' },
      ]);
      expect(formatCliError(error)).toEqual([
        'Error [VALIDATION_ERROR]: Configuration validation failed',
        '  defaults.concurrent_users: must be a positive integer',
      ]);
    });

    it('wraps anything else', () => {
      expect(formatCliError(new ConfigurationError('Unknown scenario: Soak'))).toEqual([
        'Error [INVALID_CONFIGURATION]: Unknown scenario: Soak',
      ]);
      expect(formatCliError('oops')).toEqual(['Error [UNKNOWN_ERROR]: oops']);
    });
  });

  it('makes labels safe for file names', () => {
    expect(slugify('System A/2')).toBe('System_A_2');
    expect(slugify('***')).toBe('system');
  });
});
