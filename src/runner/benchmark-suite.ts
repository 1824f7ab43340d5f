/**
 * Benchmark Suite
 *
 * Runs a list of named scenarios against one system, one after the other,
 * and turns each finished aggregate into a BenchmarkResult. A comparison
 * runs the suite against two systems with a cool-down in between.
 */

import type { Logger } from 'pino';
import { createBenchmarkConfig } from '../config/benchmark-config.js';
import type { RunDefaults, Scenario, SystemTarget } from '../config/loader.js';
import { LoadTester, type LoadTesterOptions } from '../core/load-tester.js';
import type { BenchmarkConfig, BenchmarkResult } from '../types/benchmark.js';
import { delay, type Sleeper } from '../utils/delay.js';
import { toError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

export interface BenchmarkSuiteOptions {
  scenarios: readonly Scenario[];
  run: RunDefaults;
  /** Pause between two scenarios (default: 5000) */
  scenarioPauseMs?: number;
  /** Pause between the two systems of a comparison (default: 30000) */
  systemPauseMs?: number;
  /** Passed to every LoadTester the suite creates */
  loadTester?: LoadTesterOptions;
  logger?: Logger;
  sleep?: Sleeper;
}

export interface ComparisonRun {
  a: { name: string; results: BenchmarkResult[] };
  b: { name: string; results: BenchmarkResult[] };
}

/**
 * Bind a scenario's endpoint mix to a target and run parameters
 */
export function buildScenarioConfig(scenario: Scenario, targetUrl: string, run: RunDefaults): BenchmarkConfig {
  return createBenchmarkConfig({
    targetUrl,
    concurrentUsers: run.concurrentUsers,
    durationSeconds: run.durationSeconds,
    rampUpSeconds: run.rampUpSeconds,
    endpoints: scenario.endpoints.map((endpoint) => ({ ...endpoint, headers: { ...endpoint.headers } })),
  });
}

export class BenchmarkSuite {
  private readonly logger: Logger;
  private readonly sleep: Sleeper;
  private readonly scenarioPauseMs: number;
  private readonly systemPauseMs: number;

  constructor(private readonly options: BenchmarkSuiteOptions) {
    this.logger = options.logger ?? createLogger('BenchmarkSuite');
    this.sleep = options.sleep ?? delay;
    this.scenarioPauseMs = options.scenarioPauseMs ?? 5000;
    this.systemPauseMs = options.systemPauseMs ?? 30000;
  }

  /**
   * Run every scenario against `target`.
   *
   * A scenario that fails to start (bad config, transport setup) is logged
   * and skipped; the remaining scenarios still run.
   */
  async runSystem(target: SystemTarget): Promise<BenchmarkResult[]> {
    const results: BenchmarkResult[] = [];
    const { scenarios } = this.options;
    const signal = this.options.loadTester?.signal;

    for (const [index, scenario] of scenarios.entries()) {
      if (signal?.aborted) {
        this.logger.warn({ system: target.label }, 'Suite cancelled');
        break;
      }

      this.logger.info({ system: target.label, scenario: scenario.name }, 'Running scenario');

      try {
        const result = await this.runScenario(scenario, target);
        results.push(result);
      } catch (error) {
        this.logger.warn(
          { system: target.label, scenario: scenario.name, err: toError(error) },
          'Scenario failed'
        );
      }

      if (index < scenarios.length - 1 && this.scenarioPauseMs > 0) {
        await this.sleep(this.scenarioPauseMs, signal);
      }
    }

    return results;
  }

  /**
   * Run one scenario and snapshot its aggregate
   */
  async runScenario(scenario: Scenario, target: SystemTarget): Promise<BenchmarkResult> {
    const config = buildScenarioConfig(scenario, target.url, this.options.run);
    const tester = new LoadTester(config, {
      ...this.options.loadTester,
      logger: this.options.loadTester?.logger ?? this.logger,
    });

    try {
      const metrics = await tester.runBenchmark(target.label);
      return metrics.toBenchmarkResult(scenario.name);
    } finally {
      tester.close();
    }
  }

  /**
   * Suite against A, cool-down, suite against B
   */
  async runComparison(a: SystemTarget, b: SystemTarget): Promise<ComparisonRun> {
    this.logger.info({ a: a.label, b: b.label }, 'Starting comparison');

    const resultsA = await this.runSystem(a);

    if (this.systemPauseMs > 0) {
      this.logger.info({ pauseMs: this.systemPauseMs }, 'Cooling down between systems');
      await this.sleep(this.systemPauseMs, this.options.loadTester?.signal);
    }

    const resultsB = await this.runSystem(b);

    return {
      a: { name: a.label, results: resultsA },
      b: { name: b.label, results: resultsB },
    };
  }
}
