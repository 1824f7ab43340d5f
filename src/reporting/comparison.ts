/**
 * Side-by-side comparison of two systems' benchmark results
 *
 * Works purely on BenchmarkResult values; no measurement happens here.
 */

import type { BenchmarkResult } from '../types/benchmark.js';
import { percentDifference, safeAverage, safeDivide } from '../utils/math-helpers.js';

export interface SystemResults {
  name: string;
  results: readonly BenchmarkResult[];
}

/**
 * Arithmetic means over every result of one system
 */
export interface AverageMetrics {
  system: string;
  testCount: number;
  requestsPerSecond: number;
  averageResponseTimeMs: number;
  p95ResponseTimeMs: number;
  p99ResponseTimeMs: number;
  memoryUsageMb: number;
  cpuUsagePercent: number;
}

export type ComparisonMetric = 'throughput' | 'responseTime';

export interface Verdict {
  metric: ComparisonMetric;
  winner: string;
  loser: string;
  winnerValue: number;
  loserValue: number;
  /** Advantage of the winner, as a percentage of the loser's value */
  differencePercent: number;
}

export interface ComparisonReport {
  generatedAt: string;
  systemA: SystemResults;
  systemB: SystemResults;
  averages: {
    a?: AverageMetrics;
    b?: AverageMetrics;
  };
  /** Empty unless both systems have results */
  verdicts: Verdict[];
}

/**
 * Mean of each numeric metric; `undefined` for an empty list
 */
export function calculateAverageMetrics(
  system: string,
  results: readonly BenchmarkResult[]
): AverageMetrics | undefined {
  if (results.length === 0) {
    return undefined;
  }

  const mean = (pick: (result: BenchmarkResult) => number): number => safeAverage(results.map(pick));

  return {
    system,
    testCount: results.length,
    requestsPerSecond: mean((r) => r.requestsPerSecond),
    averageResponseTimeMs: mean((r) => r.averageResponseTimeMs),
    p95ResponseTimeMs: mean((r) => r.p95ResponseTimeMs),
    p99ResponseTimeMs: mean((r) => r.p99ResponseTimeMs),
    memoryUsageMb: mean((r) => r.memoryUsageMb),
    cpuUsagePercent: mean((r) => r.cpuUsagePercent),
  };
}

/**
 * Higher mean requests/sec wins. A tie goes to B.
 */
export function throughputVerdict(a: AverageMetrics, b: AverageMetrics): Verdict {
  const [winner, loser] = a.requestsPerSecond > b.requestsPerSecond ? [a, b] : [b, a];
  return {
    metric: 'throughput',
    winner: winner.system,
    loser: loser.system,
    winnerValue: winner.requestsPerSecond,
    loserValue: loser.requestsPerSecond,
    differencePercent: percentDifference(winner.requestsPerSecond, loser.requestsPerSecond),
  };
}

/**
 * Lower mean response time wins. A tie goes to B.
 */
export function responseTimeVerdict(a: AverageMetrics, b: AverageMetrics): Verdict {
  const [winner, loser] = a.averageResponseTimeMs < b.averageResponseTimeMs ? [a, b] : [b, a];
  return {
    metric: 'responseTime',
    winner: winner.system,
    loser: loser.system,
    winnerValue: winner.averageResponseTimeMs,
    loserValue: loser.averageResponseTimeMs,
    differencePercent:
      safeDivide(loser.averageResponseTimeMs - winner.averageResponseTimeMs, loser.averageResponseTimeMs) * 100,
  };
}

/**
 * Build the comparison of system A against system B
 *
 * @example
 * ```typescript
 * const report = compare(
 *   { name: 'alpha', results: alphaResults },
 *   { name: 'beta', results: betaResults }
 * );
 * report.verdicts[0]; // throughput winner and margin
 * ```
 */
export function compare(systemA: SystemResults, systemB: SystemResults, generatedAt: Date = new Date()): ComparisonReport {
  const a = calculateAverageMetrics(systemA.name, systemA.results);
  const b = calculateAverageMetrics(systemB.name, systemB.results);

  const verdicts = a && b ? [throughputVerdict(a, b), responseTimeVerdict(a, b)] : [];

  return {
    generatedAt: generatedAt.toISOString(),
    systemA,
    systemB,
    averages: { a, b },
    verdicts,
  };
}
