/**
 * Metrics Aggregate
 *
 * Accumulates request samples for one labelled run. Owned by the
 * orchestrator, which folds worker outputs in after every worker has
 * finished and then finalizes it. Once finalized it is read-only.
 *
 * Only raw samples and running totals are stored; every statistic is
 * computed from them on demand.
 */

import type { BenchmarkResult, MetricsSummary, RequestSample } from '../types/benchmark.js';
import { LoadTestError } from '../utils/errors.js';
import { nearestRankPercentile, safeAverage, safeDivide } from '../utils/math-helpers.js';

const BYTES_PER_MB = 1024 * 1024;

/**
 * Histogram key for a failed request. Transport failures carry status 0
 * and land under `HTTP_0`.
 */
export function errorKey(statusCode: number): string {
  return `HTTP_${statusCode}`;
}

export function sampleDurationMs(sample: RequestSample): number {
  return sample.endTime - sample.startTime;
}

export class MetricsAggregate {
  readonly label: string;
  readonly startTime: number;
  private endTimeMs?: number;

  private readonly samples: RequestSample[] = [];
  private totalRequestsCount = 0;
  private successfulCount = 0;
  private failedCount = 0;
  private totalBytes = 0;
  private readonly errorHistogram = new Map<string, number>();

  private sortedDurations?: number[];

  /**
   * @param label - Name of the system under test
   * @param startTime - Epoch milliseconds the run started (default: now)
   */
  constructor(label: string, startTime: number = Date.now()) {
    this.label = label;
    this.startTime = startTime;
  }

  get endTime(): number | undefined {
    return this.endTimeMs;
  }

  get isFinalized(): boolean {
    return this.endTimeMs !== undefined;
  }

  get totalRequests(): number {
    return this.totalRequestsCount;
  }

  get successfulRequests(): number {
    return this.successfulCount;
  }

  get failedRequests(): number {
    return this.failedCount;
  }

  get totalBytesReceived(): number {
    return this.totalBytes;
  }

  get requestSamples(): readonly RequestSample[] {
    return this.samples;
  }

  get errorCounts(): Record<string, number> {
    return Object.fromEntries(this.errorHistogram);
  }

  /**
   * Fold one sample into the totals
   *
   * @throws {LoadTestError} once the aggregate is finalized
   */
  addSample(sample: RequestSample): void {
    if (this.isFinalized) {
      throw new LoadTestError(`Metrics for ${this.label} are finalized`, 'AGGREGATE_FINALIZED');
    }

    this.totalRequestsCount++;
    this.totalBytes += sample.responseSize;

    if (sample.success) {
      this.successfulCount++;
    } else {
      this.failedCount++;
      const key = errorKey(sample.statusCode);
      this.errorHistogram.set(key, (this.errorHistogram.get(key) ?? 0) + 1);
    }

    this.samples.push(sample);
    this.sortedDurations = undefined;
  }

  /**
   * Fold a whole worker's sample sequence
   */
  merge(samples: Iterable<RequestSample>): void {
    for (const sample of samples) {
      this.addSample(sample);
    }
  }

  /**
   * Stamp the end time; the aggregate is read-only afterwards
   *
   * @param endTime - Epoch milliseconds (default: now)
   */
  finalize(endTime: number = Date.now()): void {
    if (this.isFinalized) {
      return;
    }
    this.endTimeMs = Math.max(endTime, this.startTime);
  }

  /**
   * Wall-clock length of the run. Before finalization this is the time
   * elapsed so far.
   */
  durationSeconds(): number {
    const end = this.endTimeMs ?? Date.now();
    return (end - this.startTime) / 1000;
  }

  requestsPerSecond(): number {
    return safeDivide(this.totalRequestsCount, this.durationSeconds());
  }

  averageResponseTimeMs(): number {
    return safeAverage(this.samples.map(sampleDurationMs));
  }

  /**
   * Nearest-rank percentile of request durations
   *
   * @param percentile - In [0, 100]
   */
  percentileResponseTimeMs(percentile: number): number {
    return nearestRankPercentile(this.getSortedDurations(), percentile);
  }

  successRate(): number {
    return safeDivide(this.successfulCount, this.totalRequestsCount) * 100;
  }

  throughputMbPerSecond(): number {
    return safeDivide(this.totalBytes / BYTES_PER_MB, this.durationSeconds());
  }

  summary(): MetricsSummary {
    return {
      label: this.label,
      durationSeconds: this.durationSeconds(),
      totalRequests: this.totalRequestsCount,
      successfulRequests: this.successfulCount,
      failedRequests: this.failedCount,
      totalBytesReceived: this.totalBytes,
      requestsPerSecond: this.requestsPerSecond(),
      averageResponseTimeMs: this.averageResponseTimeMs(),
      p50ResponseTimeMs: this.percentileResponseTimeMs(50),
      p95ResponseTimeMs: this.percentileResponseTimeMs(95),
      p99ResponseTimeMs: this.percentileResponseTimeMs(99),
      minResponseTimeMs: this.percentileResponseTimeMs(0),
      maxResponseTimeMs: this.percentileResponseTimeMs(100),
      successRate: this.successRate(),
      throughputMbPerSecond: this.throughputMbPerSecond(),
      errorCounts: this.errorCounts,
    };
  }

  /**
   * Snapshot for reporting. Memory and CPU of the target are not
   * observable from here and are reported as 0.
   */
  toBenchmarkResult(testName: string, timestamp: Date = new Date()): BenchmarkResult {
    return {
      system: this.label,
      testName,
      requestsPerSecond: this.requestsPerSecond(),
      averageResponseTimeMs: this.averageResponseTimeMs(),
      p95ResponseTimeMs: this.percentileResponseTimeMs(95),
      p99ResponseTimeMs: this.percentileResponseTimeMs(99),
      memoryUsageMb: 0,
      cpuUsagePercent: 0,
      timestamp: timestamp.toISOString(),
    };
  }

  private getSortedDurations(): number[] {
    if (!this.sortedDurations) {
      this.sortedDurations = this.samples.map(sampleDurationMs).sort((a, b) => a - b);
    }
    return this.sortedDurations;
  }
}
