/**
 * Core benchmark types
 */

import type { z } from 'zod';
import type {
  BenchmarkConfigSchema,
  BenchmarkResultSchema,
  EndpointDefinitionSchema,
  ResultSetFileSchema,
} from './schemas/benchmark.js';

export type { HttpMethod } from './schemas/benchmark.js';

export type EndpointDefinition = Readonly<z.output<typeof EndpointDefinitionSchema>>;
export type EndpointDefinitionInput = z.input<typeof EndpointDefinitionSchema>;

export interface BenchmarkConfig {
  readonly targetUrl: string;
  readonly concurrentUsers: number;
  readonly durationSeconds: number;
  readonly rampUpSeconds: number;
  readonly endpoints: readonly EndpointDefinition[];
}

export type BenchmarkConfigInput = z.input<typeof BenchmarkConfigSchema>;

/**
 * Outcome of one request attempt.
 *
 * `startTime` and `endTime` are monotonic milliseconds (performance.now()).
 * `statusCode` is 0 when the transport failed.
 */
export interface RequestSample {
  readonly startTime: number;
  readonly endTime: number;
  readonly statusCode: number;
  readonly responseSize: number;
  readonly endpoint: string;
  readonly success: boolean;
}

export type BenchmarkResult = z.output<typeof BenchmarkResultSchema>;

export type ResultSetFile = z.output<typeof ResultSetFileSchema>;

/**
 * Everything one virtual user produced.
 *
 * `error` is set when the user stopped because of an unexpected internal
 * failure; `samples` still holds what it recorded before that.
 */
export interface WorkerOutcome {
  userIndex: number;
  samples: RequestSample[];
  error?: Error;
}

/**
 * All derived statistics of a finalized aggregate
 */
export interface MetricsSummary {
  label: string;
  durationSeconds: number;
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  totalBytesReceived: number;
  requestsPerSecond: number;
  averageResponseTimeMs: number;
  p50ResponseTimeMs: number;
  p95ResponseTimeMs: number;
  p99ResponseTimeMs: number;
  minResponseTimeMs: number;
  maxResponseTimeMs: number;
  successRate: number;
  throughputMbPerSecond: number;
  errorCounts: Record<string, number>;
}
