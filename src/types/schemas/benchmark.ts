/**
 * Benchmark Schemas
 *
 * Zod schemas for endpoint definitions, benchmark configurations and
 * benchmark results. Types in `../benchmark.ts` are inferred from these.
 *
 * @module schemas/benchmark
 */

import { z } from 'zod';

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'DELETE'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

/**
 * Map an arbitrary method string onto a supported method.
 *
 * Matching is case-insensitive; anything unrecognised becomes GET.
 */
export function resolveHttpMethod(method: string): HttpMethod {
  const upper = method.trim().toUpperCase();
  return HTTP_METHODS.find((candidate) => candidate === upper) ?? 'GET';
}

/**
 * One request template in the weighted mix
 */
export const EndpointDefinitionSchema = z.object({
  path: z.string().min(1, 'Path cannot be empty'),
  method: z.string().default('GET').transform(resolveHttpMethod),
  headers: z.record(z.string()).default({}),
  body: z.string().optional(),
  weight: z.number().finite().min(0, 'Weight must be >= 0').default(1),
});

/**
 * Target, user count, timing window and endpoint mix of one run
 */
export const BenchmarkConfigSchema = z
  .object({
    targetUrl: z.string().url('Target URL must be an absolute URL'),
    concurrentUsers: z.number().int().positive('Concurrent users must be a positive integer'),
    durationSeconds: z.number().finite().positive('Duration must be positive'),
    rampUpSeconds: z.number().finite().min(0, 'Ramp-up must be >= 0').default(0),
    endpoints: z.array(EndpointDefinitionSchema).min(1, 'At least one endpoint is required'),
  })
  .refine(
    (data) => data.endpoints.length <= 1 || data.endpoints.some((endpoint) => endpoint.weight > 0),
    {
      message: 'Total endpoint weight must be greater than zero',
      path: ['endpoints'],
    }
  );

/**
 * Snapshot of one finished test scenario
 */
export const BenchmarkResultSchema = z.object({
  system: z.string().min(1),
  testName: z.string().min(1),
  requestsPerSecond: z.number().finite().min(0),
  averageResponseTimeMs: z.number().finite().min(0),
  p95ResponseTimeMs: z.number().finite().min(0),
  p99ResponseTimeMs: z.number().finite().min(0),
  memoryUsageMb: z.number().finite().min(0).default(0),
  cpuUsagePercent: z.number().finite().min(0).default(0),
  timestamp: z.string().datetime(),
});

/**
 * File written by `saveResults` and read back by the `report` command
 */
export const ResultSetFileSchema = z.object({
  system: z.string().min(1),
  generatedAt: z.string().datetime(),
  results: z.array(BenchmarkResultSchema),
});
