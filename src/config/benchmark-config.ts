/**
 * Benchmark configuration construction and validation
 *
 * Configurations are validated once, before any virtual user starts, and
 * frozen so workers can share them without copying.
 */

import type { ZodError } from 'zod';
import {
  BenchmarkConfigSchema,
  EndpointDefinitionSchema,
} from '../types/schemas/benchmark.js';
import type {
  BenchmarkConfig,
  BenchmarkConfigInput,
  EndpointDefinition,
  EndpointDefinitionInput,
} from '../types/benchmark.js';
import { ConfigurationError, type ValidationIssue } from '../utils/errors.js';

export const DEFAULT_CONCURRENT_USERS = 100;
export const DEFAULT_DURATION_SECONDS = 60;
export const DEFAULT_RAMP_UP_SECONDS = 10;
export const DEFAULT_TARGET_URL = 'http://localhost:3000';

/**
 * Flatten zod issues into `{ path, message }` pairs
 */
export function toValidationIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : 'root',
    message: issue.message,
  }));
}

function freezeEndpoint(endpoint: EndpointDefinition): EndpointDefinition {
  return Object.freeze({ ...endpoint, headers: Object.freeze({ ...endpoint.headers }) });
}

/**
 * Build an immutable endpoint definition
 *
 * @throws {ConfigurationError} if the definition is invalid
 *
 * @example
 * ```typescript
 * defineEndpoint({ path: '/health', weight: 0.3 });
 * // => { path: '/health', method: 'GET', headers: {}, weight: 0.3 }
 * ```
 */
export function defineEndpoint(input: EndpointDefinitionInput): EndpointDefinition {
  const parsed = EndpointDefinitionSchema.safeParse(input);
  if (!parsed.success) {
    const issues = toValidationIssues(parsed.error);
    throw new ConfigurationError(
      `Invalid endpoint definition: ${issues.map((i) => `${i.path} ${i.message}`).join('; ')}`
    );
  }
  return freezeEndpoint(parsed.data);
}

/**
 * Validate and freeze a benchmark configuration
 *
 * Rejects empty endpoint lists, non-positive user counts or durations,
 * negative ramp-up, malformed URLs and mixes whose weights sum to zero.
 *
 * @throws {ConfigurationError} listing every offending field
 */
export function validateBenchmarkConfig(input: unknown): BenchmarkConfig {
  const parsed = BenchmarkConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = toValidationIssues(parsed.error);
    throw new ConfigurationError(
      `Invalid benchmark configuration:\n${issues.map((i) => `${i.path} ${i.message}`).join('\n')}`
    );
  }

  const config = parsed.data;
  return Object.freeze({
    targetUrl: config.targetUrl.replace(/\/+$/, ''),
    concurrentUsers: config.concurrentUsers,
    durationSeconds: config.durationSeconds,
    rampUpSeconds: config.rampUpSeconds,
    endpoints: Object.freeze(config.endpoints.map(freezeEndpoint)),
  });
}

/**
 * Build a validated configuration from loose input
 */
export function createBenchmarkConfig(input: BenchmarkConfigInput): BenchmarkConfig {
  return validateBenchmarkConfig(input);
}

/**
 * Default mix used when no scenario is named
 */
export function defaultBenchmarkConfig(targetUrl: string = DEFAULT_TARGET_URL): BenchmarkConfig {
  return createBenchmarkConfig({
    targetUrl,
    concurrentUsers: DEFAULT_CONCURRENT_USERS,
    durationSeconds: DEFAULT_DURATION_SECONDS,
    rampUpSeconds: DEFAULT_RAMP_UP_SECONDS,
    endpoints: [
      { path: '/health', method: 'GET', weight: 0.3 },
      { path: '/api/products', method: 'GET', weight: 0.4 },
      {
        path: '/api/users/me',
        method: 'GET',
        headers: { Authorization: 'Bearer demo-token' },
        weight: 0.2,
      },
      {
        path: '/graphql',
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"query":"query { health }"}',
        weight: 0.1,
      },
    ],
  });
}
