/**
 * Load-test Configuration Schemas
 *
 * Zod schemas for validating loadtest.yaml.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import { EndpointDefinitionSchema } from './benchmark.js';

export const RunDefaultsSchema = z.object({
  concurrent_users: z.number().int().positive('must be a positive integer').default(100),
  duration_seconds: z.number().positive('must be positive').default(60),
  ramp_up_seconds: z.number().min(0, 'must be >= 0').default(10),
});

export const TimingConfigSchema = z.object({
  request_timeout_ms: z.number().int().positive('must be positive').default(30000),
  think_time_ms: z.number().int().min(0, 'must be >= 0').default(10),
  scenario_pause_ms: z.number().int().min(0, 'must be >= 0').default(5000),
  system_pause_ms: z.number().int().min(0, 'must be >= 0').default(30000),
});

export const SystemTargetSchema = z.object({
  label: z.string().min(1, 'Label cannot be empty'),
  url: z.string().url('must be an absolute URL'),
});

export const ScenarioSchema = z
  .object({
    name: z.string().min(1, 'Scenario name cannot be empty'),
    endpoints: z.array(EndpointDefinitionSchema).min(1, 'At least one endpoint is required'),
  })
  .refine(
    (data) => data.endpoints.length <= 1 || data.endpoints.some((endpoint) => endpoint.weight > 0),
    { message: 'Total endpoint weight must be greater than zero', path: ['endpoints'] }
  );

export const LoadTestFileConfigSchema = z
  .object({
    defaults: RunDefaultsSchema.default({}),
    timing: TimingConfigSchema.default({}),
    systems: z
      .object({
        a: SystemTargetSchema.default({ label: 'system-a', url: 'http://localhost:3000' }),
        b: SystemTargetSchema.default({ label: 'system-b', url: 'http://localhost:5150' }),
      })
      .default({}),
    scenarios: z.array(ScenarioSchema).min(1, 'At least one scenario is required'),
  })
  .refine(
    (data) => new Set(data.scenarios.map((scenario) => scenario.name)).size === data.scenarios.length,
    { message: 'Scenario names must be unique', path: ['scenarios'] }
  );
