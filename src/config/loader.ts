/**
 * Configuration Loader
 *
 * Loads loadtest.yaml (run defaults, timing constants, the two compared
 * systems and the scenario catalogue), interpolates ${ENV_VAR}
 * references and validates the result with zod.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import type { z } from 'zod';
import { LoadTestFileConfigSchema } from '../types/schemas/config.js';
import type { EndpointDefinition } from '../types/benchmark.js';
import { ConfigurationError, ValidationError, toError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { toValidationIssues } from './benchmark-config.js';

const logger = createLogger('ConfigLoader');

export type LoadTestFileConfig = z.output<typeof LoadTestFileConfigSchema>;

export interface RunDefaults {
  concurrentUsers: number;
  durationSeconds: number;
  rampUpSeconds: number;
}

export interface TimingConfig {
  requestTimeoutMs: number;
  thinkTimeMs: number;
  scenarioPauseMs: number;
  systemPauseMs: number;
}

export interface SystemTarget {
  label: string;
  url: string;
}

export interface Scenario {
  name: string;
  endpoints: readonly EndpointDefinition[];
}

export interface LoadTestConfig {
  defaults: RunDefaults;
  timing: TimingConfig;
  systems: {
    a: SystemTarget;
    b: SystemTarget;
  };
  scenarios: Scenario[];
}

/**
 * Find the package root directory by looking for package.json
 */
export function findPackageRoot(startDir: string = dirname(fileURLToPath(import.meta.url))): string {
  let currentDir = startDir;

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

export function defaultConfigPath(): string {
  return join(findPackageRoot(), 'config', 'loadtest.yaml');
}

/**
 * Replace ${VAR_NAME} with process.env.VAR_NAME (empty when unset)
 */
export function interpolateEnvVars(content: string, env: NodeJS.ProcessEnv = process.env): string {
  return content.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
    const value = env[varName];
    if (value === undefined) {
      logger.warn({ varName }, 'Environment variable not found');
      return '';
    }
    return value;
  });
}

/**
 * Convert the snake_case file layout to the camelCase runtime shape
 */
function toLoadTestConfig(file: LoadTestFileConfig): LoadTestConfig {
  return {
    defaults: {
      concurrentUsers: file.defaults.concurrent_users,
      durationSeconds: file.defaults.duration_seconds,
      rampUpSeconds: file.defaults.ramp_up_seconds,
    },
    timing: {
      requestTimeoutMs: file.timing.request_timeout_ms,
      thinkTimeMs: file.timing.think_time_ms,
      scenarioPauseMs: file.timing.scenario_pause_ms,
      systemPauseMs: file.timing.system_pause_ms,
    },
    systems: {
      a: { ...file.systems.a },
      b: { ...file.systems.b },
    },
    scenarios: file.scenarios.map((scenario) => ({
      name: scenario.name,
      endpoints: scenario.endpoints.map((endpoint) => Object.freeze({ ...endpoint })),
    })),
  };
}

/**
 * Validate an already-parsed configuration object
 *
 * @throws {ValidationError} if the configuration is invalid
 */
export function validateLoadTestConfig(raw: unknown): LoadTestConfig {
  const parsed = LoadTestFileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const errors = toValidationIssues(parsed.error);
    logger.error({ errors }, 'Configuration validation failed');
    throw new ValidationError('Configuration validation failed', errors);
  }
  return toLoadTestConfig(parsed.data);
}

/**
 * Load configuration from a YAML file
 *
 * @param path - YAML file (default: config/loadtest.yaml in the package)
 * @throws {ConfigurationError} if the file cannot be read or parsed
 * @throws {ValidationError} if the configuration is invalid
 *
 * @example
 * ```typescript
 * const config = await loadConfig();
 * config.scenarios.map((s) => s.name); // ['Health Check', 'REST API', ...]
 * ```
 */
export async function loadConfig(path: string = defaultConfigPath()): Promise<LoadTestConfig> {
  logger.debug({ path }, 'Loading load-test configuration');

  let raw: unknown;
  try {
    const fileContent = interpolateEnvVars(await readFile(path, 'utf-8'));
    raw = parseYaml(fileContent);
  } catch (error) {
    const cause = toError(error);
    throw new ConfigurationError(`Failed to load configuration from ${path}: ${cause.message}`, cause);
  }

  const config = validateLoadTestConfig(raw);
  logger.debug({ path, scenarios: config.scenarios.length }, 'Configuration loaded');
  return config;
}

/**
 * Look up a scenario by name (case-insensitive)
 *
 * @throws {ConfigurationError} when no scenario matches
 */
export function findScenario(config: LoadTestConfig, name: string): Scenario {
  const wanted = name.toLowerCase();
  const scenario = config.scenarios.find((candidate) => candidate.name.toLowerCase() === wanted);
  if (!scenario) {
    const known = config.scenarios.map((candidate) => candidate.name).join(', ');
    throw new ConfigurationError(`Unknown scenario "${name}" (available: ${known})`);
  }
  return scenario;
}
