import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { stringify } from 'yaml';
import {
  defaultConfigPath,
  findScenario,
  interpolateEnvVars,
  loadConfig,
  validateLoadTestConfig,
} from '@/config/loader.js';
import { ConfigurationError, ValidationError } from '@/utils/errors.js';

describe('Config Loader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'loadtest-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeConfig(content: unknown): Promise<string> {
    const path = join(dir, 'loadtest.yaml');
    await writeFile(path, typeof content === 'string' ? content : stringify(content));
    return path;
  }

  describe('bundled configuration', () => {
    it('loads the four standard scenarios', async () => {
      const config = await loadConfig(defaultConfigPath());

      expect(config.scenarios.map((scenario) => scenario.name)).toEqual([
        'Health Check',
        'REST API',
        'GraphQL',
        'Mixed Load',
      ]);
      expect(config.defaults).toEqual({ concurrentUsers: 100, durationSeconds: 60, rampUpSeconds: 10 });
      expect(config.timing).toEqual({
        requestTimeoutMs: 30000,
        thinkTimeMs: 10,
        scenarioPauseMs: 5000,
        systemPauseMs: 30000,
      });
    });

    it('keeps method, headers, body and weight of each endpoint', async () => {
      const config = await loadConfig(defaultConfigPath());
      const rest = findScenario(config, 'REST API');

      expect(rest.endpoints.map((endpoint) => [endpoint.method, endpoint.path, endpoint.weight])).toEqual([
        ['GET', '/api/products', 0.6],
        ['POST', '/api/products', 0.2],
        ['POST', '/api/auth/login', 0.2],
      ]);
      expect(rest.endpoints[1]?.headers).toEqual({ 'Content-Type': 'application/json' });
      expect(rest.endpoints[0]?.headers).toEqual({});
      expect(rest.endpoints[0]?.body).toBeUndefined();
    });
  });

  it('applies defaults for omitted sections', async () => {
    const path = await writeConfig({ scenarios: [{ name: 'Ping', endpoints: [{ path: '/ping' }] }] });

    const config = await loadConfig(path);

    expect(config.defaults.concurrentUsers).toBe(100);
    expect(config.systems).toEqual({
      a: { label: 'system-a', url: 'http://localhost:3000' },
      b: { label: 'system-b', url: 'http://localhost:5150' },
    });
    expect(config.scenarios[0]?.endpoints[0]).toEqual({ path: '/ping', method: 'GET', headers: {}, weight: 1 });
  });

  it('interpolates environment variables', async () => {
    process.env.LOADTEST_TEST_TARGET = 'http://127.0.0.1:9999';
    try {
      const path = await writeConfig(
        [
          'systems:',
          '  a:',
          '    label: env-target',
          '    url: ${LOADTEST_TEST_TARGET}',
          'scenarios:',
          '  - name: Ping',
          '    endpoints:',
          '      - path: /ping',
        ].join('\n')
      );

      const config = await loadConfig(path);
      expect(config.systems.a).toEqual({ label: 'env-target', url: 'http://127.0.0.1:9999' });
    } finally {
      delete process.env.LOADTEST_TEST_TARGET;
    }
  });

  it('replaces unset variables with an empty string', () => {
    expect(interpolateEnvVars('url: "${NOPE}/x"', {})).toBe('url: "/x"');
    expect(interpolateEnvVars('${A}-${B}', { A: '1', B: '2' })).toBe('1-2');
  });

  it('maps unknown HTTP methods to GET', () => {
    const config = validateLoadTestConfig({
      scenarios: [{ name: 'Odd', endpoints: [{ path: '/x', method: 'patch' }, { path: '/y', method: 'post' }] }],
    });
    expect(config.scenarios[0]?.endpoints.map((endpoint) => endpoint.method)).toEqual(['GET', 'POST']);
  });

  it('reports every invalid field', () => {
    const error = (() => {
      try {
        validateLoadTestConfig({
          defaults: { concurrent_users: 0 },
          scenarios: [{ name: 'Bad', endpoints: [] }],
        });
      } catch (caught) {
        return caught;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.errors.map((issue) => issue.path)).toEqual(['defaults.concurrent_users', 'scenarios.0.endpoints']);
    }
  });

  it('rejects a scenario whose weights sum to zero', () => {
    expect(() =>
      validateLoadTestConfig({
        scenarios: [
          {
            name: 'Idle',
            endpoints: [
              { path: '/a', weight: 0 },
              { path: '/b', weight: 0 },
            ],
          },
        ],
      })
    ).toThrow(ValidationError);
  });

  it('rejects duplicate scenario names', () => {
    expect(() =>
      validateLoadTestConfig({
        scenarios: [
          { name: 'Twice', endpoints: [{ path: '/a' }] },
          { name: 'Twice', endpoints: [{ path: '/b' }] },
        ],
      })
    ).toThrow(ValidationError);
  });

  it('wraps read and parse failures in ConfigurationError', async () => {
    await expect(loadConfig(join(dir, 'missing.yaml'))).rejects.toThrow(ConfigurationError);

    const path = await writeConfig('scenarios: [unclosed');
    await expect(loadConfig(path)).rejects.toThrow(ConfigurationError);
  });

  describe('findScenario', () => {
    it('matches names case-insensitively', async () => {
      const config = await loadConfig(defaultConfigPath());
      expect(findScenario(config, 'mixed load').name).toBe('Mixed Load');
    });

    it('lists known scenarios for an unknown name', async () => {
      const config = await loadConfig(defaultConfigPath());
      expect(() => findScenario(config, 'Soak')).toThrow(
        'Unknown scenario "Soak" (available: Health Check, REST API, GraphQL, Mixed Load)'
      );
    });
  });
});
