import { describe, it, expect, vi } from 'vitest';
import { BenchmarkSuite, buildScenarioConfig } from '@/runner/benchmark-suite.js';
import { defineEndpoint } from '@/config/benchmark-config.js';
import type { Scenario } from '@/config/loader.js';
import type { HttpTransport, TransportRequest } from '@/core/http-transport.js';

const run = { concurrentUsers: 2, durationSeconds: 0.05, rampUpSeconds: 0 };

const health: Scenario = { name: 'Health Check', endpoints: [defineEndpoint({ path: '/health' })] };
const products: Scenario = { name: 'REST API', endpoints: [defineEndpoint({ path: '/api/products' })] };
const broken: Scenario = {
  name: 'Broken',
  endpoints: [defineEndpoint({ path: '/a', weight: 0 }), defineEndpoint({ path: '/b', weight: 0 })],
};

function recordingTransport(): { transport: HttpTransport; urls: string[] } {
  const urls: string[] = [];
  return {
    urls,
    transport: {
      send: async (request: TransportRequest) => {
        urls.push(request.url);
        return { statusCode: 200, contentLength: 10 };
      },
      close: () => undefined,
    },
  };
}

function recordingSleep(): { sleep: (ms: number) => Promise<void>; sleeps: number[] } {
  const sleeps: number[] = [];
  return {
    sleeps,
    sleep: async (ms: number) => {
      sleeps.push(ms);
    },
  };
}

describe('buildScenarioConfig', () => {
  it('binds the endpoint mix to the target and run parameters', () => {
    const config = buildScenarioConfig(health, 'http://target/', run);

    expect(config).toEqual({
      targetUrl: 'http://target',
      concurrentUsers: 2,
      durationSeconds: 0.05,
      rampUpSeconds: 0,
      endpoints: [{ path: '/health', method: 'GET', headers: {}, weight: 1 }],
    });
  });
});

describe('BenchmarkSuite', () => {
  it('runs scenarios in order and pauses only between them', async () => {
    const { transport, urls } = recordingTransport();
    const { sleep, sleeps } = recordingSleep();
    const suite = new BenchmarkSuite({
      scenarios: [health, products],
      run,
      loadTester: { transport, thinkTimeMs: 1 },
      sleep,
    });

    const results = await suite.runSystem({ label: 'alpha', url: 'http://alpha' });

    expect(results.map((result) => [result.system, result.testName])).toEqual([
      ['alpha', 'Health Check'],
      ['alpha', 'REST API'],
    ]);
    expect(sleeps).toEqual([5000]);
    const firstProducts = urls.indexOf('http://alpha/api/products');
    expect(firstProducts).toBeGreaterThan(0);
    expect(urls.slice(0, firstProducts).every((url) => url === 'http://alpha/health')).toBe(true);
  });

  it('skips a scenario that cannot start and keeps going', async () => {
    const { transport } = recordingTransport();
    const { sleep } = recordingSleep();
    const suite = new BenchmarkSuite({
      scenarios: [broken, health],
      run,
      loadTester: { transport, thinkTimeMs: 1 },
      sleep,
    });

    const results = await suite.runSystem({ label: 'alpha', url: 'http://alpha' });

    expect(results.map((result) => result.testName)).toEqual(['Health Check']);
  });

  it('compares two systems with a cool-down in between', async () => {
    const { transport, urls } = recordingTransport();
    const { sleep, sleeps } = recordingSleep();
    const suite = new BenchmarkSuite({
      scenarios: [health],
      run,
      systemPauseMs: 250,
      loadTester: { transport, thinkTimeMs: 1 },
      sleep,
    });

    const comparison = await suite.runComparison(
      { label: 'alpha', url: 'http://alpha' },
      { label: 'beta', url: 'http://beta' }
    );

    expect(comparison.a.name).toBe('alpha');
    expect(comparison.b.name).toBe('beta');
    expect(comparison.a.results.map((result) => result.system)).toEqual(['alpha']);
    expect(comparison.b.results.map((result) => result.system)).toEqual(['beta']);
    expect(sleeps).toEqual([250]);
    expect(urls.some((url) => url.startsWith('http://beta/'))).toBe(true);
    expect(urls.indexOf('http://beta/health')).toBeGreaterThan(urls.lastIndexOf('http://alpha/health'));
  });

  it('stops before the next scenario once cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const { transport } = recordingTransport();
    const send = vi.spyOn(transport, 'send');
    const suite = new BenchmarkSuite({
      scenarios: [health, products],
      run,
      loadTester: { transport, signal: controller.signal },
      sleep: recordingSleep().sleep,
    });

    const results = await suite.runSystem({ label: 'alpha', url: 'http://alpha' });

    expect(results).toEqual([]);
    expect(send).not.toHaveBeenCalled();
  });
});
