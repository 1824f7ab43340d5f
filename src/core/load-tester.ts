/**
 * Load Tester
 *
 * Fork-join orchestrator for one benchmark run:
 * 1. validate the configuration (nothing starts on a bad config)
 * 2. launch `concurrentUsers` virtual users
 * 3. await every user (the only synchronization point)
 * 4. fold each user's samples into a fresh MetricsAggregate and finalize it
 *
 * Users share the transport and the frozen config and nothing else, so the
 * aggregate needs no locking: it is only touched after the join.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { validateBenchmarkConfig } from '../config/benchmark-config.js';
import { MetricsAggregate } from '../metrics/metrics-aggregate.js';
import type { BenchmarkConfig, WorkerOutcome } from '../types/benchmark.js';
import type { Sleeper } from '../utils/delay.js';
import { WorkerError, toError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { RandomSource } from '../utils/random.js';
import { EndpointSelector } from './endpoint-selector.js';
import { NodeHttpTransport, type HttpTransport } from './http-transport.js';
import { RequestExecutor, type MonotonicClock } from './request-executor.js';
import { VirtualUser } from './virtual-user.js';

export interface LoadTesterOptions {
  /** Shared transport; one is created (and owned) when omitted */
  transport?: HttpTransport;
  /** Timeout for the transport created when none is given (default: 30000) */
  requestTimeoutMs?: number;
  /** Pause between a user's requests (default: 10) */
  thinkTimeMs?: number;
  random?: RandomSource;
  /** Cancels the run between requests; partial results are still returned */
  signal?: AbortSignal;
  logger?: Logger;
  /** Monotonic clock for request timing and user windows */
  now?: MonotonicClock;
  /** Epoch clock for the aggregate's start/end stamps */
  wallClock?: () => number;
  sleep?: Sleeper;
}

export interface LoadTesterEvents {
  'benchmark:start': (label: string, config: BenchmarkConfig) => void;
  'worker:complete': (outcome: WorkerOutcome) => void;
  'worker:error': (error: WorkerError, outcome: WorkerOutcome) => void;
  'benchmark:complete': (metrics: MetricsAggregate) => void;
}

export class LoadTester extends EventEmitter<LoadTesterEvents> {
  readonly config: BenchmarkConfig;
  private readonly transport: HttpTransport;
  private readonly ownsTransport: boolean;
  private readonly selector: EndpointSelector;
  private readonly executor: RequestExecutor;
  private readonly logger: Logger;
  private readonly wallClock: () => number;

  /**
   * @throws {ConfigurationError} if `config` is invalid
   */
  constructor(
    config: unknown,
    private readonly options: LoadTesterOptions = {}
  ) {
    super();
    this.config = validateBenchmarkConfig(config);
    this.logger = options.logger ?? createLogger('LoadTester');
    this.wallClock = options.wallClock ?? Date.now;

    this.ownsTransport = options.transport === undefined;
    this.transport = options.transport ?? new NodeHttpTransport({ timeoutMs: options.requestTimeoutMs });

    this.selector = new EndpointSelector(options.random);
    this.executor = new RequestExecutor(this.transport, {
      logger: this.logger,
      now: options.now,
    });
  }

  /**
   * Run the benchmark and return the finalized aggregate.
   *
   * Always resolves with an aggregate, even when every request failed or
   * some users crashed.
   */
  async runBenchmark(label: string): Promise<MetricsAggregate> {
    const metrics = new MetricsAggregate(label, this.wallClock());
    const { concurrentUsers, durationSeconds, rampUpSeconds } = this.config;

    this.logger.info(
      { label, target: this.config.targetUrl, concurrentUsers, durationSeconds, rampUpSeconds },
      'Starting benchmark'
    );
    this.emit('benchmark:start', label, this.config);

    const runs: Promise<WorkerOutcome>[] = [];
    for (let userIndex = 0; userIndex < concurrentUsers; userIndex++) {
      runs.push(this.createUser().run(userIndex, this.config));
    }

    const settled = await Promise.allSettled(runs);

    settled.forEach((result, userIndex) => {
      const outcome: WorkerOutcome =
        result.status === 'fulfilled'
          ? result.value
          : {
              userIndex,
              samples: [],
              error: new WorkerError(`Virtual user ${userIndex} rejected`, userIndex, toError(result.reason)),
            };

      metrics.merge(outcome.samples);

      if (outcome.error) {
        const error =
          outcome.error instanceof WorkerError
            ? outcome.error
            : new WorkerError(outcome.error.message, userIndex, outcome.error);
        this.logger.warn(
          { userIndex, recordedSamples: outcome.samples.length, err: error },
          'Virtual user failed; keeping its partial samples'
        );
        this.emit('worker:error', error, outcome);
      }
      this.emit('worker:complete', outcome);
    });

    metrics.finalize(this.wallClock());

    this.logger.info(
      {
        label,
        totalRequests: metrics.totalRequests,
        requestsPerSecond: Number(metrics.requestsPerSecond().toFixed(2)),
        averageResponseTimeMs: Number(metrics.averageResponseTimeMs().toFixed(2)),
        successRate: Number(metrics.successRate().toFixed(1)),
      },
      'Benchmark completed'
    );
    this.emit('benchmark:complete', metrics);

    return metrics;
  }

  /**
   * Release the transport if this tester created it
   */
  close(): void {
    if (this.ownsTransport) {
      this.transport.close();
    }
  }

  private createUser(): VirtualUser {
    return new VirtualUser({
      selector: this.selector,
      executor: this.executor,
      thinkTimeMs: this.options.thinkTimeMs,
      signal: this.options.signal,
      logger: this.logger,
      now: this.options.now,
      sleep: this.options.sleep,
    });
  }
}

/**
 * One-shot helper: run a benchmark and release the transport afterwards
 */
export async function runBenchmark(
  config: unknown,
  label: string,
  options: LoadTesterOptions = {}
): Promise<MetricsAggregate> {
  const tester = new LoadTester(config, options);
  try {
    return await tester.runBenchmark(label);
  } finally {
    tester.close();
  }
}
