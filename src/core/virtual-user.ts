/**
 * Virtual User
 *
 * One simulated client. After its ramp-up offset it loops select → execute
 * → record → pause until its own wall-clock window has elapsed. The request
 * in flight when the window closes is allowed to finish, so a user may
 * overrun its nominal end by up to one request.
 */

import type { Logger } from 'pino';
import type { BenchmarkConfig, RequestSample, WorkerOutcome } from '../types/benchmark.js';
import { delay, type Sleeper } from '../utils/delay.js';
import { WorkerError, toError } from '../utils/errors.js';
import type { EndpointSelector } from './endpoint-selector.js';
import { monotonicNow, type MonotonicClock, type RequestExecutor } from './request-executor.js';

export const DEFAULT_THINK_TIME_MS = 10;

export interface VirtualUserOptions {
  selector: EndpointSelector;
  executor: RequestExecutor;
  /** Pause between consecutive requests (default: 10) */
  thinkTimeMs?: number;
  /** Checked before each request and during ramp-up */
  signal?: AbortSignal;
  logger?: Logger;
  now?: MonotonicClock;
  sleep?: Sleeper;
}

/**
 * Start offset of a user, in milliseconds.
 *
 * Users are spread linearly over the ramp-up window using an integer
 * millisecond step: `floor(rampUp * 1000 / users) * userIndex`.
 */
export function rampUpDelayMs(config: Pick<BenchmarkConfig, 'rampUpSeconds' | 'concurrentUsers'>, userIndex: number): number {
  const stepMs = Math.floor((config.rampUpSeconds * 1000) / config.concurrentUsers);
  return stepMs * userIndex;
}

export class VirtualUser {
  private readonly selector: EndpointSelector;
  private readonly executor: RequestExecutor;
  private readonly thinkTimeMs: number;
  private readonly signal?: AbortSignal;
  private readonly logger?: Logger;
  private readonly now: MonotonicClock;
  private readonly sleep: Sleeper;

  constructor(options: VirtualUserOptions) {
    this.selector = options.selector;
    this.executor = options.executor;
    this.thinkTimeMs = options.thinkTimeMs ?? DEFAULT_THINK_TIME_MS;
    this.signal = options.signal;
    this.logger = options.logger;
    this.now = options.now ?? monotonicNow;
    this.sleep = options.sleep ?? delay;
  }

  /**
   * Run the request loop for user `userIndex`.
   *
   * Never rejects: an unexpected failure is returned in `error` next to
   * the samples recorded before it.
   */
  async run(userIndex: number, config: BenchmarkConfig): Promise<WorkerOutcome> {
    const samples: RequestSample[] = [];

    try {
      const startDelay = rampUpDelayMs(config, userIndex);
      if (startDelay > 0) {
        await this.sleep(startDelay, this.signal);
      }

      const windowMs = config.durationSeconds * 1000;
      const userStart = this.now();

      while (this.now() - userStart < windowMs) {
        if (this.signal?.aborted) {
          this.logger?.debug({ userIndex, requests: samples.length }, 'Virtual user cancelled');
          break;
        }

        const endpoint = this.selector.select(config.endpoints);
        samples.push(await this.executor.execute(config.targetUrl, endpoint));

        await this.sleep(this.thinkTimeMs, this.signal);
      }

      return { userIndex, samples };
    } catch (error) {
      const cause = toError(error);
      return {
        userIndex,
        samples,
        error: new WorkerError(`Virtual user ${userIndex} failed: ${cause.message}`, userIndex, cause),
      };
    }
  }
}
