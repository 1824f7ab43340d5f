/**
 * Request Executor
 *
 * Performs one request for an endpoint definition and turns the outcome
 * into a RequestSample. Transport failures become samples with status 0;
 * nothing is thrown.
 */

import { performance } from 'node:perf_hooks';
import type { Logger } from 'pino';
import type { EndpointDefinition, RequestSample } from '../types/benchmark.js';
import { resolveHttpMethod } from '../types/schemas/benchmark.js';
import { lazyLog } from '../utils/logger-helpers.js';
import type { HttpTransport } from './http-transport.js';

export type MonotonicClock = () => number;

export const monotonicNow: MonotonicClock = () => performance.now();

export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode <= 299;
}

export interface RequestExecutorOptions {
  logger?: Logger;
  /** Monotonic millisecond clock (default: performance.now) */
  now?: MonotonicClock;
}

export class RequestExecutor {
  private readonly logger?: Logger;
  private readonly now: MonotonicClock;

  constructor(
    private readonly transport: HttpTransport,
    options: RequestExecutorOptions = {}
  ) {
    this.logger = options.logger;
    this.now = options.now ?? monotonicNow;
  }

  /**
   * Execute one request against `baseUrl + endpoint.path`
   *
   * Headers are attached as given and the body is sent whenever present,
   * whatever the method. The response size is the declared Content-Length,
   * or 0 when absent.
   */
  async execute(baseUrl: string, endpoint: EndpointDefinition): Promise<RequestSample> {
    const url = `${baseUrl}${endpoint.path}`;
    const method = resolveHttpMethod(endpoint.method);

    const startTime = this.now();
    try {
      const response = await this.transport.send({
        url,
        method,
        headers: endpoint.headers,
        body: endpoint.body,
      });
      const endTime = this.now();

      const sample: RequestSample = {
        startTime,
        endTime,
        statusCode: response.statusCode,
        responseSize: response.contentLength ?? 0,
        endpoint: endpoint.path,
        success: isSuccessStatus(response.statusCode),
      };

      lazyLog(
        this.logger,
        'trace',
        () => ({ method, url, statusCode: sample.statusCode, durationMs: endTime - startTime }),
        'Request completed'
      );

      return sample;
    } catch (error) {
      const endTime = this.now();

      lazyLog(
        this.logger,
        'debug',
        () => ({
          method,
          url,
          durationMs: endTime - startTime,
          error: error instanceof Error ? error.message : String(error),
        }),
        'Request failed at transport level'
      );

      return {
        startTime,
        endTime,
        statusCode: 0,
        responseSize: 0,
        endpoint: endpoint.path,
        success: false,
      };
    }
  }
}
