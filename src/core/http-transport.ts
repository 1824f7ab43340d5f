/**
 * HTTP transport shared by every virtual user
 *
 * Built once per run around keep-alive agents; nothing on it changes after
 * construction, so workers call it concurrently without coordination.
 * Only response metadata is read: the body is drained and discarded so
 * large payloads do not skew timings.
 */

import http from 'node:http';
import https from 'node:https';
import type { HttpMethod } from '../types/benchmark.js';

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export interface TransportRequest {
  url: string;
  method: HttpMethod;
  headers: Readonly<Record<string, string>>;
  body?: string;
}

export interface TransportResponse {
  statusCode: number;
  /** Declared Content-Length, when the server sent one */
  contentLength?: number;
}

/**
 * Anything that can perform one request and report its status line.
 *
 * Implementations reject on transport failure (refused, DNS, timeout).
 */
export interface HttpTransport {
  send(request: TransportRequest): Promise<TransportResponse>;
  close(): void;
}

export interface NodeHttpTransportOptions {
  /** Per-request timeout (default: 30000) */
  timeoutMs?: number;
  /** Upper bound on open sockets per origin (default: unlimited) */
  maxSockets?: number;
}

export function parseContentLength(value: string | string[] | undefined): number | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : undefined;
}

/**
 * Transport on node:http / node:https.
 *
 * Unlike fetch, it sends a body with any method, GET included.
 */
export class NodeHttpTransport implements HttpTransport {
  private readonly timeoutMs: number;
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;

  constructor(options: NodeHttpTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    const agentOptions = {
      keepAlive: true,
      maxSockets: options.maxSockets ?? Infinity,
    };
    this.httpAgent = new http.Agent(agentOptions);
    this.httpsAgent = new https.Agent(agentOptions);
  }

  send(request: TransportRequest): Promise<TransportResponse> {
    return new Promise<TransportResponse>((resolve, reject) => {
      let url: URL;
      try {
        url = new URL(request.url);
      } catch (error) {
        reject(error);
        return;
      }

      const isHttps = url.protocol === 'https:';
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

      const headers: Record<string, string | number> = { ...request.headers };
      if (request.body !== undefined) {
        headers['Content-Length'] = Buffer.byteLength(request.body);
      }

      const options: http.RequestOptions = {
        method: request.method,
        headers,
        agent: isHttps ? this.httpsAgent : this.httpAgent,
        signal: controller.signal,
      };

      const onResponse = (res: http.IncomingMessage): void => {
        clearTimeout(timeoutId);
        const response: TransportResponse = {
          statusCode: res.statusCode ?? 0,
          contentLength: parseContentLength(res.headers['content-length']),
        };
        // Drain without buffering so the socket returns to the pool
        res.on('error', () => res.destroy());
        res.resume();
        resolve(response);
      };

      const req = isHttps
        ? https.request(url, options, onResponse)
        : http.request(url, options, onResponse);

      req.on('error', (error) => {
        clearTimeout(timeoutId);
        reject(error);
      });

      if (request.body !== undefined) {
        req.write(request.body);
      }
      req.end();
    });
  }

  close(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}
