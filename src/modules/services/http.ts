/**
 * Service HTTP Client
 *
 * Thin fetch-based JSON client shared by every collaborator client. Each
 * request gets its own timeout; transient failures (network errors, timeouts,
 * 5xx) are retried with exponential backoff unless the call opts out.
 */

import type { z } from 'zod';
import { CollaboratorError, TransientNetworkError, errorMessage } from './errors.js';

export type HttpMethod = 'GET' | 'POST' | 'PATCH';

/**
 * Configuration for a service client
 */
export interface ServiceClientConfig {
  /** Timeout per attempt in ms (default: 30000) */
  timeoutMs: number;
  /** Total attempts for retryable requests (default: 3) */
  maxAttempts: number;
  /** Base delay for exponential backoff in ms (default: 1000) */
  retryBaseDelay: number;
  /** Headers sent with every request */
  headers: Record<string, string>;
}

const DEFAULT_CLIENT_CONFIG: ServiceClientConfig = {
  timeoutMs: 30_000,
  maxAttempts: 3,
  retryBaseDelay: 1000,
  headers: {},
};

export interface RequestOptions {
  method?: HttpMethod;
  body?: unknown;
  query?: Record<string, string>;
  /** Overrides the client timeout for this request */
  timeoutMs?: number;
  /** Set to false for calls that must not be repeated automatically */
  retry?: boolean;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class ServiceClient {
  readonly serviceName: string;
  private readonly baseUrl: string;
  private readonly config: ServiceClientConfig;

  constructor(serviceName: string, baseUrl: string, config: Partial<ServiceClientConfig> = {}) {
    this.serviceName = serviceName;
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.config = { ...DEFAULT_CLIENT_CONFIG, ...config };
  }

  /**
   * Send a request and validate the JSON response against a schema
   */
  async request<S extends z.ZodTypeAny>(path: string, schema: S, options: RequestOptions = {}): Promise<z.output<S>> {
    const payload = await this.send(path, options);
    const parseResult = schema.safeParse(payload);

    if (!parseResult.success) {
      const issues = parseResult.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`);
      throw new CollaboratorError(this.serviceName, `Unexpected response from ${path} (${issues.join('; ')})`);
    }

    return parseResult.data;
  }

  /**
   * Hit a health endpoint once, without retries. Used to wake services
   * that scale to zero before the real call.
   */
  async ping(path: string, timeoutMs: number = 30_000): Promise<boolean> {
    try {
      const response = await fetch(this.buildUrl(path), {
        method: 'GET',
        headers: this.config.headers,
        signal: AbortSignal.timeout(timeoutMs),
      });

      if (response.status === 200) {
        console.log(`[${this.serviceName}] Warm and ready`);
        return true;
      }

      console.warn(`[${this.serviceName}] Health check returned ${response.status}`);
      return false;
    } catch (error) {
      console.warn(`[${this.serviceName}] Could not warm up: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Send with retry logic and exponential backoff
   */
  private async send(path: string, options: RequestOptions): Promise<unknown> {
    const maxAttempts = options.retry === false ? 1 : Math.max(1, this.config.maxAttempts);
    const url = this.buildUrl(path, options.query);

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.attempt(url, options);
      } catch (error) {
        if (!(error instanceof TransientNetworkError)) {
          throw error;
        }

        if (attempt >= maxAttempts) {
          // A server that keeps failing is reported as the collaborator's fault
          if (error.status !== undefined) {
            throw new CollaboratorError(this.serviceName, `HTTP ${error.status} after ${attempt} attempt(s)`, error.status, {
              cause: error,
            });
          }
          throw error;
        }

        const delay = Math.pow(2, attempt - 1) * this.config.retryBaseDelay;
        console.log(
          `[${this.serviceName}] Retrying ${path} after ${delay}ms (attempt ${attempt + 1}/${maxAttempts}): ${error.message}`
        );
        await sleep(delay);
      }
    }
  }

  private async attempt(url: string, options: RequestOptions): Promise<unknown> {
    const method = options.method ?? 'GET';
    const headers: Record<string, string> = { ...this.config.headers };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: AbortSignal.timeout(options.timeoutMs ?? this.config.timeoutMs),
      });
    } catch (error) {
      throw new TransientNetworkError(this.serviceName, `${method} ${url} failed: ${errorMessage(error)}`, undefined, {
        cause: error,
      });
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new TransientNetworkError(this.serviceName, `Reading response from ${url} failed: ${errorMessage(error)}`, undefined, {
        cause: error,
      });
    }

    if (response.status >= 500) {
      throw new TransientNetworkError(this.serviceName, `HTTP ${response.status}: ${response.statusText}`, response.status);
    }

    if (!response.ok) {
      const detail = text ? ` ${text.slice(0, 200)}` : '';
      throw new CollaboratorError(this.serviceName, `HTTP ${response.status}: ${response.statusText}${detail}`, response.status);
    }

    if (!text) {
      return {};
    }

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new CollaboratorError(this.serviceName, `Invalid JSON from ${url}`, response.status, { cause: error });
    }
  }

  private buildUrl(path: string, query?: Record<string, string>): string {
    const target = new URL(`${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      target.searchParams.set(key, value);
    }
    return target.toString();
  }
}
