/**
 * HTTP client with retry, timeout, and error handling
 */

import { backoffDelay, defaultSleep, type Sleep } from "@meridian/core";
import {
  CollaboratorRateLimitedError,
  CollaboratorRejectedError,
  CollaboratorRequestError,
  CollaboratorTimeoutError,
  getErrorMessage,
  readProblemDetail,
} from "@meridian/errors";
import { z } from "zod";

export interface HttpRetryOptions {
  /** Total attempts including the first one. */
  readonly maxAttempts: number;
  readonly initialDelay: number;
  readonly maxDelay: number;
  readonly backoffMultiplier: number;
  readonly retryableStatusCodes: readonly number[];
}

export interface HttpClientConfig {
  /** Collaborator name used in errors and logs. */
  readonly service: string;
  readonly baseUrl?: string;
  readonly timeout?: number;
  readonly retry?: Partial<HttpRetryOptions>;
  readonly bearerToken?: string;
  readonly headers?: Readonly<Record<string, string>>;
  readonly sleep?: Sleep;
}

export interface RequestOptions {
  readonly method: "GET" | "POST" | "PUT" | "DELETE";
  readonly body?: unknown;
  readonly query?: Readonly<Record<string, string | number | boolean | undefined>>;
  readonly headers?: Readonly<Record<string, string>>;
}

/**
 * Default configuration values
 */
const DEFAULT_TIMEOUT = 30000;
const DEFAULT_RETRY_OPTIONS: HttpRetryOptions = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 10000,
  backoffMultiplier: 2,
  retryableStatusCodes: [408, 429, 500, 502, 503, 504],
};

const MatrixErrorSchema = z.object({ errcode: z.string().optional(), error: z.string() });
const MessageErrorSchema = z.object({ message: z.string() });

/**
 * HTTP client for the hub's outbound collaborator calls
 */
export class HttpClient {
  readonly service: string;
  private readonly baseUrl: string | undefined;
  private readonly timeout: number;
  private readonly retryOptions: HttpRetryOptions;
  private readonly defaultHeaders: Readonly<Record<string, string>>;
  private readonly sleep: Sleep;

  constructor(config: HttpClientConfig) {
    this.service = config.service;
    this.baseUrl = config.baseUrl;
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT;
    this.retryOptions = {
      ...DEFAULT_RETRY_OPTIONS,
      ...config.retry,
    };
    this.sleep = config.sleep ?? defaultSleep;

    this.defaultHeaders = {
      "Content-Type": "application/json",
      "User-Agent": "meridian-hub",
      ...(config.bearerToken ? { Authorization: `Bearer ${config.bearerToken}` } : {}),
      ...config.headers,
    };
  }

  /**
   * Create a new HttpClient with updated retry options
   */
  withRetry(options: Partial<HttpRetryOptions>): HttpClient {
    return new HttpClient({
      service: this.service,
      ...(this.baseUrl === undefined ? {} : { baseUrl: this.baseUrl }),
      timeout: this.timeout,
      retry: { ...this.retryOptions, ...options },
      headers: this.defaultHeaders,
      sleep: this.sleep,
    });
  }

  /**
   * Make an HTTP request with retry and timeout, validating the JSON
   * response body against `schema`.
   */
  async request<T>(
    path: string,
    options: RequestOptions,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    const response = await this.requestWithRetry(path, options);
    const body = await this.readJson(response);
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new CollaboratorRequestError(
        this.service,
        response.status,
        "response body did not match the expected shape",
        parsed.error,
      );
    }
    return parsed.data;
  }

  /**
   * Make an HTTP request whose response body is not needed.
   */
  async send(path: string, options: RequestOptions): Promise<void> {
    const response = await this.requestWithRetry(path, options);
    await response.body?.cancel();
  }

  private async requestWithRetry(path: string, options: RequestOptions): Promise<Response> {
    const url = this.buildUrl(path, options.query);
    const init: RequestInit = {
      method: options.method,
      headers: { ...this.defaultHeaders, ...options.headers },
      ...(options.body === undefined ? {} : { body: JSON.stringify(options.body) }),
    };

    for (let attempt = 1; ; attempt++) {
      try {
        const response = await this.fetchWithTimeout(url, init);
        return await this.checkStatus(response);
      } catch (error) {
        if (!this.isRetryable(error) || attempt >= this.retryOptions.maxAttempts) {
          throw error;
        }

        const delay = this.delayFor(error, attempt);
        console.warn(
          `[${this.service}] ${options.method} ${path} failed (attempt ${attempt}/${this.retryOptions.maxAttempts}), retrying in ${delay}ms: ${getErrorMessage(error)}`,
        );
        await this.sleep(delay);
      }
    }
  }

  private isRetryable(error: unknown): boolean {
    if (error instanceof CollaboratorTimeoutError || error instanceof CollaboratorRateLimitedError) {
      return true;
    }
    if (error instanceof CollaboratorRequestError) {
      return (
        error.statusCode === undefined ||
        this.retryOptions.retryableStatusCodes.includes(error.statusCode)
      );
    }
    return false;
  }

  private delayFor(error: unknown, attempt: number): number {
    const backoff = backoffDelay(
      {
        maxAttempts: this.retryOptions.maxAttempts,
        baseDelayMs: this.retryOptions.initialDelay,
        maxDelayMs: this.retryOptions.maxDelay,
        multiplier: this.retryOptions.backoffMultiplier,
      },
      attempt,
    );
    if (error instanceof CollaboratorRateLimitedError && error.retryAfterMs !== undefined) {
      return Math.min(Math.max(backoff, error.retryAfterMs), this.retryOptions.maxDelay);
    }
    return backoff;
  }

  /**
   * Build full URL with query parameters
   */
  private buildUrl(
    path: string,
    query?: Readonly<Record<string, string | number | boolean | undefined>>,
  ): string {
    const url = new URL(path, this.baseUrl);

    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }
    }

    return url.toString();
  }

  /**
   * Fetch with timeout
   */
  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      return await fetch(url, {
        ...init,
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new CollaboratorTimeoutError(this.service, this.timeout);
      }
      throw new CollaboratorRequestError(
        this.service,
        undefined,
        `network error: ${getErrorMessage(error)}`,
        error,
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Map non-2xx responses to collaborator errors
   */
  private async checkStatus(response: Response): Promise<Response> {
    if (response.ok) {
      return response;
    }

    const detail = (await this.readErrorDetail(response)) ?? `HTTP ${response.status}: ${response.statusText}`;

    if (response.status === 429) {
      throw new CollaboratorRateLimitedError(this.service, parseRetryAfter(response));
    }
    if (response.status >= 500 || this.retryOptions.retryableStatusCodes.includes(response.status)) {
      throw new CollaboratorRequestError(this.service, response.status, detail);
    }
    throw new CollaboratorRejectedError(this.service, response.status, detail);
  }

  private async readJson(response: Response): Promise<unknown> {
    if (response.status === 204) {
      return undefined;
    }
    try {
      const body: unknown = await response.json();
      return body;
    } catch (error) {
      throw new CollaboratorRequestError(
        this.service,
        response.status,
        "failed to parse response JSON",
        error,
      );
    }
  }

  private async readErrorDetail(response: Response): Promise<string | undefined> {
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      // Error bodies are advisory; a non-JSON one leaves the status line as the detail.
      console.debug(`[${this.service}] unreadable error body: ${getErrorMessage(error)}`);
      return undefined;
    }
    const matrix = MatrixErrorSchema.safeParse(body);
    if (matrix.success) {
      return matrix.data.errcode ? `${matrix.data.errcode}: ${matrix.data.error}` : matrix.data.error;
    }
    const message = MessageErrorSchema.safeParse(body);
    if (message.success) {
      return message.data.message;
    }
    return readProblemDetail(body);
  }
}

function parseRetryAfter(response: Response): number | undefined {
  const header = response.headers.get("Retry-After");
  if (header === null) {
    return undefined;
  }
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}
