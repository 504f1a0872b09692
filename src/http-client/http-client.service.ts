import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { RequestInit, Response as UndiciResponse } from 'undici';
import { Agent, fetch } from 'undici';

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
  retries?: number;
  signal?: AbortSignal;
}

export class UpstreamHttpError extends Error {
  constructor(
    readonly status: number,
    readonly responseBody: unknown,
  ) {
    super(`Upstream request failed with status ${status}`);
    this.name = 'UpstreamHttpError';
  }
}

type UpstreamResponse = {
  status: number;
  ok: boolean;
  body: unknown;
};

/** JSON client for the OCR engine, bound to OCR_ENGINE_BASE_URL. */
@Injectable()
export class HttpClientService implements OnModuleDestroy {
  private readonly logger = new Logger(HttpClientService.name);
  private readonly baseUrl: string;
  private readonly defaultTimeoutMs: number;
  private readonly defaultRetries: number;
  private readonly dispatcher: Agent;

  constructor(private readonly configService: ConfigService) {
    this.baseUrl = this.configService.get<string>('OCR_ENGINE_BASE_URL') ?? '';
    this.defaultTimeoutMs = this.normalizeTimeoutMs(
      this.configService.get('OCR_ENGINE_TIMEOUT'),
      60000,
    );
    this.defaultRetries = this.normalizeRetries(this.configService.get('OCR_ENGINE_RETRIES'), 0);
    this.dispatcher = new Agent({
      connections: 16,
      pipelining: 0,
      keepAliveTimeout: 10_000,
      keepAliveMaxTimeout: 60_000,
    });
  }

  async get<T>(path: string, options?: HttpRequestOptions): Promise<T> {
    return this.request<T>('GET', path, undefined, options);
  }

  async post<T>(path: string, body: unknown, options?: HttpRequestOptions): Promise<T> {
    return this.request<T>('POST', path, body, options);
  }

  async onModuleDestroy(): Promise<void> {
    await this.dispatcher.close();
  }

  /**
   * Perform a request that throws on non-2xx responses. Retries are limited to
   * idempotent GET requests and only for retryable failures; POSTs to the
   * engine are never replayed since each one is a paid-for admission.
   */
  private async request<T>(
    method: 'GET' | 'POST',
    path: string,
    body?: unknown,
    options?: HttpRequestOptions,
  ): Promise<T> {
    const url = this.buildUrl(path);
    const timeoutMs = this.normalizeTimeoutMs(options?.timeoutMs, this.defaultTimeoutMs);
    const retries = this.normalizeRetries(options?.retries, this.defaultRetries);
    const effectiveRetries = method === 'GET' ? retries : 0;
    let lastError: unknown;

    for (let attempt = 0; attempt <= effectiveRetries; attempt += 1) {
      try {
        const response = await this.executeRequest(method, url, body, options, timeoutMs);

        if (!response.ok) {
          throw new UpstreamHttpError(response.status, response.body);
        }

        return response.body as T;
      } catch (error) {
        lastError = error;
        const shouldRetry = this.isRetryableError(error);

        if (attempt >= effectiveRetries || !shouldRetry) {
          break;
        }
        this.logger.warn(
          `HTTP ${method} ${url} failed (attempt ${attempt + 1}/${effectiveRetries + 1}). Retrying.`,
        );
      }
    }

    // Log error once at the end
    if (lastError instanceof UpstreamHttpError) {
      this.logger.error(
        lastError.message,
        JSON.stringify({ url, method, status: lastError.status }),
      );
    } else {
      this.logger.error(
        lastError instanceof Error ? lastError.message : 'Upstream request failed',
        JSON.stringify({ url, method }),
      );
    }

    throw lastError;
  }

  private async executeRequest(
    method: 'GET' | 'POST',
    url: string,
    body: unknown,
    options: HttpRequestOptions | undefined,
    timeoutMs: number,
  ): Promise<UpstreamResponse> {
    const controller = new AbortController();
    const signal = this.attachAbortSignal(controller, options?.signal);

    const response = await this.fetchWithTimeout(
      url,
      {
        method,
        headers: this.buildHeaders(options?.headers, body),
        body: body === undefined ? undefined : JSON.stringify(body),
        signal,
        dispatcher: this.dispatcher,
      },
      timeoutMs,
      controller,
    );

    const contentType = response.headers.get('content-type') ?? '';
    return {
      status: response.status,
      ok: response.ok,
      body: await this.parseResponseBody(response, contentType),
    };
  }

  private async fetchWithTimeout(
    url: string,
    init: RequestInit & { signal: AbortSignal },
    timeoutMs: number,
    controller: AbortController,
  ): Promise<UndiciResponse> {
    let timeoutId: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        controller.abort();
        reject(new Error('Request timed out'));
      }, timeoutMs);
    });

    try {
      return await Promise.race([fetch(url, init), timeoutPromise]);
    } finally {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
    }
  }

  private attachAbortSignal(controller: AbortController, signal?: AbortSignal): AbortSignal {
    if (!signal) {
      return controller.signal;
    }

    if (signal.aborted) {
      controller.abort();
      return controller.signal;
    }

    signal.addEventListener('abort', () => controller.abort(), { once: true });
    return controller.signal;
  }

  private buildUrl(path: string): string {
    if (path.startsWith('http://') || path.startsWith('https://') || path.startsWith('//')) {
      throw new Error('Absolute engine URLs are not allowed');
    }

    if (!this.baseUrl) {
      throw new Error('OCR engine base URL is not configured properly');
    }

    const baseUrl = new URL(this.baseUrl);
    const url = new URL(path, baseUrl);
    if (url.origin !== baseUrl.origin) {
      throw new Error('Engine path resolves outside the configured base URL');
    }

    return url.toString();
  }

  /**
   * Network failures, timeouts and 5xx responses are retryable; parse errors,
   * caller aborts and 4xx responses are not.
   */
  private isRetryableError(error: unknown): boolean {
    if (!(error instanceof Error) || error instanceof SyntaxError) {
      return false;
    }

    if (error.name === 'AbortError') {
      return false;
    }

    if (error instanceof UpstreamHttpError) {
      return error.status >= 500 && error.status < 600;
    }

    return true;
  }

  private buildHeaders(
    headers: Record<string, string> | undefined,
    body: unknown,
  ): Record<string, string> {
    if (body === undefined) {
      return headers ?? {};
    }

    return {
      ...(headers ?? {}),
      'content-type': 'application/json',
    };
  }

  private async parseResponseBody(response: UndiciResponse, contentType: string): Promise<unknown> {
    const text = await response.text();

    if (!text) {
      return null;
    }

    if (contentType.includes('application/json')) {
      try {
        return JSON.parse(text);
      } catch {
        this.logger.warn('Failed to parse engine JSON response, returning raw text instead.');
        return text;
      }
    }

    return text;
  }

  private normalizeTimeoutMs(value: unknown, fallback: number): number {
    const candidate = typeof value === 'number' ? value : Number(value);
    if (!Number.isFinite(candidate) || candidate <= 0) {
      return fallback;
    }
    return Math.floor(candidate);
  }

  private normalizeRetries(value: unknown, fallback: number): number {
    const candidate = typeof value === 'number' ? value : Number(value);
    if (!Number.isFinite(candidate) || candidate < 0) {
      return fallback;
    }
    return Math.floor(candidate);
  }
}
