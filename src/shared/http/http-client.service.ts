import { Inject, Injectable, OnModuleDestroy, Optional } from '@nestjs/common';
import { Agent, Dispatcher } from 'undici';
import { PinoLoggerService } from '../logging/pino-logger.service';

export const HTTP_DISPATCHER = 'HttpDispatcher';

export interface HttpRequestOptions {
  method?: Dispatcher.HttpMethod;
  headers?: Record<string, string>;
  body?: string;
  timeout?: number;
  maxRetries?: number;
  retryDelay?: number;
}

/**
 * Body is the parsed JSON when the response is JSON, otherwise the raw text.
 * Callers validate it.
 */
export interface HttpResponse {
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
  body: unknown;
}

export class HttpStatusError extends Error {
  constructor(
    public readonly url: string,
    public readonly statusCode: number,
  ) {
    super(`HTTP ${statusCode} from ${url}`);
    this.name = 'HttpStatusError';
  }
}

@Injectable()
export class HttpClientService implements OnModuleDestroy {
  private readonly dispatcher: Dispatcher;
  private readonly defaultTimeout = 30000;
  private readonly defaultMaxRetries = 3;
  private readonly defaultRetryDelay = 1000;

  constructor(
    private readonly logger: PinoLoggerService,
    @Optional() @Inject(HTTP_DISPATCHER) dispatcher?: Dispatcher,
  ) {
    this.logger.setContext(HttpClientService.name);
    this.dispatcher =
      dispatcher ??
      new Agent({
        connections: 10,
        pipelining: 1,
        keepAliveTimeout: 30000,
        keepAliveMaxTimeout: 60000,
      });
  }

  /**
   * Network errors and 5xx responses are retried with exponential backoff.
   * Other non-2xx responses are returned to the caller.
   */
  async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const parsedUrl = new URL(url);
    const maxRetries = options.maxRetries ?? this.defaultMaxRetries;
    const retryDelay = options.retryDelay ?? this.defaultRetryDelay;
    const timeout = options.timeout ?? this.defaultTimeout;

    let lastError: Error = new Error(`Request to ${url} was not attempted`);

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        const response = await this.dispatcher.request({
          origin: parsedUrl.origin,
          path: parsedUrl.pathname + parsedUrl.search,
          method: options.method || 'GET',
          headers: options.headers,
          body: options.body,
          headersTimeout: timeout,
          bodyTimeout: timeout,
        });

        const bodyText = await response.body.text();
        if (response.statusCode >= 500) {
          throw new HttpStatusError(url, response.statusCode);
        }

        return {
          statusCode: response.statusCode,
          headers: response.headers,
          body: parseBody(bodyText),
        };
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        this.logger.warn(
          { url, attempt, error: lastError.message },
          'HTTP request failed, retrying',
        );

        if (attempt < maxRetries) {
          await this.delay(retryDelay * Math.pow(2, attempt));
        }
      }
    }

    this.logger.error(
      { url, maxRetries, error: lastError.message },
      'HTTP request failed after all retries',
    );
    throw lastError;
  }

  async get(
    url: string,
    options?: Omit<HttpRequestOptions, 'method' | 'body'>,
  ): Promise<HttpResponse> {
    return this.request(url, { ...options, method: 'GET' });
  }

  async post(
    url: string,
    body: unknown,
    options?: Omit<HttpRequestOptions, 'method' | 'body'>,
  ): Promise<HttpResponse> {
    return this.request(url, {
      ...options,
      method: 'POST',
      body: JSON.stringify(body),
      headers: {
        'Content-Type': 'application/json',
        ...options?.headers,
      },
    });
  }

  async postForm(
    url: string,
    form: Record<string, string>,
    options?: Omit<HttpRequestOptions, 'method' | 'body'>,
  ): Promise<HttpResponse> {
    return this.request(url, {
      ...options,
      method: 'POST',
      body: new URLSearchParams(form).toString(),
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        ...options?.headers,
      },
    });
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  async onModuleDestroy(): Promise<void> {
    await this.dispatcher.close();
  }
}

function parseBody(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
