import type { Result } from 'neverthrow';

/**
 * HTTP request configuration.
 */
export interface HttpRequest {
  readonly url: string;
  readonly method: 'GET' | 'POST';
  readonly headers?: Readonly<Record<string, string>>;
  readonly body?: string;
  /** Caller cancellation; aborts the in-flight request */
  readonly signal?: AbortSignal;
}

/**
 * HTTP response with decoded body.
 *
 * Non-2xx responses are returned as responses, not errors, so that callers
 * can read the provider's error envelope.
 */
export interface HttpResponse<T> {
  readonly status: number;
  readonly statusText: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: T;
}

/**
 * Transport-level failure: nothing usable came back.
 */
export interface HttpError {
  readonly type: 'network' | 'timeout' | 'aborted' | 'parse';
  readonly message: string;
  readonly status?: number;
  readonly cause?: unknown;
}

/**
 * HTTP client interface for making requests.
 * Abstraction over fetch for dependency injection and testing.
 */
export interface HttpClient {
  /**
   * Makes an HTTP request and decodes the body as JSON, whatever the
   * declared content type.
   * @param request - The request configuration
   * @returns Result with the undecoded-shape JSON value or error
   */
  readonly json: (request: HttpRequest) => Promise<Result<HttpResponse<unknown>, HttpError>>;
}

/**
 * Options for creating an HTTP client.
 */
export interface HttpClientOptions {
  /** Request timeout in milliseconds (default: 10000) */
  readonly timeoutMs?: number;
  /** Base headers to include in all requests */
  readonly baseHeaders?: Readonly<Record<string, string>>;
}
