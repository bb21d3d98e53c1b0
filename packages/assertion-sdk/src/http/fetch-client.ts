import { ok, err } from 'neverthrow';
import type { Result } from 'neverthrow';
import type {
  HttpClient,
  HttpClientOptions,
  HttpRequest,
  HttpResponse,
  HttpError,
} from './types.js';

/** Default request timeout: 10 seconds */
const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Extracts headers from a fetch Response into a plain object.
 */
const extractHeaders = (headers: Headers): Record<string, string> => {
  const result: Record<string, string> = {};
  headers.forEach((value, key) => {
    result[key] = value;
  });
  return result;
};

/**
 * A response whose body has been read in full.
 */
interface FetchedResponse {
  readonly response: Response;
  readonly text: string;
}

const createAbortError = (): Error => {
  const error = new Error('Body read was aborted');
  error.name = 'AbortError';
  return error;
};

/**
 * Reads the body as text, rejecting with an AbortError as soon as `signal`
 * aborts, even when the body stream itself never ends.
 */
const readText = (response: Response, signal: AbortSignal): Promise<string> => {
  if (signal.aborted) {
    return Promise.reject(createAbortError());
  }

  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      reject(createAbortError());
    };
    signal.addEventListener('abort', onAbort, { once: true });

    void response.text().then(
      (text) => {
        signal.removeEventListener('abort', onAbort);
        resolve(text);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
};

/**
 * Creates an HTTP client using the native fetch API.
 *
 * The provider serves JSON as `text/plain`, so bodies are read as text and
 * decoded with `JSON.parse` instead of `response.json()`.
 *
 * @param options - Optional client configuration
 * @returns An HttpClient instance
 *
 * @example
 * ```typescript
 * const client = createFetchClient({ timeoutMs: 5000 });
 * const result = await client.json({ url: 'https://api.us.onelogin.com/api/1/saml_assertion', method: 'POST', body });
 *
 * if (result.isOk()) {
 *   console.log(result.value.status, result.value.body);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export const createFetchClient = (options: HttpClientOptions = {}): HttpClient => {
  const { timeoutMs = DEFAULT_TIMEOUT_MS, baseHeaders = {} } = options;

  /**
   * Executes a fetch request and reads its body. The timeout and the caller's
   * signal cover both the request and the body read.
   */
  const executeFetch = async (request: HttpRequest): Promise<Result<FetchedResponse, HttpError>> => {
    const { signal } = request;
    if (signal?.aborted === true) {
      return err({ type: 'aborted', message: 'Request was cancelled' });
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, timeoutMs);

    const onCallerAbort = (): void => {
      controller.abort();
    };
    signal?.addEventListener('abort', onCallerAbort, { once: true });

    let status: number | undefined;
    try {
      const fetchOptions: RequestInit = {
        method: request.method,
        headers: {
          ...baseHeaders,
          ...request.headers,
        },
        signal: controller.signal,
      };

      // Only set body if provided (exactOptionalPropertyTypes compliance)
      if (request.body !== undefined) {
        fetchOptions.body = request.body;
      }

      const response = await fetch(request.url, fetchOptions);
      status = response.status;
      const text = await readText(response, controller.signal);
      return ok({ response, text });
    } catch (error) {
      const statusField = status !== undefined ? { status } : {};

      if (error instanceof Error && error.name === 'AbortError') {
        if (signal?.aborted === true) {
          return err({
            type: 'aborted',
            message: 'Request was cancelled',
            ...statusField,
            cause: error,
          });
        }
        return err({
          type: 'timeout',
          message: `Request timed out after ${String(timeoutMs)}ms`,
          ...statusField,
          cause: error,
        });
      }

      if (status !== undefined) {
        return err({
          type: 'network',
          message: 'Failed to read response body',
          status,
          cause: error,
        });
      }

      return err({
        type: 'network',
        message: error instanceof Error ? error.message : 'Network error',
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onCallerAbort);
    }
  };

  const json = async (request: HttpRequest): Promise<Result<HttpResponse<unknown>, HttpError>> => {
    const fetchResult = await executeFetch({
      ...request,
      headers: {
        Accept: 'application/json',
        ...(request.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        ...request.headers,
      },
    });

    if (fetchResult.isErr()) {
      return err(fetchResult.error);
    }

    const { response, text } = fetchResult.value;

    try {
      const body: unknown = JSON.parse(text);
      return ok({
        status: response.status,
        statusText: response.statusText,
        headers: extractHeaders(response.headers),
        body,
      });
    } catch (error) {
      return err({
        type: 'parse',
        message: 'Failed to parse JSON response',
        status: response.status,
        cause: error,
      });
    }
  };

  return {
    json,
  };
};
