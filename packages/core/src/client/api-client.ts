/**
 * HTTP transport shared by every ClickUp service.
 *
 * Builds requests with consistent headers, encodes JSON and multipart bodies,
 * and turns responses into decoded values or typed errors. It never logs or
 * prints; callers that want request logging inject a wrapped `fetch`.
 */

import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT } from '../constants.js';
import { classifyResponse } from './error-message.js';
import { ApiError, DecodeError, SourceReadError, TransportError, ValidationError } from './errors.js';
import { encodeMultipart, type MultipartUpload } from './multipart.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface ApiClientConfig {
  readonly baseUrl: string;
  /** Sent verbatim as `Authorization`; empty means unauthenticated. */
  readonly apiKey: string;
  readonly userAgent: string;
  /** Zero or less disables the timeout. */
  readonly timeoutMs: number;
  readonly fetch: FetchLike;
}

type MutableConfig = { -readonly [K in keyof ApiClientConfig]: ApiClientConfig[K] };

export type ApiClientOption = (config: MutableConfig) => void;

export function withBaseUrl(baseUrl: string): ApiClientOption {
  return (config) => {
    config.baseUrl = baseUrl;
  };
}

export function withUserAgent(userAgent: string): ApiClientOption {
  return (config) => {
    config.userAgent = userAgent;
  };
}

export function withTimeout(timeoutMs: number): ApiClientOption {
  return (config) => {
    config.timeoutMs = timeoutMs;
  };
}

export function withFetch(fetchImpl: FetchLike): ApiClientOption {
  return (config) => {
    config.fetch = fetchImpl;
  };
}

export interface RequestOptions {
  signal?: AbortSignal;
  headers?: Record<string, string>;
}

export interface DecodeOptions<T> extends RequestOptions {
  /** Narrows the decoded JSON; a throw here becomes a DecodeError. */
  parse?: (value: unknown) => T;
}

export interface RequestDescriptor extends RequestOptions {
  method: HttpMethod;
  /** Relative to the base URL, query string included. */
  path: string;
  body?: unknown;
}

interface Outbound {
  method: HttpMethod;
  path: string;
  headers: Headers;
  body?: string | AsyncIterable<Uint8Array>;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function encodeJson(body: unknown): string | undefined {
  if (body === undefined || body === null) {
    return undefined;
  }

  let encoded: string | undefined;
  try {
    encoded = JSON.stringify(body);
  } catch (error) {
    throw new ValidationError(`marshal request body: ${errorMessage(error)}`, { cause: error });
  }

  if (encoded === undefined) {
    throw new ValidationError(`marshal request body: ${typeof body} is not JSON-serializable`);
  }
  return encoded;
}

export class ApiClient {
  readonly config: Readonly<ApiClientConfig>;

  constructor(config: ApiClientConfig) {
    this.config = Object.freeze({ ...config });
  }

  /**
   * Send a request and return the raw response, whatever its status.
   *
   * The timeout stops once headers arrive. `request.signal` still cancels
   * reading the returned body.
   */
  async send(request: RequestDescriptor): Promise<Response> {
    const outbound = this.buildJsonRequest(request);
    return this.dispatch(outbound, request.signal, async (response) => response, { keepSignal: true });
  }

  /**
   * GET/DELETE and decode the JSON response.
   */
  async decode<T>(method: HttpMethod, path: string, options: DecodeOptions<T> = {}): Promise<T> {
    const outbound = this.buildJsonRequest({ method, path, headers: options.headers });
    return this.dispatch(outbound, options.signal, (response) => this.readResult(response, options.parse));
  }

  /**
   * POST/PUT/PATCH with a JSON body and decode the JSON response.
   */
  async decodeWithBody<T>(
    method: HttpMethod,
    path: string,
    body: unknown,
    options: DecodeOptions<T> = {}
  ): Promise<T> {
    const outbound = this.buildJsonRequest({ method, path, body, headers: options.headers });
    return this.dispatch(outbound, options.signal, (response) => this.readResult(response, options.parse));
  }

  /**
   * Send a request whose successful response body is discarded.
   */
  async exec(method: HttpMethod, path: string, body?: unknown, options: RequestOptions = {}): Promise<void> {
    const outbound = this.buildJsonRequest({ method, path, body, headers: options.headers });
    return this.dispatch(outbound, options.signal, (response) => this.discard(response));
  }

  /**
   * POST without the Authorization header, for endpoints such as the OAuth
   * token exchange that must not see an existing key.
   */
  async sendUnauthenticated<T>(path: string, body: unknown, options: DecodeOptions<T> = {}): Promise<T> {
    return this.withoutCredentials().decodeWithBody('POST', path, body, options);
  }

  /**
   * POST a single file as multipart/form-data.
   */
  async sendMultipart<T>(upload: MultipartUpload, options: DecodeOptions<T> = {}): Promise<T> {
    const { contentType, body, failure } = encodeMultipart(upload);
    const headers = this.baseHeaders(contentType, options.headers);
    const outbound: Outbound = { method: 'POST', path: upload.path, headers, body };

    try {
      return await this.dispatch(outbound, options.signal, (response) => this.readResult(response, options.parse));
    } catch (error) {
      const source = failure();
      if (source) {
        throw new SourceReadError(`copy file content: ${errorMessage(source.cause)}`, { cause: source.cause });
      }
      throw error;
    }
  }

  get<T>(path: string, options?: DecodeOptions<T>): Promise<T> {
    return this.decode('GET', path, options);
  }

  post<T>(path: string, body: unknown, options?: DecodeOptions<T>): Promise<T> {
    return this.decodeWithBody('POST', path, body, options);
  }

  put<T>(path: string, body: unknown, options?: DecodeOptions<T>): Promise<T> {
    return this.decodeWithBody('PUT', path, body, options);
  }

  patch<T>(path: string, body: unknown, options?: DecodeOptions<T>): Promise<T> {
    return this.decodeWithBody('PATCH', path, body, options);
  }

  delete(path: string, options?: RequestOptions): Promise<void> {
    return this.exec('DELETE', path, undefined, options);
  }

  /**
   * Copy of this client with the same configuration and no credential.
   */
  withoutCredentials(): ApiClient {
    return new ApiClient({ ...this.config, apiKey: '' });
  }

  private baseHeaders(contentType: string, overrides?: Record<string, string>): Headers {
    const headers = new Headers();
    headers.set('Content-Type', contentType);
    headers.set('User-Agent', this.config.userAgent);

    // ClickUp personal tokens go in Authorization as-is, no "Bearer" prefix
    if (this.config.apiKey !== '') {
      headers.set('Authorization', this.config.apiKey);
    }

    for (const [name, value] of Object.entries(overrides ?? {})) {
      headers.set(name, value);
    }

    return headers;
  }

  private buildJsonRequest(request: RequestDescriptor): Outbound {
    const body = encodeJson(request.body);
    return {
      method: request.method,
      path: request.path,
      headers: this.baseHeaders('application/json', request.headers),
      body,
    };
  }

  private async dispatch<T>(
    outbound: Outbound,
    signal: AbortSignal | undefined,
    handle: (response: Response) => Promise<T>,
    { keepSignal = false }: { keepSignal?: boolean } = {}
  ): Promise<T> {
    const controller = new AbortController();
    let timedOut = false;
    const timer =
      this.config.timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            controller.abort();
          }, this.config.timeoutMs)
        : undefined;
    const forwardAbort = () => controller.abort();

    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    const init: RequestInit = {
      method: outbound.method,
      headers: outbound.headers,
      signal: controller.signal,
    };
    if (outbound.body !== undefined) {
      init.body = outbound.body;
      if (typeof outbound.body !== 'string') {
        init.duplex = 'half';
      }
    }

    try {
      let response: Response;
      try {
        response = await this.config.fetch(this.config.baseUrl + outbound.path, init);
      } catch (error) {
        throw this.transportFailure('execute request', error, timedOut);
      }

      try {
        return await handle(response);
      } catch (error) {
        if (error instanceof ApiError || error instanceof DecodeError || error instanceof TransportError) {
          throw error;
        }
        throw this.transportFailure('read response body', error, timedOut);
      }
    } finally {
      clearTimeout(timer);
      if (!keepSignal) {
        signal?.removeEventListener('abort', forwardAbort);
      }
    }
  }

  private transportFailure(step: string, error: unknown, timedOut: boolean): TransportError {
    if (timedOut) {
      return new TransportError(`${step}: request timed out after ${this.config.timeoutMs}ms`, true, {
        cause: error,
      });
    }
    return new TransportError(`${step}: ${errorMessage(error)}`, false, { cause: error });
  }

  private async readResult<T>(response: Response, parse?: (value: unknown) => T): Promise<T> {
    const text = await response.text();

    if (response.status >= 400) {
      throw classifyResponse(response.status, text);
    }

    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (error) {
      throw new DecodeError(`decode response: ${errorMessage(error)}`, response.status, { cause: error });
    }

    if (!parse) {
      return value as T;
    }

    try {
      return parse(value);
    } catch (error) {
      throw new DecodeError(`decode response: ${errorMessage(error)}`, response.status, { cause: error });
    }
  }

  private async discard(response: Response): Promise<void> {
    if (response.status >= 400) {
      throw classifyResponse(response.status, await response.text());
    }
    await response.body?.cancel();
  }
}

/**
 * Build an immutable client. Options apply in order over the defaults.
 */
export function createApiClient(apiKey: string, ...options: ApiClientOption[]): ApiClient {
  const config: MutableConfig = {
    baseUrl: DEFAULT_BASE_URL,
    apiKey,
    userAgent: DEFAULT_USER_AGENT,
    timeoutMs: DEFAULT_TIMEOUT_MS,
    fetch: (input, init) => fetch(input, init),
  };

  for (const option of options) {
    option(config);
  }

  return new ApiClient(config);
}
