import { STATUS_CODES } from 'node:http';
import type { Logger } from 'pino';
import { Agent, request, type Dispatcher } from 'undici';
import { DEFAULT_TIMEOUT_SECONDS } from './config';
import { describeError, RequestError } from './errors';
import type { RequestParams } from './params';
import { VERSION } from './version';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Structured outcome of a connectivity check. Never thrown.
 */
export interface PingResult {
  status: number | null;
  headers: Record<string, string>;
  success: boolean;
  message: string;
}

export interface ApiClientOptions {
  baseUrl: string;
  /** Per-request timeout in seconds. Default: 30. */
  timeoutSeconds?: number;
  /** Connection pool the client takes ownership of. Default: a new undici Agent. */
  dispatcher?: Dispatcher;
  /** Aborts the in-flight request, e.g. on SIGINT. */
  signal?: AbortSignal;
  logger?: Logger;
}

export const DEFAULT_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  'User-Agent': `httpprobe/${VERSION}`,
  Accept: 'application/json',
  'Content-Type': 'application/json',
});

/** Endpoint both operations target, relative to the base URL. */
const ECHO_PATH = '/get';

function flattenHeaders(headers: Dispatcher.ResponseData['headers']): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    flat[name] = Array.isArray(value) ? value.join(', ') : value;
  }
  return flat;
}

function statusLine(status: number): string {
  const reason = STATUS_CODES[status];
  return reason ? `HTTP ${status} ${reason}` : `HTTP ${status}`;
}

function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * HTTP client bound to one base URL. Owns its connection pool until `close()`.
 */
export class ApiClient {
  readonly baseUrl: string;
  readonly timeoutSeconds: number;
  readonly headers: Readonly<Record<string, string>> = DEFAULT_HEADERS;

  private readonly dispatcher: Dispatcher;
  private readonly signal: AbortSignal | undefined;
  private readonly logger: Logger | undefined;
  private closing: Promise<void> | undefined;

  constructor(options: ApiClientOptions) {
    const timeoutSeconds = options.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
    if (!Number.isInteger(timeoutSeconds) || timeoutSeconds < 1) {
      throw new RangeError(`timeoutSeconds must be a positive integer, got ${timeoutSeconds}`);
    }

    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutSeconds = timeoutSeconds;
    this.signal = options.signal;
    this.logger = options.logger;

    const timeoutMs = timeoutSeconds * 1000;
    this.dispatcher =
      options.dispatcher ??
      new Agent({
        headersTimeout: timeoutMs,
        bodyTimeout: timeoutMs,
        connect: { timeout: timeoutMs },
      });
  }

  get url(): string {
    return `${this.baseUrl}${ECHO_PATH}`;
  }

  get closed(): boolean {
    return this.closing !== undefined;
  }

  /**
   * Connectivity check against `{baseUrl}/get`. Failures are reported in the
   * result instead of being thrown.
   */
  async ping(): Promise<PingResult> {
    const url = this.url;
    let response: Dispatcher.ResponseData;
    try {
      response = await this.send();
    } catch (err) {
      this.logger?.debug({ err, url }, 'ping transport failure');
      return {
        status: null,
        headers: {},
        success: false,
        message: `Connection to ${url} failed: ${describeError(err)}`,
      };
    }

    const status = response.statusCode;
    const headers = flattenHeaders(response.headers);
    await response.body.dump();

    if (!isSuccessStatus(status)) {
      return {
        status,
        headers,
        success: false,
        message: `Connection to ${url} failed: ${statusLine(status)}`,
      };
    }
    return { status, headers, success: true, message: `Successfully connected to ${url}` };
  }

  /**
   * GET `{baseUrl}/get` with optional query parameters and return the decoded
   * JSON body. Rejects with `RequestError` on any failure.
   */
  async getWithParams(params?: RequestParams): Promise<JsonValue> {
    const url = this.url;
    const fail = (cause: unknown, status: number | null = null): RequestError =>
      new RequestError(`GET request to ${url} failed: ${describeError(cause)}`, url, status, { cause });

    let response: Dispatcher.ResponseData;
    try {
      response = await this.send(params);
    } catch (err) {
      throw fail(err);
    }

    const status = response.statusCode;
    if (!isSuccessStatus(status)) {
      await response.body.dump();
      throw fail(statusLine(status), status);
    }

    let text: string;
    try {
      text = await response.body.text();
    } catch (err) {
      throw fail(err, status);
    }
    try {
      const data: JsonValue = JSON.parse(text);
      return data;
    } catch (err) {
      throw fail(err, status);
    }
  }

  /**
   * Release the connection pool. Safe to call more than once.
   */
  close(): Promise<void> {
    this.closing ??= this.dispatcher.close();
    return this.closing;
  }

  private send(params?: RequestParams): Promise<Dispatcher.ResponseData> {
    const hasQuery = params !== undefined && Object.keys(params).length > 0;
    this.logger?.debug({ url: this.url, ...(hasQuery ? { params } : {}) }, 'GET');
    const timeoutMs = this.timeoutSeconds * 1000;
    return request(this.url, {
      method: 'GET',
      dispatcher: this.dispatcher,
      headers: { ...this.headers },
      ...(hasQuery ? { query: params } : {}),
      ...(this.signal ? { signal: this.signal } : {}),
      headersTimeout: timeoutMs,
      bodyTimeout: timeoutMs,
    }).then((response) => {
      this.logger?.debug({ url: this.url, status: response.statusCode }, 'response');
      return response;
    });
  }
}

/**
 * Run `fn` with a fresh client and close the client on every exit path.
 */
export async function withApiClient<T>(
  options: ApiClientOptions,
  fn: (client: ApiClient) => Promise<T>
): Promise<T> {
  const client = new ApiClient(options);
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}
