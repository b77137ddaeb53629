import type { FluentHttpError } from './errors';
import type { HttpClient } from './HttpClient';
import type { HttpRequest } from './HttpRequest';
import type { HttpResponse } from './HttpResponse';
import type { HeaderMap } from './multimap';

export type HttpMethod = 'GET' | 'HEAD' | 'OPTIONS' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'HEAD', 'OPTIONS', 'POST', 'PUT', 'PATCH', 'DELETE'];

export type HttpHeaders = Record<string, string>;

/**
 * Outcome of the result classifier for a completed attempt.
 * - 'success': decode into the success target
 * - 'error': decode into the error target (best effort)
 * - 'unknown': no decoding (1xx, 3xx with the default classifier)
 */
export type ResultState = 'success' | 'error' | 'unknown';

export type LoggerMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

export type UploadProgressCallback = (written: number, total: number) => void;

/** Body handed to a transport: fully buffered bytes or a stream read on demand. */
export type TransportBody = Uint8Array | AsyncIterable<Uint8Array>;

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: TransportBody;
  /** Byte length of `body` when known up front. */
  contentLength?: number;
  onUploadProgress?: UploadProgressCallback;
}

/** Response body as returned by a transport; the engine reads it to completion. */
export type RawResponseBody = Uint8Array | ArrayBuffer | AsyncIterable<Uint8Array> | null;

export interface RawHttpResponse {
  status: number;
  statusText?: string;
  /** Protocol version, e.g. "HTTP/1.1". */
  protocol?: string;
  headers: HttpHeaders;
  /** Every Set-Cookie value; plain header records can only hold one. */
  setCookies?: string[];
  body: RawResponseBody;
}

/**
 * HTTP transport abstraction.
 * Takes a transport request and abort signal, resolves once response headers are in.
 */
export interface HttpTransport {
  (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse>;
}

/** The assembled request of one attempt, before it is handed to the transport. */
export interface WireRequest {
  method: HttpMethod;
  url: URL;
  headers: HeaderMap;
  body?: TransportBody;
  contentLength?: number;
}

export interface TlsOptions {
  insecureSkipVerify?: boolean;
  ca?: string | Buffer;
  cert?: string | Buffer;
  key?: string | Buffer;
  servername?: string;
}

/**
 * Runs before every attempt, in registration order. Throwing aborts the whole call.
 * The wire request can be mutated to affect the attempt about to be sent.
 */
export type BeforeRequestHook = (
  client: HttpClient,
  request: HttpRequest,
  wire: WireRequest,
) => void | Promise<void>;

/** Runs after every attempt that produced a response. Throwing marks the attempt as failed. */
export type AfterResponseHook = (client: HttpClient, response: HttpResponse) => void | Promise<void>;

/** Notification for a call that ends with a terminal error; cannot change the outcome. */
export type ErrorHook = (
  client: HttpClient,
  request: HttpRequest,
  response: HttpResponse,
  error: FluentHttpError,
) => void | Promise<void>;

export type RetryCondition = (response: HttpResponse | undefined, error: FluentHttpError | undefined) => boolean;

export type ResultClassifier = (response: HttpResponse) => ResultState;

export interface TracingSpan {
  setAttribute(key: string, value: string | number | boolean): void;
  recordException(error: Error): void;
  end(): void;
}

export interface TracingStartOptions {
  attributes?: Record<string, string | number | boolean>;
}

export interface TracingAdapter {
  startSpan(name: string, options?: TracingStartOptions): TracingSpan;
}

/**
 * Outcome of one call. Both members can be present: a partial response is
 * returned next to transport, hook and decode errors.
 */
export type SettledResponse =
  | { response: HttpResponse; error?: undefined }
  | { response?: HttpResponse; error: FluentHttpError };
