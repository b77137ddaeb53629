import type { z } from 'zod';
import { jsonCodec, xmlCodec, type Codec } from './codecs';
import { parseSetCookies, type Cookie } from './cookies';
import { DecodeError, type FluentHttpError } from './errors';
import type { HttpRequest } from './HttpRequest';
import { HeaderMap } from './multimap';
import type { ResultState } from './types';

export interface HttpResponseInit {
  request: HttpRequest;
  /** Wire URL the attempt was sent to. */
  url?: URL;
  statusCode?: number;
  statusText?: string;
  proto?: string;
  headers?: HeaderMap;
  setCookies?: string[];
  body?: Uint8Array;
  receivedAt?: Date;
  durationMs?: number;
  codecs?: { json: Codec; xml: Codec };
}

const textDecoder = new TextDecoder();

/**
 * Snapshot of one attempt. A response whose transport call failed has
 * `statusCode` 0, an empty body and `error` set.
 */
export class HttpResponse {
  readonly request: HttpRequest;
  readonly url?: URL;
  readonly statusCode: number;
  /** Status line without the protocol, e.g. "200 OK". */
  readonly status: string;
  /** Protocol version reported by the transport; undefined when it cannot tell. */
  readonly proto?: string;
  readonly headers: HeaderMap;
  readonly body: Uint8Array;
  readonly receivedAt: Date;
  readonly durationMs: number;
  private readonly setCookieValues: string[];
  private readonly codecs: { json: Codec; xml: Codec };
  private state: ResultState = 'unknown';
  private failure?: FluentHttpError;

  constructor(init: HttpResponseInit) {
    this.request = init.request;
    this.url = init.url;
    this.statusCode = init.statusCode ?? 0;
    this.status = this.statusCode ? `${this.statusCode} ${init.statusText ?? ''}`.trim() : '';
    this.proto = init.proto;
    this.headers = init.headers ?? new HeaderMap();
    this.setCookieValues = init.setCookies ?? [];
    this.body = init.body ?? new Uint8Array(0);
    this.receivedAt = init.receivedAt ?? new Date();
    this.durationMs = init.durationMs ?? 0;
    this.codecs = init.codecs ?? { json: jsonCodec, xml: xmlCodec };
  }

  get size(): number {
    return this.body.byteLength;
  }

  /** Classification computed once per attempt; custom classifiers are authoritative. */
  get resultState(): ResultState {
    return this.state;
  }

  get error(): FluentHttpError | undefined {
    return this.failure;
  }

  /** @internal */
  classify(state: ResultState): void {
    this.state = state;
  }

  /** @internal */
  fail(error: FluentHttpError): void {
    this.failure = error;
    error.response = this;
  }

  isSuccess(): boolean {
    return this.state === 'success';
  }

  isError(): boolean {
    return this.state === 'error';
  }

  text(): string {
    return textDecoder.decode(this.body);
  }

  json(): unknown;
  json<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): T;
  json<T>(schema?: z.ZodType<T, z.ZodTypeDef, unknown>): unknown {
    return this.decodeWith(this.codecs.json, 'JSON', schema);
  }

  xml(): unknown;
  xml<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): T;
  xml<T>(schema?: z.ZodType<T, z.ZodTypeDef, unknown>): unknown {
    return this.decodeWith(this.codecs.xml, 'XML', schema);
  }

  contentType(): string {
    return this.headers.get('content-type') ?? '';
  }

  isJson(): boolean {
    return this.contentType().includes('application/json');
  }

  isXml(): boolean {
    const contentType = this.contentType();
    return contentType.includes('application/xml') || contentType.includes('text/xml');
  }

  isHtml(): boolean {
    return this.contentType().includes('text/html');
  }

  isText(): boolean {
    return this.contentType().includes('text/plain');
  }

  /** Cookies from the Set-Cookie headers of this attempt. */
  cookies(): Cookie[] {
    return parseSetCookies(this.setCookieValues);
  }

  location(): string | undefined {
    return this.headers.get('location');
  }

  toString(): string {
    return this.text();
  }

  private decodeWith<T>(codec: Codec, format: string, schema?: z.ZodType<T, z.ZodTypeDef, unknown>): unknown {
    // An empty body decodes to undefined; a schema still gets to reject it.
    let raw: unknown;
    if (this.body.byteLength > 0) {
      try {
        raw = codec.decode(this.body);
      } catch (error) {
        throw new DecodeError(`Failed to decode ${format} response body`, error);
      }
    }
    if (!schema) {
      return raw;
    }
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new DecodeError(`${format} response body does not match the schema`, parsed.error);
    }
    return parsed.data;
  }
}
