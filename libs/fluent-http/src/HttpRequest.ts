import { NO_BODY, type RequestBody } from './body';
import type { Cookie } from './cookies';
import { FluentHttpError, ValidationError } from './errors';
import { executeRequest } from './executor';
import type { HttpClient } from './HttpClient';
import type { HttpResponse } from './HttpResponse';
import { HeaderMap, ParamMap } from './multimap';
import type { DecodeTarget } from './resultTarget';
import type { HttpMethod, SettledResponse, TracingAdapter, UploadProgressCallback } from './types';
import { buildUrl } from './url';

export interface RequestTracer {
  adapter: TracingAdapter;
  spanName: string;
}

/** Per-call state accumulated by the request setters. */
export interface RequestConfig {
  method?: HttpMethod;
  url: string;
  signal?: AbortSignal;
  headers: HeaderMap;
  queryParams: ParamMap;
  pathParams: Map<string, string>;
  formData: ParamMap;
  body: RequestBody;
  cookies: Cookie[];
  userAgent: string;
  basicAuth?: { username: string; password: string };
  bearerToken: string;
  successResult?: DecodeTarget;
  errorResult?: DecodeTarget;
  outputPath?: string;
  onUploadProgress?: UploadProgressCallback;
  tracer?: RequestTracer;
}

function isAsyncIterable(value: unknown): value is AsyncIterable<Uint8Array> {
  return typeof value === 'object' && value !== null && Symbol.asyncIterator in value;
}

/**
 * Builder for a single call, bound to the client that created it.
 * Not meant to be shared between concurrent sends; use `clone()` instead.
 */
export class HttpRequest {
  readonly client: HttpClient;
  readonly config: RequestConfig;

  constructor(client: HttpClient, options?: Partial<RequestConfig>) {
    this.client = client;
    this.config = {
      url: '',
      headers: new HeaderMap(),
      queryParams: new ParamMap(),
      pathParams: new Map(),
      formData: new ParamMap(),
      body: NO_BODY,
      cookies: [],
      userAgent: '',
      bearerToken: '',
      ...options,
    };
  }

  get method(): HttpMethod | undefined {
    return this.config.method;
  }

  get url(): string {
    return this.config.url;
  }

  get headers(): HeaderMap {
    return this.config.headers;
  }

  get signal(): AbortSignal | undefined {
    return this.config.signal;
  }

  setMethod(method: HttpMethod): this {
    this.config.method = method;
    return this;
  }

  setUrl(url: string): this {
    this.config.url = url;
    return this;
  }

  setSignal(signal: AbortSignal): this {
    this.config.signal = signal;
    return this;
  }

  setHeader(name: string, value: string): this {
    this.config.headers.set(name, value);
    return this;
  }

  setHeaders(headers: Record<string, string>): this {
    for (const [name, value] of Object.entries(headers)) {
      this.config.headers.set(name, value);
    }
    return this;
  }

  addHeader(name: string, value: string): this {
    this.config.headers.add(name, value);
    return this;
  }

  setUserAgent(userAgent: string): this {
    this.config.userAgent = userAgent;
    return this;
  }

  setQueryParam(name: string, value: string): this {
    this.config.queryParams.set(name, value);
    return this;
  }

  setQueryParams(params: Record<string, string>): this {
    for (const [name, value] of Object.entries(params)) {
      this.config.queryParams.set(name, value);
    }
    return this;
  }

  addQueryParam(name: string, value: string): this {
    this.config.queryParams.add(name, value);
    return this;
  }

  /** Appends every pair, keeping repeated keys. */
  addQueryParams(params: Record<string, string | readonly string[]> | URLSearchParams): this {
    this.config.queryParams.addAll(params instanceof URLSearchParams ? [...params] : params);
    return this;
  }

  /** Replaces the request query params with the pairs parsed from `query`. */
  setQueryString(query: string): this {
    this.config.queryParams = new ParamMap([...new URLSearchParams(query)]);
    return this;
  }

  setPathParam(name: string, value: string): this {
    this.config.pathParams.set(name, value);
    return this;
  }

  setPathParams(params: Record<string, string>): this {
    for (const [name, value] of Object.entries(params)) {
      this.config.pathParams.set(name, value);
    }
    return this;
  }

  setFormData(data: Record<string, string>): this {
    for (const [name, value] of Object.entries(data)) {
      this.config.formData.set(name, value);
    }
    return this;
  }

  addFormData(data: Record<string, string | readonly string[]> | URLSearchParams): this {
    this.config.formData.addAll(data instanceof URLSearchParams ? [...data] : data);
    return this;
  }

  /**
   * Picks the body kind from the value: bytes, text, async iterable streams,
   * and JSON for anything else. `undefined` and `null` clear the body.
   */
  setBody(value: unknown): this {
    if (value === undefined || value === null) {
      this.config.body = NO_BODY;
    } else if (value instanceof Uint8Array) {
      this.config.body = { kind: 'bytes', data: value };
    } else if (typeof value === 'string') {
      this.config.body = { kind: 'text', data: value };
    } else if (isAsyncIterable(value)) {
      this.config.body = { kind: 'stream', data: value };
    } else {
      this.config.body = { kind: 'json', value };
    }
    return this;
  }

  setBodyBytes(data: Uint8Array): this {
    this.config.body = { kind: 'bytes', data };
    return this;
  }

  setBodyString(data: string): this {
    this.config.body = { kind: 'text', data };
    return this;
  }

  /** Streams are sent unread; pass `size` when the length is known. */
  setBodyStream(data: AsyncIterable<Uint8Array>, size?: number): this {
    this.config.body = { kind: 'stream', data, size };
    return this;
  }

  setBodyJson(value: unknown): this {
    this.config.body = { kind: 'json', value };
    return this;
  }

  setBodyXml(value: unknown): this {
    this.config.body = { kind: 'xml', value };
    return this;
  }

  setBasicAuth(username: string, password: string): this {
    this.config.basicAuth = { username, password };
    return this;
  }

  setBearerToken(token: string): this {
    this.config.bearerToken = token;
    return this;
  }

  setAuthToken(token: string): this {
    return this.setBearerToken(token);
  }

  setCookies(...cookies: Cookie[]): this {
    this.config.cookies.push(...cookies);
    return this;
  }

  setCookie(cookie: Cookie): this {
    return this.setCookies(cookie);
  }

  setSuccessResult(target: DecodeTarget): this {
    this.config.successResult = target;
    return this;
  }

  setResult(target: DecodeTarget): this {
    return this.setSuccessResult(target);
  }

  setErrorResult(target: DecodeTarget): this {
    this.config.errorResult = target;
    return this;
  }

  setError(target: DecodeTarget): this {
    return this.setErrorResult(target);
  }

  setTracer(adapter: TracingAdapter, spanName: string): this {
    this.config.tracer = { adapter, spanName };
    return this;
  }

  /** Writes the body of a successful response to `path` once the call is done. */
  setOutput(path: string): this {
    this.config.outputPath = path;
    return this;
  }

  setUploadCallback(callback: UploadProgressCallback): this {
    this.config.onUploadProgress = callback;
    return this;
  }

  get(url?: string): Promise<HttpResponse> {
    return this.send('GET', url);
  }

  post(url?: string): Promise<HttpResponse> {
    return this.send('POST', url);
  }

  put(url?: string): Promise<HttpResponse> {
    return this.send('PUT', url);
  }

  patch(url?: string): Promise<HttpResponse> {
    return this.send('PATCH', url);
  }

  delete(url?: string): Promise<HttpResponse> {
    return this.send('DELETE', url);
  }

  head(url?: string): Promise<HttpResponse> {
    return this.send('HEAD', url);
  }

  options(url?: string): Promise<HttpResponse> {
    return this.send('OPTIONS', url);
  }

  /**
   * Sends the request. Resolves with the final response, or rejects with the
   * call's error; a partial response is then available as `error.response`.
   */
  async execute(): Promise<HttpResponse> {
    const result = await this.settle();
    if (result.error !== undefined) {
      throw result.error;
    }
    return result.response;
  }

  /** Like `execute()`, but never rejects: the response and error come back together. */
  async settle(): Promise<SettledResponse> {
    try {
      return await executeRequest(this.client, this);
    } catch (error) {
      const failure =
        error instanceof FluentHttpError
          ? error
          : new FluentHttpError(`Request failed: ${String(error)}`, { cause: error });
      return { response: failure.response, error: failure };
    }
  }

  validate(): void {
    const issues: string[] = [];
    if (!this.config.method) {
      issues.push('HTTP method is required');
    }
    if (!this.config.url) {
      issues.push('URL is required');
    }
    if (issues.length) {
      throw new ValidationError('Invalid request', issues);
    }
  }

  /** Final URL with path and query params applied, or the raw URL when it cannot be built. */
  resolvedUrl(): string {
    const settings = this.client.settings;
    try {
      return buildUrl({
        rawUrl: this.config.url,
        baseUrl: settings.baseUrl,
        pathParams: this.config.pathParams,
        queryParams: this.config.queryParams,
        clientPathParams: settings.pathParams,
        clientQueryParams: settings.queryParams,
      }).toString();
    } catch {
      return this.config.url;
    }
  }

  clone(): HttpRequest {
    const { config } = this;
    return new HttpRequest(this.client, {
      ...config,
      headers: config.headers.clone(),
      queryParams: config.queryParams.clone(),
      pathParams: new Map(config.pathParams),
      formData: config.formData.clone(),
      cookies: [...config.cookies],
      basicAuth: config.basicAuth ? { ...config.basicAuth } : undefined,
    });
  }

  toString(): string {
    return `${this.config.method ?? ''} ${this.resolvedUrl()}`.trim();
  }

  private send(method: HttpMethod, url?: string): Promise<HttpResponse> {
    if (url !== undefined) {
      this.config.url = url;
    }
    this.config.method = method;
    return this.execute();
  }
}
