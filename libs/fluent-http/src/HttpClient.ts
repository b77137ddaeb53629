import { jsonCodec, xmlCodec, type Codec } from './codecs';
import {
  DEFAULT_RETRY_COUNT,
  DEFAULT_RETRY_INTERVAL_MS,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  clientConfigSchema,
  defaultResultClassifier,
  defaultRetryCondition,
  parseSetting,
  proxyUrlSchema,
  retryCountSchema,
  retryIntervalMsSchema,
  timeoutMsSchema,
  type ClientConfig,
} from './config';
import { CookieJar, type Cookie } from './cookies';
import { HttpRequest } from './HttpRequest';
import { ConsoleLogger, noopLogger } from './logger';
import { HeaderMap, ParamMap } from './multimap';
import type { DecodeTarget } from './resultTarget';
import { createFetchTransport } from './transport/fetchTransport';
import type {
  AfterResponseHook,
  BeforeRequestHook,
  ErrorHook,
  HttpMethod,
  HttpTransport,
  Logger,
  ResultClassifier,
  RetryCondition,
  TlsOptions,
  TracingAdapter,
} from './types';
import { normalizeBaseUrl } from './url';

/** Defaults shared by every request a client creates. */
export interface ClientSettings {
  baseUrl: string;
  headers: HeaderMap;
  queryParams: ParamMap;
  pathParams: Map<string, string>;
  formData: ParamMap;
  cookies: Cookie[];
  userAgent: string;
  timeoutMs: number;
  retryCount: number;
  retryIntervalMs: number;
  retryCondition: RetryCondition;
  resultClassifier: ResultClassifier;
  commonErrorResult?: DecodeTarget;
  codecs: { json: Codec; xml: Codec };
  debug: boolean;
  allowGetPayload: boolean;
  tls: TlsOptions;
  proxyUrl?: string;
  /** Explicit transport; when unset a fetch transport is built from `tls` and `proxyUrl`. */
  transport?: HttpTransport;
  logger?: Logger;
  tracing?: TracingAdapter;
  beforeRequest: BeforeRequestHook[];
  afterResponse: AfterResponseHook[];
  onError?: ErrorHook;
  cookieJar: CookieJar;
}

/**
 * Reusable HTTP client holding request defaults.
 *
 * Setters mutate the client in place and are not safe to call while requests
 * are in flight; configure first, or `clone()` per concurrent user.
 */
export class HttpClient {
  readonly settings: ClientSettings;
  private defaultTransport?: HttpTransport;
  private debugLogger?: Logger;

  constructor(config: ClientConfig = {}) {
    const data = parseSetting(clientConfigSchema, config, 'client configuration');
    this.settings = {
      baseUrl: normalizeBaseUrl(data.baseUrl),
      headers: new HeaderMap(data.headers),
      queryParams: new ParamMap(data.queryParams),
      pathParams: new Map(Object.entries(data.pathParams ?? {})),
      formData: new ParamMap(data.formData),
      cookies: [],
      userAgent: data.userAgent || DEFAULT_USER_AGENT,
      timeoutMs: data.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      retryCount: data.retryCount ?? DEFAULT_RETRY_COUNT,
      retryIntervalMs: data.retryIntervalMs ?? DEFAULT_RETRY_INTERVAL_MS,
      retryCondition: config.retryCondition ?? defaultRetryCondition,
      resultClassifier: config.resultClassifier ?? defaultResultClassifier,
      commonErrorResult: config.commonErrorResult,
      codecs: { json: config.jsonCodec ?? jsonCodec, xml: config.xmlCodec ?? xmlCodec },
      debug: data.debug ?? false,
      allowGetPayload: data.allowGetPayload ?? false,
      tls: { ...config.tls, ...(data.insecureSkipVerify !== undefined ? { insecureSkipVerify: data.insecureSkipVerify } : {}) },
      proxyUrl: data.proxyUrl,
      transport: config.transport,
      logger: config.logger,
      tracing: config.tracing,
      beforeRequest: [...(config.beforeRequest ?? [])],
      afterResponse: [...(config.afterResponse ?? [])],
      onError: config.onError,
      cookieJar: new CookieJar(),
    };
  }

  /** Transport used for the next attempt. */
  get transport(): HttpTransport {
    if (this.settings.transport) {
      return this.settings.transport;
    }
    if (!this.defaultTransport) {
      this.defaultTransport = createFetchTransport({ tls: this.settings.tls, proxyUrl: this.settings.proxyUrl });
    }
    return this.defaultTransport;
  }

  /** Configured logger; with debug on and none configured, a console logger. */
  get logger(): Logger {
    if (this.settings.logger) {
      return this.settings.logger;
    }
    if (!this.settings.debug) {
      return noopLogger;
    }
    if (!this.debugLogger) {
      this.debugLogger = new ConsoleLogger();
    }
    return this.debugLogger;
  }

  get cookieJar(): CookieJar {
    return this.settings.cookieJar;
  }

  setBaseUrl(baseUrl: string): this {
    this.settings.baseUrl = normalizeBaseUrl(baseUrl);
    return this;
  }

  setTimeout(timeoutMs: number): this {
    this.settings.timeoutMs = parseSetting(timeoutMsSchema, timeoutMs, 'timeout');
    return this;
  }

  setUserAgent(userAgent: string): this {
    this.settings.userAgent = userAgent;
    return this;
  }

  setCommonHeader(name: string, value: string): this {
    this.settings.headers.set(name, value);
    return this;
  }

  setCommonHeaders(headers: Record<string, string>): this {
    for (const [name, value] of Object.entries(headers)) {
      this.settings.headers.set(name, value);
    }
    return this;
  }

  setCommonQueryParam(name: string, value: string): this {
    this.settings.queryParams.set(name, value);
    return this;
  }

  setCommonQueryParams(params: Record<string, string>): this {
    for (const [name, value] of Object.entries(params)) {
      this.settings.queryParams.set(name, value);
    }
    return this;
  }

  setCommonPathParam(name: string, value: string): this {
    this.settings.pathParams.set(name, value);
    return this;
  }

  setCommonPathParams(params: Record<string, string>): this {
    for (const [name, value] of Object.entries(params)) {
      this.settings.pathParams.set(name, value);
    }
    return this;
  }

  setCommonFormData(data: Record<string, string>): this {
    for (const [name, value] of Object.entries(data)) {
      this.settings.formData.set(name, value);
    }
    return this;
  }

  setCommonCookies(...cookies: Cookie[]): this {
    this.settings.cookies.push(...cookies);
    return this;
  }

  enableDebug(): this {
    this.settings.debug = true;
    return this;
  }

  disableDebug(): this {
    this.settings.debug = false;
    return this;
  }

  devMode(): this {
    return this.enableDebug();
  }

  enableAllowGetPayload(): this {
    this.settings.allowGetPayload = true;
    return this;
  }

  disableAllowGetPayload(): this {
    this.settings.allowGetPayload = false;
    return this;
  }

  setTlsOptions(tls: TlsOptions): this {
    this.settings.tls = { ...tls };
    this.defaultTransport = undefined;
    return this;
  }

  enableInsecureSkipVerify(): this {
    return this.setTlsOptions({ ...this.settings.tls, insecureSkipVerify: true });
  }

  disableInsecureSkipVerify(): this {
    return this.setTlsOptions({ ...this.settings.tls, insecureSkipVerify: false });
  }

  /** Routes requests through `proxyUrl`; `undefined` goes direct again. */
  setProxy(proxyUrl: string | undefined): this {
    this.settings.proxyUrl = proxyUrl === undefined ? undefined : parseSetting(proxyUrlSchema, proxyUrl, 'proxy URL');
    this.defaultTransport = undefined;
    return this;
  }

  setTransport(transport: HttpTransport): this {
    this.settings.transport = transport;
    return this;
  }

  setRetryCount(count: number): this {
    this.settings.retryCount = parseSetting(retryCountSchema, count, 'retry count');
    return this;
  }

  setRetryInterval(intervalMs: number): this {
    this.settings.retryIntervalMs = parseSetting(retryIntervalMsSchema, intervalMs, 'retry interval');
    return this;
  }

  setRetryCondition(condition: RetryCondition): this {
    this.settings.retryCondition = condition;
    return this;
  }

  setResultClassifier(classifier: ResultClassifier): this {
    this.settings.resultClassifier = classifier;
    return this;
  }

  setCommonErrorResult(target: DecodeTarget): this {
    this.settings.commonErrorResult = target;
    return this;
  }

  setJsonCodec(codec: Codec): this {
    this.settings.codecs.json = codec;
    return this;
  }

  setXmlCodec(codec: Codec): this {
    this.settings.codecs.xml = codec;
    return this;
  }

  setLogger(logger: Logger): this {
    this.settings.logger = logger;
    return this;
  }

  setTracing(tracing: TracingAdapter): this {
    this.settings.tracing = tracing;
    return this;
  }

  onBeforeRequest(hook: BeforeRequestHook): this {
    this.settings.beforeRequest.push(hook);
    return this;
  }

  onAfterResponse(hook: AfterResponseHook): this {
    this.settings.afterResponse.push(hook);
    return this;
  }

  onError(hook: ErrorHook): this {
    this.settings.onError = hook;
    return this;
  }

  /** Independent copy with its own containers and a fresh cookie jar. */
  clone(): HttpClient {
    const copy = new HttpClient();
    const source = this.settings;
    Object.assign(copy.settings, {
      ...source,
      headers: source.headers.clone(),
      queryParams: source.queryParams.clone(),
      pathParams: new Map(source.pathParams),
      formData: source.formData.clone(),
      cookies: [...source.cookies],
      codecs: { ...source.codecs },
      tls: { ...source.tls },
      beforeRequest: [...source.beforeRequest],
      afterResponse: [...source.afterResponse],
      cookieJar: new CookieJar(),
    });
    return copy;
  }

  request(): HttpRequest {
    return new HttpRequest(this);
  }

  get(url?: string): HttpRequest {
    return this.build('GET', url);
  }

  post(url?: string): HttpRequest {
    return this.build('POST', url);
  }

  put(url?: string): HttpRequest {
    return this.build('PUT', url);
  }

  patch(url?: string): HttpRequest {
    return this.build('PATCH', url);
  }

  delete(url?: string): HttpRequest {
    return this.build('DELETE', url);
  }

  head(url?: string): HttpRequest {
    return this.build('HEAD', url);
  }

  options(url?: string): HttpRequest {
    return this.build('OPTIONS', url);
  }

  private build(method: HttpMethod, url?: string): HttpRequest {
    return new HttpRequest(this, { method, url: url ?? '' });
  }
}
