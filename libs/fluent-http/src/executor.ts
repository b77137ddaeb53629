import { writeFile } from 'fs/promises';
import { setTimeout as sleep } from 'timers/promises';
import { encodeBody, hasExplicitBody } from './body';
import { codecForContentType } from './codecs';
import { jarCookieHeader, serializeCookies, storeResponseCookies } from './cookies';
import {
  BodyReadError,
  DecodeError,
  FluentHttpError,
  HookError,
  OutputError,
  TimeoutError,
  TransportError,
  describeError,
} from './errors';
import { DEFAULT_USER_AGENT } from './config';
import type { HttpClient } from './HttpClient';
import type { HttpRequest } from './HttpRequest';
import { HttpResponse } from './HttpResponse';
import { previewBody } from './logger';
import { HeaderMap, ParamMap } from './multimap';
import type { DecodeTarget } from './resultTarget';
import type {
  Logger,
  LoggerMeta,
  RawHttpResponse,
  RawResponseBody,
  SettledResponse,
  TracingSpan,
  TransportRequest,
  WireRequest,
} from './types';
import { buildUrl } from './url';

const toFluentError = (error: unknown, fallbackMessage: string): FluentHttpError =>
  error instanceof FluentHttpError ? error : new FluentHttpError(`${fallbackMessage}: ${describeError(error)}`, { cause: error });

function encodeBasicAuth(username: string, password: string): string {
  return Buffer.from(`${username}:${password}`, 'utf8').toString('base64');
}

/**
 * Assembles the wire request of one attempt from the client defaults and the
 * request. Throws URLParseError or EncodeError.
 */
export async function prepareWireRequest(client: HttpClient, request: HttpRequest): Promise<WireRequest> {
  const settings = client.settings;
  const config = request.config;
  const logger = client.logger;

  const url = buildUrl({
    rawUrl: config.url,
    baseUrl: settings.baseUrl,
    pathParams: config.pathParams,
    queryParams: config.queryParams,
    clientPathParams: settings.pathParams,
    clientQueryParams: settings.queryParams,
  });

  const method = config.method ?? 'GET';
  const formData = ParamMap.merge(settings.formData, config.formData);
  if (hasExplicitBody(config.body) && formData.size > 0) {
    logger.debug('http.request.form_ignored', { method, url: url.toString(), bodyKind: config.body.kind });
  }

  let encoded = encodeBody(config.body, formData, settings.codecs);
  if (encoded.data !== undefined && (method === 'GET' || method === 'HEAD') && !settings.allowGetPayload) {
    logger.debug('http.request.payload_skipped', { method, url: url.toString() });
    encoded = {};
  }

  const headers = new HeaderMap([...settings.headers.entries(), ...config.headers.entries()]);

  if (!headers.has('user-agent')) {
    headers.set('User-Agent', config.userAgent || settings.userAgent || DEFAULT_USER_AGENT);
  }
  if (encoded.contentType && !headers.has('content-type')) {
    headers.set('Content-Type', encoded.contentType);
  }
  if (config.basicAuth?.username) {
    headers.set('Authorization', `Basic ${encodeBasicAuth(config.basicAuth.username, config.basicAuth.password)}`);
  }
  if (config.bearerToken) {
    headers.set('Authorization', `Bearer ${config.bearerToken}`);
  }

  const cookieParts: string[] = [];
  const explicitCookies = serializeCookies([...settings.cookies, ...config.cookies]);
  if (explicitCookies) {
    cookieParts.push(explicitCookies);
  }
  const jarCookies = await jarCookieHeader(settings.cookieJar, url);
  if (jarCookies) {
    cookieParts.push(jarCookies);
  }
  if (cookieParts.length) {
    headers.set('Cookie', [...headers.values('cookie'), ...cookieParts].join('; '));
  }

  return { method, url, headers, body: encoded.data, contentLength: encoded.size };
}

async function readBody(body: RawResponseBody): Promise<Uint8Array> {
  if (body === null) {
    return new Uint8Array(0);
  }
  if (body instanceof Uint8Array) {
    return body;
  }
  if (body instanceof ArrayBuffer) {
    return new Uint8Array(body);
  }
  const chunks: Uint8Array[] = [];
  let total = 0;
  for await (const chunk of body) {
    chunks.push(chunk);
    total += chunk.byteLength;
  }
  const bytes = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    bytes.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return bytes;
}

interface AttemptContext {
  client: HttpClient;
  request: HttpRequest;
  wire: WireRequest;
  attempt: number;
  maxAttempts: number;
  logger: Logger;
}

/** Sends one attempt and returns its response; failures are recorded on the response. */
async function runAttempt(ctx: AttemptContext): Promise<HttpResponse> {
  const { client, request, wire, logger } = ctx;
  const settings = client.settings;
  const config = request.config;
  const timeoutMs = settings.timeoutMs;

  const controller = new AbortController();
  let didTimeout = false;
  const timeoutHandle = setTimeout(() => {
    didTimeout = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = () => controller.abort(config.signal?.reason);
  if (config.signal?.aborted) {
    onAbort();
  } else {
    config.signal?.addEventListener('abort', onAbort, { once: true });
  }

  const transportRequest: TransportRequest = {
    method: wire.method,
    url: wire.url.toString(),
    headers: wire.headers.toRecord(),
    body: wire.body,
    contentLength: wire.contentLength,
    onUploadProgress: config.onUploadProgress,
  };

  const attemptMeta: LoggerMeta = {
    attempt: ctx.attempt,
    maxAttempts: ctx.maxAttempts,
    method: wire.method,
    url: transportRequest.url,
  };
  if (settings.debug) {
    attemptMeta.headers = transportRequest.headers;
    if (wire.body !== undefined) {
      attemptMeta.body = wire.body instanceof Uint8Array ? previewBody(wire.body) : '<stream>';
    }
  }
  logger.debug('http.request.attempt', attemptMeta);

  const startedAt = Date.now();
  const snapshot = (raw?: RawHttpResponse, body?: Uint8Array): HttpResponse =>
    new HttpResponse({
      request,
      url: wire.url,
      statusCode: raw?.status,
      statusText: raw?.statusText,
      proto: raw?.protocol,
      headers: raw ? new HeaderMap(Object.entries(raw.headers)) : undefined,
      setCookies: raw?.setCookies,
      body,
      receivedAt: new Date(),
      durationMs: Date.now() - startedAt,
      codecs: settings.codecs,
    });

  let raw: RawHttpResponse;
  let body: Uint8Array;
  try {
    try {
      raw = await client.transport(transportRequest, controller.signal);
    } catch (error) {
      const response = snapshot();
      response.fail(
        didTimeout
          ? new TimeoutError(timeoutMs, { cause: error })
          : new TransportError(`Request failed: ${describeError(error)}`, { cause: error }),
      );
      return response;
    }

    try {
      body = await readBody(raw.body);
    } catch (error) {
      const response = snapshot(raw);
      response.fail(didTimeout ? new TimeoutError(timeoutMs, { cause: error }) : new BodyReadError(error));
      return response;
    }
  } finally {
    clearTimeout(timeoutHandle);
    config.signal?.removeEventListener('abort', onAbort);
  }

  const response = snapshot(raw, body);

  if (raw.setCookies?.length) {
    await storeResponseCookies(settings.cookieJar, wire.url, raw.setCookies);
  }

  try {
    response.classify(settings.resultClassifier(response));
  } catch (error) {
    response.fail(toFluentError(error, 'Result classifier failed'));
    return response;
  }

  if (settings.debug) {
    logger.debug('http.response.received', {
      attempt: ctx.attempt,
      status: response.status,
      statusCode: response.statusCode,
      durationMs: response.durationMs,
      size: response.size,
      headers: response.headers.toRecord(),
      body: previewBody(response.body),
    });
  }

  for (const hook of settings.afterResponse) {
    try {
      await hook(client, response);
    } catch (error) {
      logger.warn('http.hook.after.failed', { attempt: ctx.attempt, error: describeError(error) });
      response.fail(new HookError('after', error));
      return response;
    }
  }

  decodeResult(client, request, response);
  return response;
}

function decodeInto(target: DecodeTarget, client: HttpClient, response: HttpResponse): void {
  const codec = codecForContentType(response.contentType(), client.settings.codecs);
  target.assign(codec.decode(response.body));
}

function decodeResult(client: HttpClient, request: HttpRequest, response: HttpResponse): void {
  if (response.error || response.body.byteLength === 0) {
    return;
  }
  const config = request.config;

  if (response.resultState === 'success' && config.successResult) {
    try {
      decodeInto(config.successResult, client, response);
    } catch (error) {
      response.fail(
        error instanceof FluentHttpError
          ? error
          : new DecodeError(`Failed to decode success result: ${describeError(error)}`, error),
      );
    }
    return;
  }

  if (response.resultState === 'error') {
    const target = config.errorResult ?? client.settings.commonErrorResult;
    if (!target) {
      return;
    }
    try {
      decodeInto(target, client, response);
    } catch (error) {
      client.logger.debug('http.decode.error_result.failed', {
        statusCode: response.statusCode,
        error: describeError(error),
      });
    }
  }
}

async function finalize(client: HttpClient, request: HttpRequest, response: HttpResponse): Promise<void> {
  const outputPath = request.config.outputPath;
  if (outputPath && !response.error && response.isSuccess()) {
    try {
      await writeFile(outputPath, response.body);
    } catch (error) {
      response.fail(new OutputError(outputPath, error));
    }
  }

  const error = response.error;
  const onError = client.settings.onError;
  if (error && onError) {
    try {
      await onError(client, request, response, error);
    } catch (hookError) {
      client.logger.warn('http.hook.error.failed', { error: describeError(hookError) });
    }
  }
}

function startSpan(client: HttpClient, request: HttpRequest): TracingSpan | undefined {
  const tracer = request.config.tracer;
  const adapter = tracer?.adapter ?? client.settings.tracing;
  if (!adapter) {
    return undefined;
  }
  const method = request.config.method ?? 'GET';
  return adapter.startSpan(tracer?.spanName ?? `HTTP ${method}`, {
    attributes: { 'http.method': method, 'http.url': request.resolvedUrl() },
  });
}

function endSpan(span: TracingSpan | undefined, result: SettledResponse, attempts: number): void {
  if (!span) {
    return;
  }
  span.setAttribute('http.attempts', attempts);
  if (result.response) {
    span.setAttribute('http.status_code', result.response.statusCode);
  }
  if (result.error) {
    span.recordException(result.error);
  }
  span.end();
}

/**
 * Runs a request through prepare, before hooks, send, body read, classification,
 * after hooks and auto-decode, retrying per the client's retry policy.
 *
 * Validation, prepare and before-hook failures end the call at once without a
 * response. Everything else is recorded on the attempt's response and handed to
 * the retry condition.
 */
export async function executeRequest(client: HttpClient, request: HttpRequest): Promise<SettledResponse> {
  const span = startSpan(client, request);
  let attempts = 0;
  const finish = (result: SettledResponse): SettledResponse => {
    endSpan(span, result, attempts);
    return result;
  };

  try {
    request.validate();
  } catch (error) {
    return finish({ error: toFluentError(error, 'Invalid request') });
  }

  const settings = client.settings;
  const logger = client.logger;
  const maxAttempts = settings.retryCount + 1;
  const signal = request.config.signal;
  let response: HttpResponse | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    let wire: WireRequest;
    try {
      wire = await prepareWireRequest(client, request);
    } catch (error) {
      const failure = toFluentError(error, 'Failed to prepare request');
      logger.error('http.request.prepare_failed', { error: failure.message });
      return finish({ error: failure });
    }

    for (const hook of settings.beforeRequest) {
      try {
        await hook(client, request, wire);
      } catch (error) {
        const failure = new HookError('before', error);
        logger.error('http.hook.before.failed', { attempt, error: failure.message });
        return finish({ error: failure });
      }
    }

    attempts = attempt;
    response = await runAttempt({ client, request, wire, attempt, maxAttempts, logger });

    if (attempt >= maxAttempts) {
      break;
    }
    let retry: boolean;
    try {
      retry = settings.retryCondition(response, response.error);
    } catch (error) {
      response.fail(toFluentError(error, 'Retry condition failed'));
      break;
    }
    if (!retry) {
      break;
    }
    // A streamed body is consumed by the attempt that sent it.
    if (wire.body !== undefined && !(wire.body instanceof Uint8Array)) {
      logger.warn('http.request.retry_unreplayable', { attempt, statusCode: response.statusCode });
      response.fail(new TransportError('Request body stream cannot be replayed for a retry', { cause: response.error }));
      break;
    }

    logger.info('http.request.retry', {
      attempt,
      maxAttempts,
      statusCode: response.statusCode,
      error: response.error?.message,
      delayMs: settings.retryIntervalMs,
    });
    try {
      await sleep(settings.retryIntervalMs, undefined, { signal });
    } catch (error) {
      response.fail(new TransportError('Request aborted while waiting to retry', { cause: signal?.reason ?? error }));
      break;
    }
  }

  if (!response) {
    return finish({ error: new FluentHttpError('Request made no attempt') });
  }

  await finalize(client, request, response);

  const error = response.error;
  if (error) {
    logger.error('http.request.failed', {
      method: request.config.method,
      url: response.url?.toString(),
      attempts,
      statusCode: response.statusCode,
      error: error.message,
    });
    return finish({ response, error });
  }
  return finish({ response });
}
