import { describe, expect, it } from 'vitest';
import { DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT, defaultResultClassifier, loadClientConfigFromEnv } from '../config';
import { ValidationError } from '../errors';
import { createClient, createClientFromEnv } from '../factories';
import { HttpClient } from '../HttpClient';
import { HttpResponse } from '../HttpResponse';
import { ConsoleLogger, noopLogger } from '../logger';
import { createLogger, createTransport } from './helpers';

describe('HttpClient configuration', () => {
  it('applies defaults', () => {
    const client = new HttpClient();

    expect(client.settings.timeoutMs).toBe(DEFAULT_TIMEOUT_MS);
    expect(client.settings.retryCount).toBe(0);
    expect(client.settings.retryIntervalMs).toBe(1_000);
    expect(client.settings.userAgent).toBe(DEFAULT_USER_AGENT);
    expect(client.settings.headers.size).toBe(0);
  });

  it('reads data fields from the config object', () => {
    const client = createClient({
      baseUrl: 'https://api.example.com/',
      headers: { Accept: 'application/json' },
      queryParams: { tag: ['a', 'b'] },
      pathParams: { version: 'v2' },
      insecureSkipVerify: true,
    });

    expect(client.settings.baseUrl).toBe('https://api.example.com');
    expect(client.settings.headers.get('accept')).toBe('application/json');
    expect(client.settings.queryParams.values('tag')).toEqual(['a', 'b']);
    expect(client.settings.pathParams.get('version')).toBe('v2');
    expect(client.settings.tls.insecureSkipVerify).toBe(true);
  });

  it('rejects invalid configuration with ValidationError', () => {
    expect(() => new HttpClient({ timeoutMs: -5 })).toThrow(ValidationError);
    expect(() => new HttpClient({ proxyUrl: 'not a url' })).toThrow('Invalid client configuration');
  });

  it('validates numeric setters', () => {
    const client = new HttpClient();

    expect(() => client.setRetryCount(-1)).toThrow(ValidationError);
    expect(() => client.setRetryCount(1.5)).toThrow(ValidationError);
    expect(() => client.setTimeout(0)).toThrow(ValidationError);
    expect(() => client.setRetryInterval(-10)).toThrow(ValidationError);

    client.setRetryCount(3).setRetryInterval(0).setTimeout(500);
    expect(client.settings.retryCount).toBe(3);
    expect(client.settings.retryIntervalMs).toBe(0);
    expect(client.settings.timeoutMs).toBe(500);
  });

  it('builds requests bound to the client', () => {
    const client = new HttpClient();
    const request = client.post('/items');

    expect(request.client).toBe(client);
    expect(request.method).toBe('POST');
    expect(request.url).toBe('/items');
    expect(client.request().method).toBeUndefined();
  });

  it('picks a console logger only in debug mode without a configured logger', () => {
    expect(new HttpClient().logger).toBe(noopLogger);
    expect(new HttpClient({ debug: true }).logger).toBeInstanceOf(ConsoleLogger);

    const logger = createLogger();
    expect(new HttpClient({ debug: true, logger }).logger).toBe(logger);
  });

  it('rebuilds the default transport when TLS or proxy settings change', () => {
    const client = new HttpClient();
    const first = client.transport;

    expect(client.transport).toBe(first);
    client.enableInsecureSkipVerify();
    expect(client.transport).not.toBe(first);
    expect(client.settings.tls.insecureSkipVerify).toBe(true);
  });

  it('prefers an explicit transport', () => {
    const transport = createTransport();
    const client = new HttpClient({ transport });
    client.setProxy('http://proxy.internal:3128');

    expect(client.transport).toBe(transport);
    expect(client.settings.proxyUrl).toBe('http://proxy.internal:3128');
  });
});

describe('HttpClient.clone', () => {
  it('copies containers so mutating the clone leaves the original alone', () => {
    const client = new HttpClient().setCommonHeader('X-Trace', 'a').setCommonQueryParam('q', '1');
    client.onBeforeRequest(() => undefined);

    const copy = client.clone();
    copy.setCommonHeader('X-Trace', 'b').setCommonHeader('X-New', 'c').setCommonQueryParam('q', '2');
    copy.onBeforeRequest(() => undefined);

    expect(client.settings.headers.get('x-trace')).toBe('a');
    expect(client.settings.headers.has('x-new')).toBe(false);
    expect(client.settings.queryParams.get('q')).toBe('1');
    expect(client.settings.beforeRequest).toHaveLength(1);
    expect(copy.settings.beforeRequest).toHaveLength(2);
  });

  it('gives the clone its own cookie jar and keeps scalar settings', () => {
    const client = new HttpClient({ baseUrl: 'https://api.example.com', retryCount: 2 });
    const copy = client.clone();

    expect(copy.cookieJar).not.toBe(client.cookieJar);
    expect(copy.settings.baseUrl).toBe('https://api.example.com');
    expect(copy.settings.retryCount).toBe(2);
  });
});

describe('defaultResultClassifier', () => {
  const request = new HttpClient().get('https://api.example.com');
  const classify = (statusCode: number) => defaultResultClassifier(new HttpResponse({ request, statusCode }));

  it('maps status codes to result states', () => {
    expect(classify(101)).toBe('unknown');
    expect(classify(200)).toBe('success');
    expect(classify(204)).toBe('success');
    expect(classify(302)).toBe('unknown');
    expect(classify(404)).toBe('error');
    expect(classify(503)).toBe('error');
  });
});

describe('environment configuration', () => {
  it('reads FLUENTREQ_* variables and skips empty ones', () => {
    const config = loadClientConfigFromEnv({
      FLUENTREQ_BASE_URL: 'https://env.example.com',
      FLUENTREQ_TIMEOUT_MS: '5000',
      FLUENTREQ_RETRY_COUNT: '2',
      FLUENTREQ_DEBUG: 'true',
      FLUENTREQ_USER_AGENT: '',
    });

    expect(config).toEqual({
      baseUrl: 'https://env.example.com',
      timeoutMs: 5000,
      retryCount: 2,
      debug: true,
    });
  });

  it('rejects malformed values', () => {
    expect(() => loadClientConfigFromEnv({ FLUENTREQ_RETRY_COUNT: '-1' })).toThrow(ValidationError);
    expect(() => loadClientConfigFromEnv({ FLUENTREQ_TIMEOUT_MS: 'soon' })).toThrow(ValidationError);
    expect(() => loadClientConfigFromEnv({ FLUENTREQ_DEBUG: 'maybe' })).toThrow(ValidationError);
  });

  it('lets explicit overrides win over the environment', () => {
    const client = createClientFromEnv(
      { retryCount: 5 },
      { FLUENTREQ_RETRY_COUNT: '1', FLUENTREQ_RETRY_INTERVAL_MS: '250', FLUENTREQ_DEBUG: '0' },
    );

    expect(client.settings.retryCount).toBe(5);
    expect(client.settings.retryIntervalMs).toBe(250);
    expect(client.settings.debug).toBe(false);
  });
});
