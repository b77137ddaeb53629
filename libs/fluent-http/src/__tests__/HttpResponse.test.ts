import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { DecodeError, TransportError } from '../errors';
import { HttpClient } from '../HttpClient';
import { HttpResponse } from '../HttpResponse';
import { HeaderMap } from '../multimap';

const encoder = new TextEncoder();
const request = new HttpClient().get('https://api.example.com/users');

const build = (statusCode: number, body: string, headers: Record<string, string> = {}, setCookies: string[] = []) =>
  new HttpResponse({
    request,
    statusCode,
    statusText: 'OK',
    headers: new HeaderMap(headers),
    setCookies,
    body: encoder.encode(body),
  });

describe('HttpResponse', () => {
  it('exposes the status line and size', () => {
    const response = build(200, 'hello');

    expect(response.status).toBe('200 OK');
    expect(response.statusCode).toBe(200);
    expect(response.proto).toBeUndefined();
    expect(response.size).toBe(5);
    expect(response.text()).toBe('hello');
    expect(response.toString()).toBe('hello');
  });

  it('describes a transport failure with an empty status', () => {
    const response = new HttpResponse({ request });
    const error = new TransportError('connection refused');
    response.fail(error);

    expect(response.statusCode).toBe(0);
    expect(response.status).toBe('');
    expect(response.error).toBe(error);
    expect(error.response).toBe(response);
  });

  it('decodes JSON through an optional schema', () => {
    const response = build(200, '{"name":"Ada","age":36}', { 'Content-Type': 'application/json' });

    expect(response.json()).toEqual({ name: 'Ada', age: 36 });
    expect(response.json(z.object({ name: z.string() }))).toEqual({ name: 'Ada' });
    expect(() => response.json(z.object({ name: z.number() }))).toThrow(DecodeError);
  });

  it('reports malformed JSON as DecodeError', () => {
    expect(() => build(200, '{oops').json()).toThrow('Failed to decode JSON response body');
  });

  it('decodes XML', () => {
    const response = build(200, '<?xml version="1.0"?><user><name>Ada</name><age>36</age></user>');
    expect(response.xml()).toEqual({ user: { name: 'Ada', age: 36 } });
  });

  it('returns undefined for an empty body without a schema', () => {
    expect(build(204, '').json()).toBeUndefined();
  });

  it('recognises content types', () => {
    expect(build(200, '', { 'content-type': 'application/json; charset=utf-8' }).isJson()).toBe(true);
    expect(build(200, '', { 'content-type': 'text/xml' }).isXml()).toBe(true);
    expect(build(200, '', { 'content-type': 'text/html' }).isHtml()).toBe(true);
    expect(build(200, '', { 'content-type': 'text/plain' }).isText()).toBe(true);
    expect(build(200, '').contentType()).toBe('');
  });

  it('parses Set-Cookie values and reads the Location header', () => {
    const response = build(302, '', { Location: '/next' }, ['session=abc; Path=/; HttpOnly', 'theme=dark']);

    expect(response.cookies().map((cookie) => [cookie.key, cookie.value])).toEqual([
      ['session', 'abc'],
      ['theme', 'dark'],
    ]);
    expect(response.location()).toBe('/next');
  });

  it('answers classification questions from the cached state', () => {
    const response = build(200, '');
    expect(response.resultState).toBe('unknown');

    response.classify('error');
    expect(response.isError()).toBe(true);
    expect(response.isSuccess()).toBe(false);
  });
});
