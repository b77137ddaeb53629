import { describe, expect, it } from 'vitest';
import { FORM_CONTENT_TYPE, NO_BODY, encodeBody } from '../body';
import { jsonCodec, xmlCodec } from '../codecs';
import { EncodeError } from '../errors';
import { ParamMap } from '../multimap';

const codecs = { json: jsonCodec, xml: xmlCodec };
const decoder = new TextDecoder();

const text = (data: unknown): string => {
  if (!(data instanceof Uint8Array)) {
    throw new Error('expected bytes');
  }
  return decoder.decode(data);
};

describe('encodeBody', () => {
  it('encodes JSON values with a JSON content type', () => {
    const encoded = encodeBody({ kind: 'json', value: { a: 1 } }, new ParamMap(), codecs);
    expect(text(encoded.data)).toBe('{"a":1}');
    expect(encoded.contentType).toBe('application/json');
    expect(encoded.size).toBe(7);
  });

  it('encodes XML values with an XML content type', () => {
    const encoded = encodeBody({ kind: 'xml', value: { note: { to: 'Ada' } } }, new ParamMap(), codecs);
    expect(text(encoded.data)).toBe('<note><to>Ada</to></note>');
    expect(encoded.contentType).toBe('application/xml');
  });

  it('passes bytes through without a content type', () => {
    const data = new Uint8Array([1, 2, 3]);
    const encoded = encodeBody({ kind: 'bytes', data }, new ParamMap(), codecs);
    expect(encoded.data).toBe(data);
    expect(encoded.contentType).toBeUndefined();
    expect(encoded.size).toBe(3);
  });

  it('sends strings as UTF-8 without a content type', () => {
    const encoded = encodeBody({ kind: 'text', data: 'héllo' }, new ParamMap(), codecs);
    expect(text(encoded.data)).toBe('héllo');
    expect(encoded.size).toBe(6);
    expect(encoded.contentType).toBeUndefined();
  });

  it('passes streams through unread with an unknown size', async () => {
    async function* chunks(): AsyncGenerator<Uint8Array> {
      yield new Uint8Array([1]);
    }
    const stream = chunks();
    const encoded = encodeBody({ kind: 'stream', data: stream }, new ParamMap(), codecs);
    expect(encoded.data).toBe(stream);
    expect(encoded.size).toBeUndefined();
    expect(encoded.contentType).toBeUndefined();
  });

  it('url-encodes form data when there is no body', () => {
    const form = new ParamMap([
      ['a', '1'],
      ['b', 'x y'],
    ]);
    const encoded = encodeBody(NO_BODY, form, codecs);
    expect(text(encoded.data)).toBe('a=1&b=x+y');
    expect(encoded.contentType).toBe(FORM_CONTENT_TYPE);
  });

  it('prefers an explicit body over form data', () => {
    const encoded = encodeBody({ kind: 'json', value: [1] }, new ParamMap([['a', '1']]), codecs);
    expect(text(encoded.data)).toBe('[1]');
    expect(encoded.contentType).toBe('application/json');
  });

  it('produces nothing without a body or form data', () => {
    expect(encodeBody(NO_BODY, new ParamMap(), codecs)).toEqual({});
  });

  it('wraps codec failures in EncodeError', () => {
    expect(() => encodeBody({ kind: 'json', value: 10n }, new ParamMap(), codecs)).toThrow(EncodeError);
    expect(() => encodeBody({ kind: 'json', value: undefined }, new ParamMap(), codecs)).toThrow(
      'Failed to encode json request body',
    );
  });
});
