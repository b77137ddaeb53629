import type { Codec } from './codecs';
import { EncodeError } from './errors';
import type { ParamMap } from './multimap';
import type { TransportBody } from './types';

export type RequestBody =
  | { kind: 'none' }
  | { kind: 'bytes'; data: Uint8Array }
  | { kind: 'text'; data: string }
  | { kind: 'stream'; data: AsyncIterable<Uint8Array>; size?: number }
  | { kind: 'json'; value: unknown }
  | { kind: 'xml'; value: unknown };

export const NO_BODY: RequestBody = { kind: 'none' };

export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

export interface EncodedBody {
  data?: TransportBody;
  /** Content-Type suggested by the encoding; applied only when the caller set none. */
  contentType?: string;
  /** Byte length, when known before sending. */
  size?: number;
}

const utf8Encoder = new TextEncoder();

function toBytes(value: Uint8Array | string): Uint8Array {
  return typeof value === 'string' ? utf8Encoder.encode(value) : value;
}

function encodeWith(codec: Codec, format: string, value: unknown): EncodedBody {
  let bytes: Uint8Array;
  try {
    bytes = toBytes(codec.encode(value));
  } catch (error) {
    throw new EncodeError(format, error);
  }
  return { data: bytes, contentType: codec.contentType, size: bytes.byteLength };
}

/**
 * Turns a request body into transport bytes.
 * An explicit body always wins; form data is only used when the body is `none`.
 */
export function encodeBody(body: RequestBody, formData: ParamMap, codecs: { json: Codec; xml: Codec }): EncodedBody {
  switch (body.kind) {
    case 'json':
      return encodeWith(codecs.json, 'json', body.value);
    case 'xml':
      return encodeWith(codecs.xml, 'xml', body.value);
    case 'bytes':
      return { data: body.data, size: body.data.byteLength };
    case 'text': {
      const bytes = utf8Encoder.encode(body.data);
      return { data: bytes, size: bytes.byteLength };
    }
    case 'stream':
      return { data: body.data, size: body.size };
    case 'none': {
      if (formData.size === 0) {
        return {};
      }
      const bytes = utf8Encoder.encode(formData.toSearchParams().toString());
      return { data: bytes, contentType: FORM_CONTENT_TYPE, size: bytes.byteLength };
    }
  }
}

export function hasExplicitBody(body: RequestBody): boolean {
  return body.kind !== 'none';
}
