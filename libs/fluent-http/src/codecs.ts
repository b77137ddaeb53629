import { XMLBuilder, XMLParser } from 'fast-xml-parser';

/**
 * Pluggable body codec. `encode` may return text (sent as UTF-8) or bytes;
 * both directions throw on malformed input.
 */
export interface Codec {
  readonly contentType: string;
  encode(value: unknown): Uint8Array | string;
  decode(body: Uint8Array): unknown;
}

const utf8Decoder = new TextDecoder();

export const jsonCodec: Codec = {
  contentType: 'application/json',
  encode(value: unknown): string {
    const text: string | undefined = JSON.stringify(value);
    if (text === undefined) {
      throw new TypeError(`Value of type ${typeof value} has no JSON representation`);
    }
    return text;
  },
  decode(body: Uint8Array): unknown {
    return JSON.parse(utf8Decoder.decode(body));
  },
};

export interface XmlCodecOptions {
  attributeNamePrefix?: string;
  textNodeName?: string;
}

export function createXmlCodec(options: XmlCodecOptions = {}): Codec {
  const shared = {
    ignoreAttributes: false,
    attributeNamePrefix: options.attributeNamePrefix ?? '@_',
    textNodeName: options.textNodeName ?? '#text',
  };
  const builder = new XMLBuilder(shared);
  const parser = new XMLParser({ ...shared, ignoreDeclaration: true, trimValues: true });

  return {
    contentType: 'application/xml',
    encode(value: unknown): string {
      return builder.build(value);
    },
    decode(body: Uint8Array): unknown {
      const text = utf8Decoder.decode(body);
      const parsed: unknown = parser.parse(text, true);
      return parsed;
    },
  };
}

export const xmlCodec: Codec = createXmlCodec();

/**
 * Picks the decoding codec from a Content-Type value: JSON types use `json`,
 * `application/xml` and `text/xml` use `xml`, anything else falls back to `json`.
 */
export function codecForContentType(contentType: string, codecs: { json: Codec; xml: Codec }): Codec {
  if (contentType.includes('application/json')) {
    return codecs.json;
  }
  if (contentType.includes('application/xml') || contentType.includes('text/xml')) {
    return codecs.xml;
  }
  return codecs.json;
}
