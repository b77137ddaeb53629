import { Agent, ProxyAgent, fetch, type Dispatcher } from 'undici';
import type {
  HttpHeaders,
  HttpTransport,
  RawHttpResponse,
  TlsOptions,
  TransportBody,
  TransportRequest,
  UploadProgressCallback,
} from '../types';

export interface FetchTransportOptions {
  tls?: TlsOptions;
  proxyUrl?: string;
  /** Overrides the dispatcher built from `tls` and `proxyUrl`. */
  dispatcher?: Dispatcher;
}

export function createDispatcher(options: { tls?: TlsOptions; proxyUrl?: string }): Dispatcher | undefined {
  const { tls, proxyUrl } = options;
  const connect =
    tls && Object.values(tls).some((value) => value !== undefined)
      ? {
          rejectUnauthorized: !tls.insecureSkipVerify,
          ca: tls.ca,
          cert: tls.cert,
          key: tls.key,
          servername: tls.servername,
        }
      : undefined;
  if (proxyUrl) {
    return new ProxyAgent({ uri: proxyUrl, requestTls: connect });
  }
  if (connect) {
    return new Agent({ connect });
  }
  return undefined;
}

async function* trackUpload(
  body: AsyncIterable<Uint8Array>,
  total: number,
  onProgress: UploadProgressCallback,
): AsyncGenerator<Uint8Array> {
  let written = 0;
  for await (const chunk of body) {
    yield chunk;
    written += chunk.byteLength;
    onProgress(written, total);
  }
}

async function* readChunks(stream: AsyncIterable<unknown>): AsyncGenerator<Uint8Array> {
  for await (const chunk of stream) {
    if (!(chunk instanceof Uint8Array)) {
      throw new TypeError('Response stream produced a non-binary chunk');
    }
    yield chunk;
  }
}

/**
 * Transport on undici's fetch. TLS options and the proxy are applied through
 * a dedicated dispatcher; the response body is handed back unread.
 *
 * fetch refuses bodies on GET and HEAD, so payloads on those methods need
 * another transport.
 *
 * Streamed bodies report upload progress per chunk. Buffered bodies are sent
 * as-is with their Content-Length and report a single event once the
 * response headers are in.
 */
export function createFetchTransport(options: FetchTransportOptions = {}): HttpTransport {
  const dispatcher = options.dispatcher ?? createDispatcher(options);

  return async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
    const onProgress = req.onUploadProgress;
    let body: TransportBody | undefined = req.body;
    if (body !== undefined && !(body instanceof Uint8Array) && onProgress) {
      body = trackUpload(body, req.contentLength ?? -1, onProgress);
    }

    const response = await fetch(req.url, {
      method: req.method,
      headers: req.headers,
      body,
      signal,
      dispatcher,
      duplex: body === undefined ? undefined : 'half',
    });

    if (body instanceof Uint8Array && onProgress) {
      onProgress(body.byteLength, body.byteLength);
    }

    const headers: HttpHeaders = {};
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });

    return {
      status: response.status,
      statusText: response.statusText,
      headers,
      setCookies: response.headers.getSetCookie(),
      body: response.body ? readChunks(response.body) : null,
    };
  };
}
