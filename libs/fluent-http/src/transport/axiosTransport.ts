import { Readable } from 'stream';
import type { HttpHeaders, HttpTransport, RawHttpResponse, RawResponseBody, TransportRequest } from '../types';

export interface AxiosProgressEventLike {
  loaded: number;
  total?: number;
}

export interface AxiosInstanceLike {
  request(config: {
    url?: string;
    method?: string;
    headers?: Record<string, string>;
    data?: unknown;
    signal?: AbortSignal;
    responseType?: 'arraybuffer';
    validateStatus?: (status: number) => boolean;
    onUploadProgress?: (event: AxiosProgressEventLike) => void;
  }): Promise<{
    status: number;
    statusText?: string;
    headers: Record<string, unknown>;
    data: unknown;
  }>;
}

const utf8Encoder = new TextEncoder();

function toResponseBody(data: unknown): RawResponseBody {
  if (data === undefined || data === null) {
    return null;
  }
  if (data instanceof Uint8Array || data instanceof ArrayBuffer) {
    return data;
  }
  if (typeof data === 'string') {
    return utf8Encoder.encode(data);
  }
  throw new TypeError('Expected an arraybuffer response from axios');
}

/**
 * Wraps an axios instance. Every status is passed back as a response so the
 * client's classifier decides what is an error.
 */
export const createAxiosTransport = (axiosInstance: AxiosInstanceLike): HttpTransport => {
  return async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
    const onUploadProgress = req.onUploadProgress;
    const response = await axiosInstance.request({
      url: req.url,
      method: req.method,
      headers: req.headers,
      data: req.body instanceof Uint8Array || req.body === undefined ? req.body : Readable.from(req.body),
      signal,
      responseType: 'arraybuffer',
      validateStatus: () => true,
      onUploadProgress: onUploadProgress
        ? (event) => onUploadProgress(event.loaded, event.total ?? req.contentLength ?? -1)
        : undefined,
    });

    const headers: HttpHeaders = {};
    let setCookies: string[] = [];
    for (const [key, value] of Object.entries(response.headers ?? {})) {
      if (value === undefined || value === null) continue;
      if (key.toLowerCase() === 'set-cookie') {
        setCookies = Array.isArray(value) ? value.map(String) : [String(value)];
      }
      headers[key.toLowerCase()] = Array.isArray(value) ? value.map(String).join(', ') : String(value);
    }

    return {
      status: response.status,
      statusText: response.statusText,
      headers,
      setCookies,
      body: toResponseBody(response.data),
    };
  };
};
