import { vi } from 'vitest';
import type { Logger, RawHttpResponse, TransportRequest } from '../types';

const encoder = new TextEncoder();

export const reply = (
  status: number,
  body = '',
  headers: Record<string, string> = {},
  extra: Partial<RawHttpResponse> = {},
): RawHttpResponse => ({
  status,
  statusText: '',
  headers,
  body: encoder.encode(body),
  ...extra,
});

export const jsonReply = (status: number, body: unknown): RawHttpResponse =>
  reply(status, JSON.stringify(body), { 'content-type': 'application/json' });

export const createLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

export const createTransport = (respond: (req: TransportRequest) => RawHttpResponse = () => reply(200)) =>
  vi.fn(async (req: TransportRequest, _signal: AbortSignal): Promise<RawHttpResponse> => respond(req));

export const decodeText = (body: TransportRequest['body']): string => {
  if (!(body instanceof Uint8Array)) {
    throw new Error('expected a buffered body');
  }
  return new TextDecoder().decode(body);
};
