import type { Logger, LoggerMeta } from './types';

export const BODY_PREVIEW_LIMIT = 300;

/**
 * Logs to console.debug, console.info, console.warn and console.error.
 * Used when debug output is enabled and no logger was configured.
 */
export class ConsoleLogger implements Logger {
  debug(message: string, meta?: LoggerMeta): void {
    console.debug(message, meta ?? {});
  }
  info(message: string, meta?: LoggerMeta): void {
    console.info(message, meta ?? {});
  }
  warn(message: string, meta?: LoggerMeta): void {
    console.warn(message, meta ?? {});
  }
  error(message: string, meta?: LoggerMeta): void {
    console.error(message, meta ?? {});
  }
}

export const noopLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

const previewDecoder = new TextDecoder();

/** Body text cut to `limit` characters, with a marker when truncated. */
export function previewBody(body: Uint8Array | string | undefined, limit = BODY_PREVIEW_LIMIT): string {
  if (body === undefined) {
    return '';
  }
  const text = typeof body === 'string' ? body : previewDecoder.decode(body);
  if (text.length <= limit) {
    return text;
  }
  return `${text.slice(0, limit)}... (${text.length - limit} more characters)`;
}
