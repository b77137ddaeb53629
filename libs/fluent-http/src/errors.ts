import type { HttpResponse } from './HttpResponse';

export interface FluentHttpErrorOptions {
  cause?: unknown;
  response?: HttpResponse;
}

/**
 * Base class of every error surfaced by a request.
 * `response` is set when the failing attempt got far enough to produce one;
 * callers should inspect it even on failure (partial responses are kept).
 */
export class FluentHttpError extends Error {
  response?: HttpResponse;

  constructor(message: string, options: FluentHttpErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'FluentHttpError';
    this.response = options.response;
  }
}

export class URLParseError extends FluentHttpError {
  readonly input: string;

  constructor(input: string, cause?: unknown) {
    super(`Failed to build URL from "${input}"`, { cause });
    this.name = 'URLParseError';
    this.input = input;
  }
}

export class EncodeError extends FluentHttpError {
  readonly format: string;

  constructor(format: string, cause?: unknown) {
    super(`Failed to encode ${format} request body: ${describeError(cause)}`, { cause });
    this.name = 'EncodeError';
    this.format = format;
  }
}

/** Connect, send and cancellation failures reported by the transport. */
export class TransportError extends FluentHttpError {
  constructor(message: string, options: FluentHttpErrorOptions = {}) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export class TimeoutError extends TransportError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, options: FluentHttpErrorOptions = {}) {
    super(`Request timed out after ${timeoutMs}ms`, options);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class BodyReadError extends FluentHttpError {
  constructor(cause?: unknown) {
    super(`Failed to read response body: ${describeError(cause)}`, { cause });
    this.name = 'BodyReadError';
  }
}

export type HookPhase = 'before' | 'after';

export class HookError extends FluentHttpError {
  readonly phase: HookPhase;

  constructor(phase: HookPhase, cause?: unknown) {
    super(`${phase === 'before' ? 'Before request' : 'After response'} hook failed: ${describeError(cause)}`, {
      cause,
    });
    this.name = 'HookError';
    this.phase = phase;
  }
}

export class DecodeError extends FluentHttpError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'DecodeError';
  }
}

export class ValidationError extends FluentHttpError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class OutputError extends FluentHttpError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super(`Failed to write response body to ${path}: ${describeError(cause)}`, { cause });
    this.name = 'OutputError';
    this.path = path;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
