import { z } from 'zod';
import { DecodeError } from './errors';

/** Anything the engine can decode a response body into. */
export interface DecodeTarget {
  assign(raw: unknown): void;
}

/**
 * Typed decode destination. The raw decoded body is checked against `schema`;
 * on success the parsed value is available as `value`.
 */
export class ResultTarget<T> implements DecodeTarget {
  private current: T | undefined;
  private filled = false;

  constructor(readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>) {}

  get value(): T | undefined {
    return this.current;
  }

  get hasValue(): boolean {
    return this.filled;
  }

  assign(raw: unknown): void {
    const parsed = this.schema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new DecodeError(`Response body does not match the result schema: ${issues.join('; ')}`, parsed.error);
    }
    this.current = parsed.data;
    this.filled = true;
  }

  reset(): void {
    this.current = undefined;
    this.filled = false;
  }
}

export function resultTarget(): ResultTarget<unknown>;
export function resultTarget<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): ResultTarget<T>;
export function resultTarget<T>(schema?: z.ZodType<T, z.ZodTypeDef, unknown>): ResultTarget<T> | ResultTarget<unknown> {
  return schema ? new ResultTarget(schema) : new ResultTarget(z.unknown());
}
