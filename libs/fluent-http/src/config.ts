import { z } from 'zod';
import type { Codec } from './codecs';
import { ValidationError } from './errors';
import type { DecodeTarget } from './resultTarget';
import type {
  AfterResponseHook,
  BeforeRequestHook,
  ErrorHook,
  HttpTransport,
  Logger,
  ResultClassifier,
  RetryCondition,
  TlsOptions,
  TracingAdapter,
} from './types';

export const DEFAULT_USER_AGENT = 'fluentreq/0.1.0';
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_RETRY_COUNT = 0;
export const DEFAULT_RETRY_INTERVAL_MS = 1_000;

export const timeoutMsSchema = z.number().int().positive();
export const retryCountSchema = z.number().int().min(0);
export const retryIntervalMsSchema = z.number().min(0);
export const proxyUrlSchema = z.string().url();

const multiValueRecordSchema = z.record(z.union([z.string(), z.array(z.string())]));

export const clientConfigSchema = z.object({
  baseUrl: z.string().optional(),
  timeoutMs: timeoutMsSchema.optional(),
  retryCount: retryCountSchema.optional(),
  retryIntervalMs: retryIntervalMsSchema.optional(),
  userAgent: z.string().optional(),
  debug: z.boolean().optional(),
  allowGetPayload: z.boolean().optional(),
  insecureSkipVerify: z.boolean().optional(),
  proxyUrl: proxyUrlSchema.optional(),
  headers: multiValueRecordSchema.optional(),
  queryParams: multiValueRecordSchema.optional(),
  pathParams: z.record(z.string()).optional(),
  formData: multiValueRecordSchema.optional(),
});

export type ClientConfigData = z.infer<typeof clientConfigSchema>;

/** Everything `new HttpClient(config)` accepts; data fields are checked by `clientConfigSchema`. */
export type ClientConfig = ClientConfigData & {
  transport?: HttpTransport;
  tls?: TlsOptions;
  logger?: Logger;
  retryCondition?: RetryCondition;
  resultClassifier?: ResultClassifier;
  commonErrorResult?: DecodeTarget;
  jsonCodec?: Codec;
  xmlCodec?: Codec;
  beforeRequest?: BeforeRequestHook[];
  afterResponse?: AfterResponseHook[];
  onError?: ErrorHook;
  tracing?: TracingAdapter;
};

/**
 * Runs `value` through `schema`, throwing a ValidationError that lists
 * every issue when it does not match.
 */
export function parseSetting<S extends z.ZodTypeAny>(schema: S, value: unknown, label: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid ${label}`, formatIssues(result.error));
  }
  return result.data;
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}

const emptyAsUndefined = (value: unknown): unknown => (value === '' ? undefined : value);

const envNumber = (schema: z.ZodNumber) => z.preprocess(emptyAsUndefined, z.coerce.number().pipe(schema).optional());

const envBoolean = z.preprocess(
  emptyAsUndefined,
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .transform((value) => value === 'true' || value === '1' || value === 'yes')
    .optional(),
);

const envString = z.preprocess(emptyAsUndefined, z.string().optional());

export const clientEnvSchema = z.object({
  FLUENTREQ_BASE_URL: envString,
  FLUENTREQ_TIMEOUT_MS: envNumber(timeoutMsSchema),
  FLUENTREQ_RETRY_COUNT: envNumber(retryCountSchema),
  FLUENTREQ_RETRY_INTERVAL_MS: envNumber(retryIntervalMsSchema),
  FLUENTREQ_USER_AGENT: envString,
  FLUENTREQ_DEBUG: envBoolean,
  FLUENTREQ_PROXY_URL: z.preprocess(emptyAsUndefined, proxyUrlSchema.optional()),
});

/**
 * Reads client settings from FLUENTREQ_* variables. Unset or empty variables
 * are left out so the client defaults apply.
 */
export function loadClientConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ClientConfigData {
  const parsed = parseSetting(clientEnvSchema, env, 'environment configuration');
  const config: ClientConfigData = {};
  if (parsed.FLUENTREQ_BASE_URL !== undefined) config.baseUrl = parsed.FLUENTREQ_BASE_URL;
  if (parsed.FLUENTREQ_TIMEOUT_MS !== undefined) config.timeoutMs = parsed.FLUENTREQ_TIMEOUT_MS;
  if (parsed.FLUENTREQ_RETRY_COUNT !== undefined) config.retryCount = parsed.FLUENTREQ_RETRY_COUNT;
  if (parsed.FLUENTREQ_RETRY_INTERVAL_MS !== undefined) config.retryIntervalMs = parsed.FLUENTREQ_RETRY_INTERVAL_MS;
  if (parsed.FLUENTREQ_USER_AGENT !== undefined) config.userAgent = parsed.FLUENTREQ_USER_AGENT;
  if (parsed.FLUENTREQ_DEBUG !== undefined) config.debug = parsed.FLUENTREQ_DEBUG;
  if (parsed.FLUENTREQ_PROXY_URL !== undefined) config.proxyUrl = parsed.FLUENTREQ_PROXY_URL;
  return config;
}

/** 2xx is a success, 4xx and 5xx an error, anything else (1xx, 3xx) unknown. */
export const defaultResultClassifier: ResultClassifier = (response) => {
  const code = response.statusCode;
  if (code >= 200 && code < 300) {
    return 'success';
  }
  if (code >= 400) {
    return 'error';
  }
  return 'unknown';
};

/** Retries any failed attempt, server errors and 429. */
export const defaultRetryCondition: RetryCondition = (response, error) => {
  if (error) {
    return true;
  }
  if (!response) {
    return false;
  }
  return response.statusCode >= 500 || response.statusCode === 429;
};
