import { loadClientConfigFromEnv, type ClientConfig } from './config';
import { HttpClient } from './HttpClient';

/**
 * Creates an HttpClient. Defaults applied when not configured:
 * - Transport: undici fetch
 * - Timeout: 30s per attempt
 * - Retries: none (retry interval 1s once enabled)
 * - Logger: none, or a console logger with debug enabled
 *
 * @example
 * ```typescript
 * const client = createClient({ baseUrl: 'https://api.example.com', retryCount: 2 });
 * const user = resultTarget(userSchema);
 * await client.get('/users/{id}').setPathParam('id', '42').setSuccessResult(user).execute();
 * ```
 */
export function createClient(config: ClientConfig = {}): HttpClient {
  return new HttpClient(config);
}

/**
 * Creates an HttpClient from FLUENTREQ_* environment variables;
 * explicit `overrides` win over the environment.
 */
export function createClientFromEnv(overrides: ClientConfig = {}, env: NodeJS.ProcessEnv = process.env): HttpClient {
  return new HttpClient({ ...loadClientConfigFromEnv(env), ...overrides });
}
