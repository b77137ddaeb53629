import { describe, expect, it, vi } from 'vitest';
import { HttpClient } from '../HttpClient';
import { createTransport, reply } from './helpers';

const sleep = vi.hoisted(() =>
  vi.fn(async (_delayMs: number, _value?: unknown, _options?: { signal?: AbortSignal }) => undefined),
);

vi.mock('timers/promises', () => ({ setTimeout: sleep }));

describe('retry interval', () => {
  it('waits the configured interval before every retry', async () => {
    const transport = createTransport(() => reply(503));
    const controller = new AbortController();
    const client = new HttpClient({
      baseUrl: 'https://api.example.com',
      transport,
      retryCount: 2,
      retryIntervalMs: 250,
    });

    const response = await client.get('/flaky').setSignal(controller.signal).execute();

    expect(transport).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenNthCalledWith(1, 250, undefined, { signal: controller.signal });
    expect(sleep).toHaveBeenNthCalledWith(2, 250, undefined, { signal: controller.signal });
    expect(response.statusCode).toBe(503);
  });

  it('does not wait when no retry follows', async () => {
    sleep.mockClear();
    const client = new HttpClient({ baseUrl: 'https://api.example.com', transport: createTransport(), retryCount: 2 });

    await client.get('/ok').execute();

    expect(sleep).not.toHaveBeenCalled();
  });
});
