import { describe, it, expect, vi, afterEach } from 'vitest';
import type { Server } from 'node:http';
import axios from 'axios';
import express from 'express';
import { RateLimiter, RateLimitPresets } from './rate-limiter.js';

const servers: Server[] = [];
const limiters: RateLimiter[] = [];

async function serve(limiter: RateLimiter, path = '/items/:resourceId'): Promise<string> {
  limiters.push(limiter);
  const app = express();
  app.put(path, limiter.middleware(), (_req, res) => {
    res.json({ success: true });
  });
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, () => resolve(listening));
  });
  servers.push(server);
  const address = server.address();
  return `http://127.0.0.1:${address !== null && typeof address === 'object' ? address.port : 0}`;
}

afterEach(async () => {
  for (const limiter of limiters.splice(0)) limiter.stop();
  for (const server of servers.splice(0)) {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
});

describe('RateLimiter', () => {
  it('counts requests within a window and answers 429 past the limit', async () => {
    let now = 1_000_000;
    const limiter = new RateLimiter({ windowMs: 10_000, maxRequests: 2, clock: () => now });
    const origin = await serve(limiter);
    const put = () => axios.put(`${origin}/items/a`, {}, { validateStatus: () => true });

    const first = await put();
    expect(first.status).toBe(200);
    expect(first.headers['x-ratelimit-remaining']).toBe('1');
    expect((await put()).headers['x-ratelimit-remaining']).toBe('0');

    now += 4_000;
    const limited = await put();
    expect(limited.status).toBe(429);
    expect(limited.headers['retry-after']).toBe('6');
    expect(limited.data).toMatchObject({ success: false, error: 'RATE_LIMITED', retryAfter: 6 });

    now += 6_000;
    expect((await put()).status).toBe(200);
  });

  it('sweeps expired windows every minute', async () => {
    vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval'] });
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    let now = 0;
    const limiter = new RateLimiter({
      windowMs: 1000,
      maxRequests: 1,
      keyGenerator: (req) => req.params['resourceId'] ?? 'none',
      clock: () => now,
    });
    const origin = await serve(limiter);
    const put = (resource: string) => axios.put(`${origin}/items/${resource}`, {}, { validateStatus: () => true });

    await put('a');
    now = 500;
    await put('b');
    now = 1200;
    vi.advanceTimersByTime(60_000);

    expect(log).toHaveBeenCalledWith('Cleaned up 1 expired rate limit entries');
    expect((await put('b')).status).toBe(429);
    expect((await put('a')).status).toBe(200);

    limiter.stop();
    vi.useRealTimers();
    log.mockRestore();
  });

  it('limits writes per resource with the resource preset', async () => {
    const limiter = RateLimitPresets.resourceWrites(1);
    const origin = await serve(limiter);
    const put = (resource: string) => axios.put(`${origin}/items/${resource}`, {}, { validateStatus: () => true });

    expect((await put('a')).status).toBe(200);
    expect((await put('b')).status).toBe(200);
    expect((await put('a')).status).toBe(429);
  });
});
