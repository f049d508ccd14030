import {
  AppError,
  JsonLogger,
  ManualClock,
  RateLimiter,
  chainInterceptors,
  createCallContext,
  methodKeyExtractor,
  type UnaryHandler,
} from '@callgate/core';
import { describe, it, expect, beforeEach } from 'vitest';
import { ServerMetrics } from '../metrics.js';
import {
  createRateLimitInterceptor,
  createRateLimitInterceptors,
  type RateLimitSettings,
} from './rate-limit.js';

const HELLO = { fullMethod: '/hello.HelloService/GetHello' };

describe('createRateLimitInterceptor', () => {
  let clock: ManualClock;
  let metrics: ServerMetrics;
  let lines: Array<string>;
  let reached: number;
  const handler: UnaryHandler = async () => {
    reached++;
    return { ok: true };
  };

  beforeEach(() => {
    clock = new ManualClock(0);
    metrics = new ServerMetrics();
    lines = [];
    reached = 0;
  });

  function context() {
    return createCallContext({
      logger: new JsonLogger({
        write: (line) => lines.push(line),
        now: () => new Date(0),
      }),
    });
  }

  it('should admit, reject and refill on the global budget', async () => {
    const limiter = new RateLimiter(
      { requestsPerSecond: 2, burstSize: 2 },
      { clock },
    );
    const call = chainInterceptors(
      [createRateLimitInterceptor(limiter, { metrics })],
      HELLO,
      handler,
    );

    await expect(call(context(), {})).resolves.toEqual({ ok: true });
    await expect(call(context(), {})).resolves.toEqual({ ok: true });
    await expect(call(context(), {})).rejects.toThrow(
      'Rate limit exceeded. Maximum 2 requests per second allowed.',
    );

    clock.advance(500);
    await expect(call(context(), {})).resolves.toEqual({ ok: true });
    await expect(call(context(), {})).rejects.toBeInstanceOf(AppError);

    expect(reached).toBe(3);
  });

  it('should fail with RESOURCE_EXHAUSTED mapped to 429', async () => {
    const limiter = new RateLimiter(
      { requestsPerSecond: 1, burstSize: 1 },
      { clock },
    );
    const call = chainInterceptors(
      [createRateLimitInterceptor(limiter)],
      HELLO,
      handler,
    );
    await call(context(), {});

    const err = await call(context(), {}).then(
      () => undefined,
      (e: unknown) => e,
    );

    expect(err).toBeInstanceOf(AppError);
    if (!(err instanceof AppError)) return;
    expect(err.code).toBe('RESOURCE_EXHAUSTED');
    expect(err.httpStatus).toBe(429);
    expect(err.publicCode).toBe('ERR429P08');
  });

  it('should log a warning and count the rejection', async () => {
    const limiter = new RateLimiter(
      { requestsPerSecond: 1, burstSize: 1 },
      { clock },
    );
    const call = chainInterceptors(
      [createRateLimitInterceptor(limiter, { metrics })],
      HELLO,
      handler,
    );

    await call(context(), {});
    await expect(call(context(), {})).rejects.toThrow();

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toEqual({
      level: 'warn',
      time: '1970-01-01T00:00:00.000Z',
      msg: 'Rate limit exceeded',
      method: '/hello.HelloService/GetHello',
      rate_limit_key: 'global',
      requests_per_second: 1,
      burst_size: 1,
    });
    expect(
      metrics.rateLimitExceeded.get({
        method: '/hello.HelloService/GetHello',
        key: 'global',
      }),
    ).toBe(1);
  });

  it('should keep per-method budgets independent', async () => {
    const limiter = new RateLimiter(
      { requestsPerSecond: 1, burstSize: 1, keyExtractor: methodKeyExtractor },
      { clock },
    );
    const interceptors = [createRateLimitInterceptor(limiter, { metrics })];
    const callA = chainInterceptors(interceptors, { fullMethod: '/svc.S/A' }, handler);
    const callB = chainInterceptors(interceptors, { fullMethod: '/svc.S/B' }, handler);

    await expect(callA(context(), {})).resolves.toEqual({ ok: true });
    await expect(callA(context(), {})).rejects.toThrow(
      'Rate limit exceeded. Maximum 1 requests per second allowed.',
    );
    await expect(callB(context(), {})).resolves.toEqual({ ok: true });

    expect(
      metrics.rateLimitExceeded.get({ method: '/svc.S/A', key: '/svc.S/A' }),
    ).toBe(1);
  });

  it('should pass downstream errors through untouched', async () => {
    const limiter = new RateLimiter(
      { requestsPerSecond: 10, burstSize: 10 },
      { clock },
    );
    const failure = new Error('downstream');
    const call = chainInterceptors(
      [createRateLimitInterceptor(limiter)],
      HELLO,
      async () => {
        throw failure;
      },
    );

    await expect(call(context(), {})).rejects.toBe(failure);
  });
});

describe('createRateLimitInterceptors', () => {
  const settings: RateLimitSettings = {
    rateLimitEnabled: true,
    rateLimitRequestsPerSec: 1,
    rateLimitBurstSize: 1,
    rateLimitStrategy: 'global',
  };

  it('should install nothing when disabled', async () => {
    const interceptors = createRateLimitInterceptors({
      ...settings,
      rateLimitEnabled: false,
    });
    expect(interceptors).toEqual([]);

    let reached = 0;
    const call = chainInterceptors(interceptors, HELLO, async () => {
      reached++;
      return null;
    });
    for (let i = 0; i < 50; i++) {
      await call(createCallContext(), {});
    }
    expect(reached).toBe(50);
  });

  it('should install one interceptor using the configured strategy', async () => {
    const clock = new ManualClock(0);
    const interceptors = createRateLimitInterceptors(
      { ...settings, rateLimitStrategy: 'per-method' },
      { clock },
    );
    expect(interceptors).toHaveLength(1);

    const handler: UnaryHandler = async () => 'ok';
    const callA = chainInterceptors(interceptors, { fullMethod: '/svc.S/A' }, handler);
    const callB = chainInterceptors(interceptors, { fullMethod: '/svc.S/B' }, handler);

    await expect(callA(createCallContext(), {})).resolves.toBe('ok');
    await expect(callB(createCallContext(), {})).resolves.toBe('ok');
    await expect(callA(createCallContext(), {})).rejects.toThrow(
      'Rate limit exceeded',
    );
  });

  it('should share one budget across methods under the global strategy', async () => {
    const interceptors = createRateLimitInterceptors(settings, {
      clock: new ManualClock(0),
    });
    const handler: UnaryHandler = async () => 'ok';

    await chainInterceptors(interceptors, { fullMethod: '/svc.S/A' }, handler)(
      createCallContext(),
      {},
    );
    await expect(
      chainInterceptors(interceptors, { fullMethod: '/svc.S/B' }, handler)(
        createCallContext(),
        {},
      ),
    ).rejects.toThrow('Rate limit exceeded');
  });

  it('should give each client address its own budget under the per-client strategy', async () => {
    const interceptors = createRateLimitInterceptors(
      { ...settings, rateLimitStrategy: 'per-client' },
      { clock: new ManualClock(0) },
    );
    const call = chainInterceptors(interceptors, HELLO, async () => 'ok');

    await expect(call(createCallContext({ peer: '10.0.0.1' }), {})).resolves.toBe('ok');
    await expect(call(createCallContext({ peer: '10.0.0.2' }), {})).resolves.toBe('ok');
    await expect(call(createCallContext({ peer: '10.0.0.1' }), {})).rejects.toThrow(
      'Rate limit exceeded',
    );
  });
});
