import {
  JsonLogger,
  ManualClock,
  chainInterceptors,
  createCallContext,
} from '@callgate/core';
import { describe, it, expect } from 'vitest';
import { ServerMetrics } from '../metrics.js';
import { buildInterceptors } from './index.js';
import type { RateLimitSettings } from './rate-limit.js';

const settings: RateLimitSettings = {
  rateLimitEnabled: true,
  rateLimitRequestsPerSec: 1,
  rateLimitBurstSize: 1,
  rateLimitStrategy: 'global',
};

describe('buildInterceptors', () => {
  it('should include the rate limiter only when enabled', () => {
    const metrics = new ServerMetrics();
    expect(buildInterceptors(settings, { metrics })).toHaveLength(5);
    expect(
      buildInterceptors(
        { ...settings, rateLimitEnabled: false },
        { metrics: new ServerMetrics() },
      ),
    ).toHaveLength(4);
  });

  it('should count and tag rejected calls before they reach logging', async () => {
    const metrics = new ServerMetrics();
    const lines: Array<string> = [];
    const call = chainInterceptors(
      buildInterceptors(settings, {
        metrics,
        clock: new ManualClock(0),
        generateRequestId: () => 'req-1',
      }),
      { fullMethod: '/svc.S/M' },
      async () => 'ok',
    );
    const ctx = () =>
      createCallContext({
        logger: new JsonLogger({ write: (line) => lines.push(line) }),
      });

    await expect(call(ctx(), {})).resolves.toBe('ok');
    await expect(call(ctx(), {})).rejects.toThrow('Rate limit exceeded');

    expect(
      metrics.requestsTotal.get({ method: '/svc.S/M', status_code: '8' }),
    ).toBe(1);
    expect(
      metrics.rateLimitExceeded.get({ method: '/svc.S/M', key: 'global' }),
    ).toBe(1);

    const messages = lines.map(
      (line): Record<string, unknown> => JSON.parse(line),
    );
    expect(messages.map((m) => m.msg)).toEqual([
      'request received',
      'request completed',
      'Rate limit exceeded',
    ]);
    expect(messages.every((m) => m.request_id === 'req-1')).toBe(true);
  });
});
