import {
  AppError,
  JsonLogger,
  ManualClock,
  chainInterceptors,
  createCallContext,
  type UnaryHandler,
} from '@callgate/core';
import { describe, it, expect, beforeEach } from 'vitest';
import { createLoggingInterceptor } from './logging.js';

describe('createLoggingInterceptor', () => {
  let clock: ManualClock;
  let lines: Array<string>;

  beforeEach(() => {
    clock = new ManualClock(1_000);
    lines = [];
  });

  function entries(): Array<Record<string, unknown>> {
    return lines.map((line): Record<string, unknown> => JSON.parse(line));
  }

  function run(fullMethod: string, request: unknown, handler: UnaryHandler) {
    const ctx = createCallContext({
      logger: new JsonLogger({
        write: (line) => lines.push(line),
        now: () => new Date(0),
      }),
    });
    return chainInterceptors(
      [createLoggingInterceptor({ clock })],
      { fullMethod },
      handler,
    )(ctx, request);
  }

  it('should log the request and its completion', async () => {
    await run('/hello.HelloService/GetHello', { name: 'Ada' }, async () => {
      clock.advance(12);
      return { message: 'Hello, Ada!' };
    });

    const [received, completed] = entries();
    expect(received).toMatchObject({
      level: 'info',
      msg: 'request received',
      method: '/hello.HelloService/GetHello',
      request_payload: { name: 'Ada' },
    });
    expect(completed).toMatchObject({
      level: 'info',
      msg: 'request completed',
      method: '/hello.HelloService/GetHello',
      status: 'OK',
      status_code: 0,
      duration_ms: 12,
    });
  });

  it('should log failures at error level with the status', async () => {
    await expect(
      run('/user.UserService/GetUser', { id: 9 }, async () => {
        clock.advance(3);
        throw new AppError('USER_NOT_FOUND', 'user with ID 9 not found');
      }),
    ).rejects.toThrow('user with ID 9 not found');

    expect(entries()[1]).toEqual({
      level: 'error',
      time: '1970-01-01T00:00:00.000Z',
      msg: 'request failed',
      method: '/user.UserService/GetUser',
      status: 'NOT_FOUND',
      status_code: 5,
      duration_ms: 3,
      code: 'ERR404P17',
      error: { name: 'AppError', message: 'user with ID 9 not found' },
    });
  });

  it('should log only the size of large payloads', async () => {
    const request = { blob: 'x'.repeat(1200) };
    await run('/svc.S/Upload', request, async () => ({}));

    const received = entries()[0];
    expect(received?.payload_size).toBe(JSON.stringify(request).length);
    expect(received).not.toHaveProperty('request_payload');
  });

  it('should skip payloads of health checks', async () => {
    await run('/grpc.health.v1.Health/Check', { service: '' }, async () => ({}));

    expect(entries()[0]?.payload_size).toBe(14);
  });
});
