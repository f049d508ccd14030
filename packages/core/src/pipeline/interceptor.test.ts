import { describe, it, expect } from 'vitest';
import {
  createCallContext,
  parseFullMethod,
  withContext,
  type CallContext,
} from './call-context.js';
import { chainInterceptors, type UnaryInterceptor } from './interceptor.js';

const info = { fullMethod: '/svc.Service/Method' };

describe('chainInterceptors', () => {
  it('should return the handler unchanged for an empty chain', async () => {
    const handler = async (_ctx: CallContext, request: unknown) => request;
    const chained = chainInterceptors([], info, handler);

    expect(chained).toBe(handler);
    await expect(chained(createCallContext(), 'ping')).resolves.toBe('ping');
  });

  it('should run interceptors outermost first', async () => {
    const order: Array<string> = [];
    const track =
      (name: string): UnaryInterceptor =>
      async (ctx, request, _info, next) => {
        order.push(`${name}:before`);
        const result = await next(ctx, request);
        order.push(`${name}:after`);
        return result;
      };

    const chained = chainInterceptors(
      [track('first'), track('second')],
      info,
      async () => {
        order.push('handler');
        return 'done';
      },
    );

    await expect(chained(createCallContext(), {})).resolves.toBe('done');
    expect(order).toEqual([
      'first:before',
      'second:before',
      'handler',
      'second:after',
      'first:after',
    ]);
  });

  it('should pass augmented context values downstream', async () => {
    const tag: UnaryInterceptor = (ctx, request, _info, next) =>
      next(withContext(ctx, { requestId: 'req-1' }), request);
    const observed: Array<CallContext> = [];

    const original = createCallContext({ metadata: { 'X-Tenant': 'acme' } });
    await chainInterceptors([tag], info, async (ctx) => {
      observed.push(ctx);
      return null;
    })(original, {});

    expect(observed[0]?.requestId).toBe('req-1');
    expect(observed[0]?.metadata).toEqual({ 'x-tenant': 'acme' });
    expect(observed[0]?.responseMetadata).toBe(original.responseMetadata);
    expect(original.requestId).toBeUndefined();
  });

  it('should hand the call info to every stage', async () => {
    const seen: Array<string> = [];
    const record: UnaryInterceptor = (ctx, request, callInfo, next) => {
      seen.push(callInfo.fullMethod);
      return next(ctx, request);
    };

    await chainInterceptors([record, record], info, async () => null)(
      createCallContext(),
      {},
    );

    expect(seen).toEqual(['/svc.Service/Method', '/svc.Service/Method']);
  });

  it('should let a stage short-circuit the call', async () => {
    let reached = false;
    const reject: UnaryInterceptor = async () => {
      throw new Error('stopped');
    };

    const chained = chainInterceptors([reject], info, async () => {
      reached = true;
      return null;
    });

    await expect(chained(createCallContext(), {})).rejects.toThrow('stopped');
    expect(reached).toBe(false);
  });
});

describe('parseFullMethod', () => {
  it('should split service and method', () => {
    expect(parseFullMethod('/hello.HelloService/GetHello')).toEqual({
      service: 'hello.HelloService',
      method: 'GetHello',
    });
  });

  it('should reject malformed names', () => {
    expect(parseFullMethod('hello.HelloService/GetHello')).toBeUndefined();
    expect(parseFullMethod('/hello.HelloService')).toBeUndefined();
    expect(parseFullMethod('/v1/users/1')).toBeUndefined();
  });
});
