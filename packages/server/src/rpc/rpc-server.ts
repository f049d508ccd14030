import {
  AppError,
  chainInterceptors,
  parseFullMethod,
  type CallContext,
  type UnaryHandler,
  type UnaryInterceptor,
} from '@callgate/core';

export interface ServiceDefinition {
  /** Fully-qualified service name, e.g. `user.UserService`. */
  name: string;
  methods: Readonly<Record<string, UnaryHandler>>;
}

export interface RpcServerOptions {
  interceptors?: ReadonlyArray<UnaryInterceptor>;
}

/**
 * In-process dispatcher for unary methods. Each registered method is wrapped
 * in the interceptor chain once, at registration.
 */
export class RpcServer {
  private readonly interceptors: ReadonlyArray<UnaryInterceptor>;
  private readonly handlers = new Map<string, UnaryHandler>();

  constructor(options: RpcServerOptions = {}) {
    this.interceptors = options.interceptors ?? [];
  }

  register(service: ServiceDefinition): this {
    for (const [method, handler] of Object.entries(service.methods)) {
      const fullMethod = `/${service.name}/${method}`;
      if (!parseFullMethod(fullMethod)) {
        throw new Error(`Invalid method name: ${fullMethod}`);
      }
      if (this.handlers.has(fullMethod)) {
        throw new Error(`Method already registered: ${fullMethod}`);
      }
      this.handlers.set(
        fullMethod,
        chainInterceptors(this.interceptors, { fullMethod }, handler),
      );
    }
    return this;
  }

  hasMethod(fullMethod: string): boolean {
    return this.handlers.has(fullMethod);
  }

  methods(): Array<string> {
    return Array.from(this.handlers.keys());
  }

  async call(
    fullMethod: string,
    ctx: CallContext,
    request: unknown,
  ): Promise<unknown> {
    const handler = this.handlers.get(fullMethod);
    if (!handler) {
      throw new AppError('UNIMPLEMENTED', `unknown method ${fullMethod}`);
    }
    return handler(ctx, request);
  }
}
