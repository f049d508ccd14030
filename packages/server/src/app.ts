import {
  NoOpLogger,
  type Clock,
  type StructuredLogger,
  type UserRepository,
} from '@callgate/core';
import type { AppConfig } from './config.js';
import { buildInterceptors } from './interceptors/index.js';
import { ServerMetrics } from './metrics.js';
import { RpcServer } from './rpc/rpc-server.js';
import { createGateway, type GatewayMiddleware } from './server/gateway.js';
import { createHelloService } from './services/hello/hello-service.js';
import { HelloUsecase } from './services/hello/hello-usecase.js';
import { createUserService } from './services/user/user-service.js';
import { UserUsecase } from './services/user/user-usecase.js';

export interface AppDeps {
  users: UserRepository;
  logger?: StructuredLogger;
  clock?: Clock;
  generateRequestId?: () => string;
}

export interface App {
  rpcServer: RpcServer;
  metrics: ServerMetrics;
  gateway: GatewayMiddleware;
}

/** Wires repositories → usecases → services → RPC server → gateway. */
export function createApp(config: AppConfig, deps: AppDeps): App {
  const logger = deps.logger ?? new NoOpLogger();
  const metrics = new ServerMetrics();

  const rpcServer = new RpcServer({
    interceptors: buildInterceptors(config, {
      metrics,
      clock: deps.clock,
      generateRequestId: deps.generateRequestId,
    }),
  });
  rpcServer
    .register(createHelloService(new HelloUsecase()))
    .register(createUserService(new UserUsecase(deps.users)));

  const gateway = createGateway({
    rpcServer,
    metrics,
    logger,
    service: { serviceName: config.appName, version: config.appVersion },
  });

  return { rpcServer, metrics, gateway };
}
