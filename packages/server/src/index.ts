export { createApp } from './app.js';
export type { App, AppDeps } from './app.js';
export { loadConfig } from './config.js';
export type { AppConfig, Env } from './config.js';
export { ServerMetrics } from './metrics.js';
export * from './interceptors/index.js';
export { RpcServer } from './rpc/rpc-server.js';
export type { RpcServerOptions, ServiceDefinition } from './rpc/rpc-server.js';
export {
  createHelloService,
  GetHelloRequestSchema,
  HELLO_SERVICE_NAME,
} from './services/hello/hello-service.js';
export type {
  GetHelloRequest,
  GetHelloResponse,
} from './services/hello/hello-service.js';
export { HelloUsecase } from './services/hello/hello-usecase.js';
export {
  createUserService,
  USER_SERVICE_NAME,
} from './services/user/user-service.js';
export type {
  ListUsersResponse,
  UserResponse,
} from './services/user/user-service.js';
export * from './services/user/user-schemas.js';
export { UserUsecase } from './services/user/user-usecase.js';
export { parseRequest } from './services/validation.js';
export { createGateway } from './server/gateway.js';
export type { GatewayMiddleware, GatewayOptions } from './server/gateway.js';
export { GATEWAY_ROUTES } from './server/routes.js';
export type { GatewayRoute, HttpMethod } from './server/routes.js';
export { buildSwaggerDocument } from './server/openapi.js';
export type { SwaggerDocument } from './server/openapi.js';
export { startServer } from './server/standalone.js';
export type { RunningServer, StartServerOptions } from './server/standalone.js';
