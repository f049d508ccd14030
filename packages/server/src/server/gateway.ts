import type { IncomingMessage, ServerResponse } from 'http';
import {
  createCallContext,
  toAppError,
  type StructuredLogger,
} from '@callgate/core';
import { REQUEST_ID_HEADER } from '../interceptors/request-id.js';
import type { ServerMetrics } from '../metrics.js';
import type { RpcServer } from '../rpc/rpc-server.js';
import {
  handleDocs,
  handleSwaggerJson,
  SWAGGER_JSON_PATH,
} from './handlers/docs.js';
import { handleHealth, type ServiceInfo } from './handlers/health.js';
import { handleMetrics } from './handlers/metrics.js';
import { buildSwaggerDocument } from './openapi.js';
import {
  headersToMetadata,
  matchPath,
  parseUrl,
  readJsonBody,
} from './request-helpers.js';
import {
  sendAppError,
  sendJson,
  sendMethodNotAllowed,
  sendNotFound,
} from './response-helpers.js';
import { GATEWAY_ROUTES, type GatewayRoute } from './routes.js';

export type GatewayMiddleware = (
  req: IncomingMessage,
  res: ServerResponse,
) => void;

export interface GatewayOptions {
  rpcServer: RpcServer;
  metrics: ServerMetrics;
  service: ServiceInfo;
  logger: StructuredLogger;
  routes?: ReadonlyArray<GatewayRoute>;
}

/**
 * HTTP front door. REST routes and `POST /<package>.<Service>/<Method>` both
 * become calls on the {@link RpcServer}, so they pass through its
 * interceptor chain.
 */
export function createGateway(options: GatewayOptions): GatewayMiddleware {
  const { rpcServer, metrics, service, logger } = options;
  const routes = options.routes ?? GATEWAY_ROUTES;
  const swagger = buildSwaggerDocument(routes, {
    title: service.serviceName,
    version: service.version,
  });

  const builtIns = new Map<string, (res: ServerResponse) => void>([
    ['/health', (res) => handleHealth(res, service)],
    ['/metrics', (res) => handleMetrics(res, metrics)],
    [SWAGGER_JSON_PATH, (res) => handleSwaggerJson(res, swagger)],
    ['/docs', (res) => handleDocs(res, service.serviceName)],
  ]);

  async function invoke(
    req: IncomingMessage,
    res: ServerResponse,
    fullMethod: string,
    request: unknown,
  ): Promise<void> {
    const ctx = createCallContext({
      metadata: headersToMetadata(req.headers),
      peer: req.socket.remoteAddress,
      logger,
    });

    let response: unknown;
    try {
      response = await rpcServer.call(fullMethod, ctx, request);
    } catch (err) {
      for (const [name, value] of ctx.responseMetadata) {
        res.setHeader(name, value);
      }
      sendAppError(res, toAppError(err));
      return;
    }

    for (const [name, value] of ctx.responseMetadata) {
      res.setHeader(name, value);
    }
    sendJson(res, response ?? {});
  }

  async function route(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const { pathname, query } = parseUrl(req);
    const method = req.method?.toUpperCase() ?? 'GET';

    const requestId = req.headers[REQUEST_ID_HEADER];
    if (typeof requestId === 'string' && requestId !== '') {
      res.setHeader(REQUEST_ID_HEADER, requestId);
    }

    const builtIn = builtIns.get(pathname);
    if (builtIn) {
      if (method === 'GET') builtIn(res);
      else sendMethodNotAllowed(res, ['GET']);
      return;
    }

    if (rpcServer.hasMethod(pathname)) {
      if (method !== 'POST') {
        sendMethodNotAllowed(res, ['POST']);
        return;
      }
      await invoke(req, res, pathname, await readJsonBody(req));
      return;
    }

    const matches = routes.flatMap((candidate) => {
      const params = matchPath(candidate.path, pathname);
      return params ? [{ route: candidate, params }] : [];
    });
    if (matches.length === 0) {
      sendNotFound(res);
      return;
    }

    const match = matches.find((m) => m.route.method === method);
    if (!match) {
      sendMethodNotAllowed(
        res,
        matches.map((m) => m.route.method),
      );
      return;
    }

    const body = match.route.body ? await readJsonBody(req) : undefined;
    const request = match.route.toRequest({ params: match.params, query, body });
    await invoke(req, res, match.route.rpc, request);
  }

  return (req, res) => {
    route(req, res).catch((err: unknown) => {
      const appError = toAppError(err);
      if (appError.code === 'INTERNAL') {
        logger.error('gateway request failed', { error: err });
      }
      if (res.headersSent) {
        res.end();
        return;
      }
      sendAppError(res, appError);
    });
  };
}
