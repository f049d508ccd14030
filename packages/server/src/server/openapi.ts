import type { GatewayRoute } from './routes.js';

interface SwaggerParameter {
  name: string;
  in: 'path' | 'query' | 'body';
  required: boolean;
  type?: string;
  format?: string;
  description?: string;
  schema?: { type: 'object' };
}

interface SwaggerOperation {
  operationId: string;
  summary: string;
  tags: Array<string>;
  parameters: Array<SwaggerParameter>;
  responses: Record<string, { description: string; schema?: { $ref: string } }>;
}

export interface SwaggerDocument {
  swagger: '2.0';
  info: { title: string; version: string };
  consumes: Array<string>;
  produces: Array<string>;
  paths: Record<string, Record<string, SwaggerOperation>>;
  definitions: Record<string, unknown>;
}

export interface SwaggerInfo {
  title: string;
  version: string;
}

/** `/v1/users/:id` → `/v1/users/{id}` */
function toSwaggerPath(path: string): string {
  return path.replace(/:([A-Za-z_]\w*)/g, '{$1}');
}

function pathParameterNames(path: string): Array<string> {
  return Array.from(path.matchAll(/:([A-Za-z_]\w*)/g), (m) => m[1] ?? '');
}

function operationFor(route: GatewayRoute): SwaggerOperation {
  const [, service = '', method = ''] = route.rpc.split('/');
  const serviceName = service.split('.').pop() ?? service;

  const parameters: Array<SwaggerParameter> = pathParameterNames(
    route.path,
  ).map((name): SwaggerParameter =>
    name === 'id'
      ? { name, in: 'path', required: true, type: 'string', format: 'int64' }
      : { name, in: 'path', required: true, type: 'string' },
  );
  for (const query of route.query ?? []) {
    parameters.push({
      name: query.name,
      in: 'query',
      required: false,
      type: query.type,
      description: query.description,
    });
  }
  if (route.body) {
    parameters.push({
      name: 'body',
      in: 'body',
      required: true,
      schema: { type: 'object' },
    });
  }

  return {
    operationId: `${serviceName}_${method}`,
    summary: route.summary,
    tags: [serviceName],
    parameters,
    responses: {
      '200': { description: 'A successful response.' },
      default: {
        description: 'An unexpected error response.',
        schema: { $ref: '#/definitions/Error' },
      },
    },
  };
}

/** Swagger 2.0 description of the gateway's REST routes. */
export function buildSwaggerDocument(
  routes: ReadonlyArray<GatewayRoute>,
  info: SwaggerInfo,
): SwaggerDocument {
  const paths: SwaggerDocument['paths'] = {};
  for (const route of routes) {
    const path = toSwaggerPath(route.path);
    paths[path] = {
      ...paths[path],
      [route.method.toLowerCase()]: operationFor(route),
    };
  }

  return {
    swagger: '2.0',
    info: { title: info.title, version: info.version },
    consumes: ['application/json'],
    produces: ['application/json'],
    paths,
    definitions: {
      Error: {
        type: 'object',
        properties: {
          error: { type: 'string' },
          code: { type: 'string' },
        },
      },
    },
  };
}
