import { HELLO_SERVICE_NAME } from '../services/hello/hello-service.js';
import { USER_SERVICE_NAME } from '../services/user/user-service.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface RouteInput {
  params: Record<string, string>;
  query: URLSearchParams;
  body: unknown;
}

export interface QueryParameter {
  name: string;
  type: 'integer' | 'string';
  description: string;
}

export interface GatewayRoute {
  method: HttpMethod;
  /** Path pattern with `:name` parameters. */
  path: string;
  /** Full method name the route invokes. */
  rpc: string;
  summary: string;
  /** Whether the request carries a JSON body. */
  body: boolean;
  query?: ReadonlyArray<QueryParameter>;
  toRequest(input: RouteInput): unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Path and query values are strings; the RPC messages want numbers. */
function toNumber(value: string): number {
  return value.trim() === '' ? NaN : Number(value);
}

function optionalNumber(query: URLSearchParams, name: string): number | undefined {
  const value = query.get(name);
  return value === null ? undefined : toNumber(value);
}

export const GATEWAY_ROUTES: ReadonlyArray<GatewayRoute> = [
  {
    method: 'GET',
    path: '/v1/hello/:name',
    rpc: `/${HELLO_SERVICE_NAME}/GetHello`,
    summary: 'Returns a greeting for the given name',
    body: false,
    toRequest: ({ params }) => ({ name: params.name }),
  },
  {
    method: 'POST',
    path: '/v1/users',
    rpc: `/${USER_SERVICE_NAME}/CreateUser`,
    summary: 'Creates a user',
    body: true,
    toRequest: ({ body }) => body,
  },
  {
    method: 'GET',
    path: '/v1/users',
    rpc: `/${USER_SERVICE_NAME}/ListUsers`,
    summary: 'Lists users, ordered by id',
    body: false,
    query: [
      { name: 'page', type: 'integer', description: 'Page number, from 1' },
      { name: 'limit', type: 'integer', description: 'Page size, 1 to 100' },
    ],
    toRequest: ({ query }) => {
      const pagination: Record<string, number> = {};
      const page = optionalNumber(query, 'page');
      const limit = optionalNumber(query, 'limit');
      if (page !== undefined) pagination.page = page;
      if (limit !== undefined) pagination.limit = limit;
      return { pagination };
    },
  },
  {
    method: 'GET',
    path: '/v1/users/:id',
    rpc: `/${USER_SERVICE_NAME}/GetUser`,
    summary: 'Returns one user',
    body: false,
    toRequest: ({ params }) => ({ id: toNumber(params.id ?? '') }),
  },
  {
    method: 'PUT',
    path: '/v1/users/:id',
    rpc: `/${USER_SERVICE_NAME}/UpdateUser`,
    summary: "Replaces a user's name and email",
    body: true,
    toRequest: ({ params, body }) => {
      const user = isRecord(body) && isRecord(body.user) ? body.user : {};
      return { user: { ...user, id: toNumber(params.id ?? '') } };
    },
  },
  {
    method: 'DELETE',
    path: '/v1/users/:id',
    rpc: `/${USER_SERVICE_NAME}/DeleteUser`,
    summary: 'Deletes a user',
    body: false,
    toRequest: ({ params }) => ({ id: toNumber(params.id ?? '') }),
  },
];
