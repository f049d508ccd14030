import { describe, it, expect } from 'vitest';
import { buildSwaggerDocument } from './openapi.js';
import { GATEWAY_ROUTES } from './routes.js';

describe('buildSwaggerDocument', () => {
  const doc = buildSwaggerDocument(GATEWAY_ROUTES, {
    title: 'callgate-server',
    version: 'v1.0.0',
  });

  it('should describe every route', () => {
    expect(doc.swagger).toBe('2.0');
    expect(doc.info).toEqual({ title: 'callgate-server', version: 'v1.0.0' });
    expect(Object.keys(doc.paths)).toEqual([
      '/v1/hello/{name}',
      '/v1/users',
      '/v1/users/{id}',
    ]);
    expect(Object.keys(doc.paths['/v1/users'] ?? {})).toEqual(['post', 'get']);
    expect(Object.keys(doc.paths['/v1/users/{id}'] ?? {})).toEqual([
      'get',
      'put',
      'delete',
    ]);
  });

  it('should name operations after the RPC method', () => {
    const op = doc.paths['/v1/hello/{name}']?.get;
    expect(op?.operationId).toBe('HelloService_GetHello');
    expect(op?.tags).toEqual(['HelloService']);
    expect(op?.parameters).toEqual([
      { name: 'name', in: 'path', required: true, type: 'string' },
    ]);
  });

  it('should list query and body parameters', () => {
    const list = doc.paths['/v1/users']?.get;
    expect(list?.parameters.map((p) => `${p.in}:${p.name}`)).toEqual([
      'query:page',
      'query:limit',
    ]);

    const update = doc.paths['/v1/users/{id}']?.put;
    expect(update?.parameters.map((p) => `${p.in}:${p.name}`)).toEqual([
      'path:id',
      'body:body',
    ]);
  });
});
