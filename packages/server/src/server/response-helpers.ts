import type { ServerResponse } from 'http';
import { AppError } from '@callgate/core';

export function sendJson(
  res: ServerResponse,
  data: unknown,
  status: number = 200,
): void {
  const body = JSON.stringify(data);
  res.writeHead(status, {
    'Content-Type': 'application/json',
    'Content-Length': Buffer.byteLength(body),
    'Cache-Control': 'no-store',
  });
  res.end(body);
}

export function sendText(
  res: ServerResponse,
  body: string,
  contentType: string,
  status: number = 200,
): void {
  res.writeHead(status, {
    'Content-Type': contentType,
    'Content-Length': Buffer.byteLength(body),
    'Cache-Control': 'no-store',
  });
  res.end(body);
}

/** `{ error, code }` with the status the error's code maps to. */
export function sendAppError(res: ServerResponse, err: AppError): void {
  sendJson(res, { error: err.message, code: err.publicCode }, err.httpStatus);
}

export function sendNotFound(res: ServerResponse): void {
  sendAppError(res, new AppError('NOT_FOUND', 'Not found'));
}

export function sendMethodNotAllowed(
  res: ServerResponse,
  allowed: ReadonlyArray<string>,
): void {
  res.setHeader('Allow', allowed.join(', '));
  sendJson(res, { error: 'Method not allowed' }, 405);
}
