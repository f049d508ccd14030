import type { IncomingHttpHeaders, IncomingMessage } from 'http';
import { AppError } from '@callgate/core';

export function parseUrl(req: Pick<IncomingMessage, 'url'>): {
  pathname: string;
  query: URLSearchParams;
} {
  const url = new URL(req.url ?? '/', 'http://localhost');
  return { pathname: url.pathname, query: url.searchParams };
}

/**
 * Matches `pathname` against a pattern such as `/v1/users/:id` and returns
 * the decoded parameters, or undefined when it does not match.
 */
export function matchPath(
  pattern: string,
  pathname: string,
): Record<string, string> | undefined {
  const patternParts = pattern.split('/');
  const pathParts = pathname.split('/');

  if (patternParts.length !== pathParts.length) return undefined;

  const params: Record<string, string> = {};
  for (const [i, part] of patternParts.entries()) {
    const actual = pathParts[i] ?? '';
    if (part.startsWith(':')) {
      if (actual === '') return undefined;
      const value = decodeSegment(actual);
      if (value === undefined) return undefined;
      params[part.slice(1)] = value;
    } else if (part !== actual) {
      return undefined;
    }
  }
  return params;
}

function decodeSegment(segment: string): string | undefined {
  try {
    return decodeURIComponent(segment);
  } catch (err) {
    if (err instanceof URIError) return undefined;
    throw err;
  }
}

/** Lower-cased header map; repeated headers are joined with `, `. */
export function headersToMetadata(
  headers: IncomingHttpHeaders,
): Record<string, string> {
  const metadata: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    metadata[name.toLowerCase()] = Array.isArray(value)
      ? value.join(', ')
      : value;
  }
  return metadata;
}

export const MAX_BODY_SIZE = 1024 * 1024; // 1 MiB

/**
 * Reads and parses a JSON body. An empty body reads as `{}`.
 */
export async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Array<Buffer> = [];
    let size = 0;
    let tooLarge = false;

    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_SIZE) {
        tooLarge = true;
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      if (tooLarge) {
        reject(new AppError('INVALID_ARGUMENT', 'request body too large'));
        return;
      }
      const body = Buffer.concat(chunks).toString('utf-8');
      if (body.trim() === '') {
        resolve({});
        return;
      }
      try {
        resolve(JSON.parse(body));
      } catch (err) {
        reject(
          new AppError('INVALID_ARGUMENT', 'invalid JSON body', { cause: err }),
        );
      }
    });
    req.on('error', reject);
  });
}
