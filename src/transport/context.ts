/**
 * Context creation for the GraphQL transport.
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { BaseContext } from './types.js';

export interface IncomingRequest {
  readonly headers: Headers;
  readonly method: string;
  readonly url: string;
  readonly remoteAddress?: string;
}

/**
 * Creates a base context from an incoming request.
 * The request id is taken from `X-Request-ID` when the client sent one.
 */
export function createBaseContext(req: IncomingRequest, logger: Logger): BaseContext {
  const id = req.headers.get('x-request-id') ?? randomUUID();

  return {
    request: {
      id,
      headers: req.headers,
      ip: getClientIp(req.headers, req.remoteAddress),
      method: req.method,
      url: req.url,
    },
    logger: logger.child({ requestId: id }),
  };
}

/**
 * Gets the client IP from headers.
 */
function getClientIp(headers: Headers, remoteAddress?: string): string {
  // Check common proxy headers
  const forwarded = headers.get('x-forwarded-for');
  if (forwarded) {
    return forwarded.split(',')[0].trim();
  }

  const realIp = headers.get('x-real-ip');
  if (realIp) {
    return realIp;
  }

  return remoteAddress ?? '0.0.0.0';
}
