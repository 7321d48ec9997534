import { randomUUID } from 'node:crypto';
import type { MiddlewareHandler } from 'hono';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
  }
}

export const REQUEST_ID_HEADER = 'X-Request-ID';

const SAFE_REQUEST_ID = /^[A-Za-z0-9._:-]{1,64}$/;

/**
 * Accepts a caller-supplied request id when it is short and printable,
 * otherwise mints one. The id is echoed on the response and exposed to
 * handlers as `c.get('requestId')`.
 */
export function requestId(generate: () => string = randomUUID): MiddlewareHandler {
  return async (c, next) => {
    const supplied = c.req.header(REQUEST_ID_HEADER)?.trim();
    const id = supplied && SAFE_REQUEST_ID.test(supplied) ? supplied : generate();
    c.set('requestId', id);
    c.header(REQUEST_ID_HEADER, id);
    await next();
  };
}
