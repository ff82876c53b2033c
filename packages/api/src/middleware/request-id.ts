import { randomUUID } from 'node:crypto';
import type { MiddlewareHandler } from 'hono';
import type { AppEnv } from '../types.js';

const REQUEST_ID_HEADER = 'X-Request-Id';
const MAX_INCOMING_ID_LENGTH = 128;

/** Reuses a caller-supplied request id when it looks sane, otherwise mints one. */
export const requestId: MiddlewareHandler<AppEnv> = async (c, next) => {
  const incoming = c.req.header(REQUEST_ID_HEADER);
  const id =
    incoming && incoming.length <= MAX_INCOMING_ID_LENGTH && /^[\w.-]+$/.test(incoming)
      ? incoming
      : randomUUID();

  c.set('requestId', id);
  c.header(REQUEST_ID_HEADER, id);
  await next();
};
