import type { MiddlewareHandler } from 'hono';
import { createChildLogger } from '@searchwise/shared/src/logger.js';
import type { AppEnv } from '../types.js';

const log = createChildLogger('api:request');

export const requestLogger: MiddlewareHandler<AppEnv> = async (c, next) => {
  const start = Date.now();
  await next();
  const duration = Date.now() - start;
  log.info(
    {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      duration,
      requestId: c.get('requestId'),
    },
    'Request completed',
  );
};
