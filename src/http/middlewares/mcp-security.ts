import type { HttpBindings } from '@hono/node-server';
import type { MiddlewareHandler } from 'hono';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { validateOrigin, validateProtocolVersion } from '../../utils/security.js';

export function createMcpSecurityMiddleware(protocolVersion: string): MiddlewareHandler<{
  Bindings: HttpBindings;
}> {
  return async (c, next) => {
    try {
      validateOrigin(c.req.raw.headers);
      validateProtocolVersion(c.req.raw.headers, protocolVersion);
    } catch (error) {
      void logger.warning('mcp_security', {
        message: 'Request rejected',
        error: errorMessage(error),
      });
      return c.json(
        {
          jsonrpc: '2.0',
          error: { code: -32000, message: errorMessage(error) },
          id: null,
        },
        403,
      );
    }
    await next();
  };
}
