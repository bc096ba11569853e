import { randomUUID } from 'node:crypto';
import type { HttpBindings } from '@hono/node-server';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';
import { toFetchResponse, toReqRes } from 'fetch-to-node';
import { type Context, Hono } from 'hono';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface McpSession {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

const MCP_SESSION_HEADER = 'Mcp-Session-Id';

function jsonRpcError(c: Context, code: number, message: string, status: 400 | 404 | 405 | 500) {
  return c.json({ jsonrpc: '2.0', error: { code, message }, id: null }, status);
}

export function buildMcpRoutes(params: {
  createServer: () => McpServer;
  sessions: Map<string, McpSession>;
}) {
  const { createServer, sessions } = params;
  const app = new Hono<{ Bindings: HttpBindings }>();

  async function openSession(): Promise<StreamableHTTPServerTransport> {
    const server = createServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (sid: string) => {
        sessions.set(sid, { server, transport });
        void logger.info('mcp', { message: 'Session initialized', sessionId: sid });
      },
    });

    transport.onclose = () => {
      const sid = transport.sessionId;
      if (sid && sessions.delete(sid)) {
        void logger.info('mcp', { message: 'Session closed', sessionId: sid });
      }
    };
    transport.onerror = (error) => {
      void logger.error('transport', {
        message: 'Transport error',
        error: error.message,
      });
    };

    await server.connect(transport);
    return transport;
  }

  app.post('/', async (c) => {
    const { req, res } = toReqRes(c.req.raw);

    try {
      const sessionIdHeader = c.req.header(MCP_SESSION_HEADER);
      let body: unknown;
      try {
        body = await c.req.json();
      } catch {
        return jsonRpcError(c, -32700, 'Parse error', 400);
      }

      const isInitialize = isInitializeRequest(body);

      void logger.debug('mcp_request', {
        message: 'Processing MCP request',
        sessionId: sessionIdHeader,
        isInitialize,
      });

      let transport = sessionIdHeader ? sessions.get(sessionIdHeader)?.transport : undefined;
      if (!transport) {
        if (!isInitialize) {
          return sessionIdHeader
            ? jsonRpcError(c, -32001, 'Session not found', 404)
            : jsonRpcError(c, -32000, 'Bad Request: no valid session ID provided', 400);
        }
        transport = await openSession();
      }

      await transport.handleRequest(req, res, body);
      return toFetchResponse(res);
    } catch (error) {
      void logger.error('mcp_request', {
        message: 'POST /mcp failed',
        error: errorMessage(error),
      });
      return jsonRpcError(c, -32603, 'Internal server error', 500);
    }
  });

  const withSession = async (c: Context<{ Bindings: HttpBindings }>, closeAfter: boolean) => {
    const { req, res } = toReqRes(c.req.raw);
    const sessionIdHeader = c.req.header(MCP_SESSION_HEADER);

    if (!sessionIdHeader) {
      return jsonRpcError(c, -32000, 'Method not allowed - no session', 405);
    }
    const session = sessions.get(sessionIdHeader);
    if (!session) {
      void logger.warning('mcp_request', {
        message: `${c.req.method} request rejected - invalid session`,
        sessionId: sessionIdHeader,
      });
      return c.text('Invalid session', 404);
    }

    try {
      await session.transport.handleRequest(req, res);
      if (closeAfter) {
        sessions.delete(sessionIdHeader);
        await session.server.close();
        void logger.info('mcp_request', {
          message: 'DELETE request completed - session cleaned up',
          sessionId: sessionIdHeader,
          remainingSessions: sessions.size,
        });
      }
      return toFetchResponse(res);
    } catch (error) {
      void logger.error('mcp_request', {
        message: `${c.req.method} request error`,
        sessionId: sessionIdHeader,
        error: errorMessage(error),
      });
      return jsonRpcError(c, -32603, 'Internal server error', 500);
    }
  };

  app.get('/', (c) => withSession(c, false));
  app.delete('/', (c) => withSession(c, true));

  return app;
}
