#!/usr/bin/env node
/**
 * Context Bundle MCP Server
 *
 * Supports both stdio (for local assistants) and HTTP transport.
 *
 * Usage:
 *   node dist/mcp-server/src/index.js              # stdio mode (default)
 *   node dist/mcp-server/src/index.js --http       # HTTP mode on port 3100
 *   node dist/mcp-server/src/index.js --http 8080  # HTTP mode on custom port
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import express from 'express';
import { randomUUID } from 'crypto';
import { createServer, SessionRegistry } from './server.js';

const DEFAULT_HTTP_PORT = 3100;

async function main() {
  const args = process.argv.slice(2);
  const httpMode = args.includes('--http');
  const portArg = args.find((_, i, arr) => arr[i - 1] === '--http' && !isNaN(parseInt(_, 10)));
  const port = portArg ? parseInt(portArg, 10) : DEFAULT_HTTP_PORT;

  const cleanup = () => {
    console.error('Shutting down...');
    process.exit(0);
  };

  process.on('SIGINT', cleanup);
  process.on('SIGTERM', cleanup);

  if (httpMode) {
    const app = express();
    app.use(express.json());
    const sessions = new SessionRegistry();

    app.post('/mcp', async (req, res) => {
      const header = req.headers['mcp-session-id'];
      const sessionId = typeof header === 'string' ? header : randomUUID();

      try {
        const transport = await sessions.open(sessionId);
        await transport.handleRequest(req, res, req.body);
      } catch (error) {
        console.error(`❌ MCP request failed for session ${sessionId}:`, error);
        if (!res.headersSent) {
          res.status(500).json({
            jsonrpc: '2.0',
            error: { code: -32603, message: 'Internal server error' },
            id: null,
          });
        }
      }
    });

    // Health check endpoint
    app.get('/health', (_, res) => {
      res.json({ status: 'ok', mode: 'http', port, sessions: sessions.size });
    });

    app.listen(port, () => {
      console.error(`MCP Server running in HTTP mode on port ${port}`);
      console.error(`Health check: http://localhost:${port}/health`);
    });
  } else {
    console.error('MCP Server running in stdio mode');
    const server = createServer();
    const transport = new StdioServerTransport();
    await server.connect(transport);
  }
}

main().catch((error) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
