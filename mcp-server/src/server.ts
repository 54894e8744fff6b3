/**
 * MCP Server definition for Context Bundle
 *
 * Exposes one tool, build_context, that returns the markdown bundle for a
 * set of files.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { z } from 'zod';
import { buildContextBundle } from '../../src/bundle/bundle-builder.js';
import { isContextBundleError } from '../../src/lib/errors.js';

export const buildContextParams = {
  files: z.array(z.string()).min(1).describe('Primary files to include in full'),
  roots: z.array(z.string()).optional().describe("Import roots, highest priority first (default: each importing file's directory)"),
  max_depth: z.number().int().min(0).optional().describe('Dependency rounds after direct imports (default: unlimited)'),
  sig_tokens: z.number().int().min(0).optional().describe('Token budget for dependency signatures'),
  sig_only: z.boolean().optional().describe('Render every file as signatures only'),
  sig_detailed: z.boolean().optional().describe('Keep decorators, docstrings and comments in signatures'),
  base_dir: z.string().optional().describe('Directory relative paths resolve against (default: server cwd)'),
};

const BuildContextInput = z.object(buildContextParams);
export type BuildContextInput = z.infer<typeof BuildContextInput>;

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

/**
 * Run the build_context tool.
 */
export function handleBuildContext(input: BuildContextInput): ToolResult {
  try {
    const bundle = buildContextBundle({
      files: input.files,
      roots: input.roots,
      maxDepth: input.max_depth,
      sigTokens: input.sig_tokens,
      sigOnly: input.sig_only,
      sigDetailed: input.sig_detailed,
      baseDir: input.base_dir,
    });
    return { content: [{ type: 'text', text: bundle.markdown }] };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const code = isContextBundleError(error) ? error.code : 'UNEXPECTED';
    return {
      content: [{ type: 'text', text: JSON.stringify({ success: false, code, error: message }) }],
      isError: true,
    };
  }
}

export function createServer(): McpServer {
  const server = new McpServer({
    name: 'context-bundle',
    version: '0.1.0',
  });

  // Tool: Build a context bundle
  server.tool('build_context', buildContextParams, async (input) => handleBuildContext(input));

  return server;
}

interface McpSession {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

/**
 * HTTP sessions by id. An McpServer holds a single transport, so each
 * session gets its own server; closed sessions are dropped.
 */
export class SessionRegistry {
  private sessions = new Map<string, McpSession>();

  get size(): number {
    return this.sessions.size;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  async open(sessionId: string): Promise<StreamableHTTPServerTransport> {
    const existing = this.sessions.get(sessionId);
    if (existing) return existing.transport;

    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => sessionId,
    });
    // Set before connect so the server chains its own close handler after it
    transport.onclose = () => {
      this.sessions.delete(sessionId);
    };

    const server = createServer();
    this.sessions.set(sessionId, { server, transport });
    try {
      await server.connect(transport);
    } catch (error) {
      this.sessions.delete(sessionId);
      throw error;
    }
    return transport;
  }
}
