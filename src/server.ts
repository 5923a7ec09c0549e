import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { log } from './logging.js';
import type { SessionContext } from './session.js';
import { createToolRegistry } from './tools/index.js';
import type { ToolRegistry } from './tools/registry.js';

export const SERVER_NAME = 'sheets-mcp-server';

const PackageJsonSchema = z.object({
  name: z.string(),
  version: z.string(),
  description: z.string().optional(),
});

// Resolves to the project root from both src/ and dist/.
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '..', 'package.json');

export const packageJson = PackageJsonSchema.parse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
export const VERSION = packageJson.version;

/**
 * Build an MCP server whose tool calls all run against one session. The
 * session must be fully resolved before the server is connected.
 */
export function createServer(
  session: SessionContext,
  registry: ToolRegistry = createToolRegistry()
): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: registry.list(),
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    log('Handling tool request', { tool: request.params.name });
    return registry.call(request.params.name, request.params.arguments, { session });
  });

  return server;
}
