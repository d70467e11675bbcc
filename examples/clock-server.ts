/**
 * Example MCP stdio server exposing two small tools.
 *
 * Usage:
 *   npm run build
 *   node dist/src/cli.js ask "What time is it in UTC?" --mcp-command "node dist/examples/clock-server.js"
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';

/**
 * Build the server with its tools registered
 */
export function createClockServer(now: () => Date = () => new Date()): McpServer {
  const server = new McpServer({ name: 'clock-server', version: '1.0.0' });

  server.tool(
    'current_time',
    'Current date and time as an ISO 8601 string, optionally shifted by a UTC offset in hours',
    { utcOffsetHours: z.number().min(-12).max(14).optional() },
    async ({ utcOffsetHours }) => {
      const shifted = new Date(now().getTime() + (utcOffsetHours ?? 0) * 3600000);
      return { content: [{ type: 'text', text: shifted.toISOString() }] };
    }
  );

  server.tool(
    'add',
    'Add two numbers',
    { a: z.number(), b: z.number() },
    async ({ a, b }) => ({ content: [{ type: 'text', text: String(a + b) }] })
  );

  return server;
}

async function main() {
  const server = createClockServer();
  await server.connect(new StdioServerTransport());
  console.error('🕒 clock-server running on stdio');
}

if (require.main === module) {
  main().catch((error) => {
    console.error('💥 Fatal error in main():', error);
    process.exit(1);
  });
}
