import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequest,
  CallToolResultSchema,
  ListToolsRequest,
  ListToolsResultSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { ToolCallError } from '../../core/errors/WorkflowErrors.js';
import { ITool, ToolFunctionDefinition } from '../../core/interfaces/ITool.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('McpToolset');

const ToolArgumentsSchema = z.record(z.unknown());

export type McpClientInfo = {
  name: string;
  version: string;
};

const DEFAULT_CLIENT_INFO: McpClientInfo = {
  name: 'tool-relay',
  version: '1.0.0',
};

/**
 * Tool served by an MCP server. Calls go through `tools/call`; text content
 * blocks are joined with newlines to form the result.
 */
export class McpTool implements ITool {
  readonly name: string;
  readonly description: string;
  readonly parametersSchema: Record<string, unknown>;

  constructor(
    private readonly client: Client,
    definition: { name: string; description?: string; inputSchema: Record<string, unknown> }
  ) {
    this.name = definition.name;
    this.description = definition.description ?? '';
    this.parametersSchema = definition.inputSchema;
  }

  async run(args: unknown): Promise<string> {
    const parsed = ToolArgumentsSchema.safeParse(args ?? {});
    if (!parsed.success) {
      throw new ToolCallError(this.name, 'arguments must be a JSON object', { cause: parsed.error });
    }

    const request: CallToolRequest = {
      method: 'tools/call',
      params: {
        name: this.name,
        arguments: parsed.data,
      },
    };

    const result = await this.client.request(request, CallToolResultSchema).catch((error: unknown) => {
      throw new ToolCallError(this.name, error instanceof Error ? error.message : String(error), {
        cause: error,
      });
    });

    const text = result.content.flatMap((block) => (block.type === 'text' ? [block.text] : [])).join('\n');
    if (result.isError) {
      throw new ToolCallError(this.name, text || 'server reported an error');
    }
    return text;
  }

  toFunctionDefinition(): ToolFunctionDefinition {
    return {
      type: 'function',
      function: {
        name: this.name,
        description: this.description,
        parameters: this.parametersSchema,
      },
    };
  }
}

/**
 * Tools of one MCP server, exposed as workflow tools.
 *
 * Lifecycle:
 *   1. connect() (or connectStdio()) performs the MCP handshake
 *   2. loadTools() lists the server's tools
 *   3. close() shuts the transport down
 */
export class McpToolset {
  private constructor(private readonly client: Client) {}

  static async connect(transport: Transport, clientInfo: McpClientInfo = DEFAULT_CLIENT_INFO): Promise<McpToolset> {
    const client = new Client(clientInfo, { capabilities: {} });
    client.onerror = (error) => {
      logger.error('MCP client error', error);
    };

    await client.connect(transport);
    logger.debug(`Connected as ${clientInfo.name}@${clientInfo.version}`);
    return new McpToolset(client);
  }

  /**
   * Spawn an MCP server as a child process and talk to it over stdio
   */
  static connectStdio(command: string, args: string[] = [], clientInfo?: McpClientInfo): Promise<McpToolset> {
    logger.info(`Starting MCP server: ${[command, ...args].join(' ')}`);
    return McpToolset.connect(new StdioClientTransport({ command, args }), clientInfo);
  }

  async loadTools(): Promise<McpTool[]> {
    const tools: McpTool[] = [];
    let cursor: string | undefined;

    do {
      const request: ListToolsRequest = {
        method: 'tools/list',
        params: cursor ? { cursor } : {},
      };
      const result = await this.client.request(request, ListToolsResultSchema);
      for (const tool of result.tools) {
        tools.push(
          new McpTool(this.client, {
            name: tool.name,
            description: tool.description,
            inputSchema: { ...tool.inputSchema },
          })
        );
      }
      cursor = result.nextCursor;
    } while (cursor);

    logger.debug(`Loaded ${tools.length} tool(s): ${tools.map((tool) => tool.name).join(', ')}`);
    return tools;
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
