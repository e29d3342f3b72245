// MCP Client Bridge — connects tool workers to an upstream analysis MCP server
// Tool results arrive as text content and are decoded back into JSON where possible

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import type { ToolCaller } from '../agents/tool-worker.js';

export interface McpBridgeConfig {
  /** Path to the analysis server entry point */
  serverPath: string;
  /** Command to launch the server (default: 'node') */
  command?: string;
  /** Extra arguments placed before the server path */
  args?: string[];
}

export class McpBridge {
  private client: Client;
  private transport: StdioClientTransport | null = null;
  private connected = false;

  constructor() {
    this.client = new Client(
      { name: 'consensus-desk', version: '1.0.0' },
      { capabilities: {} },
    );
  }

  async connect(config: McpBridgeConfig): Promise<void> {
    if (this.connected) return;

    this.transport = new StdioClientTransport({
      command: config.command ?? 'node',
      args: [...(config.args ?? []), config.serverPath],
    });

    await this.client.connect(this.transport);
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    if (!this.connected) return;
    await this.client.close();
    this.connected = false;
  }

  async listTools(): Promise<Array<{ name: string; description?: string }>> {
    if (!this.connected) throw new Error('MCP bridge not connected');
    const result = await this.client.listTools();
    return result.tools.map(t => ({ name: t.name, description: t.description }));
  }

  async callTool(toolName: string, params: Record<string, unknown>): Promise<unknown> {
    if (!this.connected) throw new Error('MCP bridge not connected');

    const result = await this.client.callTool({ name: toolName, arguments: params });
    if (result.isError) {
      throw new Error(`Tool ${toolName} failed: ${extractText(result.content) ?? 'unknown error'}`);
    }

    const text = extractText(result.content);
    if (text !== undefined) {
      try {
        return JSON.parse(text);
      } catch {
        return text;
      }
    }

    return result;
  }

  get isConnected(): boolean {
    return this.connected;
  }
}

function extractText(content: unknown): string | undefined {
  if (!Array.isArray(content)) return undefined;
  for (const item of content) {
    if (typeof item === 'object' && item !== null && 'type' in item && item.type === 'text'
      && 'text' in item && typeof item.text === 'string') {
      return item.text;
    }
  }
  return undefined;
}

/** Connect a bridge and return the callTool function workers use. */
export async function createToolCaller(config: McpBridgeConfig): Promise<{
  callTool: ToolCaller;
  bridge: McpBridge;
}> {
  const bridge = new McpBridge();
  await bridge.connect(config);
  return {
    callTool: (name, params) => bridge.callTool(name, params),
    bridge,
  };
}
