export { McpBridge, createToolCaller } from './mcp-client.js';
export type { McpBridgeConfig } from './mcp-client.js';
