import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import type { ChatToolDeps } from './chat-tools.js';
import { registerChatTools } from './chat-tools.js';

type ToolRegistrar = (server: McpServer, deps: ChatToolDeps) => void;

const TOOL_REGISTRARS: readonly ToolRegistrar[] = [registerChatTools];

export function registerAllTools(server: McpServer, deps: ChatToolDeps): void {
  for (const registerTool of TOOL_REGISTRARS) {
    registerTool(server, deps);
  }
}
