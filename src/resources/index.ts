import { ResourceTemplate } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Variables } from '@modelcontextprotocol/sdk/shared/uriTemplate.js';
import { McpError } from '@modelcontextprotocol/sdk/types.js';

import type { ChatSession } from '../engine/chat-session.js';
import type { SessionStore } from '../engine/session-store.js';
import { SESSIONS_URI, sessionUri } from '../engine/session-store.js';

import { formatSessionMarkdown, formatStackTree } from '../lib/formatting.js';
import { loadInstructions } from '../lib/instructions.js';
import { collectPrefixMatches } from '../lib/validators.js';
import type { ToolRegistry } from '../registry/registry.js';

const TOOLS_URI = 'toolstack://tools';
const MAX_COMPLETION_RESULTS = 20;

export interface ResourceDeps {
  store: SessionStore;
  registry: ToolRegistry;
}

function extractStringVariable(
  variables: Variables,
  name: string,
  uri: URL
): string {
  const raw = variables[name];
  const value = Array.isArray(raw) ? raw[0] : raw;
  if (typeof value !== 'string' || value.length === 0) {
    throw new McpError(-32602, `Invalid ${name} in URI: ${uri.toString()}`);
  }
  return value;
}

function resolveSession(
  store: SessionStore,
  sessionId: string,
  uri: URL
): ChatSession {
  const session = store.get(sessionId);
  if (!session) {
    throw new McpError(-32002, `Resource not found: ${uri.toString()}`);
  }
  return session;
}

function serializeJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

function shortSessionId(sessionId: string): string {
  return sessionId.slice(0, 8);
}

export function registerAllResources(
  server: McpServer,
  deps: ResourceDeps
): void {
  const { store, registry } = deps;
  const instructions = loadInstructions();
  const completeSessionIds = (value: string): string[] =>
    collectPrefixMatches(store.listSessionIds(), value, MAX_COMPLETION_RESULTS);

  server.registerResource(
    'server-instructions',
    'internal://instructions',
    {
      title: 'Server Instructions',
      description: 'Usage instructions for the MCP server.',
      mimeType: 'text/markdown',
      annotations: { audience: ['assistant'], priority: 0.8 },
    },
    (uri) => ({
      contents: [
        { uri: uri.href, mimeType: 'text/markdown', text: instructions },
      ],
    })
  );

  server.registerResource(
    'toolstack.tools',
    TOOLS_URI,
    {
      title: 'Tool Catalog',
      description: 'Tools the engine can run, with their parameters in collection order.',
      mimeType: 'application/json',
      annotations: { audience: ['assistant', 'user'], priority: 0.6 },
    },
    (uri) => ({
      contents: [
        {
          uri: uri.href,
          mimeType: 'application/json',
          text: serializeJson({ tools: registry.catalog() }),
        },
      ],
    })
  );

  server.registerResource(
    'toolstack.sessions',
    SESSIONS_URI,
    {
      title: 'Chat Sessions',
      description:
        'Active chat sessions with their engine state. Updated as sessions progress.',
      mimeType: 'application/json',
      annotations: { audience: ['assistant', 'user'], priority: 0.7 },
    },
    () => {
      const sessions = store.listSummaries().map((summary) => ({
        ...summary,
        expiresAt: store.getExpiresAt(summary.id),
      }));
      return {
        contents: [
          {
            uri: SESSIONS_URI,
            mimeType: 'application/json',
            text: serializeJson({
              ttlMs: store.getTtlMs(),
              totalSessions: sessions.length,
              sessions,
            }),
          },
        ],
      };
    }
  );

  server.registerResource(
    'toolstack.session',
    new ResourceTemplate(`${SESSIONS_URI}/{sessionId}`, {
      list: () => ({
        resources: store.listSummaries().map((summary) => ({
          uri: sessionUri(summary.id),
          name: `session-${shortSessionId(summary.id)}`,
          title: `Chat Session ${shortSessionId(summary.id)}`,
          description: `${summary.state} session, stack depth ${String(summary.depth)}.`,
          mimeType: 'application/json',
          annotations: {
            lastModified: new Date(summary.updatedAt).toISOString(),
          },
        })),
      }),
      complete: {
        sessionId: completeSessionIds,
      },
    }),
    {
      title: 'Chat Session',
      description:
        'Status snapshot, rendered tool stack and recent history of one session.',
      mimeType: 'application/json',
    },
    (uri, variables) => {
      const sessionId = extractStringVariable(variables, 'sessionId', uri);
      const session = resolveSession(store, sessionId, uri);
      const status = session.status();
      return {
        contents: [
          {
            uri: uri.toString(),
            mimeType: 'application/json',
            text: serializeJson({
              summary: session.summary(),
              status,
              stackTree: formatStackTree(status.frames),
              history: session.history(),
              expiresAt: store.getExpiresAt(sessionId),
            }),
          },
        ],
      };
    }
  );

  server.registerResource(
    'toolstack.transcript',
    new ResourceTemplate(`${SESSIONS_URI}/{sessionId}/transcript.md`, {
      list: undefined,
      complete: {
        sessionId: completeSessionIds,
      },
    }),
    {
      title: 'Session Transcript',
      description: 'Markdown rendering of a session: state, tool stack and history.',
      mimeType: 'text/markdown',
    },
    (uri, variables) => {
      const sessionId = extractStringVariable(variables, 'sessionId', uri);
      const session = resolveSession(store, sessionId, uri);
      return {
        contents: [
          {
            uri: uri.toString(),
            mimeType: 'text/markdown',
            text: formatSessionMarkdown(
              sessionId,
              session.status(),
              session.history()
            ),
            annotations: {
              lastModified: new Date(session.updatedAt).toISOString(),
            },
          },
        ],
      };
    }
  );
}
