import { readFileSync } from 'node:fs';

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { LoggingLevel } from '@modelcontextprotocol/sdk/types.js';

import { ChatSession } from './engine/chat-session.js';
import type { Collaborator } from './engine/collaborator.js';
import { SamplingCollaborator } from './engine/collaborator.js';
import type { EngineConfig } from './engine/config.js';
import { loadEngineConfig } from './engine/config.js';
import { engineEvents } from './engine/events.js';
import type {
  DepthExceededPayload,
  WorkflowOutcomePayload,
} from './engine/events.js';
import { SESSIONS_URI, SessionStore } from './engine/session-store.js';

import { getErrorMessage } from './lib/errors.js';
import { BUILTIN_TOOLS } from './registry/builtin.js';
import { ToolRegistry } from './registry/registry.js';

import { registerAllTools } from './tools/index.js';

import { registerAllResources } from './resources/index.js';

const SERVER_NAME = 'toolstack-mcp';
const SERVER_TITLE = 'Toolstack MCP';
const ENGINE_LOGGER = 'toolstack.engine';
const SERVER_LOGGER = 'toolstack.server';
const RESOURCE_LIST_CHANGED_METHOD = 'resources/list_changed';
const RESOURCE_UPDATED_METHOD = 'resources/updated';
const SERVER_DESCRIPTION =
  'Stack-based tool orchestration for conversational tool use.';
const SERVER_INSTRUCTIONS =
  'Chat front-end that selects and runs tools. Use chat_send to talk, chat_confirm to answer confirmations, chat_cancel to abandon a workflow and chat_status to inspect one. Requires client sampling support. Full guide: read internal://instructions.';
const PACKAGE_JSON_URL = new URL('../package.json', import.meta.url);
let cachedVersion: string | undefined;

export interface ServerOptions {
  config?: EngineConfig;
  registry?: ToolRegistry;
  /** Defaults to the connected client's model via sampling. */
  collaborator?: Collaborator;
}

function getPackageVersion(parsed: unknown): string {
  if (
    typeof parsed !== 'object' ||
    parsed === null ||
    !('version' in parsed) ||
    typeof parsed.version !== 'string'
  ) {
    throw new Error('Invalid package.json: missing or invalid version field');
  }
  return parsed.version;
}

function loadVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }
  const packageJson = readFileSync(PACKAGE_JSON_URL, 'utf8');
  cachedVersion = getPackageVersion(JSON.parse(packageJson) as unknown);
  return cachedVersion;
}

function outcomeLevel(payload: WorkflowOutcomePayload): LoggingLevel {
  return payload.outcome.kind === 'failed' ? 'warning' : 'notice';
}

function attachEngineEventHandlers(
  server: McpServer,
  store: SessionStore
): () => void {
  const owns = (sessionId: string): boolean => store.get(sessionId) !== undefined;

  const writeStderr = (event: string, err: unknown): void => {
    process.stderr.write(
      `[engine] Failed to log ${event}: ${getErrorMessage(err)}\n`
    );
  };

  const log = (
    level: LoggingLevel,
    logger: string,
    data: { event: string } & Record<string, unknown>
  ): void => {
    void server
      .sendLoggingMessage({ level, logger, data })
      .catch((err: unknown) => {
        writeStderr(data.event, err);
      });
  };

  const logNotificationFailure = (
    method: string,
    error: unknown,
    data?: Record<string, unknown>
  ): void => {
    log('debug', SERVER_LOGGER, {
      event: 'notification_failed',
      method,
      ...(data ?? {}),
      error: getErrorMessage(error),
    });
  };

  const onResourcesChanged = (): void => {
    void server.server.sendResourceListChanged().catch((err: unknown) => {
      logNotificationFailure(RESOURCE_LIST_CHANGED_METHOD, err);
    });
  };

  const onResourceUpdated = (data: { uri: string }): void => {
    const sessionId = data.uri.startsWith(`${SESSIONS_URI}/`)
      ? data.uri.slice(SESSIONS_URI.length + 1)
      : undefined;
    if (sessionId !== undefined && !owns(sessionId)) {
      return;
    }
    void server.server
      .sendResourceUpdated({ uri: data.uri })
      .catch((err: unknown) => {
        logNotificationFailure(RESOURCE_UPDATED_METHOD, err, { uri: data.uri });
      });
  };

  const onWorkflowStarted = (data: {
    sessionId: string;
    originalRequest: string;
  }): void => {
    if (owns(data.sessionId)) {
      log('info', ENGINE_LOGGER, { event: 'workflow_started', ...data });
    }
  };

  const onWorkflowOutcome = (data: WorkflowOutcomePayload): void => {
    if (owns(data.sessionId)) {
      log(outcomeLevel(data), ENGINE_LOGGER, {
        event: 'workflow_outcome',
        sessionId: data.sessionId,
        outcome: data.outcome,
      });
    }
  };

  const onFramePushed = (data: {
    sessionId: string;
    tool: string;
    depth: number;
    missing: number;
  }): void => {
    if (owns(data.sessionId)) {
      log('info', ENGINE_LOGGER, { event: 'frame_pushed', ...data });
    }
  };

  const onParameterRejected = (data: {
    sessionId: string;
    tool: string;
    parameter: string;
    attempt: number;
    message: string;
  }): void => {
    if (owns(data.sessionId)) {
      log('info', ENGINE_LOGGER, { event: 'parameter_rejected', ...data });
    }
  };

  const onDepthExceeded = (data: DepthExceededPayload): void => {
    if (owns(data.sessionId)) {
      log('warning', ENGINE_LOGGER, { event: 'depth_exceeded', ...data });
    }
  };

  const onResultDiscarded = (data: {
    sessionId: string;
    generation: number;
    currentGeneration: number;
  }): void => {
    if (owns(data.sessionId)) {
      log('debug', ENGINE_LOGGER, { event: 'result_discarded', ...data });
    }
  };

  engineEvents.on('resources:changed', onResourcesChanged);
  engineEvents.on('resource:updated', onResourceUpdated);
  engineEvents.on('workflow:started', onWorkflowStarted);
  engineEvents.on('workflow:outcome', onWorkflowOutcome);
  engineEvents.on('frame:pushed', onFramePushed);
  engineEvents.on('parameter:rejected', onParameterRejected);
  engineEvents.on('depth:exceeded', onDepthExceeded);
  engineEvents.on('result:discarded', onResultDiscarded);

  let detached = false;
  return (): void => {
    if (detached) {
      return;
    }
    detached = true;
    engineEvents.off('resources:changed', onResourcesChanged);
    engineEvents.off('resource:updated', onResourceUpdated);
    engineEvents.off('workflow:started', onWorkflowStarted);
    engineEvents.off('workflow:outcome', onWorkflowOutcome);
    engineEvents.off('frame:pushed', onFramePushed);
    engineEvents.off('parameter:rejected', onParameterRejected);
    engineEvents.off('depth:exceeded', onDepthExceeded);
    engineEvents.off('result:discarded', onResultDiscarded);
  };
}

function installCloseCleanup(server: McpServer, cleanup: () => void): void {
  const originalClose = server.close.bind(server);
  let closed = false;

  server.close = async (): Promise<void> => {
    if (closed) {
      return;
    }
    closed = true;
    cleanup();
    await originalClose();
  };
}

export function createServer(options: ServerOptions = {}): McpServer {
  const config = options.config ?? loadEngineConfig();
  const registry = options.registry ?? new ToolRegistry(BUILTIN_TOOLS);

  const server = new McpServer(
    {
      name: SERVER_NAME,
      title: SERVER_TITLE,
      description: SERVER_DESCRIPTION,
      version: loadVersion(),
    },
    {
      capabilities: {
        tools: {},
        logging: {},
        completions: {},
        resources: { subscribe: true, listChanged: true },
      },
      instructions: SERVER_INSTRUCTIONS,
    }
  );

  const collaborator =
    options.collaborator ??
    new SamplingCollaborator(server, {
      timeoutMs: config.collaboratorTimeoutMs,
      maxTokens: config.collaboratorMaxTokens,
    });

  const store = new SessionStore({
    ttlMs: config.sessionTtlMs,
    maxSessions: config.maxSessions,
    createSession: (id) =>
      new ChatSession({
        id,
        registry,
        collaborator,
        maxDepth: config.maxDepth,
        depthIncrement: config.depthIncrement,
        maxHistory: config.maxHistory,
      }),
  });

  registerAllTools(server, { store });
  registerAllResources(server, { store, registry });

  const detachEngineHandlers = attachEngineEventHandlers(server, store);
  installCloseCleanup(server, () => {
    detachEngineHandlers();
    store.dispose();
  });

  return server;
}
