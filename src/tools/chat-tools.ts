import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import type { ChatTurn } from '../engine/chat-session.js';
import type { SessionStore } from '../engine/session-store.js';

import {
  createErrorResponse,
  getErrorCode,
  getErrorMessage,
} from '../lib/errors.js';
import { describeReply } from '../lib/formatting.js';
import { createToolResponse } from '../lib/tool-response.js';
import type {
  EngineReply,
  StatusSnapshot,
  WorkflowOutcome,
} from '../lib/types.js';

import {
  ChatCancelInputSchema,
  ChatConfirmInputSchema,
  ChatSendInputSchema,
  ChatStatusInputSchema,
} from '../schemas/inputs.js';
import {
  ChatStatusOutputSchema,
  ChatTurnOutputSchema,
} from '../schemas/outputs.js';
import type {
  ChatStatusResult,
  ChatTurnResult,
  WireReply,
} from '../schemas/outputs.js';

export interface ChatToolDeps {
  store: SessionStore;
}

type WireOutcome = NonNullable<WireReply['outcome']>;
type WireStatus = ChatTurnResult['status'];

function toWireOutcome(outcome: WorkflowOutcome): WireOutcome {
  switch (outcome.kind) {
    case 'completed':
      return { kind: 'completed', value: outcome.value };
    case 'cancelled':
      return { kind: 'cancelled', reason: outcome.reason };
    case 'failed':
      return { kind: 'failed', error: { ...outcome.error } };
  }
}

export function toWireReply(reply: EngineReply): WireReply {
  const text = describeReply(reply);
  switch (reply.kind) {
    case 'question':
      return {
        kind: reply.kind,
        text,
        tool: reply.tool,
        parameter: reply.parameter,
        retry: reply.retry,
      };
    case 'ready':
    case 'noted':
      return { kind: reply.kind, text, tool: reply.tool };
    case 'confirmation':
      return { kind: reply.kind, text, confirmation: reply.confirmation };
    case 'outcome':
      return { kind: reply.kind, text, outcome: toWireOutcome(reply.outcome) };
    case 'error':
      return { kind: reply.kind, text, error: { ...reply.error } };
    case 'reply':
    case 'discarded':
    case 'idle':
      return { kind: reply.kind, text };
  }
}

export function toWireStatus(status: StatusSnapshot): WireStatus {
  return {
    ...status,
    frames: status.frames.map((frame) => ({ ...frame })),
  };
}

function buildTurnResult(
  store: SessionStore,
  sessionId: string,
  turn: ChatTurn
): ChatTurnResult {
  return {
    sessionId,
    replies: turn.replies.map(toWireReply),
    status: toWireStatus(turn.status),
    expiresAt: store.getExpiresAt(sessionId) ?? Date.now(),
  };
}

function toErrorResponse(err: unknown): ReturnType<typeof createErrorResponse> {
  return createErrorResponse(getErrorCode(err), getErrorMessage(err));
}

export function registerChatTools(server: McpServer, deps: ChatToolDeps): void {
  const { store } = deps;

  server.registerTool(
    'chat_send',
    {
      title: 'Chat Send',
      description:
        'Send a chat message. Starts a session when sessionId is omitted. The engine picks a tool, asks for missing parameters one at a time, runs tools (including nested ones) and returns its replies with a status snapshot.',
      inputSchema: ChatSendInputSchema,
      outputSchema: ChatTurnOutputSchema,
      annotations: { readOnlyHint: false, idempotentHint: false },
    },
    async ({ sessionId, message }) => {
      try {
        const session =
          sessionId === undefined ? store.create() : store.getOrThrow(sessionId);
        const turn = await session.send(message);
        store.touch(session.id);
        return createToolResponse({
          ok: true,
          result: buildTurnResult(store, session.id, turn),
        });
      } catch (err) {
        return toErrorResponse(err);
      }
    }
  );

  server.registerTool(
    'chat_confirm',
    {
      title: 'Chat Confirm',
      description:
        'Answer the outstanding confirmation of a session: continue the paused workflow, or extend the tool depth limit.',
      inputSchema: ChatConfirmInputSchema,
      outputSchema: ChatTurnOutputSchema,
      annotations: { readOnlyHint: false, idempotentHint: false },
    },
    async ({ sessionId, accept }) => {
      try {
        const session = store.getOrThrow(sessionId);
        const turn = await session.confirm(accept);
        store.touch(sessionId);
        return createToolResponse({
          ok: true,
          result: buildTurnResult(store, sessionId, turn),
        });
      } catch (err) {
        return toErrorResponse(err);
      }
    }
  );

  server.registerTool(
    'chat_cancel',
    {
      title: 'Chat Cancel',
      description:
        'Cancel the active workflow of a session, including any pending tool or model call. A no-op when nothing is in progress.',
      inputSchema: ChatCancelInputSchema,
      outputSchema: ChatTurnOutputSchema,
      annotations: { readOnlyHint: false, idempotentHint: true },
    },
    ({ sessionId }) => {
      try {
        const session = store.getOrThrow(sessionId);
        const turn = session.cancel();
        store.touch(sessionId);
        return createToolResponse({
          ok: true,
          result: buildTurnResult(store, sessionId, turn),
        });
      } catch (err) {
        return toErrorResponse(err);
      }
    }
  );

  server.registerTool(
    'chat_status',
    {
      title: 'Chat Status',
      description:
        'Read-only snapshot of a session: engine state, original request, stack depth and per-frame status.',
      inputSchema: ChatStatusInputSchema,
      outputSchema: ChatStatusOutputSchema,
      annotations: { readOnlyHint: true, idempotentHint: true },
    },
    ({ sessionId }) => {
      try {
        const session = store.getOrThrow(sessionId);
        const result: ChatStatusResult = {
          sessionId,
          status: toWireStatus(session.status()),
          messageCount: session.history().length,
          expiresAt: store.getExpiresAt(sessionId) ?? Date.now(),
        };
        return createToolResponse({ ok: true, result });
      } catch (err) {
        return toErrorResponse(err);
      }
    }
  );
}
