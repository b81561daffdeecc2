import { EventEmitter } from 'node:events';

import { getErrorMessage } from '../lib/errors.js';
import type { CancelReason, WorkflowOutcome } from '../lib/types.js';

const ENGINE_ERROR_LOG_PREFIX = '[engine]';

export interface WorkflowOutcomePayload {
  sessionId: string;
  originalRequest: string | undefined;
  outcome: WorkflowOutcome;
}

export interface DepthExceededPayload {
  sessionId: string;
  tool: string;
  depth: number;
  maxDepth: number;
}

interface EngineEvents {
  'workflow:started': [{ sessionId: string; originalRequest: string }];
  'workflow:outcome': [WorkflowOutcomePayload];
  'frame:pushed': [
    { sessionId: string; tool: string; depth: number; missing: number },
  ];
  'frame:popped': [{ sessionId: string; tool: string; depth: number }];
  'parameter:collected': [
    { sessionId: string; tool: string; parameter: string },
  ];
  'parameter:rejected': [
    {
      sessionId: string;
      tool: string;
      parameter: string;
      attempt: number;
      message: string;
    },
  ];
  'depth:exceeded': [DepthExceededPayload];
  'depth:extended': [{ sessionId: string; maxDepth: number }];
  'context:switched': [{ sessionId: string; reason: CancelReason }];
  'result:discarded': [
    { sessionId: string; generation: number; currentGeneration: number },
  ];
  'session:created': [{ sessionId: string }];
  'session:expired': [{ sessionId: string }];
  'session:evicted': [{ sessionId: string; reason: string }];
  'resources:changed': [{ uri: string }];
  'resource:updated': [{ uri: string }];
  error: [unknown];
}

interface TypedEmitter<T> extends Omit<EventEmitter, 'on' | 'off' | 'emit'> {
  on<K extends keyof T>(
    event: K,
    listener: (...args: T[K] extends unknown[] ? T[K] : never) => void
  ): this;
  off<K extends keyof T>(
    event: K,
    listener: (...args: T[K] extends unknown[] ? T[K] : never) => void
  ): this;
  emit<K extends keyof T>(
    event: K,
    ...args: T[K] extends unknown[] ? T[K] : never
  ): boolean;
}

export const engineEvents = new EventEmitter({
  captureRejections: true,
}) as TypedEmitter<EngineEvents>;

function logEngineError(err: unknown): void {
  process.stderr.write(`${ENGINE_ERROR_LOG_PREFIX} ${getErrorMessage(err)}\n`);
}

engineEvents.on('error', logEngineError);
