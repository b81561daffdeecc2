import { InvalidStateError } from '../lib/errors.js';
import { createSerialLock } from '../lib/concurrency.js';
import { describeReply } from '../lib/formatting.js';
import type {
  ChatMessage,
  ChatRole,
  EngineReply,
  SessionSummary,
  StatusSnapshot,
} from '../lib/types.js';
import type { ToolRegistry } from '../registry/registry.js';

import type { Collaborator } from './collaborator.js';
import { DEFAULT_MAX_HISTORY } from './config.js';
import { parseYesNo } from './heuristics.js';
import { Orchestrator } from './orchestrator.js';

export interface ChatSessionOptions {
  id: string;
  registry: ToolRegistry;
  collaborator: Collaborator;
  maxDepth?: number;
  depthIncrement?: number;
  maxHistory?: number;
}

export interface ChatTurn {
  readonly replies: readonly EngineReply[];
  readonly status: StatusSnapshot;
}

/**
 * One conversation: bounded history plus the driver that feeds user input to
 * the engine and runs ready tools until the user is needed again.
 */
export class ChatSession {
  readonly id: string;
  readonly createdAt: number;
  private lastActivityAt: number;
  private readonly engine: Orchestrator;
  private readonly lock = createSerialLock();
  private readonly messages: ChatMessage[] = [];
  private readonly maxHistory: number;

  constructor(options: ChatSessionOptions) {
    this.id = options.id;
    this.createdAt = Date.now();
    this.lastActivityAt = this.createdAt;
    this.maxHistory = options.maxHistory ?? DEFAULT_MAX_HISTORY;
    this.engine = new Orchestrator({
      sessionId: options.id,
      registry: options.registry,
      collaborator: options.collaborator,
      history: () => this.messages,
      ...(options.maxDepth !== undefined ? { maxDepth: options.maxDepth } : {}),
      ...(options.depthIncrement !== undefined
        ? { depthIncrement: options.depthIncrement }
        : {}),
    });
  }

  get updatedAt(): number {
    return this.lastActivityAt;
  }

  /** True while an input is being processed. */
  get busy(): boolean {
    return this.lock.busy;
  }

  send(text: string): Promise<ChatTurn> {
    return this.lock.run(async () => {
      this.touch();
      const replies = await this.route(text);
      if (text.trim().length > 0) {
        this.record('user', text);
      }
      return this.completeTurn(replies);
    });
  }

  confirm(accept: boolean): Promise<ChatTurn> {
    return this.lock.run(async () => {
      this.touch();
      const reply = this.engine.resolveConfirmation(accept);
      this.record('user', accept ? 'yes' : 'no');
      return this.completeTurn([reply]);
    });
  }

  /** Takes effect immediately, even while a collaborator or tool call is pending. */
  cancel(): ChatTurn {
    this.touch();
    const reply = this.engine.cancel();
    this.record('assistant', describeReply(reply));
    return { replies: [reply], status: this.engine.status() };
  }

  status(): StatusSnapshot {
    return this.engine.status();
  }

  history(): readonly ChatMessage[] {
    return Object.freeze([...this.messages]);
  }

  summary(): SessionSummary {
    const status = this.engine.status();
    const summary: SessionSummary = {
      id: this.id,
      state: status.state,
      depth: status.depth,
      messageCount: this.messages.length,
      createdAt: this.createdAt,
      updatedAt: this.lastActivityAt,
      ...(status.originalRequest !== undefined
        ? { originalRequest: status.originalRequest }
        : {}),
    };
    return Object.freeze(summary);
  }

  private async route(text: string): Promise<EngineReply[]> {
    if (text.trim().length === 0) {
      return [this.engine.handleEmptyInput()];
    }

    const state = this.engine.state;
    switch (state) {
      case 'awaiting_confirmation': {
        const answer = parseYesNo(text);
        if (answer === undefined) {
          return [this.engine.handleEmptyInput()];
        }
        return [this.engine.resolveConfirmation(answer === 'yes')];
      }
      case 'idle':
        return [await this.engine.submitUserRequest(text)];
      case 'collecting_parameters':
      case 'ready_to_execute':
        return this.engine.detectContextSwitch(text);
      case 'awaiting_selection':
      case 'executing':
        throw new InvalidStateError('send', state);
    }
  }

  private async completeTurn(initial: EngineReply[]): Promise<ChatTurn> {
    const replies = [...initial];
    while (this.engine.state === 'ready_to_execute') {
      const reply = await this.engine.executeActiveTool();
      replies.push(reply);
      if (reply.kind === 'discarded') {
        break;
      }
    }
    for (const reply of replies) {
      if (reply.kind !== 'ready' && reply.kind !== 'discarded') {
        this.record('assistant', describeReply(reply));
      }
    }
    return { replies, status: this.engine.status() };
  }

  private record(role: ChatRole, content: string): void {
    this.messages.push({ role, content, timestamp: Date.now() });
    const overflow = this.messages.length - this.maxHistory;
    if (overflow > 0) {
      this.messages.splice(0, overflow);
    }
  }

  private touch(): void {
    this.lastActivityAt = Date.now();
  }
}
