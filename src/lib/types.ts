export type EngineState =
  | 'idle'
  | 'awaiting_selection'
  | 'collecting_parameters'
  | 'ready_to_execute'
  | 'executing'
  | 'awaiting_confirmation';
export const ENGINE_STATES = [
  'idle',
  'awaiting_selection',
  'collecting_parameters',
  'ready_to_execute',
  'executing',
  'awaiting_confirmation',
] as const;

/** Paused frames are awaiting the completion of the child pushed above them. */
export type FrameStatus = 'active' | 'paused';
export const FRAME_STATUSES = ['active', 'paused'] as const;

export type CancelReason = 'explicit' | 'depth_limit' | 'context_switch';
export const CANCEL_REASONS = [
  'explicit',
  'depth_limit',
  'context_switch',
] as const;

export type ConfirmationKind = 'continue' | 'extend_depth';
export const CONFIRMATION_KINDS = ['continue', 'extend_depth'] as const;

export interface ChildResult {
  readonly tool: string;
  readonly value: unknown;
}

export interface ToolFrame {
  readonly toolName: string;
  readonly collectedParameters: Readonly<Record<string, unknown>>;
  readonly missingParameters: readonly string[];
  readonly createdAt: number;
  readonly pendingChild: string | undefined;
  readonly childResults: readonly ChildResult[];
  readonly notes: readonly string[];
}

export interface ErrorInfo {
  readonly code: string;
  readonly message: string;
}

export type WorkflowOutcome =
  | { readonly kind: 'completed'; readonly value: unknown }
  | { readonly kind: 'cancelled'; readonly reason: CancelReason }
  | { readonly kind: 'failed'; readonly error: ErrorInfo };

export type ToolResult =
  | { readonly kind: 'value'; readonly value: unknown }
  | {
      readonly kind: 'needs_tool';
      readonly tool: string;
      readonly seedArgs: Readonly<Record<string, unknown>>;
    }
  | { readonly kind: 'error'; readonly errorKind: string; readonly message: string };

export type SelectionDecision =
  | { readonly kind: 'no_tool'; readonly reply: string }
  | {
      readonly kind: 'use_tool';
      readonly tool: string;
      readonly args: Readonly<Record<string, unknown>>;
    };

export type ContinuityVerdict = 'related' | 'unrelated';

export interface FrameSummary {
  readonly toolName: string;
  readonly isTop: boolean;
  readonly status: FrameStatus;
  readonly missingParameterCount: number;
  readonly waitingFor?: string;
  readonly pendingChild?: string;
  readonly createdAt: number;
}

export interface StatusSnapshot {
  readonly state: EngineState;
  readonly originalRequest?: string;
  readonly depth: number;
  readonly maxDepth: number;
  readonly generation: number;
  readonly frames: readonly FrameSummary[];
}

export type EngineReply =
  | { readonly kind: 'reply'; readonly text: string }
  | {
      readonly kind: 'question';
      readonly tool: string;
      readonly parameter: string;
      readonly text: string;
      readonly retry: boolean;
    }
  | { readonly kind: 'ready'; readonly tool: string }
  | { readonly kind: 'noted'; readonly tool: string; readonly text: string }
  | {
      readonly kind: 'confirmation';
      readonly confirmation: ConfirmationKind;
      readonly text: string;
      readonly snapshot: StatusSnapshot;
    }
  | { readonly kind: 'outcome'; readonly outcome: WorkflowOutcome }
  | { readonly kind: 'error'; readonly error: ErrorInfo }
  | { readonly kind: 'discarded'; readonly generation: number }
  | { readonly kind: 'idle' };

export type ChatRole = 'user' | 'assistant';

export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
  readonly timestamp: number;
}

export interface SessionSummary {
  readonly id: string;
  readonly state: EngineState;
  readonly depth: number;
  readonly messageCount: number;
  readonly createdAt: number;
  readonly updatedAt: number;
  readonly originalRequest?: string;
}

export const REPLY_KINDS = [
  'reply',
  'question',
  'ready',
  'noted',
  'confirmation',
  'outcome',
  'error',
  'discarded',
  'idle',
] as const;

export const OUTCOME_KINDS = ['completed', 'cancelled', 'failed'] as const;
