import { inspect } from 'node:util';

import type { ErrorInfo } from './types.js';

const INSPECT_OPTIONS = {
  depth: 3,
  breakLength: 120,
} as const;
const UNKNOWN_ERROR_MESSAGE = 'Unknown error';

interface ErrorResponse {
  [key: string]: unknown;
  content: { type: 'text'; text: string }[];
  structuredContent: { ok: false; error: { code: string; message: string } };
  isError: true;
}

export class OrchestrationError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }

  toInfo(): ErrorInfo {
    return { code: this.code, message: this.message };
  }
}

export class UnknownToolError extends OrchestrationError {
  readonly toolName: string;

  constructor(toolName: string) {
    super('E_UNKNOWN_TOOL', `Unknown tool: ${toolName}`);
    this.toolName = toolName;
  }
}

export class ParameterValidationError extends OrchestrationError {
  readonly toolName: string;
  readonly parameter: string;

  constructor(toolName: string, parameter: string, detail: string) {
    super(
      'E_PARAMETER_INVALID',
      `Invalid value for "${parameter}" of ${toolName}: ${detail}`
    );
    this.toolName = toolName;
    this.parameter = parameter;
  }
}

export class ToolExecutionError extends OrchestrationError {
  readonly toolName: string;
  readonly kind: string;

  constructor(
    toolName: string,
    kind: string,
    message: string,
    options?: ErrorOptions
  ) {
    super('E_TOOL_FAILED', `${toolName} failed (${kind}): ${message}`, options);
    this.toolName = toolName;
    this.kind = kind;
  }
}

export class DepthExceededError extends OrchestrationError {
  readonly depth: number;
  readonly maxDepth: number;

  constructor(depth: number, maxDepth: number) {
    super(
      'E_DEPTH_EXCEEDED',
      `Tool stack depth limit reached (${String(depth)}/${String(maxDepth)})`
    );
    this.depth = depth;
    this.maxDepth = maxDepth;
  }
}

export class CollaboratorUnavailableError extends OrchestrationError {
  constructor(message = 'Reasoning collaborator unavailable', options?: ErrorOptions) {
    super('E_COLLABORATOR_UNAVAILABLE', message, options);
  }
}

export class InvalidStateError extends OrchestrationError {
  constructor(operation: string, state: string) {
    super('E_INVALID_STATE', `${operation} is not allowed in state "${state}"`);
  }
}

export class SessionNotFoundError extends OrchestrationError {
  constructor(sessionId: string) {
    super('E_SESSION_NOT_FOUND', `Session not found: ${sessionId}`);
  }
}

export function isObjectRecord(
  value: unknown
): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function stringifyUnknown(value: unknown): string {
  try {
    const serialized = JSON.stringify(value);
    if (serialized !== undefined) {
      return serialized;
    }
  } catch {
    // Fall through to inspect-based serialization.
  }
  return inspect(value, INSPECT_OPTIONS);
}

function getMessageFromErrorLike(value: unknown): string | undefined {
  if (!isObjectRecord(value)) {
    return undefined;
  }

  return typeof value.message === 'string' ? value.message : undefined;
}

export function getErrorMessage(error: unknown): string {
  if (typeof error === 'string') {
    return error;
  }
  if (error instanceof Error) {
    return error.message;
  }
  if (error === null || error === undefined) {
    return UNKNOWN_ERROR_MESSAGE;
  }
  const errorLikeMessage = getMessageFromErrorLike(error);
  if (errorLikeMessage !== undefined) {
    return errorLikeMessage;
  }
  return stringifyUnknown(error);
}

export function getErrorCode(error: unknown, fallback = 'E_INTERNAL'): string {
  return error instanceof OrchestrationError ? error.code : fallback;
}

export function createErrorResponse(
  code: string,
  message: string
): ErrorResponse {
  const structured = { ok: false as const, error: { code, message } };
  const text = JSON.stringify(structured);
  return {
    content: [{ type: 'text' as const, text }],
    structuredContent: structured,
    isError: true as const,
  };
}
