import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  CollaboratorUnavailableError,
  createErrorResponse,
  DepthExceededError,
  getErrorCode,
  getErrorMessage,
  InvalidStateError,
  isObjectRecord,
  OrchestrationError,
  ParameterValidationError,
  SessionNotFoundError,
  ToolExecutionError,
  UnknownToolError,
} from '../lib/errors.js';

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

describe('SessionNotFoundError', () => {
  it('has correct code and name', () => {
    const err = new SessionNotFoundError('abc-123');
    assert.equal(err.code, 'E_SESSION_NOT_FOUND');
    assert.equal(err.name, 'SessionNotFoundError');
    assert.ok(err instanceof OrchestrationError);
    assert.ok(err instanceof Error);
    assert.equal(err.message, 'Session not found: abc-123');
  });
});

describe('UnknownToolError', () => {
  it('names the tool', () => {
    const err = new UnknownToolError('fly_plane');
    assert.equal(err.code, 'E_UNKNOWN_TOOL');
    assert.equal(err.toolName, 'fly_plane');
    assert.deepEqual(err.toInfo(), {
      code: 'E_UNKNOWN_TOOL',
      message: 'Unknown tool: fly_plane',
    });
  });
});

describe('ParameterValidationError', () => {
  it('includes parameter, tool and detail', () => {
    const err = new ParameterValidationError('convert_temperature', 'value', 'Not a number');
    assert.equal(err.code, 'E_PARAMETER_INVALID');
    assert.equal(err.parameter, 'value');
    assert.equal(
      err.message,
      'Invalid value for "value" of convert_temperature: Not a number'
    );
  });
});

describe('ToolExecutionError', () => {
  it('carries the failure kind and cause', () => {
    const cause = new Error('disk full');
    const err = new ToolExecutionError('save_file', 'exception', 'disk full', { cause });
    assert.equal(err.code, 'E_TOOL_FAILED');
    assert.equal(err.kind, 'exception');
    assert.equal(err.message, 'save_file failed (exception): disk full');
    assert.equal(err.cause, cause);
  });
});

describe('DepthExceededError', () => {
  it('reports depth and limit', () => {
    const err = new DepthExceededError(20, 20);
    assert.equal(err.code, 'E_DEPTH_EXCEEDED');
    assert.equal(err.message, 'Tool stack depth limit reached (20/20)');
  });
});

describe('CollaboratorUnavailableError / InvalidStateError', () => {
  it('use their default messages and codes', () => {
    assert.equal(
      new CollaboratorUnavailableError().message,
      'Reasoning collaborator unavailable'
    );
    const err = new InvalidStateError('executeActiveTool', 'idle');
    assert.equal(err.code, 'E_INVALID_STATE');
    assert.equal(err.message, 'executeActiveTool is not allowed in state "idle"');
  });
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

describe('getErrorMessage', () => {
  it('extracts message from Error instances', () => {
    assert.equal(getErrorMessage(new Error('boom')), 'boom');
  });

  it('returns strings unchanged', () => {
    assert.equal(getErrorMessage('plain'), 'plain');
  });

  it('reads message from error-like objects', () => {
    assert.equal(getErrorMessage({ message: 'shaped' }), 'shaped');
  });

  it('falls back for null and undefined', () => {
    assert.equal(getErrorMessage(null), 'Unknown error');
    assert.equal(getErrorMessage(undefined), 'Unknown error');
  });

  it('serialises other values as JSON', () => {
    assert.equal(getErrorMessage({ code: 7 }), '{"code":7}');
    assert.equal(getErrorMessage(42), '42');
  });
});

describe('getErrorCode', () => {
  it('uses the orchestration error code', () => {
    assert.equal(getErrorCode(new SessionNotFoundError('x')), 'E_SESSION_NOT_FOUND');
  });

  it('falls back for other errors', () => {
    assert.equal(getErrorCode(new Error('x')), 'E_INTERNAL');
    assert.equal(getErrorCode(new Error('x'), 'E_OTHER'), 'E_OTHER');
  });
});

describe('isObjectRecord', () => {
  it('accepts objects and rejects null and primitives', () => {
    assert.equal(isObjectRecord({}), true);
    assert.equal(isObjectRecord(null), false);
    assert.equal(isObjectRecord('x'), false);
  });
});

describe('createErrorResponse', () => {
  it('builds an error envelope mirrored as text', () => {
    const response = createErrorResponse('E_TEST', 'went wrong');
    assert.equal(response.isError, true);
    assert.deepEqual(response.structuredContent, {
      ok: false,
      error: { code: 'E_TEST', message: 'went wrong' },
    });
    assert.equal(
      response.content[0]?.text,
      '{"ok":false,"error":{"code":"E_TEST","message":"went wrong"}}'
    );
  });
});
