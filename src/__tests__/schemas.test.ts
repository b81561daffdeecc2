import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  ChatConfirmInputSchema,
  ChatSendInputSchema,
  ChatStatusInputSchema,
} from '../schemas/inputs.js';
import {
  ChatStatusOutputSchema,
  ChatTurnOutputSchema,
  DefaultOutputSchema,
  ReplySchema,
} from '../schemas/outputs.js';

const STATUS = {
  state: 'idle',
  depth: 0,
  maxDepth: 20,
  generation: 0,
  frames: [],
};

describe('input schemas', () => {
  it('chat_send accepts an empty message and an optional session', () => {
    assert.equal(ChatSendInputSchema.safeParse({ message: '' }).success, true);
    assert.equal(
      ChatSendInputSchema.safeParse({ sessionId: 's', message: 'hi' }).success,
      true
    );
  });

  it('chat_send rejects oversized messages and unknown keys', () => {
    assert.equal(
      ChatSendInputSchema.safeParse({ message: 'x'.repeat(10001) }).success,
      false
    );
    assert.equal(ChatSendInputSchema.safeParse({ message: 'hi', extra: 1 }).success, false);
  });

  it('chat_confirm requires a boolean answer', () => {
    assert.equal(
      ChatConfirmInputSchema.safeParse({ sessionId: 's', accept: 'yes' }).success,
      false
    );
    assert.equal(ChatConfirmInputSchema.safeParse({ sessionId: 's', accept: false }).success, true);
  });

  it('chat_status requires a non-empty session id', () => {
    assert.equal(ChatStatusInputSchema.safeParse({ sessionId: '' }).success, false);
  });
});

describe('output schemas', () => {
  it('accepts a turn result', () => {
    const parsed = ChatTurnOutputSchema.safeParse({
      ok: true,
      result: {
        sessionId: 's',
        replies: [
          {
            kind: 'outcome',
            text: 'Cancelled (explicit).',
            outcome: { kind: 'cancelled', reason: 'explicit' },
          },
        ],
        status: STATUS,
        expiresAt: 1,
      },
    });
    assert.equal(parsed.success, true);
  });

  it('requires result when ok and error when not ok', () => {
    const missingResult = ChatTurnOutputSchema.safeParse({ ok: true });
    assert.equal(missingResult.success, false);
    assert.equal(missingResult.error?.issues[0]?.message, 'result is required when ok is true');

    const missingError = ChatStatusOutputSchema.safeParse({ ok: false });
    assert.equal(missingError.success, false);
    assert.equal(missingError.error?.issues[0]?.message, 'error is required when ok is false');
  });

  it('rejects unknown reply kinds and cancel reasons', () => {
    assert.equal(ReplySchema.safeParse({ kind: 'shrug', text: '' }).success, false);
    assert.equal(
      ReplySchema.safeParse({
        kind: 'outcome',
        text: '',
        outcome: { kind: 'cancelled', reason: 'timeout' },
      }).success,
      false
    );
  });

  it('validates the generic envelope', () => {
    assert.equal(
      DefaultOutputSchema.safeParse({ ok: false, error: { code: 'E', message: 'm' } }).success,
      true
    );
    assert.equal(DefaultOutputSchema.safeParse({ ok: false }).success, false);
  });
});
