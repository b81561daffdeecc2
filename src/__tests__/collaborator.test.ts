import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  parseContinuityVerdict,
  parseSelectionDecision,
  renderContinuityPrompt,
  renderSelectionPrompt,
} from '../engine/collaborator.js';

describe('parseSelectionDecision', () => {
  it('reads a tool choice with arguments', () => {
    assert.deepEqual(
      parseSelectionDecision('{"tool": "save_file", "arguments": {"path": "a.txt"}}'),
      { kind: 'use_tool', tool: 'save_file', args: { path: 'a.txt' } }
    );
  });

  it('accepts parameters in place of arguments', () => {
    assert.deepEqual(parseSelectionDecision('{"tool": "save_file", "parameters": {"x": 1}}'), {
      kind: 'use_tool',
      tool: 'save_file',
      args: { x: 1 },
    });
  });

  it('reads the tool_call shape', () => {
    assert.deepEqual(
      parseSelectionDecision('{"tool_call": {"name": "analyze_text", "parameters": {"text": "hi"}}}'),
      { kind: 'use_tool', tool: 'analyze_text', args: { text: 'hi' } }
    );
  });

  it('finds the decision inside a fenced block', () => {
    assert.deepEqual(parseSelectionDecision('Here you go:\n```json\n{"tool": "ping"}\n```'), {
      kind: 'use_tool',
      tool: 'ping',
      args: {},
    });
  });

  it('treats a null tool as a direct reply', () => {
    assert.deepEqual(parseSelectionDecision('{"tool": null, "reply": "Hi!"}'), {
      kind: 'no_tool',
      reply: 'Hi!',
    });
  });

  it('treats plain text as a direct reply', () => {
    assert.deepEqual(parseSelectionDecision('  Just chatting.  '), {
      kind: 'no_tool',
      reply: 'Just chatting.',
    });
    assert.deepEqual(parseSelectionDecision('   '), {
      kind: 'no_tool',
      reply: "I'm not sure how to help with that.",
    });
  });

  it('never echoes an unusable decision object', () => {
    const fallback = { kind: 'no_tool', reply: "I'm not sure how to help with that." };
    assert.deepEqual(parseSelectionDecision('{"tool": ""}'), fallback);
    assert.deepEqual(
      parseSelectionDecision('{"tool": "save_file", "arguments": null}'),
      fallback
    );
    assert.deepEqual(parseSelectionDecision('{"tool": null}'), fallback);
  });

  it('keeps the reply text of an otherwise invalid decision', () => {
    assert.deepEqual(
      parseSelectionDecision('{"tool": 42, "reply": "Let me think about that."}'),
      { kind: 'no_tool', reply: 'Let me think about that.' }
    );
  });

  it('keeps prose that only mentions unrelated JSON', () => {
    assert.deepEqual(parseSelectionDecision('Use {"a": 1} as the payload.'), {
      kind: 'no_tool',
      reply: 'Use {"a": 1} as the payload.',
    });
  });
});

describe('parseContinuityVerdict', () => {
  it('reads the verdict case-insensitively', () => {
    assert.equal(parseContinuityVerdict('{"verdict": "Unrelated"}'), 'unrelated');
    assert.equal(parseContinuityVerdict('{"verdict": "related"}'), 'related');
  });

  it('defaults to related when unreadable', () => {
    assert.equal(parseContinuityVerdict('no idea'), 'related');
    assert.equal(parseContinuityVerdict('{"verdict": "perhaps"}'), 'related');
  });
});

describe('prompt rendering', () => {
  it('renders the selection prompt sections', () => {
    const prompt = renderSelectionPrompt({
      request: 'save my notes',
      history: [],
      toolSummary: '- save_file: Save\n  parameters: path',
      guidance: 'Pick a listed tool.',
    });
    assert.equal(prompt.purpose, 'selection');
    assert.equal(
      prompt.user,
      'Available tools:\n- save_file: Save\n  parameters: path\n\n' +
        'Conversation so far:\n(no earlier messages)\n\n' +
        'User request:\nsave my notes\n\n' +
        'Note: Pick a listed tool.'
    );
  });

  it('renders the continuity prompt with history and stack', () => {
    const prompt = renderContinuityPrompt({
      text: 'what time is it?',
      history: [{ role: 'user', content: 'save my notes', timestamp: 1 }],
      originalRequest: 'save my notes',
      frames: [
        {
          toolName: 'save_file',
          isTop: true,
          status: 'active',
          missingParameterCount: 1,
          waitingFor: 'value for "path"',
          createdAt: 1,
        },
      ],
    });
    assert.equal(prompt.purpose, 'continuity');
    assert.equal(
      prompt.user,
      'Workflow started by:\nsave my notes\n\n' +
        'Tool stack:\nsave_file [active] waiting for value for "path"\n\n' +
        'Conversation so far:\nuser: save my notes\n\n' +
        'New message:\nwhat time is it?'
    );
  });

  it('shortens long history entries', () => {
    const prompt = renderSelectionPrompt({
      request: 'next',
      history: [{ role: 'assistant', content: 'x'.repeat(2500), timestamp: 1 }],
      toolSummary: '(no tools registered)',
    });
    assert.ok(prompt.user.includes(`assistant: ${'x'.repeat(1997)}...\n\nUser request:`));
  });
});
