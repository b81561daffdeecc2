import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  looksLikeParameterValue,
  matchesContextSwitchPhrase,
  parseYesNo,
} from '../engine/heuristics.js';

describe('matchesContextSwitchPhrase', () => {
  it('detects explicit topic changes', () => {
    assert.equal(matchesContextSwitchPhrase('Never mind that'), true);
    assert.equal(matchesContextSwitchPhrase('forget about the file'), true);
    assert.equal(matchesContextSwitchPhrase('Let’s talk about dinner'), true);
  });

  it('ignores ordinary answers', () => {
    assert.equal(matchesContextSwitchPhrase('celsius'), false);
    assert.equal(matchesContextSwitchPhrase('save it to notes.txt'), false);
  });
});

describe('looksLikeParameterValue', () => {
  it('accepts short statements', () => {
    assert.equal(looksLikeParameterValue('32'), true);
    assert.equal(looksLikeParameterValue('src/main.ts'), true);
    assert.equal(looksLikeParameterValue('one two three four five'), true);
  });

  it('rejects questions, blanks and long messages', () => {
    assert.equal(looksLikeParameterValue('why?'), false);
    assert.equal(looksLikeParameterValue('   '), false);
    assert.equal(looksLikeParameterValue('one two three four five six'), false);
  });
});

describe('parseYesNo', () => {
  it('reads affirmative answers', () => {
    for (const answer of ['y', 'Yes', 'sure.', 'go ahead', 'OK!']) {
      assert.equal(parseYesNo(answer), 'yes', answer);
    }
  });

  it('reads negative answers', () => {
    for (const answer of ['n', 'No.', 'nope', 'cancel']) {
      assert.equal(parseYesNo(answer), 'no', answer);
    }
  });

  it('returns undefined for anything else', () => {
    assert.equal(parseYesNo('maybe'), undefined);
    assert.equal(parseYesNo('yes please do it'), undefined);
  });
});
