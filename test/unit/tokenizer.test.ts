import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { isAdventureLoadErrorCode, tokenize } from '../../src/data/index.js';

describe('tokenize', () => {
  it('reads signed integers and quoted strings in order', () => {
    assert.deepEqual(tokenize('12 -3 "two words"'), [
      { kind: 'number', value: 12, line: 1 },
      { kind: 'number', value: -3, line: 1 },
      { kind: 'string', value: 'two words', quoted: true, line: 1 },
    ]);
  });

  it('keeps newlines inside quotes and counts lines after them', () => {
    const tokens = tokenize('"first\nsecond"\n7');
    assert.deepEqual(tokens, [
      { kind: 'string', value: 'first\nsecond', quoted: true, line: 1 },
      { kind: 'number', value: 7, line: 3 },
    ]);
  });

  it('ignores // comments outside quotes only', () => {
    const tokens = tokenize('1 // skipped 2\n"a // kept" 3');
    assert.deepEqual(
      tokens.map((token) => token.value),
      [1, 'a // kept', 3],
    );
  });

  it('starts a comment straight after a bare word', () => {
    assert.deepEqual(tokenize('12// trailing\n7'), [
      { kind: 'number', value: 12, line: 1 },
      { kind: 'number', value: 7, line: 2 },
    ]);
    assert.deepEqual(
      tokenize('KEY//note 3').map((token) => token.value),
      ['KEY'],
    );
  });

  it('keeps backquotes inside a string as they are', () => {
    const [token] = tokenize('"say `hi`"');
    assert.deepEqual(token, { kind: 'string', value: 'say `hi`', quoted: true, line: 1 });
  });

  it('treats a non-numeric bare run as an unquoted string', () => {
    assert.deepEqual(tokenize('12abc'), [{ kind: 'string', value: '12abc', quoted: false, line: 1 }]);
  });

  it('quoted digits stay strings', () => {
    assert.deepEqual(tokenize('"12"'), [{ kind: 'string', value: '12', quoted: true, line: 1 }]);
  });

  it('normalises CRLF line endings', () => {
    assert.deepEqual(
      tokenize('"a\r\nb"\r\n4').map((token) => token.value),
      ['a\nb', 4],
    );
  });

  it('fails on an unterminated quote', () => {
    assert.throws(
      () => tokenize('1 "never closed'),
      (error: unknown) => isAdventureLoadErrorCode(error, 'MALFORMED_INPUT'),
    );
  });
});
