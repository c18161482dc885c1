import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { splitVocabulary } from '../../src/data/index.js';
import { normalizeWord, resolveDirection, resolveWord } from '../../src/kernel/index.js';
import { buildHarness } from '../helpers/world-builder.js';

const { verbs, nouns } = splitVocabulary(
  ['AUT', 'GO', '*WALK', '*RUN', 'GET', 'GETUP', 'ANY', 'NORTH', 'LAMP', '*LANTERN', 'LADDER', 'GOLD'],
  5,
  'sequential',
);

describe('normalizeWord', () => {
  it('upper-cases and truncates to the word length', () => {
    assert.equal(normalizeWord(' lantern ', 3), 'LAN');
    assert.equal(normalizeWord('go', 0), 'GO');
  });
});

describe('resolveWord', () => {
  it('maps a synonym to the primary word before it', () => {
    assert.equal(resolveWord(verbs, 'walk', 4), 1);
    assert.equal(resolveWord(verbs, 'RUN', 4), 1);
  });

  it('compares only the significant letters', () => {
    assert.equal(resolveWord(nouns, 'LAMPSHADE', 4), 2);
    assert.equal(resolveWord(nouns, 'LANTERN', 4), 2);
  });

  it('prefers an exact match over a prefix match', () => {
    assert.equal(resolveWord(verbs, 'GET', 5), 4);
    assert.equal(resolveWord(verbs, 'GETU', 5), 5);
  });

  it('tries every primary word before any synonym', () => {
    const split = splitVocabulary(['AUT', 'WAIT', '*GO', 'GOAD', 'ANY', 'NORTH', 'SOUTH', 'EAST'], 3, 'sequential');

    assert.equal(resolveWord(split.verbs, 'GO', 4), 3);
    assert.equal(resolveWord(split.verbs, 'GO', 2), 3);
    assert.equal(resolveWord(split.verbs, 'WAI', 4), 1);
  });

  it('accepts an unambiguous prefix', () => {
    assert.equal(resolveWord(nouns, 'GO', 4), 5);
    assert.equal(resolveWord(nouns, 'LAD', 4), 4);
  });

  it('never matches the placeholder entry', () => {
    assert.equal(resolveWord(verbs, 'AUT', 4), null);
    assert.equal(resolveWord(nouns, 'ANY', 4), null);
  });

  it('returns null for unknown or empty words', () => {
    assert.equal(resolveWord(verbs, 'XYZZY', 4), null);
    assert.equal(resolveWord(verbs, '   ', 4), null);
  });
});

describe('resolveDirection', () => {
  const { runtime } = buildHarness();

  it('accepts single letters and direction nouns', () => {
    assert.equal(resolveDirection(runtime, 'n'), 1);
    assert.equal(resolveDirection(runtime, 'D'), 6);
    assert.equal(resolveDirection(runtime, 'west'), 4);
  });

  it('ignores nouns that are not directions', () => {
    assert.equal(resolveDirection(runtime, 'LAMP'), null);
    assert.equal(resolveDirection(runtime, 'Q'), null);
  });
});
