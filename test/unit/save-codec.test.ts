import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  assertStateRoundTrip,
  CARRIED,
  isSaveGameErrorCode,
  parseSaveGame,
  serializeSaveGame,
  type GameState,
} from '../../src/kernel/index.js';
import { buildHarness, buildWorld, placeItem, setFlag } from '../helpers/world-builder.js';

const EXPECTED = { adventureNumber: 42, numItems: 9, numRooms: 3 };

const played = (): GameState => {
  const { state } = buildHarness();
  return {
    ...setFlag(placeItem(state, 4, CARRIED), 15),
    currentRoom: 2,
    counter: -1,
    altCounters: [3, 0, 0, 0, 0, 0, 0, 9, 42],
    altRooms: [0, 3, 0, 0, 0, 1],
  };
};

describe('serializeSaveGame', () => {
  it('writes one key:value line per field in a fixed order', () => {
    const lines = serializeSaveGame(played(), 42).trimEnd().split('\n');

    assert.deepEqual(lines.slice(0, 3), ['adventure:42', 'counter:-1', 'altCounter0:3']);
    assert.equal(lines[9], 'altCounter7:9');
    assert.equal(lines[10], 'currentRoom:2');
    assert.equal(lines[12], 'altRoom1:3');
    assert.equal(lines[17 + 15], 'flag15:1');
    assert.equal(lines[49], 'lightTime:42');
    assert.deepEqual(lines.slice(50, 52), ['item0:0', 'item1:0']);
    assert.equal(lines[54], `item4:${CARRIED}`);
    assert.equal(lines.length, 60);
  });
});

describe('parseSaveGame', () => {
  it('restores the state it was given', () => {
    const state = played();
    const restored = parseSaveGame(serializeSaveGame(state, 42), EXPECTED);

    assert.deepEqual(restored, state);
    assertStateRoundTrip({ ...state, continuation: true }, buildWorld());
  });

  it('ignores blank lines and comments', () => {
    const text = `-- saved at the vault door\n\n${serializeSaveGame(played(), 42)}`;
    assert.deepEqual(parseSaveGame(text, EXPECTED), played());
  });

  it('refuses a save from another adventure', () => {
    assert.throws(
      () => parseSaveGame(serializeSaveGame(played(), 42), { ...EXPECTED, adventureNumber: 7 }),
      (error: unknown) => isSaveGameErrorCode(error, 'SAVE_ADVENTURE_MISMATCH'),
    );
  });

  it('refuses an item table of the wrong size', () => {
    assert.throws(
      () => parseSaveGame(serializeSaveGame(played(), 42), { ...EXPECTED, numItems: 5 }),
      (error: unknown) => isSaveGameErrorCode(error, 'SAVE_ITEM_COUNT_MISMATCH'),
    );
  });

  it('rejects malformed content as a whole', () => {
    const text = serializeSaveGame(played(), 42);
    const malformed = [
      text.replace('flag3:0', 'flag3:2'),
      text.replace('counter:-1\n', ''),
      text.replace('altRoom2:0', 'altRoom2:two'),
      `${text}counter:4\n`,
      `${text}garbage\n`,
    ];

    for (const candidate of malformed) {
      assert.throws(
        () => parseSaveGame(candidate, EXPECTED),
        (error: unknown) => isSaveGameErrorCode(error, 'SAVE_MALFORMED'),
      );
    }
  });

  it('rejects values outside the world', () => {
    const text = serializeSaveGame(played(), 42);
    const outOfRange = [
      text.replace('counter:-1', 'counter:-50'),
      text.replace('currentRoom:2', 'currentRoom:999'),
      text.replace('altRoom1:3', 'altRoom1:4'),
      text.replace('item1:0', 'item1:300'),
      text.replace('item2:0', 'item2:-1'),
    ];

    for (const candidate of outOfRange) {
      assert.throws(
        () => parseSaveGame(candidate, EXPECTED),
        (error: unknown) => isSaveGameErrorCode(error, 'SAVE_MALFORMED'),
      );
    }
  });

  it('accepts the edges of each range', () => {
    const edges = { ...played(), currentRoom: 0, counter: -1, altRooms: [3, 3, 0, 0, 0, 0] };
    assert.deepEqual(parseSaveGame(serializeSaveGame(edges, 42), EXPECTED), edges);
  });

  it('names the field that is out of range', () => {
    const text = serializeSaveGame(played(), 42).replace('item1:0', 'item1:300');
    assert.throws(
      () => parseSaveGame(text, EXPECTED),
      (error: unknown) =>
        isSaveGameErrorCode(error, 'SAVE_MALFORMED') &&
        error.context?.['key'] === 'item1' &&
        error.context['value'] === 300,
    );
  });
});
