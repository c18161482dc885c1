import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { validateWorld } from '../../src/data/index.js';
import { CARRIED, type RoomDef } from '../../src/kernel/index.js';
import { buildWorld, type ActionSpec } from '../helpers/world-builder.js';

const codesFor = (action: ActionSpec): string[] =>
  validateWorld(buildWorld({ actions: [action] })).map((diagnostic) => diagnostic.code);

describe('validateWorld', () => {
  it('accepts a consistent world', () => {
    assert.deepEqual(validateWorld(buildWorld()), []);
  });

  it('rejects header rooms beyond the room table', () => {
    const diagnostics = validateWorld(buildWorld({ header: { playerRoom: 7 } }));

    assert.deepEqual(diagnostics, [
      {
        code: 'HEADER_ROOM_OUT_OF_RANGE',
        path: 'header.playerRoom',
        severity: 'error',
        message: 'playerRoom 7 is beyond the last room 3.',
      },
    ]);
  });

  it('rejects exits and item locations that name missing rooms', () => {
    const rooms: RoomDef[] = [
      { exits: [0, 0, 0, 0, 0, 0], description: '' },
      { exits: [0, 0, 0, 0, 0, 9], description: 'hall' },
      { exits: [0, 0, 0, 0, 0, 0], description: 'vault' },
    ];
    const items = Array.from({ length: 10 }, (_unused, index) => ({
      description: `Item ${index}`,
      autoGet: null,
      birthLocation: index === 3 ? 40 : index === 4 ? CARRIED : 0,
    }));
    const diagnostics = validateWorld(buildWorld({ rooms, items }));

    assert.deepEqual(
      diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.path]),
      [
        ['EXIT_OUT_OF_RANGE', 'rooms[1].exits[5]'],
        ['ITEM_LOCATION_OUT_OF_RANGE', 'items[3].location'],
      ],
    );
  });

  it('checks condition parameters against what they name', () => {
    const diagnostics = validateWorld(buildWorld({ actions: [{ conditions: [[1, 40], [8, 32], [4, 2]] }] }));

    assert.deepEqual(
      diagnostics.map((diagnostic) => diagnostic.message),
      ['HAS names item 40, which does not exist.', 'BIT names flag 32, which does not exist.'],
    );
    assert.equal(diagnostics[0]?.path, 'actions[0].conditions[0]');
  });

  it('checks the messages an action shows', () => {
    const [diagnostic] = validateWorld(buildWorld({ actions: [{ commands: [40] }] }));

    assert.equal(diagnostic?.code, 'MESSAGE_OUT_OF_RANGE');
    assert.equal(diagnostic?.message, 'Opcode 40 shows message 40; the last message is 5.');
  });

  it('warns about unknown opcodes and starved commands', () => {
    assert.deepEqual(codesFor({ commands: [95] }), ['UNKNOWN_COMMAND']);
    assert.deepEqual(
      codesFor({
        conditions: [
          [4, 1],
          [4, 1],
          [4, 1],
          [4, 1],
          [4, 1],
        ],
        commands: [58],
      }),
      ['PARAMETER_CHANNEL_EXHAUSTED'],
    );
  });

  it('checks command operands drawn from PAR slots', () => {
    const diagnostics = validateWorld(buildWorld({ actions: [{ conditions: [[0, 2], [0, 300]], commands: [62] }] }));

    assert.deepEqual(diagnostics, [
      {
        code: 'COMMAND_PARAMETER_OUT_OF_RANGE',
        path: 'actions[0].commands[0]',
        severity: 'error',
        message: 'x->y operand 2 (itemDestination) is out of range: 300.',
      },
    ]);
  });

  it('lets carried be an item destination', () => {
    assert.deepEqual(codesFor({ conditions: [[0, 2], [0, CARRIED]], commands: [62] }), []);
  });

  it('downgrades reference errors to warnings on request', () => {
    const diagnostics = validateWorld(buildWorld({ header: { treasureRoom: 9 } }), { severity: 'warning' });
    assert.deepEqual(
      diagnostics.map((diagnostic) => diagnostic.severity),
      ['warning'],
    );
  });
});
