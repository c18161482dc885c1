import { operandAt, type CommandDef } from './command-context.js';
import { replaceAt } from './state.js';
import type { GameState } from './types.js';
import { describeRoom, textEvent } from './views.js';

const COUNTER_FLOOR = -1;

const withCounter = (state: GameState, counter: number): GameState => ({ ...state, counter });

/** Exchanges the current room with an alternate room register, then shows the new room. */
const swapRoom = (name: string, fixedSlot: number | null): CommandDef => ({
  name,
  operands: fixedSlot === null ? ['altRoom'] : [],
  apply: (ctx, state, operands) => {
    const slot = fixedSlot ?? operandAt(operands, 0);
    const stored = state.altRooms[slot] ?? 0;
    const next: GameState = {
      ...state,
      currentRoom: stored,
      altRooms: replaceAt(state.altRooms, slot, state.currentRoom),
    };
    return { state: next, events: describeRoom(ctx.runtime, next) };
  },
});

export const REGISTER_COMMANDS: Readonly<Record<number, CommandDef>> = {
  77: {
    name: 'CT-1',
    operands: [],
    apply: (_ctx, state) => ({ state: withCounter(state, Math.max(COUNTER_FLOOR, state.counter - 1)) }),
  },
  78: {
    name: 'DspCT',
    operands: [],
    apply: (_ctx, state) => ({ state, events: [textEvent(String(state.counter))] }),
  },
  79: {
    name: 'CT<-n',
    operands: ['counterValue'],
    apply: (_ctx, state, operands) => ({ state: withCounter(state, operandAt(operands, 0)) }),
  },
  80: swapRoom('EXRM0', 0),
  81: {
    name: 'EXm,CT',
    operands: ['altCounter'],
    apply: (_ctx, state, operands) => {
      const slot = operandAt(operands, 0);
      return {
        state: {
          ...state,
          counter: state.altCounters[slot] ?? 0,
          altCounters: replaceAt(state.altCounters, slot, state.counter),
        },
      };
    },
  },
  82: {
    name: 'CT+n',
    operands: ['counterValue'],
    apply: (_ctx, state, operands) => ({ state: withCounter(state, state.counter + operandAt(operands, 0)) }),
  },
  83: {
    name: 'CT-n',
    operands: ['counterValue'],
    apply: (_ctx, state, operands) => ({
      state: withCounter(state, Math.max(COUNTER_FLOOR, state.counter - operandAt(operands, 0))),
    }),
  },
  87: swapRoom('EXc,CR', null),
};
