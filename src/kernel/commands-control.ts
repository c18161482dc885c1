import { operandAt, type CommandDef } from './command-context.js';
import { withFlag } from './state.js';
import { DARK_FLAG, type GameState } from './types.js';
import { describeInventory, describeRoom, describeScore, textEvent } from './views.js';

const look: CommandDef = {
  name: 'DspRM',
  operands: [],
  apply: (ctx, state) => ({ state, events: describeRoom(ctx.runtime, state) }),
};

export const CONTROL_COMMANDS: Readonly<Record<number, CommandDef>> = {
  54: {
    name: 'GOTOy',
    operands: ['room'],
    apply: (ctx, state, operands) => {
      const next: GameState = { ...state, currentRoom: operandAt(operands, 0) };
      return { state: next, events: describeRoom(ctx.runtime, next) };
    },
  },
  61: {
    name: 'DEAD',
    operands: [],
    apply: (ctx, state) => {
      const next: GameState = { ...withFlag(state, DARK_FLAG, false), currentRoom: ctx.runtime.world.header.numRooms };
      return {
        state: next,
        events: [textEvent(ctx.runtime.config.messages.dead), ...describeRoom(ctx.runtime, next)],
      };
    },
  },
  63: {
    name: 'FINI',
    operands: [],
    apply: (ctx, state) => ({ state, events: [textEvent(ctx.runtime.config.messages.gameOver)], halt: 'fini' }),
  },
  64: look,
  65: {
    name: 'SCORE',
    operands: [],
    apply: (ctx, state) => {
      const report = describeScore(ctx.runtime, state);
      if (report.victory) {
        return {
          state,
          events: [...report.events, textEvent(ctx.runtime.config.messages.gameOver)],
          halt: 'victory',
        };
      }
      return { state, events: report.events };
    },
  },
  66: {
    name: 'INV',
    operands: [],
    apply: (ctx, state) => ({ state, events: describeInventory(ctx.runtime, state) }),
  },
  70: { name: 'CLS', operands: [], apply: (_ctx, state) => ({ state, events: [{ kind: 'clearScreen' }] }) },
  71: { name: 'SAVE', operands: [], apply: (_ctx, state) => ({ state, events: [{ kind: 'saveRequested' }] }) },
  73: { name: 'CONT', operands: [], apply: (_ctx, state) => ({ state: { ...state, continuation: true } }) },
  76: look,
  84: {
    name: 'SAYw',
    operands: [],
    apply: (ctx, state) => ({ state, events: [{ kind: 'inline', text: ctx.nounText }] }),
  },
  85: { name: 'SAYwCR', operands: [], apply: (ctx, state) => ({ state, events: [textEvent(ctx.nounText)] }) },
  86: { name: 'SAYCR', operands: [], apply: (_ctx, state) => ({ state, events: [textEvent('')] }) },
  88: {
    name: 'DELAY',
    operands: [],
    apply: (ctx, state) => ({ state, events: [{ kind: 'pause', durationMs: ctx.runtime.config.delayMs }] }),
  },
};
