import { operandAt, type CommandDef } from './command-context.js';
import { carriedCount, itemLocation, replaceAt, withFlag, withItemLocation } from './state.js';
import { CARRIED, DESTROYED, LIGHT_COUNTER_SLOT, LIGHT_OUT_FLAG } from './types.js';
import { textEvent } from './views.js';

const destroy: CommandDef = {
  name: 'x->RM0',
  operands: ['item'],
  apply: (_ctx, state, operands) => ({ state: withItemLocation(state, operandAt(operands, 0), DESTROYED) }),
};

export const ITEM_COMMANDS: Readonly<Record<number, CommandDef>> = {
  52: {
    name: 'GETx',
    operands: ['item'],
    apply: (ctx, state, operands) => {
      if (carriedCount(state) >= ctx.runtime.world.header.maxCarry) {
        return { state, events: [textEvent(ctx.runtime.config.messages.tooMuchToCarry)] };
      }
      return { state: withItemLocation(state, operandAt(operands, 0), CARRIED) };
    },
  },
  53: {
    name: 'DROPx',
    operands: ['item'],
    apply: (_ctx, state, operands) => ({ state: withItemLocation(state, operandAt(operands, 0), state.currentRoom) }),
  },
  55: destroy,
  59: destroy,
  62: {
    name: 'x->y',
    operands: ['item', 'itemDestination'],
    apply: (_ctx, state, operands) => ({
      state: withItemLocation(state, operandAt(operands, 0), operandAt(operands, 1)),
    }),
  },
  69: {
    name: 'FILL',
    operands: [],
    apply: (ctx, state) => {
      const refilled = withFlag(
        { ...state, altCounters: replaceAt(state.altCounters, LIGHT_COUNTER_SLOT, ctx.runtime.world.header.lightTime) },
        LIGHT_OUT_FLAG,
        false,
      );
      return { state: withItemLocation(refilled, ctx.runtime.config.lightSourceItem, CARRIED) };
    },
  },
  72: {
    name: 'EXx,x',
    operands: ['item', 'item'],
    apply: (_ctx, state, operands) => {
      const first = operandAt(operands, 0);
      const second = operandAt(operands, 1);
      const firstLocation = itemLocation(state, first) ?? DESTROYED;
      const secondLocation = itemLocation(state, second) ?? DESTROYED;
      return { state: withItemLocation(withItemLocation(state, first, secondLocation), second, firstLocation) };
    },
  },
  74: {
    name: 'AGETx',
    operands: ['item'],
    apply: (_ctx, state, operands) => ({ state: withItemLocation(state, operandAt(operands, 0), CARRIED) }),
  },
  75: {
    name: 'BYx<-x',
    operands: ['item', 'item'],
    apply: (_ctx, state, operands) => ({
      state: withItemLocation(state, operandAt(operands, 0), itemLocation(state, operandAt(operands, 1)) ?? DESTROYED),
    }),
  },
};
