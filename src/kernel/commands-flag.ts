import { operandAt, type CommandDef } from './command-context.js';
import { withFlag } from './state.js';
import { DARK_FLAG } from './types.js';

const fixedFlag = (name: string, flag: number, value: boolean): CommandDef => ({
  name,
  operands: [],
  apply: (_ctx, state) => ({ state: withFlag(state, flag, value) }),
});

export const FLAG_COMMANDS: Readonly<Record<number, CommandDef>> = {
  56: fixedFlag('NIGHT', DARK_FLAG, true),
  57: fixedFlag('DAY', DARK_FLAG, false),
  58: {
    name: 'SETz',
    operands: ['flag'],
    apply: (_ctx, state, operands) => ({ state: withFlag(state, operandAt(operands, 0), true) }),
  },
  60: {
    name: 'CLRz',
    operands: ['flag'],
    apply: (_ctx, state, operands) => ({ state: withFlag(state, operandAt(operands, 0), false) }),
  },
  67: fixedFlag('SET0', 0, true),
  68: fixedFlag('CLR0', 0, false),
};
