import type { AdventureRuntime } from './adventure-runtime.js';
import { emitWarning } from './execution-collector.js';
import { carriedCount, isCarried, isFlagIndex, isHere, isItemIndex } from './state.js';
import { DESTROYED, type DecodedAction, type DecodedCondition, type ExecutionCollector, type GameState } from './types.js';

export interface ConditionContext {
  readonly runtime: AdventureRuntime;
  readonly collector?: ExecutionCollector;
}

export type ConditionOperand = 'none' | 'item' | 'room' | 'flag' | 'counter';

export interface ConditionDef {
  readonly name: string;
  readonly operand: ConditionOperand;
  readonly test: (ctx: ConditionContext, state: GameState, parameter: number) => boolean;
}

const atBirthLocation = (ctx: ConditionContext, state: GameState, item: number): boolean =>
  state.itemLocations[item] === ctx.runtime.world.items[item]?.birthLocation;

export const CONDITION_TABLE: readonly ConditionDef[] = [
  { name: 'PAR', operand: 'none', test: () => true },
  { name: 'HAS', operand: 'item', test: (_ctx, state, item) => isCarried(state, item) },
  { name: 'IN/W', operand: 'item', test: (_ctx, state, item) => isHere(state, item) },
  {
    name: 'AVL',
    operand: 'item',
    test: (_ctx, state, item) => isCarried(state, item) || isHere(state, item),
  },
  { name: 'IN', operand: 'room', test: (_ctx, state, room) => state.currentRoom === room },
  { name: '-IN/W', operand: 'item', test: (_ctx, state, item) => !isHere(state, item) },
  { name: '-HAVE', operand: 'item', test: (_ctx, state, item) => !isCarried(state, item) },
  { name: '-IN', operand: 'room', test: (_ctx, state, room) => state.currentRoom !== room },
  { name: 'BIT', operand: 'flag', test: (_ctx, state, flag) => state.flags[flag] === true },
  { name: '-BIT', operand: 'flag', test: (_ctx, state, flag) => state.flags[flag] !== true },
  { name: 'ANY', operand: 'none', test: (_ctx, state) => carriedCount(state) > 0 },
  { name: '-ANY', operand: 'none', test: (_ctx, state) => carriedCount(state) === 0 },
  {
    name: '-AVL',
    operand: 'item',
    test: (_ctx, state, item) => !isCarried(state, item) && !isHere(state, item),
  },
  { name: '-RM0', operand: 'item', test: (_ctx, state, item) => state.itemLocations[item] !== DESTROYED },
  { name: 'RM0', operand: 'item', test: (_ctx, state, item) => state.itemLocations[item] === DESTROYED },
  { name: 'CT<=', operand: 'counter', test: (_ctx, state, value) => state.counter <= value },
  { name: 'CT>', operand: 'counter', test: (_ctx, state, value) => state.counter > value },
  { name: 'ORIG', operand: 'item', test: (ctx, state, item) => atBirthLocation(ctx, state, item) },
  { name: '-ORIG', operand: 'item', test: (ctx, state, item) => !atBirthLocation(ctx, state, item) },
  { name: 'CT=', operand: 'counter', test: (_ctx, state, value) => state.counter === value },
];

export const conditionOperand = (code: number): ConditionOperand => CONDITION_TABLE[code]?.operand ?? 'none';

function operandInRange(ctx: ConditionContext, def: ConditionDef, condition: DecodedCondition): boolean {
  switch (def.operand) {
    case 'item':
      if (isItemIndex(ctx.runtime, condition.parameter)) return true;
      emitWarning(ctx.collector, {
        code: 'ITEM_OUT_OF_RANGE',
        message: `Condition ${def.name} names item ${condition.parameter}.`,
        context: { condition: def.name, parameter: condition.parameter },
      });
      return false;
    case 'flag':
      if (isFlagIndex(condition.parameter)) return true;
      emitWarning(ctx.collector, {
        code: 'FLAG_OUT_OF_RANGE',
        message: `Condition ${def.name} names flag ${condition.parameter}.`,
        context: { condition: def.name, parameter: condition.parameter },
      });
      return false;
    case 'none':
    case 'room':
    case 'counter':
      return true;
    default: {
      const exhaustive: never = def.operand;
      return exhaustive;
    }
  }
}

export function evaluateCondition(ctx: ConditionContext, state: GameState, condition: DecodedCondition): boolean {
  if (condition.code === 0) {
    return true;
  }

  const def = CONDITION_TABLE[condition.code];
  if (def === undefined) {
    return false;
  }

  return operandInRange(ctx, def, condition) && def.test(ctx, state, condition.parameter);
}

/** Left to right over the condition slots; stops at the first failure. */
export function evaluateConditions(ctx: ConditionContext, state: GameState, action: DecodedAction): boolean {
  for (const condition of action.conditions) {
    if (!evaluateCondition(ctx, state, condition)) {
      return false;
    }
  }

  return true;
}
