import type { CommandContext, CommandDef, CommandOperand, CommandOutcome } from './command-context.js';
import { CONTROL_COMMANDS } from './commands-control.js';
import { FLAG_COMMANDS } from './commands-flag.js';
import { ITEM_COMMANDS } from './commands-item.js';
import { REGISTER_COMMANDS } from './commands-register.js';
import { emitWarning } from './execution-collector.js';
import { createParameterChannel, type ParameterChannel } from './parameter-channel.js';
import { isFlagIndex, isItemIndex, isRoomIndex } from './state.js';
import {
  ALT_COUNTER_COUNT,
  ALT_ROOM_COUNT,
  CARRIED,
  type DecodedAction,
  type GameState,
  type HaltReason,
  type OutputEvent,
  type RuntimeWarningCode,
} from './types.js';
import { textEvent } from './views.js';

const COMMAND_TABLE: Readonly<Record<number, CommandDef>> = {
  ...ITEM_COMMANDS,
  ...FLAG_COMMANDS,
  ...REGISTER_COMMANDS,
  ...CONTROL_COMMANDS,
};

/** Message shown by a message opcode: 1..51 directly, 102..151 offset by 50. */
export function messageNumberForOpcode(opcode: number): number | null {
  if (opcode >= 1 && opcode <= 51) return opcode;
  if (opcode >= 102 && opcode <= 151) return opcode - 50;
  return null;
}

const messageCommand = (message: number): CommandDef => ({
  name: `MSG${message}`,
  operands: [],
  apply: (ctx, state) => {
    const text = ctx.runtime.world.messages[message];
    if (text === undefined) {
      emitWarning(ctx.collector, {
        code: 'MESSAGE_OUT_OF_RANGE',
        message: `Message ${message} does not exist.`,
        context: { message },
      });
      return { state };
    }
    return { state, events: [textEvent(text)] };
  },
});

export function lookupCommand(opcode: number): CommandDef | null {
  const message = messageNumberForOpcode(opcode);
  if (message !== null) {
    return messageCommand(message);
  }

  return COMMAND_TABLE[opcode] ?? null;
}

export function operandFault(
  ctx: Pick<CommandContext, 'runtime'>,
  kind: CommandOperand,
  value: number,
): RuntimeWarningCode | null {
  switch (kind) {
    case 'item':
      return isItemIndex(ctx.runtime, value) ? null : 'ITEM_OUT_OF_RANGE';
    case 'room':
      return isRoomIndex(ctx.runtime, value) ? null : 'ROOM_OUT_OF_RANGE';
    case 'itemDestination':
      return isRoomIndex(ctx.runtime, value) || value === CARRIED ? null : 'ROOM_OUT_OF_RANGE';
    case 'flag':
      return isFlagIndex(value) ? null : 'FLAG_OUT_OF_RANGE';
    case 'altCounter':
      return Number.isInteger(value) && value >= 0 && value < ALT_COUNTER_COUNT ? null : 'REGISTER_OUT_OF_RANGE';
    case 'altRoom':
      return Number.isInteger(value) && value >= 0 && value < ALT_ROOM_COUNT ? null : 'REGISTER_OUT_OF_RANGE';
    case 'counterValue':
      return null;
    default: {
      const exhaustive: never = kind;
      return exhaustive;
    }
  }
}

/** Runs one opcode, drawing its operands from the channel. Faults are skipped with a warning. */
export function executeCommand(
  ctx: CommandContext,
  state: GameState,
  opcode: number,
  channel: ParameterChannel,
): CommandOutcome {
  const command = lookupCommand(opcode);
  if (command === null) {
    emitWarning(ctx.collector, {
      code: 'UNKNOWN_COMMAND',
      message: `Command opcode ${opcode} is not defined.`,
      context: { opcode },
    });
    return { state };
  }

  const operands = channel.take(command.operands.length);
  if (operands === null) {
    emitWarning(ctx.collector, {
      code: 'PARAMETER_CHANNEL_EXHAUSTED',
      message: `Command ${command.name} needs ${command.operands.length} parameter(s) but the action has too few.`,
      context: { opcode, command: command.name },
    });
    return { state };
  }

  for (const [position, kind] of command.operands.entries()) {
    const value = operands[position] ?? 0;
    const fault = operandFault(ctx, kind, value);
    if (fault !== null) {
      emitWarning(ctx.collector, {
        code: fault,
        message: `Command ${command.name} operand ${position + 1} (${kind}) is out of range: ${value}.`,
        context: { opcode, command: command.name, position, value },
      });
      return { state };
    }
  }

  return command.apply(ctx, state, operands);
}

export interface ActionOutcome {
  readonly state: GameState;
  readonly events: readonly OutputEvent[];
  readonly halt: HaltReason | null;
}

/** Runs an action's four command slots in order, stopping early only on a halt. */
export function executeActionCommands(ctx: CommandContext, state: GameState, action: DecodedAction): ActionOutcome {
  const channel = createParameterChannel(action.parameters);
  const events: OutputEvent[] = [];
  let current = state;

  for (const opcode of action.commands) {
    if (opcode === 0) {
      continue;
    }

    const outcome = executeCommand(ctx, current, opcode, channel);
    current = outcome.state;
    if (outcome.events !== undefined) {
      events.push(...outcome.events);
    }
    if (outcome.halt !== undefined) {
      return { state: current, events, halt: outcome.halt };
    }
  }

  return { state: current, events, halt: null };
}
