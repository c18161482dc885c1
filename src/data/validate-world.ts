import { createAdventureRuntime, type AdventureRuntime } from '../kernel/adventure-runtime.js';
import { lookupCommand, messageNumberForOpcode, operandFault } from '../kernel/command-dispatch.js';
import type { Diagnostic, DiagnosticSeverity } from '../kernel/diagnostics.js';
import { CONDITION_TABLE } from '../kernel/eval-condition.js';
import { createParameterChannel } from '../kernel/parameter-channel.js';
import { isFlagIndex, isItemIndex, isRoomIndex } from '../kernel/state.js';
import { CARRIED, type DecodedAction, type World } from '../kernel/types.js';

export interface ValidateWorldOptions {
  /** Severity given to out-of-range references. */
  readonly severity?: Extract<DiagnosticSeverity, 'error' | 'warning'>;
}

function validateConditions(
  runtime: AdventureRuntime,
  action: DecodedAction,
  severity: DiagnosticSeverity,
  diagnostics: Diagnostic[],
): void {
  action.conditions.forEach((condition, slot) => {
    const def = CONDITION_TABLE[condition.code];
    if (def === undefined) {
      return;
    }

    const path = `actions[${action.index}].conditions[${slot}]`;
    const inRange =
      def.operand === 'item'
        ? isItemIndex(runtime, condition.parameter)
        : def.operand === 'room'
          ? isRoomIndex(runtime, condition.parameter)
          : def.operand === 'flag'
            ? isFlagIndex(condition.parameter)
            : true;

    if (!inRange) {
      diagnostics.push({
        code: 'CONDITION_PARAMETER_OUT_OF_RANGE',
        path,
        severity,
        message: `${def.name} names ${def.operand} ${condition.parameter}, which does not exist.`,
      });
    }
  });
}

function validateCommands(
  runtime: AdventureRuntime,
  action: DecodedAction,
  severity: DiagnosticSeverity,
  diagnostics: Diagnostic[],
): void {
  const channel = createParameterChannel(action.parameters);

  action.commands.forEach((opcode, slot) => {
    if (opcode === 0) {
      return;
    }

    const path = `actions[${action.index}].commands[${slot}]`;
    const message = messageNumberForOpcode(opcode);
    if (message !== null && message > runtime.world.header.numMessages) {
      diagnostics.push({
        code: 'MESSAGE_OUT_OF_RANGE',
        path,
        severity,
        message: `Opcode ${opcode} shows message ${message}; the last message is ${runtime.world.header.numMessages}.`,
      });
      return;
    }

    const command = lookupCommand(opcode);
    if (command === null) {
      diagnostics.push({
        code: 'UNKNOWN_COMMAND',
        path,
        severity: 'warning',
        message: `Opcode ${opcode} is not a known command and will be ignored.`,
      });
      return;
    }

    const operands = channel.take(command.operands.length);
    if (operands === null) {
      diagnostics.push({
        code: 'PARAMETER_CHANNEL_EXHAUSTED',
        path,
        severity: 'warning',
        message: `${command.name} needs ${command.operands.length} parameter(s) but no PAR condition is left.`,
        suggestion: 'Add a PAR condition carrying the operand.',
      });
      return;
    }

    command.operands.forEach((kind, position) => {
      const value = operands[position] ?? 0;
      if (operandFault({ runtime }, kind, value) !== null) {
        diagnostics.push({
          code: 'COMMAND_PARAMETER_OUT_OF_RANGE',
          path,
          severity,
          message: `${command.name} operand ${position + 1} (${kind}) is out of range: ${value}.`,
        });
      }
    });
  });
}

export function validateWorld(world: World, options: ValidateWorldOptions = {}): Diagnostic[] {
  const severity = options.severity ?? 'error';
  const runtime = createAdventureRuntime(world);
  const diagnostics: Diagnostic[] = [];
  const { header } = world;

  for (const field of ['playerRoom', 'treasureRoom'] as const) {
    if (!isRoomIndex(runtime, header[field])) {
      diagnostics.push({
        code: 'HEADER_ROOM_OUT_OF_RANGE',
        path: `header.${field}`,
        severity,
        message: `${field} ${header[field]} is beyond the last room ${header.numRooms}.`,
      });
    }
  }

  world.rooms.forEach((room, index) => {
    room.exits.forEach((exit, direction) => {
      if (!isRoomIndex(runtime, exit)) {
        diagnostics.push({
          code: 'EXIT_OUT_OF_RANGE',
          path: `rooms[${index}].exits[${direction}]`,
          severity,
          message: `Exit leads to room ${exit}, which does not exist.`,
        });
      }
    });
  });

  world.items.forEach((item, index) => {
    if (!isRoomIndex(runtime, item.birthLocation) && item.birthLocation !== CARRIED) {
      diagnostics.push({
        code: 'ITEM_LOCATION_OUT_OF_RANGE',
        path: `items[${index}].location`,
        severity,
        message: `Item starts in room ${item.birthLocation}, which does not exist.`,
      });
    }
  });

  for (const action of runtime.actions) {
    validateConditions(runtime, action, severity, diagnostics);
    validateCommands(runtime, action, severity, diagnostics);
  }

  return diagnostics;
}
