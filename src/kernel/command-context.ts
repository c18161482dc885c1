import type { AdventureRuntime } from './adventure-runtime.js';
import type { ExecutionCollector, GameState, HaltReason, OutputEvent } from './types.js';

export interface CommandContext {
  readonly runtime: AdventureRuntime;
  readonly collector?: ExecutionCollector;
  /** The noun exactly as the player typed it, for the echo commands. */
  readonly nounText: string;
}

export interface CommandOutcome {
  readonly state: GameState;
  readonly events?: readonly OutputEvent[];
  readonly halt?: HaltReason;
}

export type CommandOperand = 'item' | 'room' | 'itemDestination' | 'flag' | 'counterValue' | 'altCounter' | 'altRoom';

export interface CommandDef {
  readonly name: string;
  readonly operands: readonly CommandOperand[];
  readonly apply: (ctx: CommandContext, state: GameState, operands: readonly number[]) => CommandOutcome;
}

export const operandAt = (operands: readonly number[], position: number): number => operands[position] ?? 0;
