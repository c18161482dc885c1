import type { EngineConfig } from '../config/engine-config.js';
import { runAutomaticPass, runPlayerPass } from './action-dispatch.js';
import { resolveAdventureRuntime, type AdventureRuntime } from './adventure-runtime.js';
import { dropItem, movePlayer, takeItem } from './builtins.js';
import type { CommandContext } from './command-context.js';
import { createCollector, traceBuiltin } from './execution-collector.js';
import { advanceLight } from './light.js';
import {
  DIRECTION_COUNT,
  type ExecutionCollector,
  type ExecutionOptions,
  type GameState,
  type HaltReason,
  type OutputEvent,
  type Rng,
  type TurnResult,
  type World,
} from './types.js';
import { describeInventory, describeRoom, describeScore, textEvent } from './views.js';
import { resolveDirection, resolveNoun, resolveVerb } from './vocabulary.js';

export interface TurnOptions extends ExecutionOptions {
  readonly config?: EngineConfig;
  /** Precomputed tables; takes precedence over `config`. */
  readonly runtime?: AdventureRuntime;
}

export type MetaCommand = 'look' | 'inventory' | 'score';

export type ParsedInput =
  | { readonly kind: 'invalid' }
  | { readonly kind: 'quit' }
  | { readonly kind: 'load' }
  | { readonly kind: 'meta'; readonly command: MetaCommand }
  | { readonly kind: 'move'; readonly direction: number; readonly nounText: string }
  | { readonly kind: 'command'; readonly verb: number; readonly noun: number; readonly nounText: string };

const META_WORDS: Readonly<Record<string, MetaCommand>> = {
  L: 'look',
  LOOK: 'look',
  I: 'inventory',
  INV: 'inventory',
  INVENTORY: 'inventory',
  SCORE: 'score',
};

const SINGLE_LETTER_DIRECTIONS = new Set(['N', 'S', 'E', 'W', 'U', 'D']);

function parseSingleWord(runtime: AdventureRuntime, word: string): ParsedInput {
  const upper = word.toUpperCase();
  if (upper === 'QUIT') {
    return { kind: 'quit' };
  }
  if (upper === 'LOAD') {
    return { kind: 'load' };
  }

  if (!SINGLE_LETTER_DIRECTIONS.has(upper)) {
    const verb = resolveVerb(runtime, word);
    if (verb !== null) {
      return { kind: 'command', verb, noun: 0, nounText: '' };
    }
  }

  const direction = resolveDirection(runtime, word);
  if (direction !== null) {
    return { kind: 'move', direction, nounText: word };
  }

  const meta = META_WORDS[upper];
  return meta === undefined ? { kind: 'invalid' } : { kind: 'meta', command: meta };
}

/** Splits a line into at most two words and resolves them against the vocabulary. */
export function parsePlayerInput(runtime: AdventureRuntime, line: string): ParsedInput {
  const words = line.trim().split(/\s+/).filter((word) => word !== '');
  const [first, second] = words;
  if (first === undefined || words.length > 2) {
    return { kind: 'invalid' };
  }

  if (second === undefined) {
    return parseSingleWord(runtime, first);
  }
  if (first.toUpperCase() === 'RESTORE' && second.toUpperCase() === 'GAME') {
    return { kind: 'load' };
  }

  const verb = resolveVerb(runtime, first);
  if (verb === null) {
    return { kind: 'invalid' };
  }

  const noun = resolveNoun(runtime, second) ?? 0;
  if (verb === runtime.config.verbs.go) {
    const direction = noun >= 1 && noun <= DIRECTION_COUNT ? noun : resolveDirection(runtime, second);
    if (direction !== null) {
      return { kind: 'move', direction, nounText: second };
    }
  }

  return { kind: 'command', verb, noun, nounText: second };
}

function toResult(
  collector: ExecutionCollector,
  state: GameState,
  rng: Rng,
  events: readonly OutputEvent[],
  halted: HaltReason | null,
  consumedTurn: boolean,
): TurnResult {
  return { state, rng, events, halted, consumedTurn, warnings: collector.warnings, trace: collector.trace };
}

/** Light step then the automatic pass, for every turn the player spent. */
function finishTurn(
  ctx: CommandContext & { readonly collector: ExecutionCollector },
  state: GameState,
  rng: Rng,
  events: readonly OutputEvent[],
): TurnResult {
  const light = advanceLight(ctx.runtime, state, ctx.collector);
  const automatic = runAutomaticPass(ctx, light.state, rng);

  return toResult(
    ctx.collector,
    automatic.state,
    automatic.rng,
    [...events, ...light.events, ...automatic.events],
    automatic.halt,
    true,
  );
}

/** Shows the starting room and runs the opening automatic pass. */
export function startGame(world: World, state: GameState, rng: Rng, options: TurnOptions = {}): TurnResult {
  const runtime = options.runtime ?? resolveAdventureRuntime(world, options.config);
  const collector = createCollector(options);
  const ctx = { runtime, collector, nounText: '' };
  const automatic = runAutomaticPass(ctx, state, rng);

  return toResult(
    collector,
    automatic.state,
    automatic.rng,
    [...describeRoom(runtime, state), ...automatic.events],
    automatic.halt,
    false,
  );
}

export function processTurn(
  world: World,
  state: GameState,
  rng: Rng,
  line: string,
  options: TurnOptions = {},
): TurnResult {
  const runtime = options.runtime ?? resolveAdventureRuntime(world, options.config);
  const collector = createCollector(options);
  const { messages, verbs } = runtime.config;
  const parsed = parsePlayerInput(runtime, line);

  switch (parsed.kind) {
    case 'invalid':
      return toResult(collector, state, rng, [textEvent(messages.notUnderstood)], null, false);
    case 'quit':
      traceBuiltin(collector, 'quit');
      return toResult(collector, state, rng, [], 'quit', false);
    case 'load':
      traceBuiltin(collector, 'load');
      return toResult(collector, state, rng, [{ kind: 'loadRequested' }], null, false);
    case 'meta': {
      traceBuiltin(collector, parsed.command);
      if (parsed.command === 'score') {
        const report = describeScore(runtime, state);
        return toResult(collector, state, rng, report.events, report.victory ? 'victory' : null, false);
      }
      const events = parsed.command === 'look' ? describeRoom(runtime, state) : describeInventory(runtime, state);
      return toResult(collector, state, rng, events, null, false);
    }
    case 'move': {
      const ctx = { runtime, collector, nounText: parsed.nounText };
      const moved = movePlayer(ctx, state, rng, parsed.direction);
      return finishTurn(ctx, moved.state, moved.rng, moved.events);
    }
    case 'command': {
      const ctx = { runtime, collector, nounText: parsed.nounText };
      const player = runPlayerPass(ctx, state, parsed.verb, parsed.noun);
      if (player.halt !== null) {
        return toResult(collector, player.state, rng, player.events, player.halt, true);
      }
      if (player.outcome === 'executed') {
        return finishTurn(ctx, player.state, rng, player.events);
      }
      if (parsed.verb === verbs.get) {
        const taken = takeItem(ctx, state);
        return finishTurn(ctx, taken.state, rng, taken.events);
      }
      if (parsed.verb === verbs.drop) {
        const dropped = dropItem(ctx, state);
        return finishTurn(ctx, dropped.state, rng, dropped.events);
      }
      if (player.outcome === 'conditionsFailed') {
        return finishTurn(ctx, state, rng, [textEvent(messages.cantDoYet)]);
      }
      return toResult(collector, state, rng, [textEvent(messages.notUnderstood)], null, false);
    }
    default: {
      const exhaustive: never = parsed;
      return exhaustive;
    }
  }
}
