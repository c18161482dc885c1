import type { AdventureRuntime } from './adventure-runtime.js';
import type { CommandContext } from './command-context.js';
import { traceBuiltin } from './execution-collector.js';
import { rollPercent } from './prng.js';
import { carriedCount, isDark, withFlag, withItemLocation } from './state.js';
import { CARRIED, DARK_FLAG, type GameState, type OutputEvent, type Rng } from './types.js';
import { normalizeWord } from './vocabulary.js';
import { describeRoom, textEvent } from './views.js';

export interface BuiltinResult {
  readonly state: GameState;
  readonly events: readonly OutputEvent[];
}

export interface MoveResult extends BuiltinResult {
  readonly rng: Rng;
}

const descriptionWords = (description: string): readonly string[] =>
  description
    .toUpperCase()
    .split(/[^A-Z0-9]+/)
    .filter((word) => word !== '');

/**
 * Finds the item a typed word refers to among items whose location passes
 * `inScope`. The auto-get word is preferred over words of the description.
 */
export function findItemByWord(
  runtime: AdventureRuntime,
  state: GameState,
  word: string,
  inScope: (location: number) => boolean,
): number | null {
  const { wordLength } = runtime.world.header;
  const key = normalizeWord(word, wordLength);
  if (key === '') {
    return null;
  }

  const candidates = runtime.world.items.flatMap((item, index) => {
    const location = state.itemLocations[index];
    return location !== undefined && inScope(location) ? [{ item, index }] : [];
  });

  const byAutoGet = candidates.find(
    ({ item }) => item.autoGet !== null && normalizeWord(item.autoGet, wordLength) === key,
  );
  if (byAutoGet !== undefined) {
    return byAutoGet.index;
  }

  const byDescription = candidates.find(({ item }) =>
    descriptionWords(item.description).some((candidate) => normalizeWord(candidate, wordLength) === key),
  );
  return byDescription?.index ?? null;
}

export function movePlayer(ctx: CommandContext, state: GameState, rng: Rng, direction: number): MoveResult {
  const { runtime } = ctx;
  const { messages, darkFallChance } = runtime.config;
  const events: OutputEvent[] = [];
  let cursor = rng;

  traceBuiltin(ctx.collector, 'move', String(direction));
  if (isDark(runtime, state)) {
    events.push(textEvent(messages.dangerousDark));
    const [roll, nextRng] = rollPercent(cursor);
    cursor = nextRng;
    if (roll <= darkFallChance) {
      const fallen: GameState = { ...withFlag(state, DARK_FLAG, false), currentRoom: runtime.world.header.numRooms };
      events.push(textEvent(messages.fellInDark), textEvent(messages.dead), ...describeRoom(runtime, fallen));
      return { state: fallen, rng: cursor, events };
    }
  }

  const target = runtime.world.rooms[state.currentRoom]?.exits[direction - 1] ?? 0;
  if (target === 0) {
    events.push(textEvent(messages.cantGoThatWay));
    return { state, rng: cursor, events };
  }

  const moved: GameState = { ...state, currentRoom: target };
  events.push(...describeRoom(runtime, moved));
  return { state: moved, rng: cursor, events };
}

export function takeItem(ctx: CommandContext, state: GameState): BuiltinResult {
  const { runtime, nounText } = ctx;
  const { messages } = runtime.config;
  traceBuiltin(ctx.collector, 'get', nounText);

  if (nounText === '') {
    return { state, events: [textEvent(messages.what)] };
  }
  if (isDark(runtime, state)) {
    return { state, events: [textEvent(messages.tooDark)] };
  }

  const item = findItemByWord(runtime, state, nounText, (location) => location === state.currentRoom);
  if (item === null) {
    return { state, events: [textEvent(messages.notHere)] };
  }
  if (carriedCount(state) >= runtime.world.header.maxCarry) {
    return { state, events: [textEvent(messages.tooMuchToCarry)] };
  }

  return { state: withItemLocation(state, item, CARRIED), events: [textEvent(messages.ok)] };
}

export function dropItem(ctx: CommandContext, state: GameState): BuiltinResult {
  const { runtime, nounText } = ctx;
  const { messages } = runtime.config;
  traceBuiltin(ctx.collector, 'drop', nounText);

  if (nounText === '') {
    return { state, events: [textEvent(messages.what)] };
  }

  const item = findItemByWord(runtime, state, nounText, (location) => location === CARRIED);
  if (item === null) {
    return { state, events: [textEvent(messages.notCarrying)] };
  }

  return { state: withItemLocation(state, item, state.currentRoom), events: [textEvent(messages.ok)] };
}
