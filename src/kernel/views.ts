import { formatTemplate } from '../config/engine-config.js';
import type { AdventureRuntime } from './adventure-runtime.js';
import { isDark } from './state.js';
import { CARRIED, type GameState, type ItemDef, type OutputEvent } from './types.js';

export const textEvent = (text: string): OutputEvent => ({ kind: 'text', text });

export const isTreasure = (item: ItemDef): boolean => item.description.startsWith('*');

const itemsAt = (runtime: AdventureRuntime, state: GameState, location: number): readonly string[] =>
  runtime.world.items
    .filter((item, index) => state.itemLocations[index] === location && item.description.trim() !== '')
    .map((item) => item.description);

export function describeRoom(runtime: AdventureRuntime, state: GameState): readonly OutputEvent[] {
  const messages = runtime.config.messages;
  if (isDark(runtime, state)) {
    return [textEvent(messages.tooDark)];
  }

  const room = runtime.world.rooms[state.currentRoom];
  if (room === undefined) {
    return [];
  }

  const events: OutputEvent[] = [
    textEvent(room.description.startsWith('*') ? room.description.slice(1) : `${messages.roomPrefix}${room.description}`),
  ];

  const exits = room.exits.flatMap((target, direction) =>
    target === 0 ? [] : [messages.directions[direction] ?? String(direction + 1)],
  );
  events.push(textEvent(formatTemplate(messages.exits, { exits: exits.length > 0 ? exits.join(', ') : messages.noExits })));

  const visible = itemsAt(runtime, state, state.currentRoom);
  if (visible.length > 0) {
    events.push(textEvent(formatTemplate(messages.alsoSee, { items: visible.join(' - ') })));
  }

  return events;
}

export function describeInventory(runtime: AdventureRuntime, state: GameState): readonly OutputEvent[] {
  const carried = itemsAt(runtime, state, CARRIED);
  const messages = runtime.config.messages;

  return [
    textEvent(messages.inventoryHeader),
    ...(carried.length > 0 ? carried.map(textEvent) : [textEvent(messages.inventoryEmpty)]),
  ];
}

export interface ScoreReport {
  readonly stored: number;
  readonly total: number;
  readonly rating: number;
  readonly victory: boolean;
  readonly events: readonly OutputEvent[];
}

export function describeScore(runtime: AdventureRuntime, state: GameState): ScoreReport {
  const { treasureRoom, treasures: total } = runtime.world.header;
  const stored = runtime.world.items.filter(
    (item, index) => isTreasure(item) && state.itemLocations[index] === treasureRoom,
  ).length;
  const rating = total > 0 ? Math.floor((stored * 100) / total) : 0;
  const victory = total > 0 && stored >= total;
  const messages = runtime.config.messages;

  const events = [
    textEvent(formatTemplate(messages.scoreStored, { stored })),
    textEvent(formatTemplate(messages.scoreRating, { rating })),
  ];
  if (victory) {
    events.push(textEvent(messages.victory));
  }

  return { stored, total, rating, victory, events };
}
