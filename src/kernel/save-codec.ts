import { z } from 'zod';
import { SaveGameError, saveMalformedError } from './save-error.js';
import { ALT_ROOM_COUNT, CARRIED, FLAG_COUNT, LIGHT_COUNTER_SLOT, type GameState, type World } from './types.js';

const IntegerText = z
  .string()
  .regex(/^-?\d+$/, 'expected an integer')
  .transform((value) => Number(value));

const FlagText = z
  .string()
  .regex(/^[01]$/, 'expected 0 or 1')
  .transform((value) => value === '1');

const SaveHeaderSchema = z.object({
  adventure: IntegerText,
  counter: IntegerText,
  currentRoom: IntegerText,
  lightTime: IntegerText,
});

export interface ParseSaveOptions {
  readonly adventureNumber: number;
  /** The save must hold exactly this many item locations plus one. */
  readonly numItems: number;
  /** Rooms and item locations must lie in 0..numRooms; items may also be carried. */
  readonly numRooms: number;
}

export const saveOptionsFor = (world: World): ParseSaveOptions => ({
  adventureNumber: world.trailer.adventureNumber,
  numItems: world.header.numItems,
  numRooms: world.header.numRooms,
});

export function serializeSaveGame(state: GameState, adventureNumber: number): string {
  const lines = [`adventure:${adventureNumber}`, `counter:${state.counter}`];

  for (let slot = 0; slot < LIGHT_COUNTER_SLOT; slot += 1) {
    lines.push(`altCounter${slot}:${state.altCounters[slot] ?? 0}`);
  }
  lines.push(`currentRoom:${state.currentRoom}`);
  for (let slot = 0; slot < ALT_ROOM_COUNT; slot += 1) {
    lines.push(`altRoom${slot}:${state.altRooms[slot] ?? 0}`);
  }
  for (let flag = 0; flag < FLAG_COUNT; flag += 1) {
    lines.push(`flag${flag}:${state.flags[flag] === true ? 1 : 0}`);
  }
  lines.push(`lightTime:${state.altCounters[LIGHT_COUNTER_SLOT] ?? 0}`);
  state.itemLocations.forEach((location, item) => {
    lines.push(`item${item}:${location}`);
  });

  return `${lines.join('\n')}\n`;
}

function readRecord(text: string): Map<string, string> {
  const record = new Map<string, string>();

  text.split(/\r?\n/).forEach((raw, lineIndex) => {
    const line = raw.trim();
    if (line === '' || line.startsWith('--')) {
      return;
    }

    const separator = line.indexOf(':');
    if (separator <= 0) {
      throw saveMalformedError('Save line is not a key:value pair.', { line: lineIndex + 1, text: line });
    }

    const key = line.slice(0, separator).trim();
    if (record.has(key)) {
      throw saveMalformedError(`Save key ${key} appears twice.`, { line: lineIndex + 1, key });
    }
    record.set(key, line.slice(separator + 1).trim());
  });

  return record;
}

function readIndexed<T>(
  record: Map<string, string>,
  prefix: string,
  count: number,
  schema: z.ZodType<T, z.ZodTypeDef, string>,
): T[] {
  return Array.from({ length: count }, (_unused, index) => {
    const key = `${prefix}${index}`;
    const parsed = schema.safeParse(record.get(key));
    if (!parsed.success) {
      throw saveMalformedError(`Save field ${key} is missing or invalid.`, { key, value: record.get(key) ?? null });
    }
    return parsed.data;
  });
}

const countItems = (record: Map<string, string>): number => {
  let count = 0;
  while (record.has(`item${count}`)) {
    count += 1;
  }
  return count;
};

/** Decodes a save file. Fails as a whole; no partial state is ever returned. */
export function parseSaveGame(text: string, options: ParseSaveOptions): GameState {
  const record = readRecord(text);
  const header = SaveHeaderSchema.safeParse(Object.fromEntries(record));
  if (!header.success) {
    throw saveMalformedError('Save header fields are missing or invalid.', {
      issues: header.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  if (header.data.adventure !== options.adventureNumber) {
    throw new SaveGameError('SAVE_ADVENTURE_MISMATCH', 'Save belongs to a different adventure.', {
      expected: options.adventureNumber,
      actual: header.data.adventure,
    });
  }

  const itemCount = countItems(record);
  if (itemCount !== options.numItems + 1) {
    throw new SaveGameError('SAVE_ITEM_COUNT_MISMATCH', 'Save item table does not match the adventure.', {
      expected: options.numItems + 1,
      actual: itemCount,
    });
  }

  const altCounters = readIndexed(record, 'altCounter', LIGHT_COUNTER_SLOT, IntegerText);
  altCounters.push(header.data.lightTime);

  const state: GameState = {
    currentRoom: header.data.currentRoom,
    itemLocations: readIndexed(record, 'item', itemCount, IntegerText),
    flags: readIndexed(record, 'flag', FLAG_COUNT, FlagText),
    counter: header.data.counter,
    altCounters,
    altRooms: readIndexed(record, 'altRoom', ALT_ROOM_COUNT, IntegerText),
    continuation: false,
  };
  checkRanges(state, options.numRooms);
  return state;
}

function checkRanges(state: GameState, numRooms: number): void {
  const isRoom = (value: number): boolean => value >= 0 && value <= numRooms;

  if (state.counter < -1) {
    throw saveMalformedError('Save field counter is below -1.', { key: 'counter', value: state.counter });
  }
  if (!isRoom(state.currentRoom)) {
    throw saveMalformedError('Save field currentRoom names no room.', {
      key: 'currentRoom',
      value: state.currentRoom,
      numRooms,
    });
  }
  state.altRooms.forEach((room, slot) => {
    if (!isRoom(room)) {
      throw saveMalformedError(`Save field altRoom${slot} names no room.`, { key: `altRoom${slot}`, value: room, numRooms });
    }
  });
  state.itemLocations.forEach((location, item) => {
    if (!isRoom(location) && location !== CARRIED) {
      throw saveMalformedError(`Save field item${item} is neither a room nor carried.`, {
        key: `item${item}`,
        value: location,
        numRooms,
      });
    }
  });
}
