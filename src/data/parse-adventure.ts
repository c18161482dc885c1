import { z } from 'zod';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config/engine-config.js';
import { computeChecksum } from '../kernel/codec.js';
import { hasErrorDiagnostics, type Diagnostic } from '../kernel/diagnostics.js';
import { createInitialState } from '../kernel/state.js';
import {
  COMMAND_SLOTS,
  CONDITION_SLOTS,
  DIRECTION_COUNT,
  type AdventureHeader,
  type AdventureTrailer,
  type GameState,
  type ItemDef,
  type RawAction,
  type RoomDef,
  type World,
} from '../kernel/types.js';
import { AdventureLoadError } from './load-error.js';
import { TokenCursor } from './token-cursor.js';
import { tokenize } from './tokenizer.js';
import { validateWorld } from './validate-world.js';
import { splitVocabulary } from './vocabulary-words.js';

export interface ParseAdventureOptions {
  readonly config?: EngineConfig;
  readonly sourceId?: string;
}

export interface LoadedAdventure {
  readonly world: World;
  readonly state: GameState;
  readonly diagnostics: readonly Diagnostic[];
}

const Count = z.number().int().min(0);

const HeaderSchema = z
  .object({
    textStorageBytes: Count,
    numItems: Count,
    numActions: Count,
    numWords: Count,
    numRooms: Count,
    maxCarry: Count,
    playerRoom: Count,
    treasures: Count,
    wordLength: Count,
    lightTime: Count,
    numMessages: Count,
    treasureRoom: Count,
  })
  .strict();

const HEADER_FIELDS = [
  'textStorageBytes',
  'numItems',
  'numActions',
  'numWords',
  'numRooms',
  'maxCarry',
  'playerRoom',
  'treasures',
  'wordLength',
  'lightTime',
  'numMessages',
  'treasureRoom',
] as const satisfies readonly (keyof AdventureHeader)[];

const AUTO_GET_PATTERN = /^([\s\S]*?)\/([^/]*)\/\s*$/;

function readHeader(cursor: TokenCursor): AdventureHeader {
  const raw = Object.fromEntries(HEADER_FIELDS.map((field) => [field, cursor.readInt(`header.${field}`)]));
  const parsed = HeaderSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AdventureLoadError('INVALID_HEADER', 'Header counts must be non-negative integers.', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}

const readFixedInts = (cursor: TokenCursor, count: number, field: (slot: number) => string): number[] =>
  Array.from({ length: count }, (_unused, slot) => cursor.readInt(field(slot)));

function readActions(cursor: TokenCursor, header: AdventureHeader): RawAction[] {
  return Array.from({ length: header.numActions + 1 }, (_unused, index) => {
    const path = `actions[${index}]`;
    const vocab = cursor.readInt(`${path}.vocab`);
    return {
      vocab,
      conditions: readFixedInts(cursor, CONDITION_SLOTS, (slot) => `${path}.conditions[${slot}]`),
      commands: readFixedInts(cursor, COMMAND_SLOTS, (slot) => `${path}.commands[${slot}]`),
    };
  });
}

function readRooms(cursor: TokenCursor, header: AdventureHeader): RoomDef[] {
  return Array.from({ length: header.numRooms + 1 }, (_unused, index) => ({
    exits: readFixedInts(cursor, DIRECTION_COUNT, (slot) => `rooms[${index}].exits[${slot}]`),
    description: cursor.readString(`rooms[${index}].description`),
  }));
}

export function parseItemText(text: string): Pick<ItemDef, 'description' | 'autoGet'> {
  const match = AUTO_GET_PATTERN.exec(text);
  if (match === null) {
    return { description: text, autoGet: null };
  }
  const [, description = '', autoGet = ''] = match;
  return { description, autoGet: autoGet === '' ? null : autoGet };
}

function readItems(cursor: TokenCursor, header: AdventureHeader): ItemDef[] {
  return Array.from({ length: header.numItems + 1 }, (_unused, index) => {
    const text = cursor.readString(`items[${index}].description`);
    return { ...parseItemText(text), birthLocation: cursor.readInt(`items[${index}].location`) };
  });
}

function readTrailer(cursor: TokenCursor, header: AdventureHeader): AdventureTrailer {
  const version = cursor.readInt('trailer.version');
  const adventureNumber = cursor.readInt('trailer.adventureNumber');
  const checksum = cursor.readInt('trailer.checksum');
  const expected = computeChecksum(header.numActions, header.numItems, version);

  if (checksum !== expected) {
    throw new AdventureLoadError('CHECKSUM_MISMATCH', 'Trailer checksum does not match the data.', {
      expected,
      actual: checksum,
      numActions: header.numActions,
      numItems: header.numItems,
      version,
    });
  }

  return { version, adventureNumber, checksum };
}

/** Reads a whole data file in grammar order and builds the world plus its starting state. */
export function parseAdventure(text: string, options: ParseAdventureOptions = {}): LoadedAdventure {
  const config = options.config ?? DEFAULT_ENGINE_CONFIG;
  const cursor = new TokenCursor(tokenize(text));

  const header = readHeader(cursor);
  const actions = readActions(cursor, header);
  const vocabulary = splitVocabulary(cursor.readStringRun(), header.numWords, config.vocabularyLayout);
  const rooms = readRooms(cursor, header);
  const messages = Array.from({ length: header.numMessages + 1 }, (_unused, index) =>
    cursor.readString(`messages[${index}]`),
  );
  const items = readItems(cursor, header);
  const titles = cursor.readStringRun(header.numActions + 1);
  const trailer = readTrailer(cursor, header);

  const world: World = {
    header,
    trailer,
    actions,
    verbs: vocabulary.verbs,
    nouns: vocabulary.nouns,
    rooms,
    messages,
    items,
    actionTitles: actions.map((_action, index) => titles[index] ?? ''),
  };

  const validation = validateWorld(world, { severity: config.actionValidation });
  const diagnostics = [...vocabulary.diagnostics, ...validation];
  if (hasErrorDiagnostics(diagnostics)) {
    throw new AdventureLoadError('INVALID_ACTION_TABLE', 'World references are out of range.', {
      sourceId: options.sourceId ?? null,
      diagnostics: diagnostics
        .filter((diagnostic) => diagnostic.severity === 'error')
        .map((diagnostic) => `${diagnostic.path}: ${diagnostic.message}`),
    });
  }

  return { world, state: createInitialState(world), diagnostics };
}
