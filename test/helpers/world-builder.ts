import {
  computeChecksum,
  createAdventureRuntime,
  createCollector,
  createEngineConfig,
  createInitialState,
  encodeCommandPair,
  encodeCondition,
  encodeVocab,
  splitVocabulary,
  type AdventureHeader,
  type AdventureRuntime,
  type EngineConfigInput,
  type ExecutionCollector,
  type GameState,
  type ItemDef,
  type RawAction,
  type RoomDef,
  type World,
} from '../../src/index.js';

export interface ActionSpec {
  readonly verb?: number;
  readonly noun?: number;
  /** `[code, parameter]` pairs; unused slots become raw 0. */
  readonly conditions?: readonly (readonly [number, number])[];
  /** Up to four opcodes; unused slots become 0. */
  readonly commands?: readonly number[];
}

export const makeAction = (spec: ActionSpec): RawAction => {
  const conditions = (spec.conditions ?? []).map(([code, parameter]) => encodeCondition(code, parameter));
  const commands = [...(spec.commands ?? [])];
  while (conditions.length < 5) conditions.push(0);
  while (commands.length < 4) commands.push(0);

  return {
    vocab: encodeVocab(spec.verb ?? 0, spec.noun ?? 0),
    conditions,
    commands: [
      encodeCommandPair(commands[0] ?? 0, commands[1] ?? 0),
      encodeCommandPair(commands[2] ?? 0, commands[3] ?? 0),
    ],
  };
};

export interface WorldSpec {
  readonly header?: Partial<AdventureHeader>;
  readonly actions?: readonly ActionSpec[];
  readonly rooms?: readonly RoomDef[];
  readonly items?: readonly ItemDef[];
  readonly messages?: readonly string[];
  readonly verbs?: readonly string[];
  readonly nouns?: readonly string[];
}

export const DEFAULT_VERBS = ['AUT', 'GO', 'LOOK', 'OPEN', 'WAIT', 'SAY', 'JUMP', 'PUSH', 'PULL', 'RUB', 'GET', 'READ'];
export const DEFAULT_NOUNS = ['ANY', 'NORTH', 'SOUTH', 'EAST', 'WEST', 'UP', 'DOWN', 'DOOR', 'KEY', 'LAMP', 'ROPE', 'BOOK'];

const DEFAULT_ROOMS: readonly RoomDef[] = [
  { exits: [0, 0, 0, 0, 0, 0], description: '' },
  { exits: [2, 0, 0, 0, 0, 0], description: 'hall' },
  { exits: [0, 1, 0, 0, 0, 0], description: 'attic' },
  { exits: [0, 0, 0, 0, 0, 0], description: '*Limbo.' },
];

const defaultItems = (): ItemDef[] =>
  Array.from({ length: 10 }, (_unused, index) => ({
    description: index === 9 ? 'Lamp' : `Item ${index}`,
    autoGet: null,
    birthLocation: 0,
  }));

/** A small self-consistent world; everything not given in `spec` takes a default. */
export function buildWorld(spec: WorldSpec = {}): World {
  const rooms = spec.rooms ?? DEFAULT_ROOMS;
  const items = spec.items ?? defaultItems();
  const messages = spec.messages ?? ['', 'one', 'two', 'three', 'four', 'five'];
  const actions = (spec.actions ?? [{}]).map(makeAction);
  // both lists are padded to one length, as in a data file
  const wordCount = Math.max((spec.verbs ?? DEFAULT_VERBS).length, (spec.nouns ?? DEFAULT_NOUNS).length);
  const pad = (words: readonly string[]): string[] => [...words, ...Array.from({ length: wordCount - words.length }, () => '')];
  const verbs = pad(spec.verbs ?? DEFAULT_VERBS);
  const nouns = pad(spec.nouns ?? DEFAULT_NOUNS);
  const vocabulary = splitVocabulary([...verbs, ...nouns], wordCount - 1, 'sequential');

  const header: AdventureHeader = {
    textStorageBytes: 0,
    numItems: items.length - 1,
    numActions: actions.length - 1,
    numWords: verbs.length - 1,
    numRooms: rooms.length - 1,
    maxCarry: 6,
    playerRoom: 1,
    treasures: 0,
    wordLength: 3,
    lightTime: 125,
    numMessages: messages.length - 1,
    treasureRoom: 2,
    ...spec.header,
  };

  return {
    header,
    trailer: { version: 1, adventureNumber: 42, checksum: computeChecksum(header.numActions, header.numItems, 1) },
    actions,
    verbs: vocabulary.verbs,
    nouns: vocabulary.nouns,
    rooms,
    messages,
    items,
    actionTitles: actions.map((_action, index) => `action ${index}`),
  };
}

export interface Harness {
  readonly world: World;
  readonly runtime: AdventureRuntime;
  readonly state: GameState;
  readonly collector: ExecutionCollector;
}

export function buildHarness(spec: WorldSpec = {}, config: EngineConfigInput = {}): Harness {
  const world = buildWorld(spec);
  return {
    world,
    runtime: createAdventureRuntime(world, createEngineConfig(config)),
    state: createInitialState(world),
    collector: createCollector({ trace: true }),
  };
}

export const placeItem = (state: GameState, item: number, location: number): GameState => ({
  ...state,
  itemLocations: state.itemLocations.map((current, index) => (index === item ? location : current)),
});

export const setFlag = (state: GameState, flag: number, value = true): GameState => ({
  ...state,
  flags: state.flags.map((current, index) => (index === flag ? value : current)),
});
