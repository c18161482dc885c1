export const CARRIED = 255;
export const DESTROYED = 0;

export const FLAG_COUNT = 32;
export const DARK_FLAG = 15;
export const LIGHT_OUT_FLAG = 16;

export const ALT_COUNTER_COUNT = 9;
export const LIGHT_COUNTER_SLOT = 8;
export const ALT_ROOM_COUNT = 6;

export const DIRECTION_COUNT = 6;
export const CONDITION_SLOTS = 5;
export const COMMAND_SLOTS = 2;

export interface AdventureHeader {
  readonly textStorageBytes: number;
  readonly numItems: number;
  readonly numActions: number;
  readonly numWords: number;
  readonly numRooms: number;
  readonly maxCarry: number;
  readonly playerRoom: number;
  readonly treasures: number;
  readonly wordLength: number;
  readonly lightTime: number;
  readonly numMessages: number;
  readonly treasureRoom: number;
}

export interface AdventureTrailer {
  readonly version: number;
  readonly adventureNumber: number;
  readonly checksum: number;
}

export interface RoomDef {
  /** North, south, east, west, up, down. 0 means no exit. */
  readonly exits: readonly number[];
  readonly description: string;
}

export interface ItemDef {
  readonly description: string;
  readonly autoGet: string | null;
  readonly birthLocation: number;
}

/** An action row exactly as stored in the data file. */
export interface RawAction {
  readonly vocab: number;
  readonly conditions: readonly number[];
  readonly commands: readonly number[];
}

export type WordKind = 'verb' | 'noun';

export interface VocabularyWord {
  readonly text: string;
  readonly kind: WordKind;
  readonly index: number;
  readonly isSynonym: boolean;
  /** Index of the word this one stands for; equal to `index` for non-synonyms. */
  readonly resolvesTo: number;
}

export interface World {
  readonly header: AdventureHeader;
  readonly trailer: AdventureTrailer;
  readonly actions: readonly RawAction[];
  readonly verbs: readonly VocabularyWord[];
  readonly nouns: readonly VocabularyWord[];
  readonly rooms: readonly RoomDef[];
  readonly messages: readonly string[];
  readonly items: readonly ItemDef[];
  readonly actionTitles: readonly string[];
}

export interface GameState {
  readonly currentRoom: number;
  readonly itemLocations: readonly number[];
  readonly flags: readonly boolean[];
  readonly counter: number;
  readonly altCounters: readonly number[];
  readonly altRooms: readonly number[];
  readonly continuation: boolean;
}

export interface RngState {
  readonly algorithm: 'pcg-dxsm-128';
  readonly version: 1;
  readonly state: readonly bigint[];
}

export interface Rng {
  readonly state: RngState;
}

export interface DecodedVocab {
  readonly verb: number;
  readonly noun: number;
}

export interface DecodedCondition {
  readonly code: number;
  readonly parameter: number;
}

export interface CommandPair {
  readonly first: number;
  readonly second: number;
}

export interface DecodedAction {
  readonly index: number;
  readonly verb: number;
  readonly noun: number;
  readonly conditions: readonly DecodedCondition[];
  /** Four opcodes in execution order; 0 entries are skipped. */
  readonly commands: readonly number[];
  /** Parameters of the PAR slots, in slot order. */
  readonly parameters: readonly number[];
  readonly title: string;
}

export type OutputEvent =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'inline'; readonly text: string }
  | { readonly kind: 'clearScreen' }
  | { readonly kind: 'pause'; readonly durationMs: number }
  | { readonly kind: 'saveRequested' }
  | { readonly kind: 'loadRequested' };

export type HaltReason = 'fini' | 'victory' | 'quit';

export type DispatchPhase = 'idle' | 'scanningAutomatic' | 'scanningPlayerVerb' | 'chainingContinuation' | 'halted';

export type RuntimeWarningCode =
  | 'ITEM_OUT_OF_RANGE'
  | 'ROOM_OUT_OF_RANGE'
  | 'FLAG_OUT_OF_RANGE'
  | 'REGISTER_OUT_OF_RANGE'
  | 'MESSAGE_OUT_OF_RANGE'
  | 'PARAMETER_CHANNEL_EXHAUSTED'
  | 'UNKNOWN_COMMAND';

export interface RuntimeWarning {
  readonly code: RuntimeWarningCode;
  readonly message: string;
  readonly context?: Readonly<Record<string, unknown>>;
}

export type BuiltinName = 'move' | 'get' | 'drop' | 'look' | 'inventory' | 'score' | 'quit' | 'load';

export type TraceEntry =
  | {
      readonly kind: 'action';
      readonly phase: DispatchPhase;
      readonly index: number;
      readonly title: string;
    }
  | {
      readonly kind: 'autoRoll';
      readonly index: number;
      readonly roll: number;
      readonly chance: number;
      readonly fired: boolean;
    }
  | {
      readonly kind: 'builtin';
      readonly name: BuiltinName;
      readonly detail?: string;
    }
  | {
      readonly kind: 'light';
      readonly remaining: number;
      readonly exhausted: boolean;
    };

export interface ExecutionOptions {
  readonly trace?: boolean;
}

export interface ExecutionCollector {
  readonly warnings: RuntimeWarning[];
  readonly trace: TraceEntry[] | null;
}

export interface TurnResult {
  readonly state: GameState;
  readonly rng: Rng;
  readonly events: readonly OutputEvent[];
  readonly halted: HaltReason | null;
  readonly consumedTurn: boolean;
  readonly warnings: readonly RuntimeWarning[];
  readonly trace: readonly TraceEntry[] | null;
}
