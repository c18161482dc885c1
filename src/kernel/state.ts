import type { AdventureRuntime } from './adventure-runtime.js';
import {
  ALT_COUNTER_COUNT,
  ALT_ROOM_COUNT,
  CARRIED,
  DARK_FLAG,
  FLAG_COUNT,
  LIGHT_COUNTER_SLOT,
  type GameState,
  type World,
} from './types.js';

export function createInitialState(world: World): GameState {
  const altCounters = Array.from({ length: ALT_COUNTER_COUNT }, () => 0);
  altCounters[LIGHT_COUNTER_SLOT] = world.header.lightTime;

  return {
    currentRoom: world.header.playerRoom,
    itemLocations: world.items.map((item) => item.birthLocation),
    flags: Array.from({ length: FLAG_COUNT }, () => false),
    counter: 0,
    altCounters,
    altRooms: Array.from({ length: ALT_ROOM_COUNT }, () => 0),
    continuation: false,
  };
}

export const replaceAt = <T>(values: readonly T[], index: number, value: T): readonly T[] =>
  values.map((current, position) => (position === index ? value : current));

export const withItemLocation = (state: GameState, item: number, location: number): GameState => ({
  ...state,
  itemLocations: replaceAt(state.itemLocations, item, location),
});

export const withFlag = (state: GameState, flag: number, value: boolean): GameState => ({
  ...state,
  flags: replaceAt(state.flags, flag, value),
});

export const itemLocation = (state: GameState, item: number): number | undefined => state.itemLocations[item];

export const isItemIndex = (runtime: AdventureRuntime, item: number): boolean =>
  Number.isInteger(item) && item >= 0 && item <= runtime.world.header.numItems;

export const isRoomIndex = (runtime: AdventureRuntime, room: number): boolean =>
  Number.isInteger(room) && room >= 0 && room <= runtime.world.header.numRooms;

export const isFlagIndex = (flag: number): boolean => Number.isInteger(flag) && flag >= 0 && flag < FLAG_COUNT;

export const carriedCount = (state: GameState): number =>
  state.itemLocations.filter((location) => location === CARRIED).length;

export const isCarried = (state: GameState, item: number): boolean => state.itemLocations[item] === CARRIED;

export const isHere = (state: GameState, item: number): boolean => state.itemLocations[item] === state.currentRoom;

export function isDark(runtime: AdventureRuntime, state: GameState): boolean {
  if (state.flags[DARK_FLAG] !== true) {
    return false;
  }

  const light = runtime.config.lightSourceItem;
  return !isCarried(state, light) && !isHere(state, light);
}
