import { readFileSync, writeFileSync } from 'node:fs';
import { parseSaveGame, saveOptionsFor, serializeSaveGame } from '../kernel/save-codec.js';
import { saveIoFailedError } from '../kernel/save-error.js';
import type { GameState, World } from '../kernel/types.js';

export function saveState(state: GameState, world: World, path: string): void {
  const text = serializeSaveGame(state, world.trailer.adventureNumber);
  try {
    writeFileSync(path, text, 'utf8');
  } catch (error) {
    throw saveIoFailedError(`Cannot write save file ${path}.`, { path }, error);
  }
}

/** Reads a save written for `world`; the adventure number, item count and room ranges must match it. */
export function loadState(path: string, world: World): GameState {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (error) {
    throw saveIoFailedError(`Cannot read save file ${path}.`, { path }, error);
  }

  return parseSaveGame(text, saveOptionsFor(world));
}
