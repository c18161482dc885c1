import { readFileSync, statSync } from 'node:fs';
import { AdventureLoadError } from './load-error.js';
import { parseAdventure, type LoadedAdventure, type ParseAdventureOptions } from './parse-adventure.js';

export type LoadAdventureOptions = Omit<ParseAdventureOptions, 'sourceId'>;

function readSource(path: string): string {
  try {
    if (!statSync(path).isFile()) {
      throw new Error(`${path} is not a file`);
    }
    return readFileSync(path, 'utf8');
  } catch (error) {
    throw new AdventureLoadError('SOURCE_UNREADABLE', `Cannot read adventure data from ${path}.`, { path }, error);
  }
}

export function loadAdventure(path: string, options: LoadAdventureOptions = {}): LoadedAdventure {
  return parseAdventure(readSource(path), { ...options, sourceId: path });
}
