import { isDeepStrictEqual } from 'node:util';
import { createRng } from './prng.js';
import { parseSaveGame, saveOptionsFor, serializeSaveGame } from './save-codec.js';
import type { GameState, Rng, World } from './types.js';

export const assertDeterministic = <T>(
  fn: (rng: Rng) => T,
  seed: bigint,
  compare: (a: T, b: T) => boolean = (a, b) => isDeepStrictEqual(a, b),
): void => {
  const first = fn(createRng(seed));
  const second = fn(createRng(seed));

  if (!compare(first, second)) {
    throw new Error(`Determinism assertion failed for seed ${seed.toString()}n`);
  }
};

export const assertStateRoundTrip = (state: GameState, world: World): void => {
  const options = saveOptionsFor(world);
  const restored = parseSaveGame(serializeSaveGame(state, options.adventureNumber), options);

  if (!isDeepStrictEqual(restored, { ...state, continuation: false })) {
    throw new Error(`Save round-trip mismatch for adventure ${options.adventureNumber}`);
  }
};
