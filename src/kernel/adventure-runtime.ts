import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config/engine-config.js';
import { decodeCommandPair, decodeCondition, decodeVocab } from './codec.js';
import type { DecodedAction, RawAction, World } from './types.js';

/** Per-world tables derived once and shared by every turn of a session. */
export interface AdventureRuntime {
  readonly world: World;
  readonly config: EngineConfig;
  readonly actions: readonly DecodedAction[];
}

export function decodeAction(action: RawAction, index: number, title = ''): DecodedAction {
  const { verb, noun } = decodeVocab(action.vocab);
  const conditions = action.conditions.map(decodeCondition);
  const commands = action.commands.flatMap((slot) => {
    const pair = decodeCommandPair(slot);
    return [pair.first, pair.second];
  });

  return {
    index,
    verb,
    noun,
    conditions,
    commands,
    parameters: conditions.filter((condition) => condition.code === 0).map((condition) => condition.parameter),
    title,
  };
}

const defaultRuntimes = new WeakMap<World, AdventureRuntime>();

export function createAdventureRuntime(world: World, config: EngineConfig = DEFAULT_ENGINE_CONFIG): AdventureRuntime {
  return {
    world,
    config,
    actions: world.actions.map((action, index) => decodeAction(action, index, world.actionTitles[index] ?? '')),
  };
}

export function resolveAdventureRuntime(world: World, config?: EngineConfig): AdventureRuntime {
  if (config !== undefined) {
    return createAdventureRuntime(world, config);
  }

  const cached = defaultRuntimes.get(world);
  if (cached !== undefined) {
    return cached;
  }

  const runtime = createAdventureRuntime(world);
  defaultRuntimes.set(world, runtime);
  return runtime;
}
