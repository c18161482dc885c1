import type { AdventureRuntime } from './adventure-runtime.js';
import { emitTrace } from './execution-collector.js';
import { isCarried, replaceAt, withFlag, withItemLocation } from './state.js';
import {
  DESTROYED,
  LIGHT_COUNTER_SLOT,
  LIGHT_OUT_FLAG,
  type ExecutionCollector,
  type GameState,
  type OutputEvent,
} from './types.js';
import { textEvent } from './views.js';

export interface LightStep {
  readonly state: GameState;
  readonly events: readonly OutputEvent[];
}

/**
 * Burns one turn of light while the light source is carried and still lit.
 * The exhausted flag is raised on the turn that finds the counter already at 0.
 */
export function advanceLight(runtime: AdventureRuntime, state: GameState, collector?: ExecutionCollector): LightStep {
  const { lightSourceItem, lowLightThreshold, destroyLightOnExhaust, messages } = runtime.config;
  if (!isCarried(state, lightSourceItem) || state.flags[LIGHT_OUT_FLAG] === true) {
    return { state, events: [] };
  }

  const remaining = state.altCounters[LIGHT_COUNTER_SLOT] ?? 0;
  if (remaining <= 0) {
    const flagged = withFlag(state, LIGHT_OUT_FLAG, true);
    emitTrace(collector, { kind: 'light', remaining, exhausted: true });
    return {
      state: destroyLightOnExhaust ? withItemLocation(flagged, lightSourceItem, DESTROYED) : flagged,
      events: [textEvent(messages.lightOut)],
    };
  }

  const next = remaining - 1;
  emitTrace(collector, { kind: 'light', remaining: next, exhausted: false });
  return {
    state: { ...state, altCounters: replaceAt(state.altCounters, LIGHT_COUNTER_SLOT, next) },
    events: next <= lowLightThreshold ? [textEvent(messages.lightDim)] : [],
  };
}
