import type { CommandContext } from './command-context.js';
import { executeActionCommands, type ActionOutcome } from './command-dispatch.js';
import { evaluateConditions } from './eval-condition.js';
import { emitTrace } from './execution-collector.js';
import { rollPercent } from './prng.js';
import type { DecodedAction, DispatchPhase, GameState, HaltReason, OutputEvent, Rng } from './types.js';

export type DispatchContext = CommandContext;

export interface DispatchResult {
  readonly state: GameState;
  readonly events: readonly OutputEvent[];
  readonly halt: HaltReason | null;
}

export interface AutomaticPassResult extends DispatchResult {
  readonly rng: Rng;
}

export type PlayerDispatchOutcome = 'executed' | 'conditionsFailed' | 'noMatch';

export interface PlayerPassResult extends DispatchResult {
  readonly outcome: PlayerDispatchOutcome;
}

interface ChainResult extends DispatchResult {
  /** First table index the enclosing scan has not yet examined. */
  readonly resumeAt: number;
}

const isContinuationAction = (action: DecodedAction): boolean => action.verb === 0 && action.noun === 0;

function runAction(
  ctx: DispatchContext,
  state: GameState,
  action: DecodedAction,
  phase: DispatchPhase,
  events: OutputEvent[],
): ActionOutcome {
  emitTrace(ctx.collector, { kind: 'action', phase, index: action.index, title: action.title });
  const outcome = executeActionCommands(ctx, { ...state, continuation: false }, action);
  events.push(...outcome.events);
  return outcome;
}

/**
 * Follows a CONT into the verb 0 / noun 0 actions after `startIndex`. Actions
 * whose conditions fail are skipped without closing the chain; the first
 * action with a verb or noun ends it unexecuted.
 */
export function chainContinuation(ctx: DispatchContext, state: GameState, startIndex: number): ChainResult {
  const { actions } = ctx.runtime;
  const events: OutputEvent[] = [];
  let current: GameState = { ...state, continuation: false };

  for (let index = startIndex; index < actions.length; index += 1) {
    const action = actions[index];
    if (action === undefined || !isContinuationAction(action)) {
      return { state: current, events, halt: null, resumeAt: index };
    }

    if (!evaluateConditions(ctx, current, action)) {
      continue;
    }

    const outcome = runAction(ctx, current, action, 'chainingContinuation', events);
    current = { ...outcome.state, continuation: false };
    if (outcome.halt !== null) {
      return { state: current, events, halt: outcome.halt, resumeAt: index + 1 };
    }
    if (!outcome.state.continuation) {
      return { state: current, events, halt: null, resumeAt: index + 1 };
    }
  }

  return { state: current, events, halt: null, resumeAt: actions.length };
}

/**
 * Evaluates every verb 0 action once, in table order. A nonzero noun is the
 * percent chance that the action is considered at all.
 */
export function runAutomaticPass(ctx: DispatchContext, state: GameState, rng: Rng): AutomaticPassResult {
  const { actions } = ctx.runtime;
  const events: OutputEvent[] = [];
  let current = state;
  let cursor = rng;
  let index = 0;

  while (index < actions.length) {
    const action = actions[index];
    if (action === undefined || action.verb !== 0) {
      index += 1;
      continue;
    }

    if (action.noun > 0) {
      const [roll, nextRng] = rollPercent(cursor);
      cursor = nextRng;
      const fired = roll <= action.noun;
      emitTrace(ctx.collector, { kind: 'autoRoll', index, roll, chance: action.noun, fired });
      if (!fired) {
        index += 1;
        continue;
      }
    }

    if (!evaluateConditions(ctx, current, action)) {
      index += 1;
      continue;
    }

    const outcome = runAction(ctx, current, action, 'scanningAutomatic', events);
    if (outcome.halt !== null) {
      return { state: { ...outcome.state, continuation: false }, rng: cursor, events, halt: outcome.halt };
    }

    if (outcome.state.continuation) {
      const chain = chainContinuation(ctx, outcome.state, index + 1);
      events.push(...chain.events);
      current = chain.state;
      if (chain.halt !== null) {
        return { state: current, rng: cursor, events, halt: chain.halt };
      }
      index = chain.resumeAt;
      continue;
    }

    current = outcome.state;
    index += 1;
  }

  return { state: current, rng: cursor, events, halt: null };
}

/**
 * Runs the first action matching the player's verb and noun whose conditions
 * hold. A table noun of 0 matches any noun.
 */
export function runPlayerPass(ctx: DispatchContext, state: GameState, verb: number, noun: number): PlayerPassResult {
  const { actions } = ctx.runtime;
  const events: OutputEvent[] = [];
  let matched = false;

  for (const action of actions) {
    if (action.verb !== verb || (action.noun !== 0 && action.noun !== noun)) {
      continue;
    }

    matched = true;
    if (!evaluateConditions(ctx, state, action)) {
      continue;
    }

    const outcome = runAction(ctx, state, action, 'scanningPlayerVerb', events);
    if (outcome.halt !== null || !outcome.state.continuation) {
      return {
        state: { ...outcome.state, continuation: false },
        events,
        halt: outcome.halt,
        outcome: 'executed',
      };
    }

    const chain = chainContinuation(ctx, outcome.state, action.index + 1);
    events.push(...chain.events);
    return { state: chain.state, events, halt: chain.halt, outcome: 'executed' };
  }

  return { state, events, halt: null, outcome: matched ? 'conditionsFailed' : 'noMatch' };
}
