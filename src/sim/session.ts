import type { EngineConfig } from '../config/engine-config.js';
import {
  createAdventureRuntime,
  createRng,
  processTurn,
  startGame,
  textEvent,
  type AdventureRuntime,
  type ExecutionOptions,
  type GameState,
  type HaltReason,
  type Rng,
  type TurnResult,
  type World,
} from '../kernel/index.js';
import { renderTranscript, type TranscriptEntry } from './transcript.js';

export interface SessionOptions extends ExecutionOptions {
  readonly seed: number;
  readonly config?: EngineConfig;
}

export interface Session {
  readonly runtime: AdventureRuntime;
  readonly state: GameState;
  readonly rng: Rng;
  readonly halted: HaltReason | null;
  readonly turns: number;
  readonly trace: boolean;
}

export interface SessionStep {
  readonly session: Session;
  readonly result: TurnResult;
}

export type ScriptStopReason = 'halted' | 'endOfScript' | 'maxLines';

export interface ScriptOptions extends SessionOptions {
  readonly maxLines?: number;
  readonly onSaveRequested?: (state: GameState) => void;
  /** Returns the state to resume from, or null to keep playing the current one. */
  readonly onLoadRequested?: () => GameState | null;
}

export interface ScriptRun {
  readonly session: Session;
  readonly results: readonly TurnResult[];
  readonly stopReason: ScriptStopReason;
  readonly transcript: string;
}

const validateSeed = (seed: number): void => {
  if (!Number.isSafeInteger(seed)) {
    throw new RangeError(`seed must be a safe integer, received ${String(seed)}`);
  }
};

const validateMaxLines = (maxLines: number): void => {
  if (!Number.isSafeInteger(maxLines) || maxLines < 0) {
    throw new RangeError(`maxLines must be a non-negative safe integer, received ${String(maxLines)}`);
  }
};

const advance = (session: Session, result: TurnResult): Session => ({
  ...session,
  state: result.state,
  rng: result.rng,
  halted: result.halted,
  turns: session.turns + (result.consumedTurn ? 1 : 0),
});

export function startSession(world: World, state: GameState, options: SessionOptions): SessionStep {
  validateSeed(options.seed);
  const runtime = createAdventureRuntime(world, options.config);
  const trace = options.trace === true;
  const result = startGame(world, state, createRng(BigInt(options.seed)), { runtime, trace });

  return {
    session: advance({ runtime, state, rng: result.rng, halted: null, turns: 0, trace }, result),
    result,
  };
}

/**
 * Continues a session from a loaded state. The generator and the count of
 * spent turns carry over; a halted session becomes playable again.
 */
export const restoreSession = (session: Session, state: GameState): Session => ({
  ...session,
  state,
  halted: null,
});

/** Plays one input line. A halted session refuses input and stays as it is. */
export function playLine(session: Session, line: string): SessionStep {
  if (session.halted !== null) {
    return {
      session,
      result: {
        state: session.state,
        rng: session.rng,
        events: [textEvent(session.runtime.config.messages.gameOver)],
        halted: session.halted,
        consumedTurn: false,
        warnings: [],
        trace: session.trace ? [] : null,
      },
    };
  }

  const result = processTurn(session.runtime.world, session.state, session.rng, line, {
    runtime: session.runtime,
    trace: session.trace,
  });
  return { session: advance(session, result), result };
}

export function runScript(
  world: World,
  state: GameState,
  lines: readonly string[],
  options: ScriptOptions,
): ScriptRun {
  const maxLines = options.maxLines ?? lines.length;
  validateMaxLines(maxLines);

  const started = startSession(world, state, options);
  let session = started.session;
  const results: TurnResult[] = [started.result];
  const entries: TranscriptEntry[] = [{ input: null, events: started.result.events }];
  let stopReason: ScriptStopReason = 'endOfScript';

  for (const [index, line] of lines.entries()) {
    if (session.halted !== null) {
      stopReason = 'halted';
      break;
    }
    if (index >= maxLines) {
      stopReason = 'maxLines';
      break;
    }

    const step = playLine(session, line);
    session = step.session;
    results.push(step.result);
    entries.push({ input: line, events: step.result.events });

    if (options.onSaveRequested !== undefined && step.result.events.some((event) => event.kind === 'saveRequested')) {
      options.onSaveRequested(session.state);
    }
    if (options.onLoadRequested !== undefined && step.result.events.some((event) => event.kind === 'loadRequested')) {
      const loaded = options.onLoadRequested();
      if (loaded !== null) {
        session = restoreSession(session, loaded);
      }
    }
  }

  if (stopReason === 'endOfScript' && session.halted !== null) {
    stopReason = 'halted';
  }

  return { session, results, stopReason, transcript: renderTranscript(entries) };
}
