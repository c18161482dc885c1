import type { BuiltinName, ExecutionCollector, ExecutionOptions, RuntimeWarning, TraceEntry } from './types.js';

/** Warnings are always kept; trace entries only when the caller asked for them. */
export function createCollector(options?: ExecutionOptions): ExecutionCollector {
  return {
    warnings: [],
    trace: options?.trace === true ? [] : null,
  };
}

export function emitWarning(collector: ExecutionCollector | undefined, warning: RuntimeWarning): void {
  collector?.warnings.push(warning);
}

export function emitTrace(collector: ExecutionCollector | undefined, entry: TraceEntry): void {
  collector?.trace?.push(entry);
}

/** Records a built-in verb; an empty detail (no noun typed) is left out of the entry. */
export function traceBuiltin(collector: ExecutionCollector | undefined, name: BuiltinName, detail = ''): void {
  emitTrace(collector, detail === '' ? { kind: 'builtin', name } : { kind: 'builtin', name, detail });
}
