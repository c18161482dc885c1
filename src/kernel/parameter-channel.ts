/**
 * Operands for one action's commands. Commands never carry operands in their
 * own encoding: each takes the next value from the action's PAR slots, in slot
 * order, for as many operands as it declares.
 */
export interface ParameterChannel {
  readonly remaining: () => number;
  readonly take: (count: number) => readonly number[] | null;
}

export function createParameterChannel(parameters: readonly number[]): ParameterChannel {
  let cursor = 0;

  return {
    remaining: () => parameters.length - cursor,
    take: (count) => {
      if (cursor + count > parameters.length) {
        cursor = parameters.length;
        return null;
      }

      const taken = parameters.slice(cursor, cursor + count);
      cursor += count;
      return taken;
    },
  };
}
