import { truncatedDataError, typeMismatchError } from './load-error.js';
import type { Token } from './tokenizer.js';

/** Sequential reader over the token stream; every read names the field it fills. */
export class TokenCursor {
  private position = 0;

  constructor(private readonly tokens: readonly Token[]) {}

  get done(): boolean {
    return this.position >= this.tokens.length;
  }

  peek(): Token | undefined {
    return this.tokens[this.position];
  }

  private next(field: string, expected: Token['kind']): Token {
    const token = this.tokens[this.position];
    if (token === undefined) {
      const last = this.tokens[this.tokens.length - 1];
      throw truncatedDataError(`Data ended before ${field}.`, { field, expected, line: last?.line ?? 1 });
    }
    if (token.kind !== expected) {
      throw typeMismatchError(`Expected a ${expected} for ${field}.`, {
        field,
        expected,
        actual: token.kind,
        line: token.line,
      });
    }
    this.position += 1;
    return token;
  }

  readInt(field: string): number {
    const token = this.next(field, 'number');
    return token.kind === 'number' ? token.value : 0;
  }

  readString(field: string): string {
    const token = this.next(field, 'string');
    return token.kind === 'string' ? token.value : '';
  }

  /** Consumes quoted strings while they last, up to `limit`. A bare word ends the run. */
  readStringRun(limit = Number.POSITIVE_INFINITY): string[] {
    const run: string[] = [];
    let token = this.peek();
    while (token !== undefined && token.kind === 'string' && token.quoted && run.length < limit) {
      run.push(token.value);
      this.position += 1;
      token = this.peek();
    }
    return run;
  }
}
