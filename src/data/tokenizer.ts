import { malformedInputError } from './load-error.js';

export type Token =
  | { readonly kind: 'number'; readonly value: number; readonly line: number }
  | { readonly kind: 'string'; readonly value: string; readonly quoted: boolean; readonly line: number };

const INTEGER_PATTERN = /^[-+]?\d+$/;

const isWhitespace = (char: string): boolean => /\s/.test(char);

const endsBareWord = (source: string, index: number): boolean => {
  const char = source.charAt(index);
  return isWhitespace(char) || char === '"' || source.startsWith('//', index);
};

/**
 * Splits adventure data into integers and strings. Quoted strings run to the
 * next quote and keep every character, newlines included. `//` starts a
 * comment anywhere outside quotes, including straight after a bare word.
 */
export function tokenize(text: string): Token[] {
  const source = text.replace(/\r\n?/g, '\n');
  const tokens: Token[] = [];
  let line = 1;
  let index = 0;

  while (index < source.length) {
    const char = source.charAt(index);

    if (char === '\n') {
      line += 1;
      index += 1;
      continue;
    }
    if (isWhitespace(char)) {
      index += 1;
      continue;
    }

    if (char === '/' && source.charAt(index + 1) === '/') {
      const end = source.indexOf('\n', index);
      index = end === -1 ? source.length : end;
      continue;
    }

    if (char === '"') {
      const close = source.indexOf('"', index + 1);
      if (close === -1) {
        throw malformedInputError('Unterminated quoted string.', { line });
      }
      const value = source.slice(index + 1, close);
      tokens.push({ kind: 'string', value, quoted: true, line });
      line += value.split('\n').length - 1;
      index = close + 1;
      continue;
    }

    let end = index;
    while (end < source.length && !endsBareWord(source, end)) {
      end += 1;
    }
    const word = source.slice(index, end);
    tokens.push(
      INTEGER_PATTERN.test(word)
        ? { kind: 'number', value: Number.parseInt(word, 10), line }
        : { kind: 'string', value: word, quoted: false, line },
    );
    index = end;
  }

  return tokens;
}
