import type { AdventureRuntime } from './adventure-runtime.js';
import { DIRECTION_COUNT, type VocabularyWord } from './types.js';

const DIRECTION_LETTERS = ['N', 'S', 'E', 'W', 'U', 'D'] as const;

/** Upper-cases and truncates to the significant word length (0 keeps the whole word). */
export const normalizeWord = (text: string, wordLength: number): string => {
  const upper = text.trim().toUpperCase();
  return wordLength > 0 ? upper.slice(0, wordLength) : upper;
};

interface KeyedWord {
  readonly word: VocabularyWord;
  readonly key: string;
}

/**
 * Resolves player input to a word number. Primary words are tried before
 * synonyms; within each, an exact match wins over a prefix match. Entry 0 is
 * the table's placeholder and never matches.
 */
export function resolveWord(words: readonly VocabularyWord[], input: string, wordLength: number): number | null {
  const key = normalizeWord(input, wordLength);
  if (key === '') {
    return null;
  }

  const keyed: KeyedWord[] = words
    .filter((word) => word.index > 0 && word.text.trim() !== '')
    .map((word) => ({ word, key: normalizeWord(word.text, wordLength) }));

  const pick = (synonym: boolean): KeyedWord | undefined => {
    const candidates = keyed.filter((entry) => entry.word.isSynonym === synonym);
    return candidates.find((entry) => entry.key === key) ?? candidates.find((entry) => entry.key.startsWith(key));
  };

  const found = pick(false) ?? pick(true);
  return found === undefined ? null : found.word.resolvesTo;
}

export const resolveVerb = (runtime: AdventureRuntime, input: string): number | null =>
  resolveWord(runtime.world.verbs, input, runtime.world.header.wordLength);

export const resolveNoun = (runtime: AdventureRuntime, input: string): number | null =>
  resolveWord(runtime.world.nouns, input, runtime.world.header.wordLength);

/** Direction number 1..6 named by a single word, if any. */
export function resolveDirection(runtime: AdventureRuntime, input: string): number | null {
  const upper = input.trim().toUpperCase();
  const letter = DIRECTION_LETTERS.findIndex((candidate) => candidate === upper);
  if (letter >= 0) {
    return letter + 1;
  }

  const noun = resolveNoun(runtime, input);
  return noun !== null && noun >= 1 && noun <= DIRECTION_COUNT ? noun : null;
}
