import type { Diagnostic } from '../kernel/diagnostics.js';
import type { VocabularyWord, WordKind } from '../kernel/types.js';

export type VocabularyLayout = 'sequential' | 'interleaved';

export interface VocabularySplit {
  readonly verbs: readonly VocabularyWord[];
  readonly nouns: readonly VocabularyWord[];
  readonly diagnostics: readonly Diagnostic[];
}

const SYNONYM_MARK = '*';

function buildWords(texts: readonly string[], kind: WordKind): VocabularyWord[] {
  let lastPrimary: number | null = null;

  return texts.map((raw, index) => {
    const isSynonym = raw.startsWith(SYNONYM_MARK);
    if (!isSynonym && index > 0) {
      lastPrimary = index;
    }
    return {
      text: isSynonym ? raw.slice(SYNONYM_MARK.length) : raw,
      kind,
      index,
      isSynonym,
      resolvesTo: isSynonym ? (lastPrimary ?? index) : index,
    };
  });
}

/**
 * Divides the vocabulary run into verbs and nouns. Data files disagree on
 * whether the header's word count is the highest index or the list length,
 * so both are accepted; anything else is split down the middle.
 */
export function splitVocabulary(words: readonly string[], numWords: number, layout: VocabularyLayout): VocabularySplit {
  const diagnostics: Diagnostic[] = [];
  let verbCount: number;

  if (words.length === 2 * (numWords + 1)) {
    verbCount = numWords + 1;
  } else if (words.length === 2 * numWords) {
    verbCount = numWords;
  } else {
    verbCount = Math.floor(words.length / 2);
    diagnostics.push({
      code: 'VOCABULARY_SPLIT_UNEVEN',
      path: 'vocabulary',
      severity: 'info',
      message: `Read ${words.length} vocabulary words for a declared count of ${numWords}; split as ${verbCount} verbs.`,
    });
  }

  if (layout === 'interleaved') {
    return {
      verbs: buildWords(words.filter((_word, position) => position % 2 === 0), 'verb'),
      nouns: buildWords(words.filter((_word, position) => position % 2 === 1), 'noun'),
      diagnostics,
    };
  }

  return {
    verbs: buildWords(words.slice(0, verbCount), 'verb'),
    nouns: buildWords(words.slice(verbCount), 'noun'),
    diagnostics,
  };
}
