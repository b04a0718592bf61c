export const DEFAULT_VAGUE_TERMS: readonly string[] = [
  "works",
  "working",
  "done",
  "ready",
  "complete",
  "completed",
  "finished",
  "good",
  "ok",
  "okay",
  "fine",
  "looks good",
  "as expected"
];

const FILLER_WORDS = new Set([
  "it",
  "is",
  "are",
  "all",
  "everything",
  "should",
  "be",
  "the",
  "and",
  "fully",
  "just",
  "has",
  "been",
  "things",
  "stuff"
]);

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}%<>=]+/gu) ?? [];
}

/**
 * Returns a matcher that flags completion criteria with nothing verifiable
 * in them: after filler words are dropped, either no tokens remain or the
 * remaining tokens are covered end to end by denylisted terms.
 */
export function createVagueMatcher(
  terms: readonly string[] = DEFAULT_VAGUE_TERMS
): (criterion: string) => boolean {
  const phrases = terms
    .map((term) => tokenize(term))
    .filter((tokens) => tokens.length > 0);

  return (criterion) => {
    const tokens = tokenize(criterion).filter((token) => !FILLER_WORDS.has(token));
    if (tokens.length === 0) {
      return true;
    }

    // covered[i]: tokens[i..] splits into denylisted phrases
    const covered: boolean[] = new Array<boolean>(tokens.length + 1).fill(false);
    covered[tokens.length] = true;
    for (let start = tokens.length - 1; start >= 0; start -= 1) {
      covered[start] = phrases.some(
        (phrase) =>
          covered[start + phrase.length] === true &&
          phrase.every((word, offset) => tokens[start + offset] === word)
      );
    }
    return covered[0] === true;
  };
}

export function isVagueCriterion(
  criterion: string,
  terms: readonly string[] = DEFAULT_VAGUE_TERMS
): boolean {
  return createVagueMatcher(terms)(criterion);
}
