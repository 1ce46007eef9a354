import { toComparisonForm } from './name-normalizer';

export enum MatchType {
  EXACT = 'exact',
  PREFIX = 'prefix',
  SUBSTRING = 'substring',
  FUZZY = 'fuzzy',
  TEXT_SEARCH = 'text_search',
}

/**
 * Strategy order, highest fidelity first
 */
export const MATCH_TYPE_ORDER: readonly MatchType[] = [
  MatchType.EXACT,
  MatchType.PREFIX,
  MatchType.SUBSTRING,
  MatchType.FUZZY,
  MatchType.TEXT_SEARCH,
];

export interface SimilarityMatch {
  score: number;
  matchType: MatchType;
}

export const DEFAULT_FUZZY_THRESHOLD = 0.5;

// Longest query tail allowed when the query extends the candidate
const MAX_PREFIX_TAIL = 3;

/**
 * Score a normalized candidate name against a normalized query.
 *
 * The first applicable strategy wins. Returns null when nothing applies.
 *
 * Score bands (ratio = shorter length / longer length):
 * - exact: 1.0
 * - prefix: 0.8 + 0.19 * ratio
 * - substring: 0.6 + 0.24 * ratio
 * - fuzzy: best Levenshtein similarity, clipped into [0.31, 0.69]
 * - text_search: 0.3 + 0.14 * shared tokens / query tokens
 */
export function scoreSimilarity(
  query: string,
  candidate: string,
  fuzzyThreshold: number = DEFAULT_FUZZY_THRESHOLD,
): SimilarityMatch | null {
  const q = toComparisonForm(query);
  const c = toComparisonForm(candidate);

  if (!q || !c) {
    return null;
  }

  if (q === c) {
    return { score: 1, matchType: MatchType.EXACT };
  }

  const ratio = Math.min(q.length, c.length) / Math.max(q.length, c.length);

  if (
    c.startsWith(q) ||
    (q.startsWith(c) && q.length - c.length <= MAX_PREFIX_TAIL)
  ) {
    return { score: round(0.8 + 0.19 * ratio), matchType: MatchType.PREFIX };
  }

  if (c.includes(q)) {
    return {
      score: round(0.6 + 0.24 * ratio),
      matchType: MatchType.SUBSTRING,
    };
  }

  const similarity = Math.max(
    levenshteinSimilarity(q, c),
    levenshteinSimilarity(sortTokens(q), sortTokens(c)),
  );
  if (similarity >= fuzzyThreshold) {
    return {
      score: round(Math.min(0.69, Math.max(0.31, similarity))),
      matchType: MatchType.FUZZY,
    };
  }

  const queryTokens = new Set(q.split(' '));
  const candidateTokens = new Set(c.split(' '));
  let shared = 0;
  queryTokens.forEach((token) => {
    if (candidateTokens.has(token)) {
      shared++;
    }
  });
  if (shared > 0) {
    return {
      score: round(0.3 + (0.14 * shared) / queryTokens.size),
      matchType: MatchType.TEXT_SEARCH,
    };
  }

  return null;
}

/**
 * Longest space-free run of the query that every candidate scoring as
 * exact, prefix or substring contains in its normalized form. Lets those
 * bands be fetched with a single indexed LIKE.
 *
 * A candidate may be shorter than the query by up to MAX_PREFIX_TAIL
 * characters, so the run is taken from the query without that tail.
 */
export function containmentAnchor(query: string): string {
  const q = toComparisonForm(query);
  const head = q.slice(0, Math.max(1, q.length - MAX_PREFIX_TAIL));

  return head
    .split(' ')
    .reduce((longest, run) => (run.length > longest.length ? run : longest), '');
}

/**
 * 1 - distance / longer length
 */
export function levenshteinSimilarity(text1: string, text2: string): number {
  const maxLength = Math.max(text1.length, text2.length);

  if (maxLength === 0) return 1;

  return 1 - levenshteinDistance(text1, text2) / maxLength;
}

export function levenshteinDistance(str1: string, str2: string): number {
  const len1 = str1.length;
  const len2 = str2.length;

  if (len1 === 0) return len2;
  if (len2 === 0) return len1;

  // Two rolling rows
  let previous = Array.from({ length: len2 + 1 }, (_, j) => j);
  let current = new Array<number>(len2 + 1);

  for (let i = 1; i <= len1; i++) {
    current[0] = i;
    for (let j = 1; j <= len2; j++) {
      const cost = str1[i - 1] === str2[j - 1] ? 0 : 1;
      current[j] = Math.min(
        previous[j] + 1, // deletion
        current[j - 1] + 1, // insertion
        previous[j - 1] + cost, // substitution
      );
    }
    [previous, current] = [current, previous];
  }

  return previous[len2];
}

function sortTokens(text: string): string {
  return text.split(' ').sort().join(' ');
}

function round(score: number): number {
  return Math.round(score * 10000) / 10000;
}
