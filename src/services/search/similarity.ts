/**
 * Edit-distance based similarity. Every scorer maps a (query, candidate)
 * pair to [0, 100]; the ranking code only depends on that contract.
 */

export interface SimilarityScorer {
  score(query: string, candidate: string): number;
}

export function levenshtein(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  if (left.length === 0) return right.length;
  if (right.length === 0) return left.length;

  let previous = Array.from({ length: right.length + 1 }, (_, i) => i);
  for (let i = 1; i <= left.length; i++) {
    const current = [i];
    for (let j = 1; j <= right.length; j++) {
      const cost = left[i - 1] === right[j - 1] ? 0 : 1;
      current[j] = Math.min(
        (previous[j] ?? 0) + 1,
        (current[j - 1] ?? 0) + 1,
        (previous[j - 1] ?? 0) + cost,
      );
    }
    previous = current;
  }
  return previous[right.length] ?? 0;
}

export function ratio(a: string, b: string): number {
  const longest = Math.max(Array.from(a).length, Array.from(b).length);
  if (longest === 0) return 100;
  return 100 * (1 - levenshtein(a, b) / longest);
}

function sortTokens(text: string): string {
  return text
    .split(' ')
    .filter(Boolean)
    .sort()
    .join(' ');
}

/** Word order insensitive: "you shape of" scores like "shape of you". */
export function tokenSortRatio(a: string, b: string): number {
  return ratio(sortTokens(a), sortTokens(b));
}

/**
 * Best ratio of the shorter string against every same-length window of the
 * longer one.
 */
export function partialRatio(a: string, b: string): number {
  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
  if (shorter.length === 0) return longer.length === 0 ? 100 : 0;
  if (longer.includes(shorter)) return 100;

  let best = 0;
  for (let start = 0; start + shorter.length <= longer.length; start++) {
    best = Math.max(best, ratio(shorter, longer.slice(start, start + shorter.length)));
    if (best === 100) break;
  }
  return best;
}

/** Partial matches top out at 90. */
const PARTIAL_WEIGHT = 0.9;

export class TokenSortScorer implements SimilarityScorer {
  score(query: string, candidate: string): number {
    return tokenSortRatio(query, candidate);
  }
}

/**
 * Token-sort ratio, or the discounted partial ratio when the query only
 * resembles part of the candidate.
 */
export class BlendedScorer implements SimilarityScorer {
  score(query: string, candidate: string): number {
    return Math.max(
      tokenSortRatio(query, candidate),
      PARTIAL_WEIGHT * partialRatio(query, candidate),
    );
  }
}
