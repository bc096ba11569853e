/**
 * Search & Ranking Engine
 *
 * Scores every scanned file against a free-text query. Each file offers a
 * few comparison strings in priority order (artist + title, title, artist,
 * filename). Substring containment lands in the exact band [90, 100]; only
 * files with no containment hit are scored fuzzily, and fuzzy scores are
 * scaled below 90 so an exact hit always ranks first.
 */

import type {
  AudioFile,
  ExactMatchType,
  MatchType,
  SearchCandidate,
  TrackMetadata,
} from '../../types/audio.js';
import { normalizeText } from './normalize.js';
import { BlendedScorer, type SimilarityScorer } from './similarity.js';

export type SearchScope = 'all' | 'artist';

export interface SearchOptions {
  limit?: number;
  /** Candidates scoring below this are dropped. */
  minScore?: number;
  scope?: SearchScope;
}

export type MetadataLookup = (file: AudioFile) => Promise<TrackMetadata>;

export interface Comparison {
  type: ExactMatchType;
  text: string;
}

interface ScoredComparison {
  matchType: MatchType;
  score: number;
  matchedText: string;
}

export const DEFAULT_MIN_SCORE = 30;
export const DEFAULT_LIMIT = 5;

const EXACT_FLOOR = 90;
const EXACT_SPAN = 10;
const FUZZY_SCALE = 0.89;
/** Comparison strings shorter than this never count as "contained in the query". */
const MIN_REVERSE_CONTAINMENT = 4;

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

export function buildComparisons(
  file: AudioFile,
  metadata: TrackMetadata,
  scope: SearchScope = 'all',
): Comparison[] {
  const artist = normalizeText(metadata.artist ?? '');
  const title = normalizeText(metadata.title ?? '');
  const comparisons: Comparison[] = [];

  if (artist && title) {
    comparisons.push({ type: 'artist_title', text: normalizeText(`${artist} - ${title}`) });
  }
  if (scope === 'all' && title) {
    comparisons.push({ type: 'metadata', text: title });
  }
  if (artist) {
    comparisons.push({ type: 'metadata', text: artist });
  }
  if (scope === 'all') {
    const stem = normalizeText(file.stem);
    if (stem) {
      comparisons.push({ type: 'filename', text: stem });
    }
  }
  return comparisons;
}

/** Score in the exact band, or null when neither string contains the other. */
export function containmentScore(query: string, text: string): number | null {
  if (!query || !text) {
    return null;
  }
  const contained =
    text.includes(query) || (text.length >= MIN_REVERSE_CONTAINMENT && query.includes(text));
  if (!contained) {
    return null;
  }
  const closeness = Math.min(query.length, text.length) / Math.max(query.length, text.length);
  return EXACT_FLOOR + EXACT_SPAN * closeness;
}

export function scoreComparisons(
  query: string,
  comparisons: readonly Comparison[],
  scorer: SimilarityScorer,
): ScoredComparison | null {
  let best: ScoredComparison | null = null;

  // Strictly-greater updates keep the earlier (higher priority) comparison on ties
  for (const comparison of comparisons) {
    const score = containmentScore(query, comparison.text);
    if (score !== null && (!best || score > best.score)) {
      best = { matchType: comparison.type, score, matchedText: comparison.text };
    }
  }
  if (best) {
    return best;
  }

  for (const comparison of comparisons) {
    const similarity = Math.min(100, Math.max(0, scorer.score(query, comparison.text)));
    const score = similarity * FUZZY_SCALE;
    if (!best || score > best.score) {
      best = {
        matchType: `${comparison.type}_fuzzy`,
        score,
        matchedText: comparison.text,
      };
    }
  }
  return best;
}

export class SearchEngine {
  constructor(
    private readonly lookup: MetadataLookup,
    private readonly scorer: SimilarityScorer = new BlendedScorer(),
    private readonly defaultMinScore: number = DEFAULT_MIN_SCORE,
  ) {}

  async search(
    query: string,
    files: readonly AudioFile[],
    options: SearchOptions = {},
  ): Promise<SearchCandidate[]> {
    const limit = Math.max(0, options.limit ?? DEFAULT_LIMIT);
    const minScore = options.minScore ?? this.defaultMinScore;
    const scope = options.scope ?? 'all';
    const normalizedQuery = normalizeText(query);

    if (!normalizedQuery) {
      const listed: SearchCandidate[] = [];
      for (const file of files.slice(0, limit)) {
        listed.push({
          file,
          metadata: await this.lookup(file),
          matchType: 'filename',
          score: 100,
          matchedText: normalizeText(file.stem),
        });
      }
      return listed;
    }

    const scored: SearchCandidate[] = [];
    for (const file of files) {
      const metadata = await this.lookup(file);
      const best = scoreComparisons(
        normalizedQuery,
        buildComparisons(file, metadata, scope),
        this.scorer,
      );
      if (!best) {
        continue;
      }
      const score = round1(best.score);
      if (score < minScore) {
        continue;
      }
      scored.push({
        file,
        metadata,
        matchType: best.matchType,
        score,
        matchedText: best.matchedText,
      });
    }

    // Array.prototype.sort is stable, so equal scores keep scan order
    return scored.sort((a, b) => b.score - a.score).slice(0, limit);
  }
}
