import type { MusicLibrary } from '../library/library.js';
import type { PlaybackController, PlayResult } from '../player/controller.js';
import type { SearchCandidate } from '../../types/audio.js';
import { AudioError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { SearchEngine } from './engine.js';

/** Returns a float in [0, 1), like Math.random. */
export type RandomSource = () => number;

export interface AutoPlayOptions {
  library: MusicLibrary;
  search: SearchEngine;
  controller: PlaybackController;
  /** Minimum score for search_and_play to start a track. */
  autoplayMinScore?: number;
  /** Artist matches at or above this score are treated as equally good. */
  artistTieBand?: number;
  random?: RandomSource;
}

export interface AutoPlayResult extends PlayResult {
  candidate: SearchCandidate | null;
  /** How many tracks were eligible for a random pick. */
  poolSize: number;
}

export function pickRandom<T>(items: readonly T[], random: RandomSource): T | undefined {
  if (items.length === 0) {
    return undefined;
  }
  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[index];
}

/**
 * Search-then-play operations: confident single match, random track by an
 * artist, random track from a genre.
 */
export class AutoPlayer {
  private readonly library: MusicLibrary;
  private readonly search: SearchEngine;
  private readonly controller: PlaybackController;
  private readonly autoplayMinScore: number;
  private readonly artistTieBand: number;
  private readonly random: RandomSource;

  constructor(options: AutoPlayOptions) {
    this.library = options.library;
    this.search = options.search;
    this.controller = options.controller;
    this.autoplayMinScore = options.autoplayMinScore ?? 60;
    this.artistTieBand = options.artistTieBand ?? 90;
    this.random = options.random ?? Math.random;
  }

  async searchAndPlay(query: string): Promise<AutoPlayResult> {
    const files = await this.library.files();
    // minScore 0: a weak best match is still reported with its score
    const [best] = await this.search.search(query, files, { limit: 1, minScore: 0 });
    if (!best) {
      throw new AudioError('NoMatch', `The library has no songs to match '${query}'`, { query });
    }
    if (best.score < this.autoplayMinScore) {
      throw new AudioError(
        'NoConfidentMatch',
        `Best match for '${query}' is ${best.file.relativePath} with score ${best.score}, below ${this.autoplayMinScore}`,
        {
          query,
          bestScore: best.score,
          bestMatch: best.file.relativePath,
          threshold: this.autoplayMinScore,
        },
      );
    }
    const played = await this.controller.play(best.file);
    return { ...played, candidate: best, poolSize: 1 };
  }

  async playRandomByArtist(artist: string): Promise<AutoPlayResult> {
    const files = await this.library.files();
    const candidates = await this.search.search(artist, files, {
      limit: files.length,
      scope: 'artist',
    });

    const pool = this.artistPool(candidates);
    const choice = pickRandom(pool, this.random);
    if (!choice) {
      throw new AudioError('NoMatch', `No songs found by an artist matching '${artist}'`, {
        artist,
        bestScore: candidates[0]?.score ?? null,
      });
    }

    void logger.info('autoplay', {
      message: `Random pick for artist '${artist}'`,
      pool: pool.length,
      chosen: choice.file.relativePath,
    });
    const played = await this.controller.play(choice.file);
    return { ...played, candidate: choice, poolSize: pool.length };
  }

  /** High-confidence matches; otherwise the candidates tied at a confident top score. */
  private artistPool(candidates: readonly SearchCandidate[]): SearchCandidate[] {
    const banded = candidates.filter((c) => c.score >= this.artistTieBand);
    if (banded.length > 0) {
      return banded;
    }
    const top = candidates[0];
    if (!top || top.score < this.autoplayMinScore) {
      return [];
    }
    return candidates.filter((c) => c.score === top.score);
  }

  async playRandomFromGenre(genre: string): Promise<AutoPlayResult> {
    const files = await this.library.files();
    const matches = await this.library.findByGenre(genre, files.length);
    const choice = pickRandom(matches, this.random);
    if (!choice) {
      throw new AudioError('NoMatch', `No songs found in genre '${genre}'`, { genre });
    }
    const played = await this.controller.play(choice.file);
    return { ...played, candidate: null, poolSize: matches.length };
  }
}
