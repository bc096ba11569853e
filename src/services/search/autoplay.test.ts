import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FakeEngine } from '../../testing/fake-engine.js';
import {
  type FixtureLibrary,
  createEmptyLibrary,
  createFixtureLibrary,
} from '../../testing/library.js';
import { PlaybackController } from '../player/controller.js';
import { AutoPlayer, pickRandom } from './autoplay.js';
import { SearchEngine } from './engine.js';

describe('pickRandom', () => {
  it('maps [0, 1) onto the items', () => {
    expect(pickRandom(['a', 'b', 'c'], () => 0)).toBe('a');
    expect(pickRandom(['a', 'b', 'c'], () => 0.5)).toBe('b');
    expect(pickRandom(['a', 'b', 'c'], () => 0.999)).toBe('c');
    expect(pickRandom([], () => 0)).toBeUndefined();
  });
});

describe('AutoPlayer', () => {
  let fixture: FixtureLibrary;
  let engine: FakeEngine;
  let controller: PlaybackController;
  let search: SearchEngine;
  let nextRandom: number;

  function autoplay(): AutoPlayer {
    return new AutoPlayer({
      library: fixture.library,
      search,
      controller,
      autoplayMinScore: 60,
      artistTieBand: 90,
      random: () => nextRandom,
    });
  }

  beforeEach(async () => {
    fixture = await createFixtureLibrary();
    engine = new FakeEngine();
    controller = new PlaybackController({ engine, loadLibrary: () => fixture.library.files() });
    search = new SearchEngine((file) => fixture.library.metadataFor(file));
    nextRandom = 0;
  });

  afterEach(async () => {
    await fixture.cleanup();
  });

  describe('searchAndPlay', () => {
    it('plays an exact match', async () => {
      const result = await autoplay().searchAndPlay('shape of you');
      expect(result.file.relativePath).toBe('Pop/Ed Sheeran - Shape of You.mp3');
      expect(result.candidate?.score).toBe(100);
      expect(engine.current?.filePath).toBe(result.file.path);
    });

    it('plays a confident fuzzy match', async () => {
      const result = await autoplay().searchAndPlay('shpae of you');
      expect(result.file.relativePath).toBe('Pop/Ed Sheeran - Shape of You.mp3');
      expect(result.candidate).toMatchObject({ matchType: 'metadata_fuzzy', score: 74.2 });
    });

    it('refuses a weak match and reports it', async () => {
      const attempt = autoplay().searchAndPlay('fiev');
      await expect(attempt).rejects.toMatchObject({
        kind: 'NoConfidentMatch',
        details: { bestScore: 40.1, bestMatch: 'Jazz/Take Five.mp3', threshold: 60 },
      });
      expect(engine.handles).toHaveLength(0);
    });

    it('reports the best score even when it is below the search floor', async () => {
      await expect(autoplay().searchAndPlay('xyzzy')).rejects.toMatchObject({
        kind: 'NoConfidentMatch',
        details: {
          query: 'xyzzy',
          bestScore: 16,
          bestMatch: 'Pop/Ed Sheeran - Shape of You.mp3',
          threshold: 60,
        },
      });
      expect(engine.handles).toHaveLength(0);
    });

    it('fails NoMatch only when the library is empty', async () => {
      const empty = await createEmptyLibrary();
      try {
        const player = new AutoPlayer({
          library: empty.library,
          search,
          controller,
          random: () => 0,
        });
        await expect(player.searchAndPlay('shape of you')).rejects.toMatchObject({
          kind: 'NoMatch',
        });
      } finally {
        await empty.cleanup();
      }
    });
  });

  describe('playRandomByArtist', () => {
    it('picks among every high-confidence match', async () => {
      nextRandom = 0;
      const first = await autoplay().playRandomByArtist('Queen');
      expect(first.file.relativePath).toBe('Rock/Queen - Bohemian Rhapsody.flac');
      expect(first.poolSize).toBe(2);

      nextRandom = 0.99;
      const second = await autoplay().playRandomByArtist('Queen');
      expect(second.file.relativePath).toBe('Rock/Queen - Under Pressure.flac');
    });

    it('different random draws can pick different songs', async () => {
      const picked = new Set<string>();
      for (const draw of [0, 0.25, 0.5, 0.75]) {
        nextRandom = draw;
        picked.add((await autoplay().playRandomByArtist('ed sheeran')).file.relativePath);
      }
      expect([...picked].sort()).toEqual([
        'Pop/Ed Sheeran - Perfect.mp3',
        'Pop/Ed Sheeran - Shape of You.mp3',
      ]);
    });

    it('falls back to the top-scoring tie for a misspelled artist', async () => {
      const result = await autoplay().playRandomByArtist('ed sheren');
      expect(result.poolSize).toBe(2);
      expect(result.candidate).toMatchObject({ matchType: 'metadata_fuzzy', score: 71.2 });
    });

    it('plays the single best match when it is confident', async () => {
      const result = await autoplay().playRandomByArtist('brubek');
      expect(result.file.relativePath).toBe('Jazz/Take Five.mp3');
      expect(result.poolSize).toBe(1);
    });

    it('fails NoMatch for an unknown artist', async () => {
      await expect(autoplay().playRandomByArtist('xyzzy')).rejects.toMatchObject({
        kind: 'NoMatch',
      });
    });
  });

  describe('playRandomFromGenre', () => {
    it('picks among songs of the genre', async () => {
      nextRandom = 0.6;
      const result = await autoplay().playRandomFromGenre('rock');
      expect(result.poolSize).toBe(2);
      expect(result.file.relativePath).toBe('Rock/Queen - Under Pressure.flac');
    });

    it('fails NoMatch for a genre nobody has', async () => {
      await expect(autoplay().playRandomFromGenre('metal')).rejects.toMatchObject({
        kind: 'NoMatch',
      });
    });
  });
});
