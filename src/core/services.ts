import type { Config } from '../config/env.js';
import { MusicLibrary } from '../services/library/library.js';
import type { MediaEngine } from '../services/player/engine.js';
import { PlaybackController } from '../services/player/controller.js';
import { MpvEngine } from '../services/player/mpv.js';
import { PlaylistState } from '../services/player/state.js';
import { AutoPlayer, type RandomSource } from '../services/search/autoplay.js';
import { SearchEngine } from '../services/search/engine.js';
import type { SimilarityScorer } from '../services/search/similarity.js';

/**
 * Process-wide services shared by every MCP session.
 */
export interface AudioServices {
  config: Config;
  library: MusicLibrary;
  engine: MediaEngine;
  controller: PlaybackController;
  search: SearchEngine;
  autoplay: AutoPlayer;
  startedAt: number;
}

export interface ServiceOverrides {
  library?: MusicLibrary;
  engine?: MediaEngine;
  scorer?: SimilarityScorer;
  random?: RandomSource;
}

export function createAudioServices(
  config: Config,
  overrides: ServiceOverrides = {},
): AudioServices {
  const library =
    overrides.library ??
    new MusicLibrary({ rootDir: config.AUDIO_PLAYER_DIR, maxDepth: config.SCAN_MAX_DEPTH });

  const engine =
    overrides.engine ??
    new MpvEngine({ binary: config.MPV_PATH, connectTimeoutMs: config.MPV_IPC_TIMEOUT_MS });

  const controller = new PlaybackController({
    engine,
    loadLibrary: () => library.files(),
    state: new PlaylistState(config.DEFAULT_VOLUME),
  });

  const search = new SearchEngine(
    (file) => library.metadataFor(file),
    overrides.scorer,
    config.SEARCH_MIN_SCORE,
  );

  const autoplay = new AutoPlayer({
    library,
    search,
    controller,
    autoplayMinScore: config.AUTOPLAY_MIN_SCORE,
    artistTieBand: config.ARTIST_TIE_BAND,
    random: overrides.random,
  });

  return { config, library, engine, controller, search, autoplay, startedAt: Date.now() };
}
