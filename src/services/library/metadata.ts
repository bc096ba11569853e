/**
 * Metadata Extractor
 *
 * Best-effort artist/title/genre/duration lookup. Tag parsing failures never
 * escape: callers always get a TrackMetadata, empty when nothing could be read.
 */

import * as path from 'node:path';
import { parseFile } from 'music-metadata';
import type { MetadataResult, TrackMetadata } from '../../types/audio.js';
import { logger } from '../../utils/logger.js';

export interface NativeTag {
  id: string;
  value: unknown;
}

/** The subset of a parsed file the extractor looks at. */
export interface RawTags {
  common: { artist?: string; title?: string; genre?: string[] };
  native: Record<string, NativeTag[]>;
  duration?: number;
}

export type TagReader = (filePath: string) => Promise<RawTags>;

export const EMPTY_METADATA: Readonly<TrackMetadata> = Object.freeze({
  artist: null,
  title: null,
  genre: null,
  duration: null,
});

const TITLE_KEYS = ['TIT2', 'TT2', 'TITLE', 'Title', 'title', '©nam', 'INAM'];
const ARTIST_KEYS = ['TPE1', 'TP1', 'ARTIST', 'Artist', 'artist', '©ART', 'IART'];
const GENRE_KEYS = ['TCON', 'TCO', 'GENRE', 'Genre', 'genre', '©gen', 'gnre', 'IGNR'];

const ID3 = ['ID3v2.4', 'ID3v2.3', 'ID3v2.2'];

/** Native tag namespaces consulted per container, in priority order. */
const NAMESPACES_BY_EXTENSION: Record<string, readonly string[]> = {
  '.mp3': [...ID3, 'APEv2', 'ID3v1'],
  '.flac': ['vorbis', ...ID3],
  '.ogg': ['vorbis'],
  '.opus': ['vorbis'],
  '.m4a': ['iTunes', ...ID3],
  '.aac': [...ID3, 'APEv2'],
  '.wav': ['exif', ...ID3],
};

export const readWithMusicMetadata: TagReader = async (filePath) => {
  const parsed = await parseFile(filePath, { duration: false, skipCovers: true });
  return {
    common: {
      artist: parsed.common.artist,
      title: parsed.common.title,
      genre: parsed.common.genre,
    },
    native: parsed.native,
    duration: parsed.format.duration,
  };
};

function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  if (Array.isArray(value)) {
    return textOf(value[0]);
  }
  if (value && typeof value === 'object' && 'text' in value) {
    return textOf(value.text);
  }
  return undefined;
}

function firstNonEmpty(candidates: Array<string | undefined>): string | null {
  for (const candidate of candidates) {
    const trimmed = candidate?.trim();
    if (trimmed) {
      return trimmed;
    }
  }
  return null;
}

function nativeValues(
  tags: RawTags,
  namespaces: readonly string[],
  keys: readonly string[],
): Array<string | undefined> {
  const values: Array<string | undefined> = [];
  for (const namespace of namespaces) {
    const list = tags.native[namespace];
    if (!list) {
      continue;
    }
    for (const key of keys) {
      const tag = list.find((t) => t.id === key);
      if (tag) {
        values.push(textOf(tag.value));
      }
    }
  }
  return values;
}

/**
 * `(13)Pop` → `Pop`, `(Rock)` → `Rock`, `hip-hop` → `Hip-Hop`.
 */
export function cleanGenre(raw: string | null): string | null {
  if (!raw) {
    return null;
  }
  let genre = raw.trim().replace(/^\(\d+\)/, '').trim();
  if (genre.startsWith('(') && genre.endsWith(')')) {
    genre = genre.slice(1, -1).trim();
  }
  if (!genre) {
    return null;
  }
  return genre
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, prefix: string, letter: string) =>
      `${prefix}${letter.toUpperCase()}`,
    );
}

export function normalizeTags(tags: RawTags, extension: string): TrackMetadata {
  const namespaces = NAMESPACES_BY_EXTENSION[extension.toLowerCase()] ?? ID3;
  const title = firstNonEmpty([
    tags.common.title,
    ...nativeValues(tags, namespaces, TITLE_KEYS),
  ]);
  const artist = firstNonEmpty([
    tags.common.artist,
    ...nativeValues(tags, namespaces, ARTIST_KEYS),
  ]);
  const genre = cleanGenre(
    firstNonEmpty([...(tags.common.genre ?? []), ...nativeValues(tags, namespaces, GENRE_KEYS)]),
  );
  const duration =
    typeof tags.duration === 'number' && Number.isFinite(tags.duration) && tags.duration > 0
      ? tags.duration
      : null;
  return { artist, title, genre, duration };
}

export class MetadataExtractor {
  private readonly cache = new Map<string, MetadataResult>();

  constructor(private readonly reader: TagReader = readWithMusicMetadata) {}

  get cachedCount(): number {
    return this.cache.size;
  }

  async extract(filePath: string): Promise<MetadataResult> {
    const cached = this.cache.get(filePath);
    if (cached) {
      return cached;
    }

    let result: MetadataResult;
    try {
      const tags = await this.reader(filePath);
      result = { ok: true, metadata: normalizeTags(tags, path.extname(filePath)) };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      void logger.debug('metadata', {
        message: 'Could not read tags',
        path: filePath,
        error: reason,
      });
      result = { ok: false, metadata: { ...EMPTY_METADATA }, reason };
    }

    this.cache.set(filePath, result);
    return result;
  }

  /** Drop every cached entry; used when the library is re-scanned. */
  clear(): void {
    this.cache.clear();
  }
}
