import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { AudioFile, TrackMetadata } from '../../types/audio.js';
import { AudioError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { MetadataExtractor } from './metadata.js';
import { isSupportedAudioFile, isWithinRoot, scanLibrary, toAudioFile } from './scanner.js';

export interface FolderSummary {
  folder: string;
  fileCount: number;
  sampleFiles: string[];
}

export interface GenreCount {
  genre: string;
  count: number;
}

export interface GenreMatch {
  file: AudioFile;
  genre: string;
}

export const UNKNOWN_GENRE = 'Unknown';

export interface MusicLibraryOptions {
  rootDir: string;
  maxDepth?: number;
  extractor?: MetadataExtractor;
}

/**
 * Owns the scanned file list and the metadata cache for one music root.
 * The file list is scanned on first use and kept until `refresh()`.
 */
export class MusicLibrary {
  readonly rootDir: string;
  readonly extractor: MetadataExtractor;
  private readonly maxDepth?: number;
  private cached: AudioFile[] | null = null;

  constructor(options: MusicLibraryOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.maxDepth = options.maxDepth;
    this.extractor = options.extractor ?? new MetadataExtractor();
  }

  async files(): Promise<AudioFile[]> {
    if (!this.cached) {
      this.cached = await scanLibrary(this.rootDir, { maxDepth: this.maxDepth });
    }
    return this.cached;
  }

  /** Re-read the directory tree and invalidate every cached tag. */
  async refresh(): Promise<AudioFile[]> {
    this.extractor.clear();
    this.cached = null;
    return this.files();
  }

  async metadataFor(file: AudioFile): Promise<TrackMetadata> {
    const result = await this.extractor.extract(file.path);
    return result.metadata;
  }

  /**
   * Resolve a relative path, or a bare filename anywhere in the library,
   * to a scanned file. Anything that escapes the root is rejected.
   */
  async resolve(requested: string): Promise<AudioFile> {
    const trimmed = requested.trim();
    if (!trimmed) {
      throw new AudioError('FileNotFound', 'No file was given');
    }

    const files = await this.files();
    const looksLikePath =
      trimmed.includes('/') || trimmed.includes('\\') || path.isAbsolute(trimmed);

    if (!looksLikePath) {
      const matches = files.filter((f) => f.filename === trimmed);
      const [first] = matches;
      if (!first) {
        throw new AudioError('FileNotFound', `Audio file not found: ${trimmed}`, {
          path: trimmed,
        });
      }
      await this.assertInsideRoot(first.path, trimmed);
      if (matches.length > 1) {
        void logger.warning('library', {
          message: `Multiple files named '${trimmed}', using ${first.relativePath}`,
          candidates: matches.map((m) => m.relativePath),
        });
      }
      return first;
    }

    const candidate = path.resolve(this.rootDir, trimmed.replace(/\\/g, '/'));
    await this.assertInsideRoot(candidate, trimmed);

    const known = files.find((f) => f.path === candidate);
    if (known) {
      return known;
    }
    if (!isSupportedAudioFile(candidate)) {
      throw new AudioError('FileNotFound', `Not a supported audio file: ${trimmed}`, {
        path: trimmed,
      });
    }
    // Present on disk but added after the last scan
    const stats = await fs.stat(candidate);
    return toAudioFile(this.rootDir, candidate, stats.size);
  }

  private async assertInsideRoot(candidate: string, requested: string): Promise<void> {
    if (!isWithinRoot(this.rootDir, candidate)) {
      throw new AudioError(
        'PathTraversalRejected',
        `Path escapes the music directory: ${requested}`,
        { path: requested },
      );
    }

    let realCandidate: string;
    let realRoot: string;
    try {
      realCandidate = await fs.realpath(candidate);
      realRoot = await fs.realpath(this.rootDir);
    } catch {
      throw new AudioError('FileNotFound', `Audio file not found: ${requested}`, {
        path: requested,
      });
    }
    if (!isWithinRoot(realRoot, realCandidate)) {
      throw new AudioError(
        'PathTraversalRejected',
        `Path resolves outside the music directory: ${requested}`,
        { path: requested },
      );
    }
  }

  async folders(): Promise<FolderSummary[]> {
    const files = await this.files();
    const byFolder = new Map<string, string[]>();
    for (const file of files) {
      const names = byFolder.get(file.directory) ?? [];
      names.push(file.filename);
      byFolder.set(file.directory, names);
    }
    return [...byFolder.entries()]
      .map(([folder, names]) => ({
        folder,
        fileCount: names.length,
        sampleFiles: names.slice(0, 3),
      }))
      .sort((a, b) => (a.folder < b.folder ? -1 : a.folder > b.folder ? 1 : 0));
  }

  async genres(): Promise<GenreCount[]> {
    const files = await this.files();
    const counts = new Map<string, number>();
    for (const file of files) {
      const { genre } = await this.metadataFor(file);
      const key = genre ?? UNKNOWN_GENRE;
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
    // Stable sort keeps first-seen order between equal counts
    return [...counts.entries()]
      .map(([genre, count]) => ({ genre, count }))
      .sort((a, b) => b.count - a.count);
  }

  async findByGenre(query: string, limit: number): Promise<GenreMatch[]> {
    const wanted = query.trim().toLowerCase();
    if (!wanted) {
      return [];
    }
    const matches: GenreMatch[] = [];
    for (const file of await this.files()) {
      const genre = (await this.metadataFor(file)).genre ?? UNKNOWN_GENRE;
      if (genre.toLowerCase().includes(wanted)) {
        matches.push({ file, genre });
        if (matches.length >= limit) {
          break;
        }
      }
    }
    return matches;
  }
}
