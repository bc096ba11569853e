/**
 * Library Scanner
 *
 * Walks the music directory depth-first and returns every file with a
 * supported audio extension. Entries are visited in code-point order so the
 * result is stable between scans.
 */

import type { Dirent } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { AudioFile } from '../../types/audio.js';
import { AudioError, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export const SUPPORTED_EXTENSIONS: ReadonlySet<string> = new Set([
  '.mp3',
  '.wav',
  '.ogg',
  '.flac',
  '.opus',
  '.m4a',
  '.aac',
]);

export const ROOT_FOLDER = 'root';

export interface ScanOptions {
  maxDepth?: number;
}

export function isSupportedAudioFile(filename: string): boolean {
  return SUPPORTED_EXTENSIONS.has(path.extname(filename).toLowerCase());
}

export function toAudioFile(rootDir: string, absolutePath: string, size?: number): AudioFile {
  const relativePath = path.relative(rootDir, absolutePath).split(path.sep).join('/');
  const filename = path.basename(absolutePath);
  const extension = path.extname(filename).toLowerCase();
  const folder = path.posix.dirname(relativePath);
  return {
    path: absolutePath,
    relativePath,
    filename,
    stem: filename.slice(0, filename.length - extension.length),
    extension,
    size,
    directory: folder === '.' ? ROOT_FOLDER : folder,
  };
}

/** True when `candidate` is `root` or lies below it. Both must be absolute. */
export function isWithinRoot(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  if (relative === '') {
    return true;
  }
  return (
    relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative)
  );
}

function byName(a: Dirent, b: Dirent): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

async function assertDirectory(rootDir: string): Promise<void> {
  try {
    const stats = await fs.stat(rootDir);
    if (!stats.isDirectory()) {
      throw new AudioError('DirectoryNotFound', `Not a directory: ${rootDir}`, {
        directory: rootDir,
      });
    }
  } catch (error) {
    if (error instanceof AudioError) {
      throw error;
    }
    throw new AudioError('DirectoryNotFound', `Music directory not found: ${rootDir}`, {
      directory: rootDir,
      cause: errorMessage(error),
    });
  }
}

export async function scanLibrary(
  rootDir: string,
  options: ScanOptions = {},
): Promise<AudioFile[]> {
  const root = path.resolve(rootDir);
  await assertDirectory(root);

  const realRoot = await fs.realpath(root);
  const maxDepth = options.maxDepth ?? 32;
  const visited = new Set<string>();
  const files: AudioFile[] = [];

  const walk = async (directory: string, depth: number): Promise<void> => {
    let canonical: string;
    let entries: Dirent[];
    try {
      canonical = await fs.realpath(directory);
      if (visited.has(canonical)) {
        void logger.debug('scanner', {
          message: 'Skipping already visited directory',
          directory,
          canonical,
        });
        return;
      }
      visited.add(canonical);
      entries = await fs.readdir(directory, { withFileTypes: true });
    } catch (error) {
      void logger.warning('scanner', {
        message: 'Skipping unreadable directory',
        directory,
        error: errorMessage(error),
      });
      return;
    }

    for (const entry of entries.sort(byName)) {
      const entryPath = path.join(directory, entry.name);
      let isFile = entry.isFile();
      let isDirectory = entry.isDirectory();

      if (entry.isSymbolicLink()) {
        let target: string;
        try {
          target = await fs.realpath(entryPath);
          const stats = await fs.stat(target);
          isFile = stats.isFile();
          isDirectory = stats.isDirectory();
        } catch {
          void logger.debug('scanner', { message: 'Dangling symlink', path: entryPath });
          continue;
        }
        if (!isWithinRoot(realRoot, target)) {
          void logger.warning('scanner', {
            message: 'Skipping symlink that leaves the music directory',
            path: entryPath,
            target,
          });
          continue;
        }
      }

      if (isDirectory) {
        if (depth >= maxDepth) {
          void logger.warning('scanner', {
            message: 'Maximum scan depth reached',
            directory: entryPath,
            maxDepth,
          });
          continue;
        }
        await walk(entryPath, depth + 1);
      } else if (isFile && isSupportedAudioFile(entry.name)) {
        let size: number | undefined;
        try {
          size = (await fs.stat(entryPath)).size;
        } catch {
          size = undefined;
        }
        files.push(toAudioFile(root, entryPath, size));
      }
    }
  };

  await walk(root, 0);

  void logger.info('scanner', {
    message: `Found ${files.length} audio files`,
    root,
    directories: visited.size,
  });

  return files;
}
