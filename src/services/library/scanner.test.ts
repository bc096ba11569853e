import * as fs from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { isSupportedAudioFile, isWithinRoot, scanLibrary, toAudioFile } from './scanner.js';

async function touch(root: string, relativePath: string): Promise<void> {
  const target = path.join(root, ...relativePath.split('/'));
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, 'x');
}

describe('isSupportedAudioFile', () => {
  it('matches extensions case-insensitively', () => {
    expect(isSupportedAudioFile('song.MP3')).toBe(true);
    expect(isSupportedAudioFile('song.opus')).toBe(true);
    expect(isSupportedAudioFile('cover.jpg')).toBe(false);
    expect(isSupportedAudioFile('mp3')).toBe(false);
  });
});

describe('isWithinRoot', () => {
  it('accepts the root and paths below it only', () => {
    const root = path.resolve('/music');
    expect(isWithinRoot(root, root)).toBe(true);
    expect(isWithinRoot(root, path.join(root, 'Rock', 'a.mp3'))).toBe(true);
    expect(isWithinRoot(root, path.resolve('/music-other/a.mp3'))).toBe(false);
    expect(isWithinRoot(root, path.resolve('/'))).toBe(false);
  });
});

describe('toAudioFile', () => {
  it('derives names relative to the root', () => {
    const root = path.resolve('/music');
    expect(toAudioFile(root, path.join(root, 'Rock', 'Song.FLAC'), 12)).toEqual({
      path: path.join(root, 'Rock', 'Song.FLAC'),
      relativePath: 'Rock/Song.FLAC',
      filename: 'Song.FLAC',
      stem: 'Song',
      extension: '.flac',
      size: 12,
      directory: 'Rock',
    });
    expect(toAudioFile(root, path.join(root, 'top.mp3')).directory).toBe('root');
  });
});

describe('scanLibrary', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(tmpdir(), 'scanner-'));
    await touch(root, 'a.mp3');
    await touch(root, 'B.FLAC');
    await touch(root, 'notes.txt');
    await touch(root, 'sub/c.ogg');
    await touch(root, 'sub/deeper/d.wav');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('finds supported files depth-first in code-point order', async () => {
    const files = await scanLibrary(root);
    expect(files.map((f) => f.relativePath)).toEqual([
      'B.FLAC',
      'a.mp3',
      'sub/c.ogg',
      'sub/deeper/d.wav',
    ]);
    expect(files[0]?.size).toBe(1);
  });

  it('returns the same order on every scan', async () => {
    const first = await scanLibrary(root);
    const second = await scanLibrary(root);
    expect(second.map((f) => f.path)).toEqual(first.map((f) => f.path));
  });

  it('does not loop on a symlink cycle', async () => {
    await fs.symlink(root, path.join(root, 'sub', 'loop'), 'junction');
    const files = await scanLibrary(root);
    expect(files.map((f) => f.relativePath)).toEqual([
      'B.FLAC',
      'a.mp3',
      'sub/c.ogg',
      'sub/deeper/d.wav',
    ]);
  });

  it('skips links that lead outside the root', async () => {
    const outside = await fs.mkdtemp(path.join(tmpdir(), 'scanner-outside-'));
    try {
      await touch(outside, 'secret.mp3');
      await fs.symlink(outside, path.join(root, 'linked'), 'junction');

      const files = await scanLibrary(root);
      expect(files.map((f) => f.relativePath)).toEqual([
        'B.FLAC',
        'a.mp3',
        'sub/c.ogg',
        'sub/deeper/d.wav',
      ]);
    } finally {
      await fs.rm(outside, { recursive: true, force: true });
    }
  });

  it('follows links that stay inside the root, once per directory', async () => {
    await fs.symlink(path.join(root, 'sub'), path.join(root, 'alias'), 'junction');
    const files = await scanLibrary(root);
    expect(files.map((f) => f.relativePath)).toEqual([
      'B.FLAC',
      'a.mp3',
      'alias/c.ogg',
      'alias/deeper/d.wav',
    ]);
  });

  it('stops descending at the maximum depth', async () => {
    const files = await scanLibrary(root, { maxDepth: 1 });
    expect(files.map((f) => f.relativePath)).toEqual(['B.FLAC', 'a.mp3', 'sub/c.ogg']);
  });

  it('returns an empty list for an empty directory', async () => {
    const empty = await fs.mkdtemp(path.join(tmpdir(), 'scanner-empty-'));
    try {
      expect(await scanLibrary(empty)).toEqual([]);
    } finally {
      await fs.rm(empty, { recursive: true, force: true });
    }
  });

  it('fails DirectoryNotFound for a missing root or a file', async () => {
    await expect(scanLibrary(path.join(root, 'missing'))).rejects.toMatchObject({
      kind: 'DirectoryNotFound',
    });
    await expect(scanLibrary(path.join(root, 'a.mp3'))).rejects.toMatchObject({
      kind: 'DirectoryNotFound',
    });
  });
});
