import { describe, expect, it, vi } from 'vitest';
import { MetadataExtractor, type RawTags, cleanGenre, normalizeTags } from './metadata.js';

function tags(partial: Partial<RawTags>): RawTags {
  return { common: {}, native: {}, ...partial };
}

describe('cleanGenre', () => {
  it('strips ID3v1 numeric prefixes and wrapping parentheses', () => {
    expect(cleanGenre('(13)Pop')).toBe('Pop');
    expect(cleanGenre('(Rock)')).toBe('Rock');
  });

  it('title-cases each word', () => {
    expect(cleanGenre('hip-hop')).toBe('Hip-Hop');
    expect(cleanGenre('ELECTRONIC dance')).toBe('Electronic Dance');
  });

  it('returns null for nothing useful', () => {
    expect(cleanGenre(null)).toBeNull();
    expect(cleanGenre('(12)')).toBeNull();
    expect(cleanGenre('  ')).toBeNull();
  });
});

describe('normalizeTags', () => {
  it('prefers the common tags', () => {
    const result = normalizeTags(
      tags({
        common: { artist: 'Queen', title: 'Under Pressure', genre: ['rock'] },
        native: { 'ID3v2.3': [{ id: 'TIT2', value: 'Other' }] },
        duration: 248.5,
      }),
      '.mp3',
    );
    expect(result).toEqual({
      artist: 'Queen',
      title: 'Under Pressure',
      genre: 'Rock',
      duration: 248.5,
    });
  });

  it('falls back to native frames of the container', () => {
    const result = normalizeTags(
      tags({
        native: {
          vorbis: [
            { id: 'TITLE', value: 'Take Five' },
            { id: 'ARTIST', value: 'Dave Brubeck' },
            { id: 'GENRE', value: 'jazz' },
          ],
        },
      }),
      '.flac',
    );
    expect(result).toEqual({
      artist: 'Dave Brubeck',
      title: 'Take Five',
      genre: 'Jazz',
      duration: null,
    });
  });

  it('ignores namespaces that do not belong to the format', () => {
    const result = normalizeTags(
      tags({ native: { vorbis: [{ id: 'TITLE', value: 'Hidden' }] } }),
      '.mp3',
    );
    expect(result.title).toBeNull();
  });

  it('skips blank values and reads text from structured frames', () => {
    const result = normalizeTags(
      tags({
        common: { title: '   ' },
        native: { iTunes: [{ id: '©nam', value: { text: 'Perfect' } }] },
      }),
      '.m4a',
    );
    expect(result.title).toBe('Perfect');
  });
});

describe('MetadataExtractor', () => {
  it('caches by path until cleared', async () => {
    const reader = vi.fn(async () => tags({ common: { title: 'Perfect' } }));
    const extractor = new MetadataExtractor(reader);

    const first = await extractor.extract('/music/a.mp3');
    await extractor.extract('/music/a.mp3');

    expect(first).toEqual({
      ok: true,
      metadata: { artist: null, title: 'Perfect', genre: null, duration: null },
    });
    expect(reader).toHaveBeenCalledTimes(1);
    expect(extractor.cachedCount).toBe(1);

    extractor.clear();
    await extractor.extract('/music/a.mp3');
    expect(reader).toHaveBeenCalledTimes(2);
  });

  it('never throws on unreadable files', async () => {
    const extractor = new MetadataExtractor(async () => {
      throw new Error('corrupt header');
    });

    expect(await extractor.extract('/music/broken.mp3')).toEqual({
      ok: false,
      metadata: { artist: null, title: null, genre: null, duration: null },
      reason: 'corrupt header',
    });
  });
});
