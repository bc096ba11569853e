import { describe, expect, it } from 'vitest';
import { MpvEngine } from './mpv.js';

const missingBinary = 'definitely-not-mpv-binary';

describe('MpvEngine', () => {
  it('fails EngineUnavailable when the player cannot be started', async () => {
    const engine = new MpvEngine({ binary: missingBinary, connectTimeoutMs: 200 });
    await expect(engine.open('/music/a.mp3', { volume: 30 })).rejects.toMatchObject({
      kind: 'EngineUnavailable',
      details: { binary: missingBinary },
    });
  });

  it('reports a missing player in diagnostics', async () => {
    const report = await new MpvEngine({ binary: missingBinary }).diagnose();
    expect(report).toMatchObject({
      engine: 'mpv',
      available: false,
      version: null,
      binary: missingBinary,
    });
    expect(report.supportedFormats).toEqual(['mp3', 'wav', 'ogg', 'flac', 'opus', 'm4a', 'aac']);
    expect(report.errors).toHaveLength(1);
  });
});
