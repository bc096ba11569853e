import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ReadResourceResult } from '@modelcontextprotocol/sdk/types.js';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { type TestServices, createTestServices } from '../testing/services.js';
import { buildServer } from './mcp.js';

function resourceText(result: ReadResourceResult): string {
  const [first] = result.contents;
  if (!first || !('text' in first) || typeof first.text !== 'string') {
    throw new Error('expected a text resource');
  }
  return first.text;
}

describe('MCP server', () => {
  let t: TestServices;
  let server: McpServer;
  let client: Client;

  beforeEach(async () => {
    t = await createTestServices();
    server = buildServer({ services: t.services });
    client = new Client({ name: 'test-client', version: '1.0.0' });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
    await t.fixture.cleanup();
  });

  it('advertises every tool', async () => {
    const { tools } = await client.listTools();
    expect(tools).toHaveLength(22);
    const search = tools.find((tool) => tool.name === 'search_songs');
    expect(search?.annotations?.readOnlyHint).toBe(false);
    expect(search?.outputSchema).toBeDefined();
  });

  it('searches, plays and reports status end to end', async () => {
    const played = await client.callTool({
      name: 'search_and_play',
      arguments: { query: 'bohemian rhapsody' },
    });
    expect(played.isError).toBeFalsy();
    expect(played.structuredContent).toMatchObject({
      ok: true,
      file: 'Rock/Queen - Bohemian Rhapsody.flac',
      index: 3,
      playlist_size: 6,
      pool_size: 1,
      match: { match_type: 'metadata', score: 100 },
    });
    expect(t.engine.current?.filePath).toBe(
      t.services.controller.state.currentFile?.path,
    );

    const status = await client.callTool({ name: 'get_playback_status', arguments: {} });
    expect(status.structuredContent).toEqual({
      ok: true,
      _msg: 'Playing: Rock/Queen - Bohemian Rhapsody.flac at 0s of 200s',
      state: 'playing',
      current_file: 'Rock/Queen - Bohemian Rhapsody.flac',
      volume: 3,
      playlist_size: 6,
      current_index: 3,
      position_seconds: 0,
      duration_seconds: 200,
      stale: false,
    });
  });

  it('walks the playlist and stops at its end', async () => {
    await client.callTool({ name: 'play_audio', arguments: { path: 'Rock/Queen - Under Pressure.flac' } });

    const next = await client.callTool({ name: 'next_song', arguments: {} });
    expect(next.structuredContent).toMatchObject({
      file: 'untagged/shape_of_my_heart.ogg',
      index: 5,
    });

    const end = await client.callTool({ name: 'next_song', arguments: {} });
    expect(end.isError).toBe(true);
    expect(end.structuredContent).toMatchObject({ ok: false, kind: 'EndOfPlaylist' });
  });

  it('serves the library as a resource', async () => {
    const result = await client.readResource({ uri: 'audio://files' });
    const body: unknown = JSON.parse(resourceText(result));
    expect(body).toMatchObject({ directory: t.fixture.library.rootDir, total: 6 });
  });

  it('serves the configuration as a resource', async () => {
    const result = await client.readResource({ uri: 'config://server' });
    const body: unknown = JSON.parse(resourceText(result));
    expect(body).toMatchObject({ AUDIO_PLAYER_DIR: t.fixture.root, DEFAULT_VOLUME: 3 });
  });
});
