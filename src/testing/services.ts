import { loadConfig } from '../config/env.js';
import { type AudioServices, createAudioServices } from '../core/services.js';
import type { ToolContext } from '../shared/tools/types.js';
import { FakeEngine } from './fake-engine.js';
import { type FixtureLibrary, createFixtureLibrary } from './library.js';

export interface TestServices {
  services: AudioServices;
  engine: FakeEngine;
  fixture: FixtureLibrary;
  context: ToolContext;
}

/** Full service graph over the fixture library and an in-memory engine. */
export async function createTestServices(random: () => number = () => 0): Promise<TestServices> {
  const fixture = await createFixtureLibrary();
  const engine = new FakeEngine();
  const config = loadConfig({ AUDIO_PLAYER_DIR: fixture.root, NODE_ENV: 'test' });
  const services = createAudioServices(config, { library: fixture.library, engine, random });
  return {
    services,
    engine,
    fixture,
    context: { sessionId: 'test-session', services },
  };
}
