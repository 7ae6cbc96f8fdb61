// Wiring shared by the HTTP server and the terminal client

import type { AppConfig } from '@/utils/config.js';
import { loadWorld } from '@/infrastructure/world/WorldLoader.js';
import { loadKnowledgeStore } from '@/infrastructure/knowledge/loadKnowledgeGraph.js';
import { getDatabase } from '@/infrastructure/database/lowdb/connection.js';
import type { DatabaseConnection } from '@/infrastructure/database/lowdb/connection.js';
import { GameStateRepository } from '@/infrastructure/database/lowdb/GameStateRepository.js';
import { GameStateManager } from '@/application/game/GameStateManager.js';
import { SessionRegistry } from '@/application/game/SessionRegistry.js';

export interface Runtime {
  registry: SessionRegistry;
  db: DatabaseConnection;
}

export async function createRuntime(config: AppConfig): Promise<Runtime> {
  console.log(`Loading world from ${config.game.worldPath}...`);
  const world = loadWorld(config.game.worldPath);
  console.log(`  Areas: ${Object.keys(world.areas).length}, start: ${world.startAreaId}`);

  const knowledge = loadKnowledgeStore(config.game.knowledgePath);

  console.log(`Opening save database at ${config.dbPath}...`);
  const db = await getDatabase({ path: config.dbPath });
  const saves = new GameStateManager(new GameStateRepository(db));

  const registry = new SessionRegistry({
    world,
    knowledge,
    saves,
    llm: config.llm,
    game: config.game,
  });

  return { registry, db };
}
