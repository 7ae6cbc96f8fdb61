// Shared fixtures: a tiny world, scripted providers and wired sessions

import { ProviderId } from '@/domain/llm/types.js';
import type { GenerateOptions, LLMProvider, ProviderSettings } from '@/domain/llm/types.js';
import type { WorldDefinition } from '@/domain/world/types.js';
import type { WorldDocument } from '@/infrastructure/world/WorldLoader.js';
import { parseWorld } from '@/infrastructure/world/WorldLoader.js';
import { InMemoryKnowledgeStore } from '@/infrastructure/knowledge/InMemoryKnowledgeStore.js';
import type { KnowledgeGraphData } from '@/infrastructure/knowledge/InMemoryKnowledgeStore.js';
import { RuleBasedProvider } from '@/infrastructure/llm/RuleBasedProvider.js';
import type { ProviderFactory } from '@/infrastructure/llm/createProvider.js';
import { DatabaseConnection } from '@/infrastructure/database/lowdb/connection.js';
import { GameStateRepository } from '@/infrastructure/database/lowdb/GameStateRepository.js';
import { GameState } from '@/application/game/GameState.js';
import { GameStateManager } from '@/application/game/GameStateManager.js';
import { SessionRegistry } from '@/application/game/SessionRegistry.js';
import { ProviderManager } from '@/application/llm/ProviderManager.js';
import { Retriever } from '@/application/retrieval/Retriever.js';
import { GraphRAGEngine } from '@/application/graphrag/GraphRAGEngine.js';
import { buildGameDefaults, buildLLMConfig, buildProviderSettings } from '@/utils/config.js';
import type { GameDefaults, LLMConfig } from '@/utils/config.js';

export const FIXED_NOW = new Date('2024-03-01T12:00:00.000Z');
export const clock = (): Date => FIXED_NOW;

export const TEST_WORLD: WorldDocument = {
  current_area_id: 'hall',
  areas: {
    hall: {
      name: 'Great Hall',
      region: 'Keep',
      description: 'A draughty hall hung with faded banners.',
      exits: { north: 'library', east: 'vault', w: null },
      items: ['brass key', 'healing potion', 'short sword'],
      npcs: ['Ana'],
    },
    library: {
      name: 'Library',
      region: 'Keep',
      description: 'Dusty shelves lean under the weight of old books.',
      exits: { south: 'hall' },
      npcs: ['goblin'],
      danger_level: 1,
    },
    vault: {
      name: 'Vault',
      region: 'Keep',
      description: 'A cold room behind a brass-bound door.',
      exits: { west: 'hall' },
      requires_item: 'brass key',
    },
  },
  item_catalog: {
    'brass key': { kind: 'key' },
    'healing potion': { kind: 'consumable', heal: 30 },
    'short sword': { kind: 'weapon', attack_bonus: 2 },
    'leather cap': { kind: 'armor', defense_bonus: 1 },
    'smoke bomb': { kind: 'consumable', effect: { effect: 'stunned', duration: 1, potency: 0 } },
  },
  npc_profiles: {
    Ana: { hostile: false, faction: 'guild', disposition: 60 },
    goblin: {
      hostile: true,
      health: 12,
      attack: 5,
      defense: 1,
      speed: 4,
      faction: 'goblins',
      loot: ['goblin ear'],
      experience: 15,
    },
  },
  player: { health: 50, attack: 7, defense: 3, speed: 6 },
};

export function testWorld(): WorldDefinition {
  return parseWorld(structuredClone(TEST_WORLD));
}

export function newState(sessionId = 'session-1'): GameState {
  return GameState.fromWorld(sessionId, testWorld(), { clock });
}

export const TEST_GRAPH: KnowledgeGraphData = {
  nodes: [
    { id: 'ana', label: 'Ana', type: 'character' },
    { id: 'guild', label: 'guild', type: 'faction' },
    { id: 'hall', label: 'Great Hall', type: 'area' },
    { id: 'vault', label: 'Vault', type: 'area' },
  ],
  edges: [
    { source: 'ana', target: 'guild', relation: 'member_of' },
    { source: 'guild', target: 'vault', relation: 'guards' },
  ],
  chunks: [
    { id: 'c-ana', text: 'Ana keeps the ledgers of the guild.', entityIds: ['ana'] },
    { id: 'c-vault', text: 'The vault holds the guild treasury.', entityIds: ['vault'] },
    { id: 'c-weather', text: 'Rain falls on the keep most evenings.', entityIds: [] },
  ],
};

export type ScriptStep = string | Error;

/**
 * Answers from a queue; an Error entry is thrown instead of returned.
 */
export class ScriptedProvider implements LLMProvider {
  readonly id = ProviderId.OpenAI;
  readonly name = 'Scripted';
  readonly prompts: string[] = [];
  readonly options: GenerateOptions[] = [];

  constructor(private steps: ScriptStep[]) {}

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    this.prompts.push(prompt);
    this.options.push(options);
    const step = this.steps.shift();
    if (step === undefined) throw new Error('ScriptedProvider: script exhausted');
    if (step instanceof Error) throw step;
    return step;
  }
}

export function testSettings(overrides: Partial<ProviderSettings> = {}): ProviderSettings {
  const settings = buildProviderSettings({});
  return { ...settings, openai: { ...settings.openai, apiKey: 'test-secret' }, ...overrides };
}

/** OpenAI slot answers from the script, everything else is the template provider */
export function scriptedFactory(provider: LLMProvider): ProviderFactory {
  return (id) => (id === ProviderId.OpenAI ? provider : new RuleBasedProvider());
}

export function testProviders(provider: LLMProvider, initial = ProviderId.OpenAI): ProviderManager {
  return new ProviderManager({
    settings: testSettings(),
    generation: { temperature: 0.7, maxTokens: 200, timeoutMs: 1000 },
    initialProvider: initial,
    factory: scriptedFactory(provider),
  });
}

export const noSleep = async (): Promise<void> => undefined;

export function testEngine(providers: ProviderManager, graph: KnowledgeGraphData = TEST_GRAPH): GraphRAGEngine {
  return new GraphRAGEngine({
    retriever: new Retriever(new InMemoryKnowledgeStore(graph), { topK: 4 }),
    providers,
    maxContextChars: 2000,
    retryBackoffMs: 0,
    sleep: noSleep,
  });
}

export async function memoryDatabase(): Promise<DatabaseConnection> {
  const db = new DatabaseConnection({ path: ':memory:' });
  await db.init();
  return db;
}

export interface TestRegistryOptions {
  provider?: LLMProvider;
  game?: Partial<GameDefaults>;
  llm?: Partial<LLMConfig>;
  db?: DatabaseConnection;
}

export async function testRegistry(options: TestRegistryOptions = {}): Promise<{
  registry: SessionRegistry;
  saves: GameStateManager;
  db: DatabaseConnection;
}> {
  const db = options.db ?? (await memoryDatabase());
  const saves = new GameStateManager(new GameStateRepository(db), { clock });
  const llm: LLMConfig = {
    ...buildLLMConfig({}),
    providers: testSettings(),
    retryBackoffMs: 0,
    ...options.llm,
  };
  const registry = new SessionRegistry({
    world: testWorld(),
    knowledge: new InMemoryKnowledgeStore(TEST_GRAPH),
    saves,
    llm,
    game: { ...buildGameDefaults({}), autosaveTurns: 0, combatSeed: 42, ...options.game },
    providerFactory: scriptedFactory(options.provider ?? new RuleBasedProvider()),
    stateOptions: { clock },
    sleep: noSleep,
  });
  return { registry, saves, db };
}
