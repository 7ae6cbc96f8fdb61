import { describe, expect, it } from 'vitest';
import { loadWorld, parseWorld } from '@/infrastructure/world/WorldLoader.js';
import { loadKnowledgeStore } from '@/infrastructure/knowledge/loadKnowledgeGraph.js';
import { normalizeDirection } from '@/domain/world/types.js';
import { WorldLoadError } from '@/utils/errors.js';
import { TEST_WORLD, testWorld } from './helpers.js';

describe('parseWorld', () => {
  it('maps the document onto domain types with defaults', () => {
    const world = testWorld();

    expect(world.startAreaId).toBe('hall');
    expect(world.areas.vault).toMatchObject({
      id: 'vault',
      name: 'Vault',
      subRegion: null,
      coordinates: [0, 0, 0],
      requiresItem: 'brass key',
      dangerLevel: 0,
      visited: false,
    });
    expect(world.itemCatalog['short sword']).toEqual({
      kind: 'weapon',
      description: undefined,
      attackBonus: 2,
      defenseBonus: undefined,
      heal: undefined,
      effect: undefined,
    });
    expect(world.player).toEqual({
      health: 50,
      maxHealth: 50,
      attack: 7,
      defense: 3,
      speed: 6,
      experience: 0,
      equippedWeapon: null,
      equippedArmor: null,
    });
  });

  it('rejects a start area that does not exist', () => {
    expect(() => parseWorld({ ...TEST_WORLD, current_area_id: 'attic' })).toThrow(
      new WorldLoadError('current_area_id does not name an area: attic')
    );
  });

  it('lists every schema problem', () => {
    let caught: unknown;
    try {
      parseWorld({ current_area_id: 'hall', areas: { hall: { name: '', danger_level: 11 } } });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(WorldLoadError);
    expect(caught).toMatchObject({
      details: {
        issues: [
          'areas.hall.name: String must contain at least 1 character(s)',
          'areas.hall.danger_level: Number must be less than or equal to 10',
        ],
      },
    });
  });

  it('normalises direction aliases', () => {
    expect(normalizeDirection(' NE ')).toBe('northeast');
    expect(normalizeDirection('Portal')).toBe('portal');
  });
});

describe('bundled data', () => {
  it('loads the Hollowmere world', () => {
    const world = loadWorld('data/worlds/hollowmere.json');
    expect(world.startAreaId).toBe('village_square');
    expect(Object.keys(world.areas)).toHaveLength(8);
    expect(world.areas.forest_path.exits.west).toBeNull();
    expect(world.areas.shrine_crypt.requiresItem).toBe('iron key');
  });

  it('loads the Hollowmere knowledge graph', () => {
    expect(loadKnowledgeStore('data/knowledge/hollowmere.json').size).toEqual({ nodes: 18, chunks: 7 });
  });

  it('starts with an empty store when the graph file is missing', () => {
    expect(loadKnowledgeStore('data/knowledge/missing.json').size).toEqual({ nodes: 0, chunks: 0 });
  });

  it('reports an unreadable world file', () => {
    expect(() => loadWorld('data/worlds/missing.json')).toThrow(WorldLoadError);
  });
});
