// Infrastructure layer: World document loader
// Reads the snake_case world JSON and maps it onto domain types

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import type { Area, WorldDefinition } from '@/domain/world/types.js';
import { normalizeDirection } from '@/domain/world/types.js';
import { WorldLoadError } from '@/utils/errors.js';

const areaDocumentSchema = z.object({
  name: z.string().min(1),
  region: z.string().default('Unknown'),
  sub_region: z.string().nullable().default(null),
  parent_area_id: z.string().nullable().default(null),
  is_region_entrance: z.boolean().default(false),
  coordinates: z.tuple([z.number().int(), z.number().int(), z.number().int()]).default([0, 0, 0]),
  description: z.string().default(''),
  attributes: z.array(z.string()).default([]),
  exits: z.record(z.string(), z.string().nullable()).default({}),
  items: z.array(z.string()).default([]),
  npcs: z.array(z.string()).default([]),
  visited: z.boolean().default(false),
  danger_level: z.number().int().min(0).max(10).default(0),
  requires_item: z.string().nullable().default(null),
});

const itemDocumentSchema = z.object({
  kind: z.enum(['weapon', 'armor', 'consumable', 'key', 'misc']).default('misc'),
  description: z.string().optional(),
  attack_bonus: z.number().int().optional(),
  defense_bonus: z.number().int().optional(),
  heal: z.number().int().positive().optional(),
  effect: z
    .object({
      effect: z.enum(['poisoned', 'stunned', 'weakened', 'protected']),
      duration: z.number().int().positive().default(2),
      potency: z.number().int().min(0).default(2),
    })
    .optional(),
});

const npcDocumentSchema = z.object({
  hostile: z.boolean().default(false),
  health: z.number().int().positive().optional(),
  attack: z.number().int().optional(),
  defense: z.number().int().optional(),
  speed: z.number().int().optional(),
  faction: z.string().optional(),
  loot: z.array(z.string()).default([]),
  experience: z.number().int().min(0).optional(),
  disposition: z.number().int().min(0).max(100).optional(),
});

const playerDocumentSchema = z.object({
  health: z.number().int().positive().default(100),
  max_health: z.number().int().positive().optional(),
  attack: z.number().int().default(8),
  defense: z.number().int().default(4),
  speed: z.number().int().default(6),
  experience: z.number().int().min(0).default(0),
});

export const worldDocumentSchema = z.object({
  current_area_id: z.string().min(1),
  areas: z.record(z.string(), areaDocumentSchema),
  item_catalog: z.record(z.string(), itemDocumentSchema).default({}),
  npc_profiles: z.record(z.string(), npcDocumentSchema).default({}),
  player: playerDocumentSchema.default({}),
});

export type WorldDocument = z.input<typeof worldDocumentSchema>;

/**
 * Validate and convert a parsed world document.
 * @throws WorldLoadError
 */
export function parseWorld(raw: unknown): WorldDefinition {
  const parsed = worldDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new WorldLoadError('World document is invalid', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  const doc = parsed.data;
  if (!(doc.current_area_id in doc.areas)) {
    throw new WorldLoadError(`current_area_id does not name an area: ${doc.current_area_id}`, {
      currentAreaId: doc.current_area_id,
    });
  }

  const areas: Record<string, Area> = {};
  for (const [id, area] of Object.entries(doc.areas)) {
    const exits: Record<string, string | null> = {};
    for (const [direction, target] of Object.entries(area.exits)) {
      exits[normalizeDirection(direction)] = target;
    }

    areas[id] = {
      id,
      name: area.name,
      region: area.region,
      subRegion: area.sub_region,
      parentAreaId: area.parent_area_id,
      isRegionEntrance: area.is_region_entrance,
      coordinates: area.coordinates,
      description: area.description,
      attributes: [...new Set(area.attributes)],
      exits,
      items: [...area.items],
      npcs: [...area.npcs],
      visited: area.visited,
      dangerLevel: area.danger_level,
      requiresItem: area.requires_item,
    };
  }

  // dangling exits are reported but kept; moving there is refused at run time
  for (const area of Object.values(areas)) {
    for (const [direction, target] of Object.entries(area.exits)) {
      if (target !== null && !(target in areas)) {
        console.warn(`[WorldLoader] ${area.id} exit ${direction} points at unknown area ${target}`);
      }
    }
  }

  const itemCatalog: WorldDefinition['itemCatalog'] = {};
  for (const [name, item] of Object.entries(doc.item_catalog)) {
    itemCatalog[name] = {
      kind: item.kind,
      description: item.description,
      attackBonus: item.attack_bonus,
      defenseBonus: item.defense_bonus,
      heal: item.heal,
      effect: item.effect,
    };
  }

  const npcProfiles: WorldDefinition['npcProfiles'] = {};
  for (const [name, npc] of Object.entries(doc.npc_profiles)) {
    npcProfiles[name] = {
      hostile: npc.hostile,
      health: npc.health,
      attack: npc.attack,
      defense: npc.defense,
      speed: npc.speed,
      faction: npc.faction,
      loot: [...npc.loot],
      experience: npc.experience,
      disposition: npc.disposition,
    };
  }

  const player = doc.player;
  return {
    startAreaId: doc.current_area_id,
    areas,
    itemCatalog,
    npcProfiles,
    player: {
      health: player.health,
      maxHealth: player.max_health ?? player.health,
      attack: player.attack,
      defense: player.defense,
      speed: player.speed,
      experience: player.experience,
      equippedWeapon: null,
      equippedArmor: null,
    },
  };
}

export function loadWorld(filePath: string): WorldDefinition {
  const fullPath = resolve(filePath);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(fullPath, 'utf-8'));
  } catch (error) {
    throw new WorldLoadError(`Cannot read world document: ${fullPath}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const world = parseWorld(raw);
  console.log(`[WorldLoader] Loaded ${Object.keys(world.areas).length} areas from ${fullPath}`);
  return world;
}
