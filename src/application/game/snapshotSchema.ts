// Application layer: Save snapshot validation
// Snapshots come back from disk, so they are parsed rather than trusted

import { z } from 'zod';
import type { GameStateSnapshot } from '@/domain/game/GameState.js';

const areaSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  region: z.string(),
  subRegion: z.string().nullable(),
  parentAreaId: z.string().nullable(),
  isRegionEntrance: z.boolean(),
  coordinates: z.tuple([z.number().int(), z.number().int(), z.number().int()]),
  description: z.string(),
  attributes: z.array(z.string()),
  exits: z.record(z.string(), z.string().nullable()),
  items: z.array(z.string()),
  npcs: z.array(z.string()),
  visited: z.boolean(),
  dangerLevel: z.number().int().min(0).max(10),
  requiresItem: z.string().nullable(),
});

const statusEffectNameSchema = z.enum(['poisoned', 'stunned', 'weakened', 'protected']);

const itemProfileSchema = z.object({
  kind: z.enum(['weapon', 'armor', 'consumable', 'key', 'misc']),
  description: z.string().optional(),
  attackBonus: z.number().optional(),
  defenseBonus: z.number().optional(),
  heal: z.number().optional(),
  effect: z
    .object({
      effect: statusEffectNameSchema,
      duration: z.number().int().positive(),
      potency: z.number(),
    })
    .optional(),
});

const npcProfileSchema = z.object({
  hostile: z.boolean(),
  health: z.number().optional(),
  attack: z.number().optional(),
  defense: z.number().optional(),
  speed: z.number().optional(),
  faction: z.string().optional(),
  loot: z.array(z.string()),
  experience: z.number().optional(),
  disposition: z.number().optional(),
});

const playerSchema = z.object({
  health: z.number(),
  maxHealth: z.number().positive(),
  attack: z.number(),
  defense: z.number(),
  speed: z.number(),
  experience: z.number(),
  equippedWeapon: z.string().nullable(),
  equippedArmor: z.string().nullable(),
});

const combatantSchema = z.object({
  id: z.string(),
  name: z.string(),
  side: z.enum(['player', 'enemy']),
  stats: z.object({
    health: z.number(),
    maxHealth: z.number(),
    attack: z.number(),
    defense: z.number(),
    speed: z.number(),
  }),
  weaponId: z.string().nullable(),
  armorId: z.string().nullable(),
  statusEffects: z.array(
    z.object({
      effect: statusEffectNameSchema,
      remaining: z.number().int(),
      potency: z.number(),
    })
  ),
  defending: z.boolean(),
});

const combatSessionSchema = z.object({
  id: z.string(),
  participants: z.array(combatantSchema).min(2),
  turnIndex: z.number().int().min(0),
  round: z.number().int().min(1),
  phase: z.enum(['not_started', 'player_turn', 'enemy_turn', 'victory', 'defeat', 'fled']),
  seed: z.number().int(),
  rngState: z.number().int(),
  log: z.array(
    z.object({
      turnIndex: z.number().int(),
      round: z.number().int(),
      actorId: z.string(),
      action: z.enum(['attack', 'defend', 'flee', 'use', 'wait', 'status', 'start', 'end']),
      roll: z.number().optional(),
      damage: z.number().optional(),
      message: z.string(),
    })
  ),
});

export const gameStateSnapshotSchema: z.ZodType<GameStateSnapshot> = z
  .object({
    version: z.literal(1),
    sessionId: z.string().min(1),
    turn: z.number().int().min(0),
    playerLocation: z.string().min(1),
    areas: z.record(z.string(), areaSchema),
    inventory: z.array(
      z.object({
        itemId: z.string().min(1),
        quantity: z.number().int().positive(),
        metadata: z.record(z.string(), z.union([z.string(), z.number(), z.boolean()])),
      })
    ),
    player: playerSchema,
    npcStates: z.record(
      z.string(),
      z.object({
        disposition: z.number().min(0).max(100),
        flags: z.record(z.string(), z.boolean()),
      })
    ),
    factionStandings: z.record(z.string(), z.number().min(-100).max(100)),
    worldEvents: z.array(
      z.object({
        sequence: z.number().int().positive(),
        turn: z.number().int().min(0),
        actor: z.string(),
        description: z.string(),
        timestamp: z.string(),
      })
    ),
    combatActive: z.boolean(),
    combat: combatSessionSchema.nullable(),
    itemCatalog: z.record(z.string(), itemProfileSchema),
    npcProfiles: z.record(z.string(), npcProfileSchema),
  })
  .superRefine((snapshot, ctx) => {
    if (!(snapshot.playerLocation in snapshot.areas)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['playerLocation'],
        message: `Unknown area: ${snapshot.playerLocation}`,
      });
    }
    if (snapshot.combatActive !== (snapshot.combat !== null)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['combat'],
        message: 'combatActive does not match the stored combat session',
      });
    }
  });
