// Application layer: GameState
// Single source of truth for one session. Every mutation validates first and
// either applies completely or throws, leaving the state untouched.

import type { Area, WorldDefinition, PlayerStats, ItemProfile, NpcProfile } from '@/domain/world/types.js';
import { normalizeDirection } from '@/domain/world/types.js';
import type { CombatSession } from '@/domain/combat/types.js';
import {
  DISPOSITION_DEFAULT,
  DISPOSITION_MAX,
  DISPOSITION_MIN,
  FACTION_MAX,
  FACTION_MIN,
} from '@/domain/game/GameState.js';
import type {
  GameStateSnapshot,
  InventoryEntry,
  ItemMetadataValue,
  NewWorldEvent,
  NpcState,
  StateChange,
  TurnMetadata,
  WorldEvent,
} from '@/domain/game/GameState.js';
import { gameStateSnapshotSchema } from './snapshotSchema.js';
import { InvalidTransitionError, ItemNotFoundError, SaveCorruptedError, WorldLoadError } from '@/utils/errors.js';
import { matchName } from '@/utils/string.js';

export interface GameStateOptions {
  clock?: () => Date;
}

export interface ItemTransfer extends StateChange<number> {
  itemId: string;
}

export class GameState {
  private data: GameStateSnapshot;
  private readonly clock: () => Date;

  private constructor(data: GameStateSnapshot, options: GameStateOptions = {}) {
    this.data = data;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Start a fresh session on a loaded world. The start area counts as visited.
   */
  static fromWorld(sessionId: string, world: WorldDefinition, options?: GameStateOptions): GameState {
    const areas = structuredClone(world.areas);
    const start = areas[world.startAreaId];
    if (!start) {
      throw new WorldLoadError(`Start area does not exist: ${world.startAreaId}`, {
        startAreaId: world.startAreaId,
      });
    }
    start.visited = true;

    return new GameState(
      {
        version: 1,
        sessionId,
        turn: 0,
        playerLocation: world.startAreaId,
        areas,
        inventory: [],
        player: { ...world.player },
        npcStates: {},
        factionStandings: {},
        worldEvents: [],
        combatActive: false,
        combat: null,
        itemCatalog: structuredClone(world.itemCatalog),
        npcProfiles: structuredClone(world.npcProfiles),
      },
      options
    );
  }

  /**
   * Rebuild a state from a stored snapshot.
   * @throws SaveCorruptedError when the snapshot does not validate
   */
  static fromSnapshot(snapshot: unknown, options?: GameStateOptions): GameState {
    const parsed = gameStateSnapshotSchema.safeParse(snapshot);
    if (!parsed.success) {
      throw new SaveCorruptedError('Save data is corrupted', {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return new GameState(parsed.data, options);
  }

  toSnapshot(): GameStateSnapshot {
    return structuredClone(this.data);
  }

  // ========== Reads ==========

  get sessionId(): string {
    return this.data.sessionId;
  }

  get turn(): number {
    return this.data.turn;
  }

  get playerLocation(): string {
    return this.data.playerLocation;
  }

  get combatActive(): boolean {
    return this.data.combatActive;
  }

  get combat(): Readonly<CombatSession> | null {
    return this.data.combat;
  }

  get player(): Readonly<PlayerStats> {
    return this.data.player;
  }

  get inventory(): readonly Readonly<InventoryEntry>[] {
    return this.data.inventory;
  }

  get worldEvents(): readonly Readonly<WorldEvent>[] {
    return this.data.worldEvents;
  }

  get factionStandings(): Readonly<Record<string, number>> {
    return this.data.factionStandings;
  }

  currentArea(): Readonly<Area> {
    return this.data.areas[this.data.playerLocation];
  }

  getArea(areaId: string): Readonly<Area> | null {
    return this.data.areas[areaId] ?? null;
  }

  itemProfile(itemId: string): Readonly<ItemProfile> | null {
    return this.data.itemCatalog[itemId] ?? null;
  }

  npcProfile(npcId: string): Readonly<NpcProfile> | null {
    return this.data.npcProfiles[npcId] ?? null;
  }

  npcState(npcId: string): Readonly<NpcState> {
    return this.data.npcStates[npcId] ?? { disposition: this.defaultDisposition(npcId), flags: {} };
  }

  hasItem(itemId: string): boolean {
    return this.data.inventory.some((entry) => entry.itemId === itemId);
  }

  /** total quantity across inventory entries */
  inventoryCount(): number {
    return this.data.inventory.reduce((sum, entry) => sum + entry.quantity, 0);
  }

  metadata(): TurnMetadata {
    return {
      playerLocation: this.data.playerLocation,
      inventoryCount: this.inventoryCount(),
      combatActive: this.data.combatActive,
    };
  }

  findInventoryItem(term: string): string | null {
    return matchName(
      term,
      this.data.inventory.map((entry) => entry.itemId)
    );
  }

  findAreaItem(term: string): string | null {
    return matchName(term, this.currentArea().items);
  }

  findCatalogItem(term: string): string | null {
    return matchName(term, Object.keys(this.data.itemCatalog), 1);
  }

  findAreaNpc(term: string): string | null {
    return matchName(term, this.currentArea().npcs);
  }

  /**
   * Resolve an NPC anywhere in the world, preferring those present.
   */
  resolveNpc(term: string): string | null {
    return this.findAreaNpc(term) ?? matchName(term, this.knownNpcs());
  }

  /**
   * Resolve a direction, area id or area name to a reachable neighbour id.
   */
  resolveExit(term: string): string | null {
    const exits = this.currentArea().exits;
    const direction = normalizeDirection(term);
    const byDirection = exits[direction];
    if (byDirection) return byDirection;

    const targets = Object.values(exits).filter((id): id is string => id !== null);
    const lower = term.trim().toLowerCase();
    const byId = targets.find((id) => id.toLowerCase() === lower);
    if (byId) return byId;

    const names = new Map<string, string>();
    for (const id of targets) {
      const area = this.data.areas[id];
      if (area) names.set(area.name, id);
    }
    const name = matchName(term, names.keys());
    return name === null ? null : names.get(name) ?? null;
  }

  // ========== Movement ==========

  /**
   * @throws InvalidTransitionError for unknown or non-adjacent areas and unmet gates
   */
  moveTo(areaId: string): StateChange<string> {
    if (this.data.combatActive) {
      throw new InvalidTransitionError("You can't leave while in combat.", { areaId });
    }
    const target = this.data.areas[areaId];
    if (!target) {
      throw new InvalidTransitionError(`Unknown area: ${areaId}`, { areaId });
    }
    const current = this.currentArea();
    if (!Object.values(current.exits).includes(areaId)) {
      throw new InvalidTransitionError("You can't go that way.", { from: current.id, areaId });
    }
    if (target.requiresItem && !this.hasItem(target.requiresItem)) {
      throw new InvalidTransitionError(`You need the ${target.requiresItem} to enter ${target.name}.`, {
        areaId,
        requiresItem: target.requiresItem,
      });
    }

    const previous = this.data.playerLocation;
    this.data.playerLocation = areaId;
    target.visited = true;
    return { previous, next: areaId };
  }

  moveInDirection(direction: string): StateChange<string> {
    const normalized = normalizeDirection(direction);
    const exits = this.currentArea().exits;
    if (!(normalized in exits)) {
      throw new InvalidTransitionError("You can't go that way.", { direction: normalized });
    }
    const target = exits[normalized];
    if (target === null) {
      throw new InvalidTransitionError(`The way ${normalized} is blocked.`, { direction: normalized });
    }
    return this.moveTo(target);
  }

  // ========== Inventory ==========

  addItem(itemId: string, metadata: Record<string, ItemMetadataValue> = {}, quantity = 1): StateChange<number> {
    const name = itemId.trim();
    if (!name || !Number.isInteger(quantity) || quantity < 1) {
      throw new InvalidTransitionError('Invalid item', { itemId, quantity });
    }
    const entry = this.data.inventory.find((e) => e.itemId === name);
    if (entry) {
      const previous = entry.quantity;
      entry.quantity += quantity;
      Object.assign(entry.metadata, metadata);
      return { previous, next: entry.quantity };
    }
    this.data.inventory.push({ itemId: name, quantity, metadata: { ...metadata } });
    return { previous: 0, next: quantity };
  }

  /**
   * Remove one unit. Unequips the item when the last unit leaves.
   * @throws ItemNotFoundError
   */
  removeItem(itemId: string): StateChange<number> {
    const index = this.data.inventory.findIndex((e) => e.itemId === itemId);
    if (index < 0) {
      throw new ItemNotFoundError(`You don't have ${itemId}.`, itemId);
    }
    const entry = this.data.inventory[index];
    const previous = entry.quantity;
    entry.quantity -= 1;
    if (entry.quantity === 0) {
      this.data.inventory.splice(index, 1);
      if (this.data.player.equippedWeapon === itemId) this.data.player.equippedWeapon = null;
      if (this.data.player.equippedArmor === itemId) this.data.player.equippedArmor = null;
    }
    return { previous, next: entry.quantity };
  }

  takeItem(term: string): ItemTransfer {
    const itemId = this.findAreaItem(term);
    if (itemId === null) {
      throw new ItemNotFoundError(`There is no ${term.trim()} here.`, term.trim());
    }
    const area = this.data.areas[this.data.playerLocation];
    area.items.splice(area.items.indexOf(itemId), 1);
    return { itemId, ...this.addItem(itemId) };
  }

  dropItem(term: string): ItemTransfer {
    const itemId = this.findInventoryItem(term);
    if (itemId === null) {
      throw new ItemNotFoundError(`You don't have ${term.trim()}.`, term.trim());
    }
    const change = this.removeItem(itemId);
    this.data.areas[this.data.playerLocation].items.push(itemId);
    return { itemId, ...change };
  }

  equip(term: string): StateChange<string | null> & { itemId: string; slot: 'weapon' | 'armor' } {
    const itemId = this.findInventoryItem(term);
    if (itemId === null) {
      throw new ItemNotFoundError(`You don't have ${term.trim()}.`, term.trim());
    }
    const kind = this.data.itemCatalog[itemId]?.kind;
    if (kind === 'weapon') {
      const previous = this.data.player.equippedWeapon;
      this.data.player.equippedWeapon = itemId;
      return { itemId, slot: 'weapon', previous, next: itemId };
    }
    if (kind === 'armor') {
      const previous = this.data.player.equippedArmor;
      this.data.player.equippedArmor = itemId;
      return { itemId, slot: 'armor', previous, next: itemId };
    }
    throw new InvalidTransitionError(`You can't equip the ${itemId}.`, { itemId });
  }

  // ========== NPCs & factions ==========

  updateNpcDisposition(npcId: string, delta: number): StateChange<number> {
    assertFinite(delta, 'delta');
    const npc = this.requireNpc(npcId);
    const state = this.ensureNpcState(npc);
    const previous = state.disposition;
    state.disposition = clamp(previous + delta, DISPOSITION_MIN, DISPOSITION_MAX);
    return { previous, next: state.disposition };
  }

  setNpcDisposition(npcId: string, value: number): StateChange<number> {
    assertFinite(value, 'value');
    const npc = this.requireNpc(npcId);
    const state = this.ensureNpcState(npc);
    const previous = state.disposition;
    state.disposition = clamp(value, DISPOSITION_MIN, DISPOSITION_MAX);
    return { previous, next: state.disposition };
  }

  setNpcFlag(npcId: string, flag: string, value: boolean): StateChange<boolean | undefined> {
    const key = flag.trim();
    if (!key) {
      throw new InvalidTransitionError('Flag name is required', { npcId });
    }
    const npc = this.requireNpc(npcId);
    const state = this.ensureNpcState(npc);
    const previous = state.flags[key];
    state.flags[key] = value;
    return { previous, next: value };
  }

  removeNpcFromArea(npcId: string, areaId: string = this.data.playerLocation): StateChange<string[]> {
    const area = this.data.areas[areaId];
    const npc = area ? matchName(npcId, area.npcs) : null;
    if (!area || npc === null) {
      throw new InvalidTransitionError(`${npcId} is not in ${areaId}.`, { npcId, areaId });
    }
    const previous = [...area.npcs];
    area.npcs = area.npcs.filter((name) => name !== npc);
    return { previous, next: [...area.npcs] };
  }

  updateFactionStanding(factionId: string, delta: number): StateChange<number> {
    assertFinite(delta, 'delta');
    const name = factionId.trim();
    if (!name) {
      throw new InvalidTransitionError('Faction name is required', { factionId });
    }
    const key = matchName(name, Object.keys(this.data.factionStandings), 1) ?? name;
    const previous = this.data.factionStandings[key] ?? 0;
    const next = clamp(previous + delta, FACTION_MIN, FACTION_MAX);
    this.data.factionStandings[key] = next;
    return { previous, next };
  }

  // ========== Events & turns ==========

  recordEvent(event: NewWorldEvent): WorldEvent {
    const last = this.data.worldEvents[this.data.worldEvents.length - 1];
    const recorded: WorldEvent = {
      sequence: (last?.sequence ?? 0) + 1,
      turn: this.data.turn,
      actor: event.actor,
      description: event.description,
      timestamp: this.clock().toISOString(),
    };
    this.data.worldEvents.push(recorded);
    return recorded;
  }

  incrementTurn(): StateChange<number> {
    const previous = this.data.turn;
    this.data.turn = previous + 1;
    return { previous, next: this.data.turn };
  }

  // ========== Player ==========

  setPlayerHealth(health: number): StateChange<number> {
    assertFinite(health, 'health');
    const previous = this.data.player.health;
    this.data.player.health = clamp(Math.round(health), 0, this.data.player.maxHealth);
    return { previous, next: this.data.player.health };
  }

  addExperience(amount: number): StateChange<number> {
    assertFinite(amount, 'amount');
    const previous = this.data.player.experience;
    this.data.player.experience = previous + Math.max(0, amount);
    return { previous, next: this.data.player.experience };
  }

  // ========== Combat ==========

  enterCombat(session: CombatSession): StateChange<boolean> {
    if (this.data.combatActive) {
      throw new InvalidTransitionError('Already in combat.', { combatId: this.data.combat?.id });
    }
    this.data.combat = structuredClone(session);
    this.data.combatActive = true;
    return { previous: false, next: true };
  }

  updateCombat(session: CombatSession): StateChange<boolean> {
    if (!this.data.combatActive) {
      throw new InvalidTransitionError('Not in combat.');
    }
    this.data.combat = structuredClone(session);
    return { previous: true, next: true };
  }

  /**
   * @returns the finished session
   */
  exitCombat(): CombatSession {
    const session = this.data.combat;
    if (!this.data.combatActive || session === null) {
      throw new InvalidTransitionError('Not in combat.');
    }
    this.data.combat = null;
    this.data.combatActive = false;
    return session;
  }

  // ========== Internal ==========

  private knownNpcs(): Set<string> {
    const names = new Set<string>(Object.keys(this.data.npcProfiles));
    for (const area of Object.values(this.data.areas)) {
      area.npcs.forEach((npc) => names.add(npc));
    }
    Object.keys(this.data.npcStates).forEach((npc) => names.add(npc));
    return names;
  }

  private requireNpc(npcId: string): string {
    const npc = this.resolveNpc(npcId);
    if (npc === null) {
      throw new InvalidTransitionError(`Unknown character: ${npcId}`, { npcId });
    }
    return npc;
  }

  private ensureNpcState(npcId: string): NpcState {
    const existing = this.data.npcStates[npcId];
    if (existing) return existing;
    const created: NpcState = { disposition: this.defaultDisposition(npcId), flags: {} };
    this.data.npcStates[npcId] = created;
    return created;
  }

  private defaultDisposition(npcId: string): number {
    const configured = this.data.npcProfiles[npcId]?.disposition;
    return configured === undefined ? DISPOSITION_DEFAULT : clamp(configured, DISPOSITION_MIN, DISPOSITION_MAX);
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function assertFinite(value: number, field: string): void {
  if (!Number.isFinite(value)) {
    throw new InvalidTransitionError(`${field} must be a finite number`, { [field]: value });
  }
}
