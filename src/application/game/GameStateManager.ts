// Application layer: GameStateManager
// Handles save/load orchestration for GameState

import { z } from 'zod';
import type { GameStateOptions } from './GameState.js';
import { GameState } from './GameState.js';
import type { GameStateRepository, SaveSlotSummary } from '@/infrastructure/database/lowdb/GameStateRepository.js';
import { SaveNotFoundError } from '@/utils/errors.js';

export const AUTOSAVE_SLOT = 'autosave';
export const DEFAULT_SLOT = 'quicksave';

export const slotNameSchema = z
  .string()
  .trim()
  .min(1)
  .max(40)
  .regex(/^[A-Za-z0-9_-]+$/, 'Slot names may only contain letters, digits, "-" and "_"');

/** Saves are keyed by session id, so a resumable id follows the same rules as a slot. */
export const sessionIdSchema = z
  .string()
  .trim()
  .min(1)
  .max(64)
  .regex(/^[A-Za-z0-9_-]+$/, 'Session ids may only contain letters, digits, "-" and "_"');

export interface SaveResult {
  slotName: string;
  savedAt: string;
  turn: number;
}

export interface LoadResult {
  slotName: string;
  state: GameState;
  savedAt: string;
}

export class GameStateManager {
  constructor(
    private gameStateRepo: GameStateRepository,
    private stateOptions: GameStateOptions = {}
  ) {}

  async save(state: GameState, slotName = DEFAULT_SLOT): Promise<SaveResult> {
    const slot = slotNameSchema.parse(slotName);
    const snapshot = state.toSnapshot();
    const record = await this.gameStateRepo.saveState(state.sessionId, slot, snapshot);
    console.log(`[GameStateManager] Saved ${state.sessionId}/${slot} at turn ${snapshot.turn}`);
    return { slotName: slot, savedAt: record.saved_at, turn: snapshot.turn };
  }

  /**
   * Build a new GameState from a slot. The caller swaps it in, so a failure
   * here never touches the live state.
   * @throws SaveNotFoundError
   * @throws SaveCorruptedError
   */
  async load(sessionId: string, slotName = DEFAULT_SLOT): Promise<LoadResult> {
    const slot = slotNameSchema.parse(slotName);
    const record = await this.gameStateRepo.loadState(sessionId, slot);
    if (!record) {
      throw new SaveNotFoundError(`No save named "${slot}"`, { sessionId, slotName: slot });
    }
    const state = GameState.fromSnapshot(record.snapshot, this.stateOptions);
    console.log(`[GameStateManager] Loaded ${sessionId}/${slot} (turn ${state.turn})`);
    return { slotName: slot, state, savedAt: record.saved_at };
  }

  async listSlots(sessionId: string): Promise<SaveSlotSummary[]> {
    return this.gameStateRepo.listSlots(sessionId);
  }

  /**
   * @throws SaveNotFoundError
   */
  async deleteSlot(sessionId: string, slotName: string): Promise<void> {
    const slot = slotNameSchema.parse(slotName);
    const removed = await this.gameStateRepo.deleteState(sessionId, slot);
    if (!removed) {
      throw new SaveNotFoundError(`No save named "${slot}"`, { sessionId, slotName: slot });
    }
  }
}
