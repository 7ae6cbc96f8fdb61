// Infrastructure layer: GameState repository using LowDB
// Save slots keyed by session id and slot name

import type { GameStateSnapshot } from '@/domain/game/GameState.js';
import type { DatabaseConnection, SaveRecord } from './connection.js';

export interface SaveSlotSummary {
  slotName: string;
  savedAt: string;
  turn: number;
  playerLocation: string;
}

export class GameStateRepository {
  constructor(private db: DatabaseConnection) {}

  /**
   * Write a snapshot into a slot, replacing any previous save there.
   */
  async saveState(sessionId: string, slotName: string, snapshot: GameStateSnapshot): Promise<SaveRecord> {
    const record: SaveRecord = {
      session_id: sessionId,
      slot_name: slotName,
      snapshot,
      saved_at: new Date().toISOString(),
    };

    await this.db.atomicUpdate((data) => {
      const existingIndex = data.saves.findIndex((s) => s.session_id === sessionId && s.slot_name === slotName);
      if (existingIndex >= 0) {
        data.saves[existingIndex] = record;
      } else {
        data.saves.push(record);
      }
    });
    return record;
  }

  /**
   * @returns the stored record, unvalidated, or null for an unknown slot
   */
  async loadState(sessionId: string, slotName: string): Promise<SaveRecord | null> {
    await this.db.read();
    return this.db.getData().saves.find((s) => s.session_id === sessionId && s.slot_name === slotName) ?? null;
  }

  /**
   * @returns whether a slot was removed
   */
  async deleteState(sessionId: string, slotName: string): Promise<boolean> {
    return this.db.atomicUpdate((data) => {
      const before = data.saves.length;
      data.saves = data.saves.filter((s) => !(s.session_id === sessionId && s.slot_name === slotName));
      return data.saves.length < before;
    });
  }

  async listSlots(sessionId: string): Promise<SaveSlotSummary[]> {
    await this.db.read();
    return this.db
      .getData()
      .saves.filter((s) => s.session_id === sessionId)
      .sort((a, b) => a.slot_name.localeCompare(b.slot_name))
      .map((s) => ({
        slotName: s.slot_name,
        savedAt: s.saved_at,
        turn: typeof s.snapshot?.turn === 'number' ? s.snapshot.turn : 0,
        playerLocation: typeof s.snapshot?.playerLocation === 'string' ? s.snapshot.playerLocation : 'unknown',
      }));
  }
}
