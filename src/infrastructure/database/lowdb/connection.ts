// LowDB connection and database instance management
// JSON file storage for save slots, with version-checked writes

import { Low, Memory } from 'lowdb';
import type { Adapter } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import { dirname } from 'path';
import { mkdirSync } from 'fs';
import type { GameStateSnapshot } from '@/domain/game/GameState.js';

export interface DatabaseSchema {
  _version: number; // incremented on every checked write
  saves: SaveRecord[];
}

export interface SaveRecord {
  session_id: string;
  slot_name: string;
  /** stored as written; validated on load */
  snapshot: GameStateSnapshot;
  saved_at: string;
}

export class VersionConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'VersionConflictError';
  }
}

function defaultData(): DatabaseSchema {
  return { _version: 1, saves: [] };
}

export interface DatabaseConfig {
  /** JSON file path, or ':memory:' for an in-process database */
  path: string;
  adapter?: Adapter<DatabaseSchema>;
}

export class DatabaseConnection {
  private db: Low<DatabaseSchema>;

  constructor(config: DatabaseConfig) {
    let adapter = config.adapter;
    if (!adapter && config.path === ':memory:') {
      adapter = new Memory<DatabaseSchema>();
    }
    if (!adapter) {
      mkdirSync(dirname(config.path), { recursive: true });
      adapter = new JSONFile<DatabaseSchema>(config.path);
    }
    this.db = new Low(adapter, defaultData());
  }

  async init(): Promise<void> {
    await this.db.read();

    // files written before versioning, or by hand
    if (this.db.data._version === undefined || !Array.isArray(this.db.data.saves)) {
      this.db.data = { ...defaultData(), ...this.db.data };
      if (!Array.isArray(this.db.data.saves)) this.db.data.saves = [];
      await this.db.write();
    }
  }

  getData(): DatabaseSchema {
    return this.db.data;
  }

  async read(): Promise<void> {
    await this.db.read();
  }

  async write(): Promise<void> {
    await this.db.write();
  }

  /**
   * @throws VersionConflictError if another writer got there first
   */
  async writeWithVersionCheck(expectedVersion: number): Promise<void> {
    const currentVersion = this.db.data._version;
    if (currentVersion !== expectedVersion) {
      throw new VersionConflictError(`Version conflict: expected ${expectedVersion}, got ${currentVersion}`);
    }
    this.db.data._version = currentVersion + 1;
    await this.db.write();
  }

  /**
   * Read, apply and write with a version check, retrying on conflict.
   */
  async atomicUpdate<T>(updater: (data: DatabaseSchema) => T, options?: { maxRetries?: number }): Promise<T> {
    const maxRetries = options?.maxRetries ?? 3;

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      await this.read();
      const data = this.getData();
      const version = data._version;

      try {
        const result = updater(data);
        await this.writeWithVersionCheck(version);
        return result;
      } catch (e) {
        if (e instanceof VersionConflictError && attempt < maxRetries - 1) {
          continue;
        }
        throw e;
      }
    }

    throw new VersionConflictError('Max retries exceeded in atomicUpdate');
  }

  async close(): Promise<void> {
    await this.write();
  }
}

let instance: DatabaseConnection | null = null;

export async function getDatabase(config?: DatabaseConfig): Promise<DatabaseConnection> {
  if (!instance) {
    if (!config) {
      throw new Error('Database config required for first initialization');
    }
    instance = new DatabaseConnection(config);
    await instance.init();
  }
  return instance;
}

export async function closeDatabase(): Promise<void> {
  if (instance) {
    await instance.close();
    instance = null;
  }
}
