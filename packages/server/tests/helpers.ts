import type { ID, Role, ServerToClient } from '@vtt/shared';
import { type AppConfig, loadConfig } from '../src/config.js';
import { type DB, openDatabase } from '../src/db.js';
import type { ClientSocket } from '../src/realtime-hub.js';

export const TEST_SECRET = 'test-secret';

export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({
    SECRET_KEY: TEST_SECRET,
    DATABASE_FILE: ':memory:',
    ARGON2_TIME_COST: '2',
    ARGON2_MEMORY_COST: '4096',
    ARGON2_PARALLELISM: '1',
    ...overrides,
  });
}

export function memoryDb(): DB {
  return openDatabase(':memory:');
}

/** Inserts a user row directly, for tests that only need an owner id. */
export function insertUser(db: DB, username: string, role: Role = 'gm'): ID {
  const result = db
    .prepare<[string, Role]>("INSERT INTO users (username, password_hash, role) VALUES (?, 'unused', ?)")
    .run(username, role);
  return Number(result.lastInsertRowid);
}

/** Stands in for a ws socket; records every frame the hub sends. */
export class FakeSocket implements ClientSocket {
  readonly OPEN = 1;
  readyState = 1;
  readonly sent: string[] = [];

  send(data: string): void {
    this.sent.push(data);
  }

  messages(): ServerToClient[] {
    return this.sent.map((frame) => JSON.parse(frame));
  }

  /** Everything after the welcome frame. */
  received(): ServerToClient[] {
    return this.messages().filter((msg) => msg.t !== 'welcome');
  }
}
