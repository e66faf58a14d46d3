import { mkdirSync } from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type { ZodType, ZodTypeDef } from "zod";

export type DB = Database.Database;
export type Statement<P extends unknown[], R = unknown> = Database.Statement<P, R>;

/**
 * Canonical SQLite schema. Scenes and layers reference each other, so the
 * scene row is written first and its layer pointers filled in afterwards.
 */
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS users (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  username TEXT NOT NULL UNIQUE,
  password_hash TEXT NOT NULL,
  role TEXT NOT NULL DEFAULT 'player' CHECK (role IN ('gm', 'player')),
  registered_by INTEGER REFERENCES users(id) ON DELETE SET NULL
);

CREATE TABLE IF NOT EXISTS scenes (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL,
  thumbnail_path TEXT,
  active INTEGER NOT NULL DEFAULT 0,
  owner_id INTEGER NOT NULL REFERENCES users(id),
  background_layer_id INTEGER REFERENCES layers(id),
  foreground_layer_id INTEGER REFERENCES layers(id)
);

CREATE TABLE IF NOT EXISTS layers (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  scene_id INTEGER NOT NULL REFERENCES scenes(id) ON DELETE CASCADE,
  name TEXT NOT NULL,
  order_index INTEGER NOT NULL,
  type TEXT NOT NULL CHECK (type IN ('background', 'player', 'custom')),
  visible INTEGER NOT NULL DEFAULT 1,
  UNIQUE (scene_id, order_index)
);

CREATE TABLE IF NOT EXISTS tokens (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  layer_id INTEGER NOT NULL REFERENCES layers(id) ON DELETE CASCADE,
  image_path TEXT NOT NULL,
  x REAL NOT NULL DEFAULT 0,
  y REAL NOT NULL DEFAULT 0,
  scale REAL NOT NULL DEFAULT 1,
  rotation REAL NOT NULL DEFAULT 0,
  z_index INTEGER NOT NULL DEFAULT 0,
  metadata TEXT
);

CREATE TABLE IF NOT EXISTS drawings (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  layer_id INTEGER NOT NULL REFERENCES layers(id) ON DELETE CASCADE,
  type TEXT NOT NULL CHECK (type IN ('free', 'line', 'rectangle', 'circle')),
  points TEXT NOT NULL,
  color TEXT NOT NULL,
  stroke_width REAL NOT NULL DEFAULT 1
);

CREATE TABLE IF NOT EXISTS text_elements (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  layer_id INTEGER NOT NULL REFERENCES layers(id) ON DELETE CASCADE,
  x REAL NOT NULL,
  y REAL NOT NULL,
  text TEXT NOT NULL,
  font_size INTEGER NOT NULL DEFAULT 12,
  color TEXT NOT NULL DEFAULT '#000000',
  style TEXT NOT NULL DEFAULT 'normal' CHECK (style IN ('normal', 'bold', 'italic', 'bold-italic'))
);

CREATE INDEX IF NOT EXISTS idx_layers_scene ON layers(scene_id);
CREATE INDEX IF NOT EXISTS idx_tokens_layer ON tokens(layer_id);
CREATE INDEX IF NOT EXISTS idx_drawings_layer ON drawings(layer_id);
CREATE INDEX IF NOT EXISTS idx_text_elements_layer ON text_elements(layer_id);
`;

/** Opens (creating if needed) the database file and applies the schema. */
export function openDatabase(file: string): DB {
  const inMemory = file === ":memory:";
  if (!inMemory) {
    mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
  }
  const db = new Database(file);
  if (!inMemory) {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");
  db.exec(SCHEMA_SQL);
  if (!inMemory) {
    console.log(`[db] opened ${path.resolve(file)}`);
  }
  return db;
}

/**
 * Decodes a JSON text column. A value that no longer matches its schema is
 * reported as the column it came from rather than passed on half-typed.
 */
export function parseJsonColumn<T>(schema: ZodType<T, ZodTypeDef, unknown>, text: string, column: string): T {
  const result = schema.safeParse(JSON.parse(text));
  if (!result.success) {
    throw new Error(`Corrupt ${column} column: ${result.error.issues[0]?.message ?? "invalid value"}`);
  }
  return result.data;
}
