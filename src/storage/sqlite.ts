/**
 * SQLite Storage Backend
 *
 * Connection management and schema for better-sqlite3.
 */

import Database from "better-sqlite3";
import * as path from "node:path";
import * as fs from "node:fs";
import { getDatabasePath } from "../config.js";

let db: Database.Database | null = null;

/**
 * Open a database at the given path and make sure the schema exists.
 * Pass ":memory:" for a throwaway database.
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const database = new Database(dbPath);
  database.pragma("journal_mode = WAL");
  database.pragma("synchronous = NORMAL");
  database.pragma("foreign_keys = ON");

  initializeSchema(database);
  return database;
}

/**
 * Get or create the shared SQLite database connection.
 */
export function getDatabase(): Database.Database {
  if (db) return db;
  db = openDatabase(getDatabasePath());
  return db;
}

/**
 * Close the shared database connection.
 */
export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Initialize database schema.
 */
function initializeSchema(database: Database.Database): void {
  database.exec(`
    -- Patients (allergy status only; demographics live elsewhere)
    CREATE TABLE IF NOT EXISTS patients (
      id TEXT PRIMARY KEY,
      allergy_status TEXT NOT NULL DEFAULT 'UNKNOWN',
      created_at TEXT DEFAULT (datetime('now')),
      updated_at TEXT DEFAULT (datetime('now'))
    );

    -- Allergy versions; retired rows are kept for history
    CREATE TABLE IF NOT EXISTS allergies (
      id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      patient_id TEXT NOT NULL REFERENCES patients(id),
      position INTEGER NOT NULL DEFAULT 0,
      seq INTEGER NOT NULL,
      retired INTEGER NOT NULL DEFAULT 0,
      retired_at TEXT,
      retire_reason TEXT,
      previous_version_id TEXT REFERENCES allergies(id),
      created_at TEXT NOT NULL,
      updated_at TEXT DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_allergies_patient_active ON allergies(patient_id, retired, position);
    CREATE INDEX IF NOT EXISTS idx_allergies_previous_version ON allergies(previous_version_id);

    -- Concept dictionary
    CREATE TABLE IF NOT EXISTS concepts (
      uuid TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      concept_class TEXT NOT NULL,
      updated_at TEXT DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_concepts_class ON concepts(concept_class);
  `);
}
