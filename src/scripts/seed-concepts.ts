/**
 * Seed script: concept JSON file → SQLite
 *
 * Upserts every concept in the file, so it is safe to run more than once.
 *
 * Usage: npx tsx src/scripts/seed-concepts.ts [concepts.json]
 */

import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { getDatabase, closeDatabase } from "../storage/sqlite.js";
import { SqliteConceptDictionary } from "../storage/concepts.js";
import { getDatabasePath } from "../config.js";

const DEFAULT_SEED_FILE = fileURLToPath(
  new URL("../../seed/concepts.json", import.meta.url)
);

function seed(filePath: string): void {
  console.log("=".repeat(50));
  console.log(`Seeding concepts from ${filePath}`);
  console.log(`Database: ${getDatabasePath()}`);

  const dictionary = new SqliteConceptDictionary(getDatabase());
  const count = dictionary.importConcepts(filePath);

  console.log(`  concepts: ${count} imported`);
  console.log("=".repeat(50));
}

try {
  seed(path.resolve(process.argv[2] ?? DEFAULT_SEED_FILE));
  closeDatabase();
} catch (err) {
  console.error("Seeding failed:", err);
  closeDatabase();
  process.exit(1);
}
