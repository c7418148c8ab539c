/**
 * Runtime configuration from environment variables.
 */

import * as path from "node:path";
import { OTHER_NON_CODED_UUID } from "./types/concept.js";

/** Base data directory relative to project root */
const DATA_DIR = path.join(process.cwd(), "data");

/**
 * Get the SQLite database file path.
 * ALLERGY_DB_PATH may also be ":memory:".
 */
export function getDatabasePath(): string {
  const configured = process.env.ALLERGY_DB_PATH?.trim();
  if (configured) return configured;
  return path.join(DATA_DIR, "allergies.db");
}

/**
 * Get the uuid of the "other non-coded" concept.
 */
export function getOtherNonCodedConceptUuid(): string {
  return process.env.OTHER_NON_CODED_CONCEPT_UUID?.trim() || OTHER_NON_CODED_UUID;
}
