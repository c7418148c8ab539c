/**
 * Concept Storage
 *
 * SQLite-backed concept dictionary used to resolve coded allergens,
 * reactions and severities.
 */

import type Database from "better-sqlite3";
import * as fs from "node:fs";
import type { Concept, ConceptClass, ConceptRef } from "../types/concept.js";
import { CONCEPT_CLASSES } from "../types/concept.js";
import { getOtherNonCodedConceptUuid } from "../config.js";
import type { ConceptVocabulary } from "./repository.js";
import { getDatabase } from "./sqlite.js";

interface ConceptRow {
  uuid: string;
  name: string;
  concept_class: string;
}

function parseConceptClass(value: unknown): ConceptClass | undefined {
  return CONCEPT_CLASSES.find((conceptClass) => conceptClass === value);
}

function toConcept(row: ConceptRow): Concept {
  return {
    uuid: row.uuid,
    name: row.name,
    conceptClass: parseConceptClass(row.concept_class) ?? "Misc",
  };
}

/**
 * Validate one entry of a concept import file.
 */
function parseConceptEntry(entry: unknown, index: number): Concept {
  if (
    typeof entry !== "object" ||
    entry === null ||
    !("uuid" in entry) ||
    !("name" in entry) ||
    !("conceptClass" in entry)
  ) {
    throw new Error(`Concept entry ${index} needs uuid, name and conceptClass`);
  }
  const { uuid, name, conceptClass } = entry;
  const parsedClass = parseConceptClass(conceptClass);
  if (typeof uuid !== "string" || !uuid || typeof name !== "string" || !parsedClass) {
    throw new Error(`Concept entry ${index} has an empty field or an unknown conceptClass`);
  }
  return { uuid, name, conceptClass: parsedClass };
}

export class SqliteConceptDictionary implements ConceptVocabulary {
  constructor(
    private readonly database: Database.Database = getDatabase(),
    private readonly otherNonCodedUuid: string = getOtherNonCodedConceptUuid()
  ) {}

  getConceptByUuid(uuid: string): Concept | null {
    const row = this.database
      .prepare<[string], ConceptRow>(
        `SELECT uuid, name, concept_class FROM concepts WHERE uuid = ?`
      )
      .get(uuid);
    return row ? toConcept(row) : null;
  }

  getConceptsByClass(conceptClass: ConceptClass): Concept[] {
    return this.database
      .prepare<[string], ConceptRow>(
        `SELECT uuid, name, concept_class FROM concepts WHERE concept_class = ? ORDER BY name`
      )
      .all(conceptClass)
      .map(toConcept);
  }

  getOtherNonCodedConcept(): ConceptRef {
    const concept = this.getConceptByUuid(this.otherNonCodedUuid);
    return concept
      ? { uuid: concept.uuid, display: concept.name }
      : { uuid: this.otherNonCodedUuid };
  }

  isOtherNonCoded(ref: ConceptRef | undefined): boolean {
    return ref?.uuid === this.otherNonCodedUuid;
  }

  saveConcept(concept: Concept): Concept {
    this.database
      .prepare(
        `INSERT INTO concepts (uuid, name, concept_class, updated_at)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(uuid) DO UPDATE SET
           name = excluded.name,
           concept_class = excluded.concept_class,
           updated_at = excluded.updated_at`
      )
      .run(concept.uuid, concept.name, concept.conceptClass, new Date().toISOString());
    return concept;
  }

  /**
   * Load a JSON array of concepts and upsert them in one transaction.
   * Returns the number imported.
   */
  importConcepts(filePath: string): number {
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
    if (!Array.isArray(parsed)) {
      throw new Error(`${filePath} must contain a JSON array of concepts`);
    }
    const concepts = parsed.map(parseConceptEntry);

    this.database.transaction(() => {
      for (const concept of concepts) this.saveConcept(concept);
    })();

    return concepts.length;
  }
}
