/**
 * Shared test setup: an in-memory database seeded with the concept fixture.
 */

import { vi } from "vitest";
import { fileURLToPath } from "node:url";
import type Database from "better-sqlite3";
import type { Allergy, ConceptRef, CreateAllergyInput } from "../../src/types/index.js";
import { openDatabase } from "../../src/storage/sqlite.js";
import { SqliteAllergyStore } from "../../src/storage/allergies.js";
import { SqliteConceptDictionary } from "../../src/storage/concepts.js";
import { AllergyList } from "../../src/services/allergy-list.js";
import { AllergyService } from "../../src/services/allergy-service.js";

export const CONCEPTS_FILE = fileURLToPath(
  new URL("../fixtures/concepts.json", import.meta.url)
);

/** Sentinel uuid used by the fixture dictionary */
export const OTHER_NON_CODED = "other-non-coded";

/** Patient seeded with four allergies */
export const PATIENT_WITH_ALLERGIES = "patient-2";

/** Patient with nothing recorded */
export const PATIENT_WITHOUT_ALLERGIES = "patient-7";

export function ref(uuid: string): ConceptRef {
  return { uuid };
}

export function allergy(input: CreateAllergyInput & { id?: string }): Allergy {
  return { ...input, reactions: input.reactions ?? [] };
}

export interface TestContext {
  database: Database.Database;
  store: SqliteAllergyStore;
  dictionary: SqliteConceptDictionary;
  service: AllergyService;
  logger: {
    log: ReturnType<typeof vi.fn>;
    error: ReturnType<typeof vi.fn>;
  };
}

export function createTestContext(): TestContext {
  const database = openDatabase(":memory:");
  const dictionary = new SqliteConceptDictionary(database, OTHER_NON_CODED);
  dictionary.importConcepts(CONCEPTS_FILE);
  const store = new SqliteAllergyStore(database, OTHER_NON_CODED);
  const logger = { log: vi.fn(), error: vi.fn() };
  const service = new AllergyService({ store, vocabulary: dictionary, logger });
  return { database, store, dictionary, service, logger };
}

/**
 * Save four allergies for PATIENT_WITH_ALLERGIES with reaction counts [2, 2, 0, 0].
 */
export function seedFourAllergies(service: AllergyService): AllergyList {
  const list = new AllergyList();
  list.add(
    allergy({
      allergen: { allergenType: "DRUG", coded: ref("drug-penicillin") },
      severity: ref("severity-severe"),
      comment: "rash after first dose",
      reactions: [{ reaction: ref("reaction-rash") }, { reaction: ref("reaction-hives") }],
    })
  );
  list.add(
    allergy({
      allergen: { allergenType: "FOOD", coded: ref("food-peanuts") },
      severity: ref("severity-mild"),
      reactions: [{ reaction: ref("reaction-cough") }, { reactionNonCoded: "itchy throat" }],
    })
  );
  list.add(
    allergy({
      allergen: { allergenType: "ENVIRONMENT", coded: ref("env-latex") },
    })
  );
  list.add(
    allergy({
      allergen: { allergenType: "DRUG", coded: ref("drug-aspirin") },
      comment: "reported by family",
    })
  );
  return service.setAllergies(PATIENT_WITH_ALLERGIES, list);
}
