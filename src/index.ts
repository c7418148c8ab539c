/**
 * Allergy list reconciler.
 */

import { AllergyService, type Logger } from "./services/allergy-service.js";
import { SqliteAllergyStore } from "./storage/allergies.js";
import { SqliteConceptDictionary } from "./storage/concepts.js";
import { getDatabase } from "./storage/sqlite.js";

export * from "./types/index.js";
export * from "./storage/index.js";
export * from "./services/errors.js";
export { AllergyList, type AllergyListOptions } from "./services/allergy-list.js";
export { deriveAllergyStatus } from "./services/allergy-status.js";
export {
  describeAllergen,
  findDuplicateAllergen,
  hasSameReactions,
  hasSameValues,
  isNonCodedAllergen,
  isSameAllergen,
  sameConcept,
} from "./services/allergy-equality.js";
export {
  completeAllergen,
  reconcileAllergies,
  type ReconcileOptions,
  type ReconciledAllergy,
  type ReconciledDisposition,
  type ReconciliationResult,
  type RetiredAllergy,
} from "./services/allergy-reconciler.js";
export { validateAllergy } from "./services/allergy-validator.js";
export {
  AllergyService,
  type AllergyServiceOptions,
  type Logger,
} from "./services/allergy-service.js";
export { getDatabasePath, getOtherNonCodedConceptUuid } from "./config.js";

/**
 * Build a service on the shared database connection.
 */
export function createAllergyService(logger?: Logger): AllergyService {
  const database = getDatabase();
  return new AllergyService({
    store: new SqliteAllergyStore(database),
    vocabulary: new SqliteConceptDictionary(database),
    ...(logger && { logger }),
  });
}
