/**
 * Allergy List Type Definitions
 */

// Vocabulary types
export type { Concept, ConceptClass, ConceptRef } from "./concept.js";
export { CONCEPT_CLASSES, OTHER_NON_CODED_UUID } from "./concept.js";

// Allergy types
export type {
  Allergen,
  AllergenType,
  Allergy,
  AllergyReaction,
  AllergyRevision,
  AllergyStatus,
  CreateAllergyInput,
  PersistedAllergy,
  RetireReason,
} from "./allergy.js";
export {
  ALLERGEN_TYPES,
  ALLERGY_STATUSES,
  RETIRE_REASONS,
} from "./allergy.js";
