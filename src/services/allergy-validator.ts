/**
 * Allergy entry validation, run before a list is saved.
 */

import type { ConceptRef } from "../types/concept.js";
import type { Allergy } from "../types/allergy.js";
import type { ConceptVocabulary } from "../storage/repository.js";
import { AllergyValidationError } from "./errors.js";

function isBlank(value?: string): boolean {
  return !value || value.trim().length === 0;
}

function requireKnownConcept(
  vocabulary: ConceptVocabulary,
  ref: ConceptRef | undefined,
  field: string
): void {
  if (!ref || vocabulary.isOtherNonCoded(ref)) return;
  if (!vocabulary.getConceptByUuid(ref.uuid)) {
    throw new AllergyValidationError(`Unknown concept ${ref.uuid}`, field);
  }
}

/**
 * Check an entry is complete and its concepts exist.
 *
 * @param field - Path prefix for error messages (e.g., "allergies[2]")
 */
export function validateAllergy(
  allergy: Allergy,
  vocabulary: ConceptVocabulary,
  field = "allergy"
): void {
  const { allergen } = allergy;

  if (!allergen.coded && isBlank(allergen.nonCoded)) {
    throw new AllergyValidationError(
      "Allergen needs a coded concept or a free-text name",
      `${field}.allergen`
    );
  }

  if (vocabulary.isOtherNonCoded(allergen.coded) && isBlank(allergen.nonCoded)) {
    throw new AllergyValidationError(
      "Non-coded allergen needs a free-text name",
      `${field}.allergen.nonCoded`
    );
  }

  requireKnownConcept(vocabulary, allergen.coded, `${field}.allergen.coded`);
  requireKnownConcept(vocabulary, allergy.severity, `${field}.severity`);

  allergy.reactions.forEach((reaction, i) => {
    const path = `${field}.reactions[${i}]`;
    if (!reaction.reaction && isBlank(reaction.reactionNonCoded)) {
      throw new AllergyValidationError(
        "Reaction needs a coded concept or free text",
        path
      );
    }
    requireKnownConcept(vocabulary, reaction.reaction, `${path}.reaction`);
  });
}
