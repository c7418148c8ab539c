/**
 * Semantic comparison of allergy entries.
 *
 * Two entries are the same when every clinically meaningful field matches.
 * Identity, owner and reaction order are not compared.
 */

import type { ConceptRef } from "../types/concept.js";
import type {
  Allergen,
  Allergy,
  AllergyReaction,
} from "../types/allergy.js";

function sameText(a?: string, b?: string): boolean {
  return (a ?? "") === (b ?? "");
}

/**
 * Compare two concept links by uuid. Both absent counts as equal.
 */
export function sameConcept(a?: ConceptRef, b?: ConceptRef): boolean {
  return a?.uuid === b?.uuid;
}

function normalizedText(value?: string): string {
  return (value ?? "").trim().toLowerCase();
}

/**
 * Whether an allergen is named by free text: either it carries the
 * "other non-coded" concept, or it has text and no concept yet.
 */
export function isNonCodedAllergen(allergen: Allergen, otherNonCodedUuid: string): boolean {
  if (!allergen.coded) return normalizedText(allergen.nonCoded).length > 0;
  return allergen.coded.uuid === otherNonCodedUuid;
}

/**
 * Whether two allergens name the same agent.
 * Free-text allergens match on text, case-insensitively, so "Latex" and
 * "latex" collide. Coded allergens match on the concept alone.
 */
export function isSameAllergen(
  a: Allergen,
  b: Allergen,
  otherNonCodedUuid: string
): boolean {
  const aNonCoded = isNonCodedAllergen(a, otherNonCodedUuid);
  const bNonCoded = isNonCodedAllergen(b, otherNonCodedUuid);
  if (aNonCoded && bNonCoded) {
    return normalizedText(a.nonCoded) === normalizedText(b.nonCoded);
  }
  return aNonCoded === bNonCoded && sameConcept(a.coded, b.coded);
}

/**
 * The first entry whose allergen repeats an earlier one, if any.
 */
export function findDuplicateAllergen<T extends { allergen: Allergen }>(
  entries: readonly T[],
  otherNonCodedUuid: string
): T | undefined {
  return entries.find((entry, i) =>
    entries
      .slice(0, i)
      .some((earlier) => isSameAllergen(earlier.allergen, entry.allergen, otherNonCodedUuid))
  );
}

function hasSameAllergenValues(a: Allergen, b: Allergen): boolean {
  return (
    a.allergenType === b.allergenType &&
    sameConcept(a.coded, b.coded) &&
    sameText(a.nonCoded, b.nonCoded)
  );
}

function reactionKey(reaction: AllergyReaction): string {
  return JSON.stringify([
    reaction.reaction?.uuid ?? null,
    reaction.reactionNonCoded ?? "",
  ]);
}

/**
 * Compare reaction lists as multisets of their content.
 */
export function hasSameReactions(
  a: readonly AllergyReaction[],
  b: readonly AllergyReaction[]
): boolean {
  if (a.length !== b.length) return false;

  const left = a.map(reactionKey).sort();
  const right = b.map(reactionKey).sort();
  return left.every((key, i) => key === right[i]);
}

/**
 * Full-field comparison used to decide whether a stored entry was edited.
 */
export function hasSameValues(a: Allergy, b: Allergy): boolean {
  return (
    hasSameAllergenValues(a.allergen, b.allergen) &&
    sameConcept(a.severity, b.severity) &&
    sameText(a.comment, b.comment) &&
    hasSameReactions(a.reactions, b.reactions)
  );
}

/**
 * Short label for an allergen, for messages and logs.
 */
export function describeAllergen(allergen: Allergen): string {
  const name = allergen.nonCoded ?? allergen.coded?.display ?? allergen.coded?.uuid;
  return `${allergen.allergenType}:${name ?? "?"}`;
}
