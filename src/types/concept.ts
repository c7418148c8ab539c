/**
 * Controlled vocabulary types.
 * Allergens, reactions and severities are coded against a concept dictionary.
 */

/** Concept classes the allergy workflow draws from */
export type ConceptClass =
  | "Drug"
  | "Food"
  | "Environment"
  | "Reaction"
  | "Severity"
  | "Misc";

/** All concept classes for iteration */
export const CONCEPT_CLASSES: readonly ConceptClass[] = [
  "Drug",
  "Food",
  "Environment",
  "Reaction",
  "Severity",
  "Misc",
] as const;

/**
 * Reserved concept meaning "no coded match; see free text".
 * Can be overridden with OTHER_NON_CODED_CONCEPT_UUID.
 */
export const OTHER_NON_CODED_UUID = "5622AAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAA";

/**
 * Link from a record to a dictionary concept.
 * Two references point at the same concept when their uuids match.
 */
export interface ConceptRef {
  /** Dictionary uuid */
  uuid: string;

  /** Display name captured when the link was made (presentation only) */
  display?: string;
}

/**
 * A dictionary entry.
 */
export interface Concept {
  /** Dictionary uuid */
  uuid: string;

  /** Preferred name (e.g., "Penicillin") */
  name: string;

  /** Class used to group concepts in pickers */
  conceptClass: ConceptClass;
}
