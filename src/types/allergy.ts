/**
 * Patient allergy types.
 * An allergy list is edited as a whole and reconciled against the stored versions.
 */

import type { ConceptRef } from "./concept.js";

/** What kind of agent triggers the allergy */
export type AllergenType = "DRUG" | "FOOD" | "ENVIRONMENT";

/** All allergen types for iteration */
export const ALLERGEN_TYPES: readonly AllergenType[] = [
  "DRUG",
  "FOOD",
  "ENVIRONMENT",
] as const;

/**
 * Patient-level summary of allergy documentation.
 * SEE_LIST is implied by active entries and is never chosen directly.
 */
export type AllergyStatus = "UNKNOWN" | "SEE_LIST" | "NO_KNOWN_ALLERGIES";

/** All allergy statuses for iteration */
export const ALLERGY_STATUSES: readonly AllergyStatus[] = [
  "UNKNOWN",
  "SEE_LIST",
  "NO_KNOWN_ALLERGIES",
] as const;

/** Why a stored allergy version was retired */
export type RetireReason = "EDITED" | "REMOVED";

/** All retire reasons for iteration */
export const RETIRE_REASONS: readonly RetireReason[] = [
  "EDITED",
  "REMOVED",
] as const;

/**
 * The trigger of an allergy.
 * Either coded, or the "other non-coded" concept plus free text.
 */
export interface Allergen {
  allergenType: AllergenType;

  /** Coded allergen concept */
  coded?: ConceptRef;

  /** Free-text allergen, used with the "other non-coded" concept */
  nonCoded?: string;
}

/**
 * A documented reaction. Belongs to exactly one allergy.
 */
export interface AllergyReaction {
  /** Coded reaction concept (e.g., "Rash") */
  reaction?: ConceptRef;

  /** Free-text reaction when no concept applies */
  reactionNonCoded?: string;
}

/**
 * One allergy entry as callers see it.
 * Values are immutable; an edit is a new object carrying the same id.
 */
export interface Allergy {
  /** Stable identity assigned at first save, absent for new entries */
  id?: string;

  /** Owning patient; absent on a new entry means the target patient */
  patientId?: string;

  allergen: Allergen;

  /** Severity concept (e.g., "Severe") */
  severity?: ConceptRef;

  comment?: string;

  reactions: readonly AllergyReaction[];
}

/**
 * A persisted allergy. Ids and owner are always set.
 */
export type PersistedAllergy = Allergy & { id: string; patientId: string };

/**
 * One stored version of an allergy, retired or not.
 */
export interface AllergyRevision {
  allergy: PersistedAllergy;

  /** Index within the patient's active list */
  position: number;

  createdAt: Date;

  retired: boolean;

  retiredAt?: Date;

  retireReason?: RetireReason;

  /** Version this one replaced after an edit */
  previousVersionId?: string;

  /** Version that replaced this one, resolved on read */
  supersededBy?: string;
}

/**
 * Input type for a caller-built entry.
 */
export type CreateAllergyInput = Omit<Allergy, "id" | "reactions"> & {
  reactions?: readonly AllergyReaction[];
};
