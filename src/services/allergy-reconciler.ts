/**
 * Allergy list reconciliation.
 *
 * Compares a patient's stored active allergies with the list a caller wants
 * to save. Stored entries are never edited in place: an edited entry retires
 * the stored version and comes back as a new one, a missing entry is retired.
 *
 * Pure and synchronous; the caller persists the result in one transaction.
 */

import type { ConceptRef } from "../types/concept.js";
import type {
  Allergen,
  Allergy,
  AllergyStatus,
  RetireReason,
} from "../types/allergy.js";
import type { AllergyList } from "./allergy-list.js";
import { deriveAllergyStatus } from "./allergy-status.js";
import { hasSameValues } from "./allergy-equality.js";
import { InvalidStateError } from "./errors.js";

/** How an entry in the active output came about */
export type ReconciledDisposition = "UNCHANGED" | "REPLACEMENT" | "NEW";

export interface RetiredAllergy {
  allergy: Allergy;
  reason: RetireReason;
}

export interface ReconciledAllergy {
  /** Carries its stored id when UNCHANGED, no id otherwise */
  allergy: Allergy;
  disposition: ReconciledDisposition;
  /** Stored version a REPLACEMENT supersedes */
  previousVersionId?: string;
}

export interface ReconciliationResult {
  patientId: string;
  /** Stored entries to retire, in stored order */
  retired: RetiredAllergy[];
  /** Entries to keep active, in candidate order */
  active: ReconciledAllergy[];
  status: AllergyStatus;
}

export interface ReconcileOptions {
  /** Patient being saved */
  patientId: string;
  /** Concept assigned to allergens that only have free text */
  otherNonCoded: ConceptRef;
}

/**
 * Give a free-text-only allergen the "other non-coded" concept.
 */
export function completeAllergen(
  allergen: Allergen,
  otherNonCoded: ConceptRef
): Allergen {
  if (allergen.coded || !allergen.nonCoded?.trim()) return allergen;
  return { ...allergen, coded: otherNonCoded };
}

function assertOwner(
  stored: AllergyList,
  candidate: AllergyList,
  patientId: string
): void {
  const owners = [
    stored.patientId,
    candidate.patientId,
    ...candidate.toArray().map((entry) => entry.patientId),
  ];
  const foreign = owners.find(
    (owner) => owner !== undefined && owner !== patientId
  );
  if (foreign !== undefined) {
    throw new InvalidStateError(
      `Allergy list belongs to patient ${foreign}, not ${patientId}`
    );
  }
}

function asNewEntry(
  entry: Allergy,
  { patientId, otherNonCoded }: ReconcileOptions
): Allergy {
  const { id: _id, ...content } = entry;
  return {
    ...content,
    patientId,
    allergen: completeAllergen(entry.allergen, otherNonCoded),
  };
}

/**
 * Work out which stored entries to retire and which entries to keep active.
 */
export function reconcileAllergies(
  stored: AllergyList,
  candidate: AllergyList,
  options: ReconcileOptions
): ReconciliationResult {
  const { patientId } = options;
  assertOwner(stored, candidate, patientId);

  const storedById = new Map<string, Allergy>();
  for (const entry of stored) {
    if (entry.id !== undefined) storedById.set(entry.id, entry);
  }

  const claimed = new Set<string>();
  const edited = new Set<string>();
  const active: ReconciledAllergy[] = [];

  for (const entry of candidate) {
    const original =
      entry.id !== undefined && !claimed.has(entry.id)
        ? storedById.get(entry.id)
        : undefined;

    if (original?.id === undefined) {
      active.push({ allergy: asNewEntry(entry, options), disposition: "NEW" });
      continue;
    }

    claimed.add(original.id);

    if (hasSameValues(original, entry)) {
      active.push({
        allergy: { ...original, patientId },
        disposition: "UNCHANGED",
      });
    } else {
      edited.add(original.id);
      active.push({
        allergy: asNewEntry(entry, options),
        disposition: "REPLACEMENT",
        previousVersionId: original.id,
      });
    }
  }

  const retired: RetiredAllergy[] = [];
  for (const entry of stored) {
    if (entry.id === undefined) continue;
    if (edited.has(entry.id)) {
      retired.push({ allergy: entry, reason: "EDITED" });
    } else if (!claimed.has(entry.id)) {
      retired.push({ allergy: entry, reason: "REMOVED" });
    }
  }

  return {
    patientId,
    retired,
    active,
    status: deriveAllergyStatus(active.length, candidate.declaredStatus),
  };
}
