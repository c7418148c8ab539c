/**
 * Repository interfaces for the allergy service.
 *
 * Implemented on SQLite; tests may substitute their own.
 */

import type { Concept, ConceptRef } from "../types/concept.js";
import type {
  Allergy,
  AllergyRevision,
  AllergyStatus,
  RetireReason,
} from "../types/allergy.js";
import type { AllergyList } from "../services/allergy-list.js";

/**
 * Allergy persistence.
 *
 * Methods are synchronous so a whole save fits in one SQLite transaction.
 */
export interface AllergyStore {
  /** Active entries in list order, with the stored status */
  loadActiveAllergies(patientId: string): AllergyList;

  /** Mark a stored entry retired; the row is kept for history */
  retire(allergy: Allergy, reason: RetireReason): void;

  /**
   * Insert an entry without id, or move an existing active entry to a new
   * position. Returns the entry's id.
   */
  persist(allergy: Allergy, position: number, previousVersionId?: string): string;

  /** Record the patient's allergy status */
  saveAllergyStatus(patientId: string, status: AllergyStatus): void;

  /** Any stored version by id */
  getAllergy(id: string): AllergyRevision | null;

  /** Every stored version for a patient, oldest first */
  loadAllergyHistory(patientId: string): AllergyRevision[];

  /** Run fn atomically; a throw rolls everything back */
  runInTransaction<T>(fn: () => T): T;
}

/**
 * Concept dictionary lookups.
 */
export interface ConceptVocabulary {
  getConceptByUuid(uuid: string): Concept | null;

  /** The reserved "no coded match; see free text" concept */
  getOtherNonCodedConcept(): ConceptRef;

  isOtherNonCoded(ref: ConceptRef | undefined): boolean;
}
