/**
 * Allergy service.
 *
 * Loads a patient's allergy list and saves edited lists by reconciling them
 * against what is stored. Nothing is deleted or edited in place: removed and
 * edited entries are retired, edited content is saved as a new version.
 */

import type { AllergyRevision } from "../types/allergy.js";
import type { AllergyStore, ConceptVocabulary } from "../storage/repository.js";
import { AllergyList } from "./allergy-list.js";
import {
  reconcileAllergies,
  type ReconciliationResult,
} from "./allergy-reconciler.js";
import { validateAllergy } from "./allergy-validator.js";
import { describeAllergen, findDuplicateAllergen } from "./allergy-equality.js";
import { DuplicateAllergenError } from "./errors.js";

export type Logger = Pick<Console, "log" | "error">;

export interface AllergyServiceOptions {
  store: AllergyStore;
  vocabulary: ConceptVocabulary;
  logger?: Logger;
}

function summarize(result: ReconciliationResult): string {
  const counts = { UNCHANGED: 0, REPLACEMENT: 0, NEW: 0 };
  for (const entry of result.active) counts[entry.disposition]++;
  return (
    `${counts.UNCHANGED} unchanged, ${counts.REPLACEMENT} replaced, ` +
    `${counts.NEW} new, ${result.retired.length} retired (status ${result.status})`
  );
}

export class AllergyService {
  private readonly store: AllergyStore;
  private readonly vocabulary: ConceptVocabulary;
  private readonly logger: Logger;

  constructor(options: AllergyServiceOptions) {
    this.store = options.store;
    this.vocabulary = options.vocabulary;
    this.logger = options.logger ?? console;
  }

  /**
   * Active allergies in list order, with the patient's status.
   */
  getAllergies(patientId: string): AllergyList {
    return this.store.loadActiveAllergies(patientId);
  }

  /**
   * Make the stored list match the candidate.
   *
   * Runs in one transaction: a validation or storage failure leaves the
   * stored list untouched. Returns the list as stored afterwards.
   */
  setAllergies(patientId: string, candidate: AllergyList): AllergyList {
    let result: ReconciliationResult;
    try {
      result = this.store.runInTransaction(() => {
        const stored = this.store.loadActiveAllergies(patientId);
        const otherNonCoded = this.vocabulary.getOtherNonCodedConcept();
        const reconciled = reconcileAllergies(stored, candidate, {
          patientId,
          otherNonCoded,
        });

        const duplicate = findDuplicateAllergen(
          reconciled.active.map((entry) => entry.allergy),
          otherNonCoded.uuid
        );
        if (duplicate) {
          throw new DuplicateAllergenError(describeAllergen(duplicate.allergen));
        }

        reconciled.active.forEach((entry, position) => {
          if (entry.disposition !== "UNCHANGED") {
            validateAllergy(entry.allergy, this.vocabulary, `allergies[${position}]`);
          }
        });

        for (const { allergy, reason } of reconciled.retired) {
          this.store.retire(allergy, reason);
        }
        reconciled.active.forEach((entry, position) => {
          this.store.persist(entry.allergy, position, entry.previousVersionId);
        });
        this.store.saveAllergyStatus(patientId, reconciled.status);

        return reconciled;
      });
    } catch (err) {
      this.logger.error(`[Allergies] Save failed for patient ${patientId}:`, err);
      throw err;
    }

    this.logger.log(`[Allergies] Saved patient ${patientId}: ${summarize(result)}`);
    return this.store.loadActiveAllergies(patientId);
  }

  /**
   * Any stored version, including retired ones.
   */
  getAllergy(id: string): AllergyRevision | null {
    return this.store.getAllergy(id);
  }

  /**
   * Every version saved for a patient, oldest first.
   */
  getAllergyHistory(patientId: string): AllergyRevision[] {
    return this.store.loadAllergyHistory(patientId);
  }
}
