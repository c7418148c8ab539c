/**
 * Allergy List
 *
 * Ordered container for one patient's active allergies plus the status the
 * caller declared. The container never touches storage; removed entries are
 * retired by the reconciler at save time.
 */

import type { Allergy, AllergyStatus } from "../types/allergy.js";
import { getOtherNonCodedConceptUuid } from "../config.js";
import { deriveAllergyStatus } from "./allergy-status.js";
import {
  describeAllergen,
  hasSameValues,
  isSameAllergen,
} from "./allergy-equality.js";
import { DuplicateAllergenError, IndexOutOfRangeError } from "./errors.js";

export interface AllergyListOptions {
  /** Owning patient, set when the list was loaded from storage */
  patientId?: string;

  /** Status recorded for the patient */
  status?: AllergyStatus;

  /** Concept that marks free-text allergens in duplicate checks */
  otherNonCodedUuid?: string;
}

export class AllergyList implements Iterable<Allergy> {
  private readonly items: Allergy[] = [];
  private declared: AllergyStatus;
  readonly patientId: string | undefined;
  private readonly otherNonCodedUuid: string;

  constructor(options: AllergyListOptions = {}) {
    this.patientId = options.patientId;
    this.otherNonCodedUuid = options.otherNonCodedUuid ?? getOtherNonCodedConceptUuid();
    this.declared =
      options.status === "NO_KNOWN_ALLERGIES" ? "NO_KNOWN_ALLERGIES" : "UNKNOWN";
  }

  /**
   * Build a list from stored entries without the duplicate check.
   */
  static from(
    entries: Iterable<Allergy>,
    options: AllergyListOptions = {}
  ): AllergyList {
    const list = new AllergyList(options);
    list.items.push(...entries);
    return list;
  }

  /** Status implied by the entries, or the declared one when empty */
  get status(): AllergyStatus {
    return deriveAllergyStatus(this.items.length, this.declared);
  }

  /** UNKNOWN or NO_KNOWN_ALLERGIES as the caller left it, regardless of entries */
  get declaredStatus(): AllergyStatus {
    return this.declared;
  }

  size(): number {
    return this.items.length;
  }

  get(index: number): Allergy {
    return this.itemAt(index);
  }

  add(entry: Allergy): void {
    this.assertNoDuplicate(entry);
    this.items.push(entry);
    if (this.declared === "NO_KNOWN_ALLERGIES") {
      this.declared = "UNKNOWN";
    }
  }

  /**
   * Swap in an edited value. Keep the id to mark it as an edit of a stored entry.
   */
  replace(index: number, entry: Allergy): Allergy {
    const previous = this.itemAt(index);
    this.assertNoDuplicate(entry, index);
    this.items[index] = entry;
    return previous;
  }

  remove(index: number): Allergy {
    const removed = this.itemAt(index);
    this.items.splice(index, 1);
    return removed;
  }

  /**
   * Membership by id for stored entries, by value for unsaved ones.
   */
  contains(entry: Allergy): boolean {
    if (entry.id !== undefined) {
      return this.findById(entry.id) !== undefined;
    }
    return this.items.some((item) => item === entry || hasSameValues(item, entry));
  }

  findById(id: string): Allergy | undefined {
    return this.items.find((item) => item.id === id);
  }

  /**
   * Record that the patient has no known allergies.
   * Only shows while the list is empty; entries always mean SEE_LIST.
   */
  confirmNoKnownAllergies(): void {
    this.declared = "NO_KNOWN_ALLERGIES";
  }

  toArray(): Allergy[] {
    return [...this.items];
  }

  entries(): IterableIterator<[number, Allergy]> {
    return this.items.entries();
  }

  [Symbol.iterator](): Iterator<Allergy> {
    return this.items[Symbol.iterator]();
  }

  private itemAt(index: number): Allergy {
    const item = Number.isInteger(index) ? this.items[index] : undefined;
    if (item === undefined) {
      throw new IndexOutOfRangeError(index, this.items.length);
    }
    return item;
  }

  private assertNoDuplicate(entry: Allergy, skipIndex?: number): void {
    const clash = this.items.some(
      (item, i) =>
        i !== skipIndex &&
        isSameAllergen(item.allergen, entry.allergen, this.otherNonCodedUuid)
    );
    if (clash) {
      throw new DuplicateAllergenError(describeAllergen(entry.allergen));
    }
  }
}
