/**
 * Allergy domain errors.
 *
 * Persistence failures are not wrapped; they reach the caller unchanged.
 */

/** The candidate list belongs to a different patient than the one being saved */
export class InvalidStateError extends Error {
  readonly code = "invalid_state" as const;

  constructor(message: string) {
    super(message);
    this.name = "InvalidStateError";
  }
}

/** An allergy list was addressed outside its bounds */
export class IndexOutOfRangeError extends Error {
  readonly code = "index_out_of_range" as const;

  constructor(
    readonly index: number,
    readonly size: number
  ) {
    super(`Index ${index} is out of range for an allergy list of size ${size}`);
    this.name = "IndexOutOfRangeError";
  }
}

/** The same allergen was listed twice for one patient */
export class DuplicateAllergenError extends Error {
  readonly code = "duplicate_allergen" as const;

  constructor(readonly allergenLabel: string) {
    super(`Allergy list already contains allergen ${allergenLabel}`);
    this.name = "DuplicateAllergenError";
  }
}

/** An allergy entry is incomplete or references an unknown concept */
export class AllergyValidationError extends Error {
  readonly code = "validation_failed" as const;

  constructor(
    message: string,
    readonly field: string
  ) {
    super(message);
    this.name = "AllergyValidationError";
  }
}
