/**
 * Allergy status derivation.
 */

import type { AllergyStatus } from "../types/allergy.js";

/**
 * Resolve the status a list presents.
 *
 * Active entries always mean SEE_LIST. An empty list takes the declared
 * status, except that SEE_LIST cannot be declared for an empty list.
 */
export function deriveAllergyStatus(
  activeCount: number,
  declared?: AllergyStatus
): AllergyStatus {
  if (activeCount > 0) return "SEE_LIST";
  if (declared === "NO_KNOWN_ALLERGIES") return "NO_KNOWN_ALLERGIES";
  return "UNKNOWN";
}
