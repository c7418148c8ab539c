/**
 * Storage Layer
 *
 * SQLite storage for allergy versions, patient allergy status and the
 * concept dictionary.
 */

export { openDatabase, getDatabase, closeDatabase } from "./sqlite.js";

export type { AllergyStore, ConceptVocabulary } from "./repository.js";

export * from "./allergies.js";
export * from "./concepts.js";
