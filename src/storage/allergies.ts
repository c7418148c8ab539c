/**
 * Allergy Storage
 *
 * SQLite storage for allergy versions and the patient's allergy status.
 * Entity content is kept as JSON in `data`; lifecycle fields are columns.
 */

import type Database from "better-sqlite3";
import { randomUUID } from "node:crypto";
import type {
  Allergen,
  Allergy,
  AllergyReaction,
  AllergyRevision,
  AllergyStatus,
  PersistedAllergy,
  RetireReason,
} from "../types/allergy.js";
import { ALLERGY_STATUSES, RETIRE_REASONS } from "../types/allergy.js";
import type { ConceptRef } from "../types/concept.js";
import { getOtherNonCodedConceptUuid } from "../config.js";
import { AllergyList } from "../services/allergy-list.js";
import type { AllergyStore } from "./repository.js";
import { getDatabase } from "./sqlite.js";

/** Content stored in the `data` column */
interface AllergyData {
  allergen: Allergen;
  severity?: ConceptRef;
  comment?: string;
  reactions: AllergyReaction[];
}

interface AllergyRow {
  id: string;
  data: string;
  patient_id: string;
  position: number;
  retired: number;
  retired_at: string | null;
  retire_reason: string | null;
  previous_version_id: string | null;
  created_at: string;
}

function toData(allergy: Allergy): AllergyData {
  return {
    allergen: allergy.allergen,
    ...(allergy.severity && { severity: allergy.severity }),
    ...(allergy.comment !== undefined && { comment: allergy.comment }),
    reactions: [...allergy.reactions],
  };
}

function toAllergy(row: AllergyRow): PersistedAllergy {
  const data: AllergyData = JSON.parse(row.data);
  return { ...data, id: row.id, patientId: row.patient_id };
}

function parseRetireReason(value: string | null): RetireReason | undefined {
  return RETIRE_REASONS.find((reason) => reason === value);
}

function parseAllergyStatus(value: string | undefined): AllergyStatus {
  return ALLERGY_STATUSES.find((status) => status === value) ?? "UNKNOWN";
}

function toRevision(row: AllergyRow, supersededBy?: string): AllergyRevision {
  const retireReason = parseRetireReason(row.retire_reason);
  return {
    allergy: toAllergy(row),
    position: row.position,
    createdAt: new Date(row.created_at),
    retired: row.retired === 1,
    ...(row.retired_at ? { retiredAt: new Date(row.retired_at) } : {}),
    ...(retireReason ? { retireReason } : {}),
    ...(row.previous_version_id ? { previousVersionId: row.previous_version_id } : {}),
    ...(supersededBy ? { supersededBy } : {}),
  };
}

/**
 * AllergyStore backed by a better-sqlite3 connection.
 */
export class SqliteAllergyStore implements AllergyStore {
  constructor(
    private readonly database: Database.Database = getDatabase(),
    private readonly otherNonCodedUuid: string = getOtherNonCodedConceptUuid()
  ) {}

  loadActiveAllergies(patientId: string): AllergyList {
    const rows = this.database
      .prepare<[string], AllergyRow>(
        `SELECT * FROM allergies WHERE patient_id = ? AND retired = 0 ORDER BY position, seq`
      )
      .all(patientId);

    return AllergyList.from(rows.map(toAllergy), {
      patientId,
      status: this.getAllergyStatus(patientId),
      otherNonCodedUuid: this.otherNonCodedUuid,
    });
  }

  getAllergyStatus(patientId: string): AllergyStatus {
    const row = this.database
      .prepare<[string], { allergy_status: string }>(
        `SELECT allergy_status FROM patients WHERE id = ?`
      )
      .get(patientId);

    return parseAllergyStatus(row?.allergy_status);
  }

  retire(allergy: Allergy, reason: RetireReason): void {
    if (allergy.id === undefined) {
      throw new Error("Cannot retire an allergy that was never saved");
    }
    const now = new Date().toISOString();
    this.database
      .prepare(
        `UPDATE allergies
         SET retired = 1, retired_at = ?, retire_reason = ?, updated_at = ?
         WHERE id = ? AND retired = 0`
      )
      .run(now, reason, now, allergy.id);
  }

  persist(allergy: Allergy, position: number, previousVersionId?: string): string {
    const now = new Date().toISOString();

    if (allergy.id !== undefined) {
      this.database
        .prepare(
          `UPDATE allergies SET position = ?, updated_at = ? WHERE id = ? AND retired = 0`
        )
        .run(position, now, allergy.id);
      return allergy.id;
    }

    if (allergy.patientId === undefined) {
      throw new Error("Cannot save an allergy without a patient");
    }

    this.ensurePatient(allergy.patientId);

    const id = randomUUID();
    const seq = this.database
      .prepare<[], { next: number }>(
        `SELECT COALESCE(MAX(seq), 0) + 1 AS next FROM allergies`
      )
      .get();

    this.database
      .prepare(
        `INSERT INTO allergies
           (id, data, patient_id, position, seq, previous_version_id, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        id,
        JSON.stringify(toData(allergy)),
        allergy.patientId,
        position,
        seq?.next ?? 1,
        previousVersionId ?? null,
        now,
        now
      );

    return id;
  }

  saveAllergyStatus(patientId: string, status: AllergyStatus): void {
    this.database
      .prepare(
        `INSERT INTO patients (id, allergy_status, updated_at)
         VALUES (?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           allergy_status = excluded.allergy_status,
           updated_at = excluded.updated_at`
      )
      .run(patientId, status, new Date().toISOString());
  }

  getAllergy(id: string): AllergyRevision | null {
    const row = this.database
      .prepare<[string], AllergyRow>(`SELECT * FROM allergies WHERE id = ?`)
      .get(id);
    if (!row) return null;

    const successor = this.database
      .prepare<[string], { id: string }>(
        `SELECT id FROM allergies WHERE previous_version_id = ? LIMIT 1`
      )
      .get(id);

    return toRevision(row, successor?.id);
  }

  loadAllergyHistory(patientId: string): AllergyRevision[] {
    const rows = this.database
      .prepare<[string], AllergyRow>(
        `SELECT * FROM allergies WHERE patient_id = ? ORDER BY seq`
      )
      .all(patientId);

    const successors = new Map<string, string>();
    for (const row of rows) {
      if (row.previous_version_id) {
        successors.set(row.previous_version_id, row.id);
      }
    }

    return rows.map((row) => toRevision(row, successors.get(row.id)));
  }

  runInTransaction<T>(fn: () => T): T {
    return this.database.transaction(fn)();
  }

  private ensurePatient(patientId: string): void {
    this.database
      .prepare(`INSERT OR IGNORE INTO patients (id) VALUES (?)`)
      .run(patientId);
  }
}
