import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { logger } from '../utils/logger';
import {
  DuplicateAmbiguityError,
  FormPipelineError,
  ForeignKeyViolationError,
  StorageUnavailableError,
  errorMessage,
} from '../shared/errors';
import {
  CREATE_FORMS_DATA_TABLE,
  CREATE_INDEXES,
  CREATE_PATIENTS_TABLE,
  DATABASE_PRAGMAS,
  FILE_DATABASE_PRAGMAS,
  UNRESOLVED_DOB,
} from './schema';
import { serializeFields } from './form-store';
import type { FormStore, NameMatching } from './form-store';
import type { FormSubmission, Patient, StructuredRecord, SubmissionReceipt } from '../types';

export interface SqliteFormStoreOptions {
  nameMatching?: NameMatching;
}

interface IdRow {
  id: number;
}

interface SubmissionRow {
  id: number;
  patient_id: number;
  form_json: string;
  created_at: string;
}

/**
 * SQLite result code of a driver error. Matched by shape: when the driver is
 * loaded into more than one module registry or realm, its errors need not be
 * instances of the `SqliteError` (or even `Error`) this module sees.
 */
export function sqliteErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' && error.code.startsWith('SQLITE_') ? error.code : undefined;
}

export function toStoreError(error: unknown): FormPipelineError {
  if (error instanceof FormPipelineError) {
    return error;
  }
  const sqliteCode = sqliteErrorCode(error);
  if (sqliteCode === 'SQLITE_CONSTRAINT_FOREIGNKEY') {
    return new ForeignKeyViolationError(`Foreign key violation: ${errorMessage(error)}`, {
      cause: error,
      details: { sqliteCode },
    });
  }
  if (sqliteCode !== undefined) {
    return new StorageUnavailableError(`SQLite error ${sqliteCode}: ${errorMessage(error)}`, {
      cause: error,
      details: { sqliteCode },
    });
  }
  return new StorageUnavailableError(`Storage failure: ${errorMessage(error)}`, { cause: error });
}

/**
 * FormStore on a local SQLite database.
 *
 * Each submission runs in a BEGIN IMMEDIATE transaction: the write lock is
 * taken before the natural-key lookup, so two writers (even on separate
 * connections or processes) cannot both miss and both insert a patient.
 */
export class SqliteFormStore implements FormStore {
  readonly name = 'sqlite';
  private readonly recordTransaction: Database.Transaction<(record: StructuredRecord) => SubmissionReceipt>;

  private constructor(private readonly db: Database.Database, private readonly nameMatching: NameMatching) {
    const collate = nameMatching === 'case-insensitive' ? ' COLLATE NOCASE' : '';
    const findByNaturalKey = db.prepare<[string, string], IdRow>(
      `SELECT id FROM patients WHERE name = ?${collate} AND dob = ? ORDER BY id`
    );
    const findByName = db.prepare<[string], IdRow>(
      `SELECT id FROM patients WHERE name = ?${collate} ORDER BY id`
    );
    const insertPatient = db.prepare<[string, string]>('INSERT INTO patients (name, dob) VALUES (?, ?)');
    const insertSubmission = db.prepare<[number, string]>(
      'INSERT INTO forms_data (patient_id, form_json) VALUES (?, ?)'
    );

    // An unresolved dob first matches an earlier unresolved row, then a
    // patient who is the only one with that name; otherwise it is a new patient
    const resolveWithoutDob = (name: string): IdRow[] => {
      const unresolved = findByNaturalKey.all(name, UNRESOLVED_DOB);
      if (unresolved.length > 0) {
        return unresolved;
      }
      const named = findByName.all(name);
      return named.length === 1 ? named : [];
    };

    this.recordTransaction = db.transaction((record: StructuredRecord): SubmissionReceipt => {
      const candidates = record.dob === null
        ? resolveWithoutDob(record.name)
        : findByNaturalKey.all(record.name, record.dob);

      if (candidates.length > 1) {
        throw new DuplicateAmbiguityError(candidates.map(row => row.id), {
          details: { name: record.name, dob: record.dob },
        });
      }

      let patientId: number;
      let patientCreated = false;
      if (candidates.length === 1) {
        patientId = candidates[0].id;
      } else {
        const inserted = insertPatient.run(record.name, record.dob ?? UNRESOLVED_DOB);
        patientId = Number(inserted.lastInsertRowid);
        patientCreated = true;
      }

      const submission = insertSubmission.run(patientId, serializeFields(record.fields));
      return {
        patientId,
        submissionId: Number(submission.lastInsertRowid),
        patientCreated,
      };
    });
  }

  /**
   * Open (and create if needed) a database at `filename`; `:memory:` is accepted
   */
  static open(filename: string, options: SqliteFormStoreOptions = {}): SqliteFormStore {
    let db: Database.Database | undefined;

    try {
      if (filename !== ':memory:') {
        fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
      }
      db = new Database(filename);

      for (const pragma of DATABASE_PRAGMAS) {
        db.exec(pragma);
      }
      if (!db.memory) {
        for (const pragma of FILE_DATABASE_PRAGMAS) {
          db.exec(pragma);
        }
      }

      db.exec(CREATE_PATIENTS_TABLE);
      db.exec(CREATE_FORMS_DATA_TABLE);
      for (const statement of CREATE_INDEXES) {
        db.exec(statement);
      }

      logger.info({ filename, nameMatching: options.nameMatching ?? 'exact' }, 'SQLite form store opened');
      return new SqliteFormStore(db, options.nameMatching ?? 'exact');
    } catch (error) {
      db?.close();
      throw new StorageUnavailableError(`Could not open database ${filename}: ${errorMessage(error)}`, {
        cause: error,
        details: { filename },
      });
    }
  }

  async recordSubmission(record: StructuredRecord): Promise<SubmissionReceipt> {
    try {
      const receipt = this.recordTransaction.immediate(record);
      logger.info({ ...receipt, store: this.name }, 'Form submission recorded');
      return receipt;
    } catch (error) {
      throw toStoreError(error);
    }
  }

  getPatient(id: number): Patient | undefined {
    return this.db
      .prepare<[number], Patient>('SELECT id, name, dob FROM patients WHERE id = ?')
      .get(id);
  }

  findPatients(name: string, dob: string): Patient[] {
    const collate = this.nameMatching === 'case-insensitive' ? ' COLLATE NOCASE' : '';
    return this.db
      .prepare<[string, string], Patient>(`SELECT id, name, dob FROM patients WHERE name = ?${collate} AND dob = ? ORDER BY id`)
      .all(name, dob);
  }

  listSubmissions(patientId: number): FormSubmission[] {
    return this.db
      .prepare<[number], SubmissionRow>(
        'SELECT id, patient_id, form_json, created_at FROM forms_data WHERE patient_id = ? ORDER BY id'
      )
      .all(patientId)
      .map(row => ({
        id: row.id,
        patientId: row.patient_id,
        formJson: row.form_json,
        createdAt: row.created_at,
      }));
  }

  countPatients(): number {
    return this.count('patients');
  }

  countSubmissions(): number {
    return this.count('forms_data');
  }

  /** Escape hatch for maintenance scripts and tests */
  get database(): Database.Database {
    return this.db;
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
      logger.debug({ store: this.name }, 'SQLite form store closed');
    }
  }

  private count(table: 'patients' | 'forms_data'): number {
    const row = this.db.prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM ${table}`).get();
    return row?.total ?? 0;
  }
}
