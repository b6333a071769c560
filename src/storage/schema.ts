/**
 * SQLite schema for patients and their form submissions
 */

export const DATABASE_PRAGMAS = [
  'PRAGMA foreign_keys = ON',
  'PRAGMA busy_timeout = 5000',
] as const;

/** Only meaningful for file-backed databases */
export const FILE_DATABASE_PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA synchronous = NORMAL',
] as const;

export const CREATE_PATIENTS_TABLE = `
CREATE TABLE IF NOT EXISTS patients (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL,
  dob TEXT NOT NULL
)
`;

export const CREATE_FORMS_DATA_TABLE = `
CREATE TABLE IF NOT EXISTS forms_data (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  patient_id INTEGER NOT NULL,
  form_json TEXT NOT NULL,
  created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
  FOREIGN KEY (patient_id) REFERENCES patients(id)
)
`;

/**
 * Lookup indexes. The natural key is deliberately not UNIQUE: databases
 * written before de-duplication may hold duplicates, which must surface as
 * DuplicateAmbiguity instead of failing schema creation.
 */
export const CREATE_INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_patients_natural_key ON patients(name, dob)',
  'CREATE INDEX IF NOT EXISTS idx_forms_data_patient_id ON forms_data(patient_id)',
] as const;

/** Stored in patients.dob when a document's date of birth could not be resolved */
export const UNRESOLVED_DOB = 'Unknown';
