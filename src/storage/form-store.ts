import type { StructuredRecord, SubmissionReceipt } from '../types';

export type NameMatching = 'exact' | 'case-insensitive';

/**
 * Persistence contract for parsed forms.
 *
 * `recordSubmission` is one atomic unit: resolve (or create) the patient by
 * natural key, insert the submission, commit. On any failure nothing is
 * written.
 */
export interface FormStore {
  readonly name: string;
  recordSubmission(record: StructuredRecord): Promise<SubmissionReceipt>;
  close(): Promise<void>;
}

/**
 * Canonical JSON for a field mapping: keys in insertion order, no whitespace
 */
export function serializeFields(fields: ReadonlyMap<string, string>): string {
  const members = Array.from(fields, ([key, value]) => `${JSON.stringify(key)}:${JSON.stringify(value)}`);
  return `{${members.join(',')}}`;
}

/**
 * Parse a stored `form_json` back into a field mapping
 */
export function parseFormJson(json: string): Map<string, string> {
  const parsed: unknown = JSON.parse(json);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new TypeError('form_json must encode an object');
  }

  const fields = new Map<string, string>();
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value !== 'string') {
      throw new TypeError(`form_json field "${key}" is not a string`);
    }
    fields.set(key, value);
  }
  return fields;
}

export function fieldsToObject(fields: ReadonlyMap<string, string>): Record<string, string> {
  return Object.fromEntries(fields);
}
