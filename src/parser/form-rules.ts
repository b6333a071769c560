/**
 * Matcher rules for assessment form lines.
 *
 * Rules are tried in order against each trimmed content segment and the
 * first rule that accepts a segment consumes it. The two residual rules at
 * the end accept anything, so every segment lands somewhere.
 */

import { normalizeDate } from './date-normalizer';
import type { DateNormalization, DateNormalizerOptions } from './date-normalizer';

interface RuleBase {
  readonly id: string;
  /** Case-insensitive, with named groups `value` and optionally `label` */
  readonly pattern: RegExp;
}

export interface NameRule extends RuleBase {
  readonly target: 'name';
  readonly normalize: (value: string) => string;
}

export interface DobRule extends RuleBase {
  readonly target: 'dob';
  readonly normalize: (value: string, options: DateNormalizerOptions) => DateNormalization;
}

/**
 * A known form question with a typed answer. `normalize` returns null when
 * the answer does not have the expected shape, and the segment falls through
 * to the residual rules unchanged.
 */
export interface FieldRule extends RuleBase {
  readonly target: 'field';
  readonly normalize: (value: string) => string | null;
}

export interface ResidualRule extends RuleBase {
  readonly target: 'residual';
  /** Key for the `fields` entry; `position` is the 1-based content line number */
  readonly key: (label: string | undefined, position: number) => string;
  readonly normalize: (value: string) => string;
}

export type FormRule = NameRule | DobRule | FieldRule | ResidualRule;

/** A `Label:` prefix, used to tell a value line from the next labeled line */
export const LABELED_LINE = /^[a-z][^:]{0,119}:/i;

const DOB_LABEL = String.raw`(?:d\.?\s?o\.?\s?b\.?|date\s+of\s+birth|birth\s*date)`;

/**
 * Where a second `Label:` starts on the same line: after a wide gap (or a
 * tab), or right before a date-of-birth label.
 */
const SEGMENT_BOUNDARY = new RegExp(
  String.raw`(?:\s{2,}|\t)(?=[a-z][a-z .'()/#-]{0,40}?(?:[a-z]\d)?\s*:)|\s+(?=${DOB_LABEL}\s*[:;])`,
  'gi'
);

/**
 * Split one content line into `Label: value` segments. A boundary only
 * counts once the text before it carries a label of its own, so free text
 * that happens to mention a label stays whole.
 */
export function splitSegments(line: string): string[] {
  const segments: string[] = [];
  let start = 0;

  for (const match of line.matchAll(SEGMENT_BOUNDARY)) {
    const end = match.index ?? 0;
    const pending = line.slice(start, end);
    if (!/[:;]/.test(pending)) {
      continue;
    }
    segments.push(pending.trim());
    start = end + match[0].length;
  }
  segments.push(line.slice(start).trim());

  return segments.filter(segment => segment.length > 0);
}

export function normalizeName(value: string): string {
  return value
    .replace(/\s+/g, ' ')
    .replace(/[,;:]+$/, '')
    .trim();
}

const MARKED_OPTION = /(?:[[(]\s*[x✓✔]\s*[\])]|[☒☑✓✔])\s*(yes|no)\b/i;

/**
 * YES/NO answers, written plainly or as a ticked box among both options
 */
export function normalizeCheckbox(value: string): string | null {
  const marked = MARKED_OPTION.exec(value);
  if (marked) {
    return marked[1].toUpperCase();
  }
  const plain = /^(yes|no|y|n)\.?$/i.exec(value.trim());
  if (!plain) {
    return null;
  }
  return plain[1].toLowerCase().startsWith('y') ? 'YES' : 'NO';
}

/**
 * Whole-number score from 0 to `max`, optionally written as `n/max`
 */
export function normalizeScore(value: string, max: number): string | null {
  const match = /^(\d{1,2})(?:\s*\/\s*(\d{1,2}))?$/.exec(value.trim());
  if (!match) {
    return null;
  }
  const score = Number(match[1]);
  if (score > max || (match[2] !== undefined && Number(match[2]) !== max)) {
    return null;
  }
  return String(score);
}

/**
 * A number with an optional unit, spacing made uniform: `72bpm` → `72 bpm`,
 * `98 %` → `98%`
 */
export function normalizeMeasurement(value: string): string | null {
  const match = /^(\d{1,4}(?:[.,]\d{1,2})?)\s*(%|°\s*[cf]|[a-z][a-z/]{0,11})?$/i.exec(value.trim());
  if (!match) {
    return null;
  }
  const amount = match[1].replace(',', '.');
  const unit = match[2]?.replace(/\s+/g, '');
  if (!unit) {
    return amount;
  }
  return unit === '%' ? `${amount}%` : `${amount} ${unit}`;
}

export function normalizeBloodPressure(value: string): string | null {
  const match = /^(\d{2,3})\s*\/\s*(\d{2,3})(?:\s*(mm\s*hg))?$/i.exec(value.trim());
  if (!match) {
    return null;
  }
  return match[3] ? `${match[1]}/${match[2]} mmHg` : `${match[1]}/${match[2]}`;
}

function labeled(labels: readonly string[]): RegExp {
  return new RegExp(String.raw`^(?<label>(?:${labels.join('|')}))\s*[:;]\s*(?<value>\S.*)$`, 'i');
}

export const patientNameRule: NameRule = {
  id: 'patient-name',
  target: 'name',
  pattern: /^(?<label>(?:patient(?:'s)?\s+)?(?:full\s+)?name)\s*[:;]\s*(?<value>.*)$/i,
  normalize: normalizeName,
};

export const dateOfBirthRule: DobRule = {
  id: 'date-of-birth',
  target: 'dob',
  pattern: new RegExp(String.raw`^(?<label>${DOB_LABEL}(?:\s*\([^)]*\))?)(?:\s*[:;]\s*|\s+|$)(?<value>.*)$`, 'i'),
  normalize: (value, options) => normalizeDate(value, options),
};

export const treatmentCheckboxRule: FieldRule = {
  id: 'treatment-checkbox',
  target: 'field',
  pattern: labeled([String.raw`injection`, String.raw`exercise\s+therapy`]),
  normalize: normalizeCheckbox,
};

export const DIFFICULTY_TASKS = [
  String.raw`bending\s+or\s+stooping`,
  String.raw`putting\s+on\s+(?:your\s+)?shoes`,
  String.raw`sleeping`,
  String.raw`standing\s+for\s+an\s+hour`,
  String.raw`(?:going\s+up\s+or\s+down\s+)?stairs`,
  String.raw`walking\s+through\s+(?:a\s+)?store`,
  String.raw`driving`,
  String.raw`preparing\s+(?:a\s+)?meal`,
  String.raw`yard\s+work`,
  String.raw`picking\s+up\s+items(?:\s+off\s+the\s+floor)?`,
] as const;

export const difficultyRatingRule: FieldRule = {
  id: 'difficulty-rating',
  target: 'field',
  pattern: labeled(DIFFICULTY_TASKS),
  normalize: value => normalizeScore(value, 5),
};

export const symptomScoreRule: FieldRule = {
  id: 'symptom-score',
  target: 'field',
  pattern: labeled(['pain', 'numbness', 'tingling', 'burning', 'tightness']),
  normalize: value => normalizeScore(value, 10),
};

export const bloodPressureRule: FieldRule = {
  id: 'blood-pressure',
  target: 'field',
  pattern: labeled([String.raw`blood\s+pressure`, 'bp']),
  normalize: normalizeBloodPressure,
};

export const vitalSignRule: FieldRule = {
  id: 'vital-sign',
  target: 'field',
  pattern: labeled([
    'hr',
    String.raw`heart\s+rate`,
    'pulse',
    'weight',
    'spo2',
    String.raw`blood\s+glucose`,
    'respirations',
    'temperature',
    'temp',
  ]),
  normalize: normalizeMeasurement,
};

export const labeledFieldRule: ResidualRule = {
  id: 'labeled-field',
  target: 'residual',
  pattern: /^(?<label>[a-z][^:]{0,119}?)\s*:\s*(?<value>.*)$/i,
  key: (label, position) => label?.trim() || `line_${position}`,
  normalize: value => value.trim(),
};

export const unlabeledLineRule: ResidualRule = {
  id: 'unlabeled-line',
  target: 'residual',
  pattern: /^(?<value>.+)$/,
  key: (_label, position) => `line_${position}`,
  normalize: value => value,
};

export const DEFAULT_RULES: readonly FormRule[] = [
  patientNameRule,
  dateOfBirthRule,
  treatmentCheckboxRule,
  difficultyRatingRule,
  symptomScoreRule,
  bloodPressureRule,
  vitalSignRule,
  labeledFieldRule,
  unlabeledLineRule,
];
