import { logger } from '../utils/logger';
import { MissingRequiredFieldError } from '../shared/errors';
import { PAGE_MARKER_PATTERN } from '../ocr/text-extractor';
import { DEFAULT_RULES, LABELED_LINE, splitSegments } from './form-rules';
import type { FormRule } from './form-rules';
import type { DateOrder } from './date-normalizer';
import type { PageText, StructuredRecord } from '../types';

export interface FormParserOptions {
  /** Day/month order for numeric dates such as 05/01/1990 */
  dateOrder?: DateOrder;
  rules?: readonly FormRule[];
}

/** Key under which an unresolvable date of birth is kept verbatim */
export const DOB_RAW_FIELD = 'dob_raw';

interface Segment {
  text: string;
  /** 1-based content line the segment came from */
  position: number;
}

function splitLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

/**
 * Split joined OCR text into trimmed content lines, dropping blanks and page markers
 */
export function contentLines(text: string): string[] {
  return splitLines(text).filter(line => !PAGE_MARKER_PATTERN.test(line));
}

function toSegments(lines: readonly string[]): Segment[] {
  return lines.flatMap((line, index) =>
    splitSegments(line).map(text => ({ text, position: index + 1 }))
  );
}

function uniqueKey(fields: Map<string, string>, key: string): string {
  let candidate = key;
  for (let n = 2; fields.has(candidate); n++) {
    candidate = `${key} (${n})`;
  }
  return candidate;
}

function parseLines(lines: readonly string[], options: FormParserOptions): StructuredRecord {
  const rules = options.rules ?? DEFAULT_RULES;
  const segments = toSegments(lines);
  const fields = new Map<string, string>();
  let name: string | null = null;
  let dob: string | null = null;
  let dobSeen = false;

  const isValueSegment = (index: number): boolean => {
    const next = segments[index];
    return next !== undefined && !LABELED_LINE.test(next.text);
  };

  for (let i = 0; i < segments.length; i++) {
    const { text, position } = segments[i];

    for (const rule of rules) {
      const match = rule.pattern.exec(text);
      if (!match) {
        continue;
      }
      const label = match.groups?.label?.trim();
      const value = (match.groups?.value ?? '').trim();

      if (rule.target === 'name') {
        if (name !== null) {
          continue;
        }
        // A bare "Name:" may have its answer on the following line
        const continuation = !value && isValueSegment(i + 1) ? segments[i + 1].text : null;
        const candidate = rule.normalize(value || continuation || '');
        if (!candidate) {
          continue;
        }
        name = candidate;
        if (continuation !== null) {
          i++;
        }
        break;
      }

      if (rule.target === 'dob') {
        if (dobSeen) {
          continue;
        }
        const continuation = !value && isValueSegment(i + 1) ? segments[i + 1].text : null;
        const candidate = value || continuation;
        if (!candidate) {
          continue;
        }
        dobSeen = true;
        if (continuation !== null) {
          i++;
        }

        const normalized = rule.normalize(candidate, { dateOrder: options.dateOrder });
        if (normalized.ok) {
          dob = normalized.iso;
        } else {
          fields.set(uniqueKey(fields, DOB_RAW_FIELD), candidate);
          logger.debug({ value: candidate, reason: normalized.reason }, 'Date of birth left unresolved');
        }
        break;
      }

      if (rule.target === 'field') {
        const normalized = rule.normalize(value);
        if (normalized === null || !label) {
          continue;
        }
        fields.set(uniqueKey(fields, label), normalized);
        break;
      }

      if (label && !value) {
        // An open question keeps every answer line up to the next labeled line
        const answer: string[] = [];
        while (isValueSegment(i + 1)) {
          i++;
          answer.push(segments[i].text);
        }
        fields.set(uniqueKey(fields, rule.key(label, position)), answer.join('\n'));
        break;
      }

      fields.set(uniqueKey(fields, rule.key(label, position)), rule.normalize(value));
      break;
    }
  }

  if (name === null) {
    throw new MissingRequiredFieldError('name', { details: { contentLines: lines.length } });
  }

  logger.debug({
    contentLines: lines.length,
    segments: segments.length,
    residualFields: fields.size,
    dobResolved: dob !== null,
  }, 'Form text parsed');

  return { name, dob, fields };
}

/**
 * Turn raw multi-page OCR text into a structured record.
 *
 * Deterministic: the same text and options always give the same record.
 * Throws `MissingRequiredFieldError` when no patient name is found.
 */
export function parseFormText(text: string, options: FormParserOptions = {}): StructuredRecord {
  return parseLines(contentLines(text), options);
}

/**
 * Same as `parseFormText`, but reads page texts directly: no page markers are
 * involved, so an OCR line that reads like one is kept as content.
 */
export function parseFormPages(pages: readonly PageText[], options: FormParserOptions = {}): StructuredRecord {
  const lines = [...pages]
    .sort((a, b) => a.pageNumber - b.pageNumber)
    .flatMap(page => splitLines(page.text));
  return parseLines(lines, options);
}

/**
 * Parser bound to one set of options, for injection into the pipeline
 */
export class FormParser {
  constructor(private readonly options: FormParserOptions = {}) {}

  parse(text: string): StructuredRecord {
    return parseFormText(text, this.options);
  }

  parsePages(pages: readonly PageText[]): StructuredRecord {
    return parseFormPages(pages, this.options);
  }
}
