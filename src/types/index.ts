import type { PipelineErrorInfo } from '../shared/errors';

export const SUPPORTED_MEDIA_TYPES = [
  'application/pdf',
  'image/png',
  'image/jpeg',
  'image/tiff',
  'image/bmp',
  'image/gif',
  'image/webp',
] as const;

export type MediaType = (typeof SUPPORTED_MEDIA_TYPES)[number];

export type ImageMediaType = Exclude<MediaType, 'application/pdf'>;

/**
 * One rasterized page, on disk for the lifetime of a rasterizer scope
 */
export interface PageImage {
  /** 1-indexed */
  pageNumber: number;
  path: string;
  mimeType: ImageMediaType;
}

export interface PageText {
  pageNumber: number;
  text: string;
  /** Engine confidence in [0, 1], when the engine reports one */
  confidence?: number;
}

export interface ExtractedDocument {
  pages: PageText[];
  /** Page texts in page order, each preceded by a `--- Page N ---` marker */
  text: string;
  meanConfidence?: number;
}

/**
 * Parsed form: patient identity plus every other line of the document
 */
export interface StructuredRecord {
  name: string;
  /** ISO-8601 date, or null when the document's date of birth is unresolved */
  dob: string | null;
  fields: Map<string, string>;
}

export interface Patient {
  id: number;
  name: string;
  dob: string;
}

export interface FormSubmission {
  id: number;
  patientId: number;
  formJson: string;
  createdAt: string;
}

export interface SubmissionReceipt {
  patientId: number;
  submissionId: number;
  patientCreated: boolean;
}

export type PipelineState =
  | 'received'
  | 'rasterized'
  | 'extracted'
  | 'parsed'
  | 'persisted'
  | 'failed';

export interface PipelineResult {
  status: 'persisted' | 'failed';
  inputId: string;
  runId: string;
  state: PipelineState;
  /** States visited in this run, oldest first */
  history: PipelineState[];
  patientId?: number;
  submissionId?: number;
  patientCreated?: boolean;
  /** Present once parsing succeeded, including when persistence failed */
  record?: StructuredRecord;
  pages?: PageText[];
  error?: PipelineErrorInfo;
}
