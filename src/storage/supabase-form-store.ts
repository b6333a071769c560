import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { logger } from '../utils/logger';
import {
  DuplicateAmbiguityError,
  FormPipelineError,
  ForeignKeyViolationError,
  StorageUnavailableError,
} from '../shared/errors';
import { serializeFields } from './form-store';
import type { FormStore, NameMatching } from './form-store';
import type { StructuredRecord, SubmissionReceipt } from '../types';

export const RECORD_SUBMISSION_FUNCTION = 'record_form_submission';

/** Subset of a PostgREST error the store inspects */
export interface RpcError {
  message: string;
  code?: string;
  details?: string | null;
  hint?: string | null;
}

export interface RpcResponse {
  data: unknown;
  error: RpcError | null;
}

/**
 * The one call the store makes; narrower than SupabaseClient so tests can stand in
 */
export interface RpcClient {
  rpc(fn: string, args: Record<string, unknown>): Promise<RpcResponse>;
}

export function rpcClientFrom(client: SupabaseClient): RpcClient {
  return {
    async rpc(fn, args) {
      const { data, error } = await client.rpc(fn, args);
      return { data, error };
    },
  };
}

const receiptRowSchema = z.object({
  patient_id: z.coerce.number().int().positive(),
  submission_id: z.coerce.number().int().positive(),
  patient_created: z.boolean(),
});

const receiptSchema = z.union([z.array(receiptRowSchema).length(1), receiptRowSchema]);

const FOREIGN_KEY_VIOLATION = '23503';

function toStoreError(error: RpcError): FormPipelineError {
  if (error.hint === 'duplicate_ambiguity' || error.message.startsWith('duplicate_ambiguity')) {
    const ids = (error.message.split(':')[1] ?? '')
      .split(',')
      .map(id => Number(id.trim()))
      .filter(id => Number.isInteger(id) && id > 0);
    return new DuplicateAmbiguityError(ids, { details: { postgresCode: error.code } });
  }
  if (error.code === FOREIGN_KEY_VIOLATION) {
    return new ForeignKeyViolationError(`Foreign key violation: ${error.message}`, {
      details: { postgresCode: error.code, postgresDetails: error.details },
    });
  }
  return new StorageUnavailableError(`Supabase RPC failed: ${error.message}`, {
    details: { postgresCode: error.code, postgresDetails: error.details },
  });
}

/**
 * FormStore on Supabase/Postgres. The unit of work lives in the
 * `record_form_submission` function, which runs in a single transaction
 * under an advisory lock on the natural key.
 */
export class SupabaseFormStore implements FormStore {
  readonly name = 'supabase';

  constructor(private readonly client: RpcClient, private readonly nameMatching: NameMatching = 'exact') {}

  async recordSubmission(record: StructuredRecord): Promise<SubmissionReceipt> {
    let response: RpcResponse;

    try {
      response = await this.client.rpc(RECORD_SUBMISSION_FUNCTION, {
        p_name: record.name,
        p_dob: record.dob,
        p_form_json: serializeFields(record.fields),
        p_case_insensitive: this.nameMatching === 'case-insensitive',
      });
    } catch (error) {
      throw new StorageUnavailableError('Supabase is unreachable', { cause: error });
    }

    if (response.error) {
      throw toStoreError(response.error);
    }

    const parsed = receiptSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new StorageUnavailableError('Unexpected reply from record_form_submission', {
        details: { issues: parsed.error.issues.map(issue => issue.message) },
      });
    }

    const row = Array.isArray(parsed.data) ? parsed.data[0] : parsed.data;
    const receipt: SubmissionReceipt = {
      patientId: row.patient_id,
      submissionId: row.submission_id,
      patientCreated: row.patient_created,
    };

    logger.info({ ...receipt, store: this.name }, 'Form submission recorded');
    return receipt;
  }

  async close(): Promise<void> {
    // HTTP client; nothing to release
  }
}
