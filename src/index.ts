export * from './types';
export * from './shared/errors';
export * from './ocr';
export { parseFormText, parseFormPages, FormParser, FormParserOptions, DOB_RAW_FIELD, contentLines } from './parser/form-parser';
export { normalizeDate, DateOrder, DateNormalization } from './parser/date-normalizer';
export { DEFAULT_RULES, FormRule, NameRule, DobRule, FieldRule, ResidualRule, splitSegments } from './parser/form-rules';
export { FormStore, NameMatching, serializeFields, parseFormJson, fieldsToObject } from './storage/form-store';
export { SqliteFormStore, SqliteFormStoreOptions } from './storage/sqlite-form-store';
export { SupabaseFormStore, RpcClient, rpcClientFrom } from './storage/supabase-form-store';
export { FormPipeline, FormPipelineDeps, FormPipelineOptions, ProcessOptions } from './pipeline/form-pipeline';
export { createFormPipeline, createOcrEngine, createFormStore, PipelineOverrides } from './pipeline/factory';
export { DocumentRun, PIPELINE_TRANSITIONS, IllegalTransitionError } from './pipeline/state-machine';
export { loadConfig, AppConfig } from './config';
