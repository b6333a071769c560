#!/usr/bin/env node

import fs from 'fs/promises';
import path from 'path';
import { config } from './config';
import { logger } from './utils/logger';
import { errorMessage } from './shared/errors';
import { mediaTypeFromPath } from './ocr/page-rasterizer';
import { fieldsToObject } from './storage/form-store';
import { createFormPipeline } from './pipeline/factory';
import { PipelineLogger } from './pipeline/pipeline-logger';
import type { PipelineResult } from './types';

const USAGE = `Usage:
  intake-ocr process <file...> [--type <mediaType>] [--output <results.json>] [--db <database path>]

Examples:
  intake-ocr process scans/intake-001.pdf
  intake-ocr process scans/*.png --db ./data/clinic.db --output results.json`;

export interface CliOptions {
  files: string[];
  mediaType?: string;
  output?: string;
  databasePath?: string;
}

const VALUE_OPTIONS = new Set(['--type', '--output', '--db']);

/**
 * Parse `process <file...>` arguments. Returns null when the command line is unusable.
 */
export function parseCliArgs(args: readonly string[]): CliOptions | null {
  const [command, ...rest] = args;
  if (command !== 'process') {
    return null;
  }

  const options: CliOptions = { files: [] };
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (!VALUE_OPTIONS.has(arg)) {
      if (arg.startsWith('--')) {
        return null;
      }
      options.files.push(arg);
      continue;
    }

    const value = rest[i + 1];
    if (value === undefined || value.startsWith('--')) {
      return null;
    }
    i++;
    switch (arg) {
      case '--type':
        options.mediaType = value;
        break;
      case '--output':
        options.output = value;
        break;
      case '--db':
        options.databasePath = value;
        break;
    }
  }

  return options.files.length > 0 ? options : null;
}

/**
 * JSON shape of a result; record fields become a plain object in document order
 */
export function toOutputRecord(result: PipelineResult): Record<string, unknown> {
  const { record, ...rest } = result;
  if (!record) {
    return rest;
  }
  return {
    ...rest,
    record: { name: record.name, dob: record.dob, fields: fieldsToObject(record.fields) },
  };
}

export async function run(args: readonly string[]): Promise<number> {
  const options = parseCliArgs(args);
  if (!options) {
    console.error(USAGE);
    return 2;
  }

  const pipeline = createFormPipeline(config, { databasePath: options.databasePath });
  const results: PipelineResult[] = [];

  try {
    for (const file of options.files) {
      const mediaType = options.mediaType ?? mediaTypeFromPath(file) ?? 'application/octet-stream';
      const inputId = path.basename(file);
      const startTime = Date.now();

      PipelineLogger.documentStart(inputId, file, mediaType);
      const result = await pipeline.process(file, mediaType, { inputId });
      const duration = (Date.now() - startTime) / 1000;

      if (result.status === 'persisted') {
        PipelineLogger.documentComplete(result, duration);
      } else {
        PipelineLogger.documentError(result, duration);
      }
      results.push(result);
    }
  } finally {
    await pipeline.store.close();
  }

  PipelineLogger.summary(results);

  if (options.output) {
    await fs.mkdir(path.dirname(path.resolve(options.output)), { recursive: true });
    await fs.writeFile(options.output, JSON.stringify(results.map(toOutputRecord), null, 2) + '\n', 'utf8');
    console.log(`📁 Results saved to: ${options.output}`);
  }

  return results.every(result => result.status === 'persisted') ? 0 : 1;
}

if (require.main === module) {
  run(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      logger.fatal({ error }, 'intake-ocr crashed');
      console.error(`❌ ${errorMessage(error)}`);
      process.exitCode = 1;
    });
}
