import { execFile } from 'child_process';
import { promisify } from 'util';
import { logger } from '../../utils/logger';
import { ExtractionEngineUnavailableError } from '../../shared/errors';
import type { PageImage } from '../../types';
import type { OcrEngine, OcrEngineOutput, RecognizeOptions } from './ocr-engine';

const execFileAsync = promisify(execFile);

export interface TesseractEngineConfig {
  command?: string;
  language?: string;
  pageSegmentationMode?: number;
}

const WORD_LEVEL = '5';

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Rebuild text lines and a mean word confidence from `tesseract ... tsv` output
 */
export function parseTesseractTsv(tsv: string): OcrEngineOutput {
  const lines = new Map<string, string[]>();
  const confidences: number[] = [];

  for (const row of tsv.split(/\r?\n/).slice(1)) {
    const columns = row.split('\t');
    if (columns.length < 12 || columns[0] !== WORD_LEVEL) {
      continue;
    }

    const word = columns.slice(11).join('\t').trim();
    if (!word) {
      continue;
    }

    const [, page, block, paragraph, line] = columns;
    const key = `${page}.${block}.${paragraph}.${line}`;
    const words = lines.get(key) ?? [];
    words.push(word);
    lines.set(key, words);

    const confidence = Number(columns[10]);
    if (Number.isFinite(confidence) && confidence >= 0) {
      confidences.push(confidence);
    }
  }

  const text = Array.from(lines.values(), words => words.join(' ')).join('\n');
  const confidence = confidences.length > 0
    ? confidences.reduce((sum, c) => sum + c, 0) / confidences.length / 100
    : 0;

  return { text, confidence: Math.round(confidence * 1000) / 1000 };
}

/**
 * Runs the tesseract CLI on one page image
 */
export class TesseractEngine implements OcrEngine {
  readonly name = 'tesseract';
  private readonly command: string;
  private readonly language: string;
  private readonly pageSegmentationMode: number;

  constructor(config: TesseractEngineConfig = {}) {
    this.command = config.command ?? 'tesseract';
    this.language = config.language ?? 'eng';
    this.pageSegmentationMode = config.pageSegmentationMode ?? 6;
  }

  async recognize(image: PageImage, options: RecognizeOptions): Promise<OcrEngineOutput> {
    const args = [
      image.path,
      'stdout',
      '-l', this.language,
      '--psm', String(this.pageSegmentationMode),
      'tsv',
    ];

    logger.debug({ command: this.command, args, pageNumber: image.pageNumber }, 'Running tesseract');

    try {
      const { stdout, stderr } = await execFileAsync(this.command, args, {
        signal: options.signal,
        maxBuffer: 32 * 1024 * 1024,
        encoding: 'utf8',
      });

      if (stderr.trim()) {
        logger.debug({ stderr: stderr.trim(), pageNumber: image.pageNumber }, 'tesseract diagnostics');
      }

      return parseTesseractTsv(stdout);
    } catch (error) {
      const code = errorCode(error);
      if (code === 'ENOENT' || code === 'EACCES') {
        throw new ExtractionEngineUnavailableError(
          `OCR engine "${this.command}" could not be started (${code}). Install tesseract or set TESSERACT_CMD.`,
          { cause: error, details: { command: this.command } }
        );
      }
      throw error;
    }
  }
}
