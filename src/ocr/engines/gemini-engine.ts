import fs from 'fs/promises';
import {
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
  GoogleGenerativeAIRequestInputError,
  GoogleGenerativeAIResponseError,
} from '@google/generative-ai';
import { logger } from '../../utils/logger';
import { ExtractionEngineUnavailableError, errorMessage } from '../../shared/errors';
import { TRANSCRIBE_PROMPT } from '../prompts';
import type { PageImage } from '../../types';
import type { OcrEngine, OcrEngineOutput, RecognizeOptions } from './ocr-engine';

export interface GeminiEngineConfig {
  apiKey?: string;
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
  prompt?: string;
}

/**
 * Vision-model OCR through Gemini. Reports no confidence score.
 */
export class GeminiEngine implements OcrEngine {
  readonly name = 'gemini';
  private readonly genAI: GoogleGenerativeAI | null;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxOutputTokens: number;
  private readonly prompt: string;

  constructor(config: GeminiEngineConfig) {
    this.genAI = config.apiKey ? new GoogleGenerativeAI(config.apiKey) : null;
    this.model = config.model ?? 'gemini-2.0-flash';
    this.temperature = config.temperature ?? 0;
    this.maxOutputTokens = config.maxOutputTokens ?? 8192;
    this.prompt = config.prompt ?? TRANSCRIBE_PROMPT;

    logger.debug({ model: this.model, configured: this.genAI !== null }, 'GeminiEngine initialized');
  }

  async recognize(image: PageImage, options: RecognizeOptions): Promise<OcrEngineOutput> {
    if (!this.genAI) {
      throw new ExtractionEngineUnavailableError('GEMINI_API_KEY is required for the gemini OCR engine', {
        details: { engine: this.name },
      });
    }

    const imageData = (await fs.readFile(image.path)).toString('base64');
    const generativeModel = this.genAI.getGenerativeModel({
      model: this.model,
      generationConfig: {
        temperature: this.temperature,
        maxOutputTokens: this.maxOutputTokens,
      },
    });

    try {
      const result = await generativeModel.generateContent(
        [this.prompt, { inlineData: { data: imageData, mimeType: image.mimeType } }],
        { signal: options.signal }
      );
      const text = result.response.text();

      logger.debug({ pageNumber: image.pageNumber, textLength: text.length }, 'Gemini transcription received');
      return { text };
    } catch (error) {
      if (options.signal.aborted || !this.isUnreachable(error)) {
        throw error;
      }
      throw new ExtractionEngineUnavailableError(`Gemini request failed: ${errorMessage(error)}`, {
        cause: error,
        details: { engine: this.name, model: this.model },
      });
    }
  }

  /**
   * Credentials refused or the API never answered. Blocked or empty
   * candidates, rejected images and rate limits are outcomes for one page.
   */
  private isUnreachable(error: unknown): boolean {
    if (error instanceof GoogleGenerativeAIFetchError) {
      return error.status === 401 || error.status === 403;
    }
    return !(error instanceof GoogleGenerativeAIResponseError || error instanceof GoogleGenerativeAIRequestInputError);
  }
}
