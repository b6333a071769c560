import fs from 'fs';
import os from 'os';
import path from 'path';
import { GoogleGenerativeAIFetchError, GoogleGenerativeAIResponseError } from '@google/generative-ai';
import { GeminiEngine } from '../engines/gemini-engine';
import { TextExtractor } from '../text-extractor';
import { ExtractionEngineUnavailableError } from '../../shared/errors';
import type { PageImage } from '../../types';

jest.mock('@google/generative-ai', () => {
  class MockFetchError extends Error {
    constructor(message: string, readonly status?: number) {
      super(message);
    }
  }
  class MockResponseError extends Error {}
  class MockRequestInputError extends Error {}
  return {
    GoogleGenerativeAI: jest.fn(),
    GoogleGenerativeAIFetchError: MockFetchError,
    GoogleGenerativeAIResponseError: MockResponseError,
    GoogleGenerativeAIRequestInputError: MockRequestInputError,
  };
});

const { GoogleGenerativeAI } = jest.requireMock<{ GoogleGenerativeAI: jest.Mock }>('@google/generative-ai');

describe('GeminiEngine', () => {
  const generateContent = jest.fn();
  const getGenerativeModel = jest.fn(() => ({ generateContent }));
  let workspace: string;
  let image: PageImage;

  beforeEach(() => {
    generateContent.mockReset();
    getGenerativeModel.mockClear();
    GoogleGenerativeAI.mockReset();
    GoogleGenerativeAI.mockImplementation(() => ({ getGenerativeModel }));

    workspace = fs.mkdtempSync(path.join(os.tmpdir(), 'gemini-engine-'));
    image = { pageNumber: 1, path: path.join(workspace, 'page-1.png'), mimeType: 'image/png' };
    fs.writeFileSync(image.path, Buffer.from('fake image bytes'));
  });

  afterEach(() => {
    fs.rmSync(workspace, { recursive: true, force: true });
  });

  it('should be unavailable without an API key', async () => {
    const engine = new GeminiEngine({});

    await expect(engine.recognize(image, { signal: new AbortController().signal })).rejects.toThrow(
      ExtractionEngineUnavailableError
    );
    expect(GoogleGenerativeAI).not.toHaveBeenCalled();
  });

  it('should send the page inline with the transcription prompt', async () => {
    generateContent.mockResolvedValue({ response: { text: () => 'Name: Jane Doe' } });
    const engine = new GeminiEngine({ apiKey: 'test-secret', model: 'gemini-test', prompt: 'Transcribe.' });
    const { signal } = new AbortController();

    await expect(engine.recognize(image, { signal })).resolves.toEqual({ text: 'Name: Jane Doe' });

    expect(GoogleGenerativeAI).toHaveBeenCalledWith('test-secret');
    expect(getGenerativeModel).toHaveBeenCalledWith({
      model: 'gemini-test',
      generationConfig: { temperature: 0, maxOutputTokens: 8192 },
    });
    expect(generateContent).toHaveBeenCalledWith(
      ['Transcribe.', { inlineData: { data: Buffer.from('fake image bytes').toString('base64'), mimeType: 'image/png' } }],
      { signal }
    );
  });

  it('should report network failures as ExtractionEngineUnavailable', async () => {
    generateContent.mockRejectedValue(new TypeError('fetch failed'));
    const engine = new GeminiEngine({ apiKey: 'test-secret' });

    await expect(engine.recognize(image, { signal: new AbortController().signal })).rejects.toThrow(
      'Gemini request failed: fetch failed'
    );
  });

  it('should pass a rejected image back to the caller unchanged', async () => {
    const rejected = new GoogleGenerativeAIFetchError('Unable to process input image', 400);
    generateContent.mockRejectedValue(rejected);
    const engine = new GeminiEngine({ apiKey: 'test-secret' });

    await expect(engine.recognize(image, { signal: new AbortController().signal })).rejects.toBe(rejected);
  });
  it.each([429, 500, 503])('should leave an HTTP %i to the caller as a page failure', async status => {
    const failure = new GoogleGenerativeAIFetchError('Service unavailable', status);
    generateContent.mockRejectedValue(failure);
    const engine = new GeminiEngine({ apiKey: 'test-secret' });

    await expect(engine.recognize(image, { signal: new AbortController().signal })).rejects.toBe(failure);
  });

  it.each([401, 403])('should report an HTTP %i as ExtractionEngineUnavailable', async status => {
    generateContent.mockRejectedValue(new GoogleGenerativeAIFetchError('API key not valid', status));
    const engine = new GeminiEngine({ apiKey: 'test-secret' });

    await expect(engine.recognize(image, { signal: new AbortController().signal })).rejects.toThrow(
      ExtractionEngineUnavailableError
    );
  });

  it('should record a blocked page as empty text instead of failing the document', async () => {
    const blocked = new GoogleGenerativeAIResponseError('Candidate was blocked due to SAFETY');
    generateContent.mockResolvedValue({
      response: {
        text: () => {
          throw blocked;
        },
      },
    });
    const extractor = new TextExtractor(new GeminiEngine({ apiKey: 'test-secret' }), { timeoutMs: 1000 });

    await expect(extractor.extractPage(image)).resolves.toEqual({ pageNumber: 1, text: '', confidence: 0 });
  });
});
