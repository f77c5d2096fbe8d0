/**
 * =============================================================================
 * GEMINI SERVICE - Unit Tests
 * =============================================================================
 *
 * @google/genai is mocked; the tests check what the wrapper sends and how it
 * turns replies into text.
 * =============================================================================
 */

import { GoogleGenAI } from '@google/genai';
import { GeminiService } from '../shared/services/gemini.service';
import { AdvisoryService } from '../modules/advisory/advisory.service';
import { NavigatorErrorKind } from '../core/errors/AppError';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const mockGenerateContent = jest.fn<Promise<{ text?: string }>, [unknown]>();

jest.mock('@google/genai', () => ({
  GoogleGenAI: jest.fn().mockImplementation(() => ({
    models: { generateContent: (request: unknown) => mockGenerateContent(request) },
  })),
}));

const GENERATION = { temperature: 0.3, maxOutputTokens: 600 };

function createService(apiKey = 'test-secret'): GeminiService {
  return new GeminiService({ apiKey, model: 'gemini-2.5-flash', timeoutMs: 8000 });
}

beforeEach(() => {
  jest.clearAllMocks();
});

describe('GeminiService', () => {
  describe('without an API key', () => {
    it('reports itself unavailable and creates no client', () => {
      const service = createService('');

      expect(service.isAvailable()).toBe(false);
      expect(GoogleGenAI).not.toHaveBeenCalled();
    });

    it('rejects generate calls', async () => {
      await expect(createService('').generate('prompt', GENERATION))
        .rejects.toThrow('Gemini API key not configured');
      expect(mockGenerateContent).not.toHaveBeenCalled();
    });
  });

  describe('with an API key', () => {
    it('creates the client with the key and the request timeout', () => {
      const service = createService();

      expect(service.isAvailable()).toBe(true);
      expect(GoogleGenAI).toHaveBeenCalledWith({
        apiKey: 'test-secret',
        httpOptions: { timeout: 8000 },
      });
    });

    it('sends the model, prompt and generation settings', async () => {
      mockGenerateContent.mockResolvedValue({ text: '1. Leave through the east gate.' });

      const text = await createService().generate('Stay safe?', GENERATION);

      expect(text).toBe('1. Leave through the east gate.');
      expect(mockGenerateContent).toHaveBeenCalledWith({
        model: 'gemini-2.5-flash',
        contents: 'Stay safe?',
        config: { temperature: 0.3, maxOutputTokens: 600 },
      });
    });

    it('returns an empty string when the reply has no text', async () => {
      mockGenerateContent.mockResolvedValue({});

      await expect(createService().generate('Stay safe?', GENERATION)).resolves.toBe('');
    });

    it('propagates API errors', async () => {
      mockGenerateContent.mockRejectedValue(new Error('quota exceeded'));

      await expect(createService().generate('Stay safe?', GENERATION)).rejects.toThrow('quota exceeded');
    });
  });

  describe('behind the advisory stage', () => {
    it('maps a reply without text to TextGenerationError', async () => {
      mockGenerateContent.mockResolvedValue({});
      const advisory = new AdvisoryService(createService(), GENERATION);

      const result = await advisory.generateAdvisory({
        description: 'Water is rising',
        location: '12.9716,77.5946',
        disasterType: 'Flood',
      });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe(NavigatorErrorKind.TEXT_GENERATION_ERROR);
        expect(result.error.message).toBe('Analysis error: empty response from AI service');
      }
    });
  });
});
