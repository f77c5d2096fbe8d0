/**
 * =============================================================================
 * ADVISORY SERVICE - Unit Tests
 * =============================================================================
 */

import { AdvisoryService, buildAdvisoryPrompt } from '../modules/advisory/advisory.service';
import { GenerationOptions, TextGenerator } from '../shared/services/gemini.service';
import { NavigatorErrorKind } from '../core/errors/AppError';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const GENERATION: GenerationOptions = { temperature: 0.3, maxOutputTokens: 600 };

class FakeGenerator implements TextGenerator {
  readonly prompts: string[] = [];
  readonly options: GenerationOptions[] = [];

  constructor(
    private readonly reply: () => Promise<string>,
    private readonly available = true
  ) {}

  isAvailable(): boolean {
    return this.available;
  }

  async generate(prompt: string, options: GenerationOptions): Promise<string> {
    this.prompts.push(prompt);
    this.options.push(options);
    return this.reply();
  }
}

const REQUEST = {
  description: 'Water is knee deep on our street and rising',
  location: '12.9716,77.5946',
  disasterType: 'Flood',
};

describe('buildAdvisoryPrompt', () => {
  it('carries the situation, location and disaster type', () => {
    const lines = buildAdvisoryPrompt({ ...REQUEST, description: '  Water is knee deep  ' }).split('\n');

    expect(lines[0]).toBe('EMERGENCY NAVIGATION ASSISTANT');
    expect(lines).toContain('Situation: Water is knee deep');
    expect(lines).toContain('Location: 12.9716,77.5946');
    expect(lines).toContain('Disaster type: Flood');
    expect(lines[lines.length - 1]).toBe('Answer in clear plain text with emojis. Do not use JSON.');
  });
});

describe('AdvisoryService.generateAdvisory', () => {
  it('returns the trimmed text and passes the sampling options', async () => {
    const generator = new FakeGenerator(async () => '\n1. Move to higher ground now.\n2. Avoid River Road.\n');
    const service = new AdvisoryService(generator, GENERATION);

    const result = await service.generateAdvisory(REQUEST);

    expect(result).toEqual({ ok: true, value: '1. Move to higher ground now.\n2. Avoid River Road.' });
    expect(generator.prompts).toEqual([buildAdvisoryPrompt(REQUEST)]);
    expect(generator.options).toEqual([{ temperature: 0.3, maxOutputTokens: 600 }]);
  });

  it('rejects a blank description without calling the generator', async () => {
    const generator = new FakeGenerator(async () => 'unused');

    const result = await new AdvisoryService(generator, GENERATION).generateAdvisory({ ...REQUEST, description: ' \n\t ' });

    if (result.ok) throw new Error('expected failure');
    expect(result.error.kind).toBe(NavigatorErrorKind.EMPTY_INPUT);
    expect(result.error.message).toBe('Please describe your emergency situation');
    expect(generator.prompts).toHaveLength(0);
  });

  it('reports TextGenerationUnavailable when no generator is configured', async () => {
    const generator = new FakeGenerator(async () => 'unused', false);

    const result = await new AdvisoryService(generator, GENERATION).generateAdvisory(REQUEST);

    if (result.ok) throw new Error('expected failure');
    expect(result.error.kind).toBe(NavigatorErrorKind.TEXT_GENERATION_UNAVAILABLE);
    expect(result.error.message).toBe('AI service unavailable');
    expect(result.error.statusCode).toBe(503);
    expect(generator.prompts).toHaveLength(0);
  });

  it('reports TextGenerationError when the generator throws', async () => {
    const generator = new FakeGenerator(async () => {
      throw new Error('quota exceeded');
    });

    const result = await new AdvisoryService(generator, GENERATION).generateAdvisory(REQUEST);

    if (result.ok) throw new Error('expected failure');
    expect(result.error.kind).toBe(NavigatorErrorKind.TEXT_GENERATION_ERROR);
    expect(result.error.message).toBe('Analysis error: quota exceeded');
    expect(result.error.code).toBe('NAV_9005');
  });

  it('reports TextGenerationError for an empty reply', async () => {
    const generator = new FakeGenerator(async () => '   ');

    const result = await new AdvisoryService(generator, GENERATION).generateAdvisory(REQUEST);

    if (result.ok) throw new Error('expected failure');
    expect(result.error.kind).toBe(NavigatorErrorKind.TEXT_GENERATION_ERROR);
    expect(result.error.message).toBe('Analysis error: empty response from AI service');
  });
});
