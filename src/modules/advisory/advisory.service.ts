/**
 * =============================================================================
 * ADVISORY SERVICE - Safety guidance from the text generator
 * =============================================================================
 *
 * One prompt, one response, shown to the user as plain text.
 * The model is asked for free text; nothing in the answer is parsed.
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';
import { geminiService, GenerationOptions, TextGenerator } from '../../shared/services/gemini.service';
import { Result, ok, fail } from '../../shared/types/result.types';
import { NavigatorError, NavigatorErrorKind } from '../../core/errors/AppError';
import { config } from '../../config/environment';

export interface AdvisoryRequest {
  description: string;
  /** "lat,lon" as typed by the user */
  location: string;
  disasterType: string;
}

/**
 * Prompt asking for prioritised actions, hazards, contacts and a verification note
 */
export function buildAdvisoryPrompt(request: AdvisoryRequest): string {
  return [
    'EMERGENCY NAVIGATION ASSISTANT',
    `Situation: ${request.description.trim()}`,
    `Location: ${request.location}`,
    `Disaster type: ${request.disasterType}`,
    '',
    'Respond with:',
    '1. Three safety actions, most urgent first',
    '2. Hazards to expect along an evacuation route',
    '3. Local emergency contacts',
    '4. A verification status for this guidance',
    '',
    'Answer in clear plain text with emojis. Do not use JSON.',
  ].join('\n');
}

export class AdvisoryService {
  constructor(
    private readonly generator: TextGenerator,
    private readonly generation: GenerationOptions
  ) {}

  async generateAdvisory(request: AdvisoryRequest): Promise<Result<string, NavigatorError>> {
    if (!request.description.trim()) {
      return fail(new NavigatorError(NavigatorErrorKind.EMPTY_INPUT, 'Please describe your emergency situation'));
    }

    if (!this.generator.isAvailable()) {
      logger.warn('Advisory requested but no text generator is configured');
      return fail(new NavigatorError(NavigatorErrorKind.TEXT_GENERATION_UNAVAILABLE, 'AI service unavailable'));
    }

    let text: string;
    try {
      text = await this.generator.generate(buildAdvisoryPrompt(request), this.generation);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Advisory generation failed: ${message}`);
      return fail(new NavigatorError(NavigatorErrorKind.TEXT_GENERATION_ERROR, `Analysis error: ${message}`));
    }

    if (!text.trim()) {
      return fail(new NavigatorError(NavigatorErrorKind.TEXT_GENERATION_ERROR, 'Analysis error: empty response from AI service'));
    }

    return ok(text.trim());
  }
}

export const advisoryService = new AdvisoryService(geminiService, {
  temperature: config.gemini.temperature,
  maxOutputTokens: config.gemini.maxOutputTokens,
});
