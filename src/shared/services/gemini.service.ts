/**
 * =============================================================================
 * GEMINI SERVICE - Text generation
 * =============================================================================
 *
 * Wraps @google/genai behind the small TextGenerator contract used by the
 * advisory module. Without GEMINI_API_KEY the service reports itself
 * unavailable instead of failing at startup.
 * =============================================================================
 */

import { GoogleGenAI } from '@google/genai';
import { logger } from './logger.service';
import { config } from '../../config/environment';

export interface GeminiConfig {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export interface GenerationOptions {
  temperature: number;
  maxOutputTokens: number;
}

export interface TextGenerator {
  isAvailable(): boolean;
  /** Resolves with the generated text; rejects on transport or API errors */
  generate(prompt: string, options: GenerationOptions): Promise<string>;
}

export class GeminiService implements TextGenerator {
  private readonly client: GoogleGenAI | null;

  constructor(private readonly options: GeminiConfig) {
    this.client = options.apiKey
      ? new GoogleGenAI({ apiKey: options.apiKey, httpOptions: { timeout: options.timeoutMs } })
      : null;
  }

  /**
   * Check if service is available (API key configured)
   */
  isAvailable(): boolean {
    return this.client !== null;
  }

  async generate(prompt: string, generation: GenerationOptions): Promise<string> {
    if (!this.client) {
      throw new Error('Gemini API key not configured');
    }

    const startTime = Date.now();
    const response = await this.client.models.generateContent({
      model: this.options.model,
      contents: prompt,
      config: {
        temperature: generation.temperature,
        maxOutputTokens: generation.maxOutputTokens,
      },
    });

    const text = response.text ?? '';
    logger.debug(`🤖 Gemini ${this.options.model}: ${text.length} chars - ${Date.now() - startTime}ms`);
    return text;
  }
}

export const geminiService = new GeminiService(config.gemini);
