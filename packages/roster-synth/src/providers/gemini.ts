/**
 * Google Gemini content model
 */

import { FinishReason, GoogleGenerativeAI } from '@google/generative-ai';
import { APIError, type ContentModel, type ContentRequest, type ContentResponse } from '../types.js';

export interface GeminiModelConfig {
  apiKey: string;
  model: string;
  timeout?: number;
}

export class GeminiContentModel implements ContentModel {
  readonly provider = 'gemini' as const;
  readonly model: string;
  private client: GoogleGenerativeAI;
  private timeout: number;

  constructor(config: GeminiModelConfig) {
    this.model = config.model;
    this.timeout = config.timeout ?? 120000;
    this.client = new GoogleGenerativeAI(config.apiKey);
  }

  async complete(request: ContentRequest): Promise<ContentResponse> {
    try {
      const genModel = this.client.getGenerativeModel(
        {
          model: this.model,
          systemInstruction: request.system,
          generationConfig: {
            responseMimeType: 'application/json',
            temperature: request.temperature,
            maxOutputTokens: request.maxOutputTokens
          }
        },
        { timeout: this.timeout }
      );

      const result = await genModel.generateContent(request.prompt);
      const response = result.response;
      const finishReason = response.candidates?.[0]?.finishReason ?? FinishReason.FINISH_REASON_UNSPECIFIED;

      return {
        text: response.text(),
        finishReason,
        truncated: finishReason === FinishReason.MAX_TOKENS,
        model: this.model,
        usage: response.usageMetadata
          ? {
              promptTokens: response.usageMetadata.promptTokenCount,
              outputTokens: response.usageMetadata.candidatesTokenCount
            }
          : undefined
      };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      throw new APIError(`Gemini API error: ${errorMessage}`, {
        model: this.model,
        error
      });
    }
  }
}
