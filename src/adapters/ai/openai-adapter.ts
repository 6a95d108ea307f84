/**
 * OpenAI Adapter - structured sentiment extraction with OpenAI chat models
 *
 * Sends one article per request in JSON mode and returns the parsed object.
 * Numeric scores are clamped into [0, 1] before they reach schema validation.
 */

import { AnalysisRequest } from '../../types/sentiment';
import { BaseAIAdapter, AIAdapterConfig, AIProviderError, ProviderType } from './base-ai-adapter';
import { SENTIMENT_SYSTEM_PROMPT, buildSentimentUserPrompt } from './prompts';
import { clamp } from '../../utils/format';

/**
 * OpenAI-specific configuration
 */
export interface OpenAIAdapterConfig extends AIAdapterConfig {
  organizationId?: string;
  temperature?: number;
  maxTokens?: number;
}

/**
 * OpenAI API response structure
 */
interface OpenAIResponse {
  id?: string;
  model?: string;
  choices?: Array<{
    index?: number;
    message?: {
      role?: string;
      content?: string | null;
    };
    finish_reason?: string;
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
  };
  error?: {
    message?: string;
    type?: string;
    code?: string;
  };
}

const SCORE_FIELDS = ['confidence', 'impact_score'] as const;

export class OpenAIAdapter extends BaseAIAdapter {
  readonly providerType: ProviderType = 'OPENAI';

  private organizationId?: string;
  private temperature: number;
  private maxTokens: number;

  constructor(config: OpenAIAdapterConfig) {
    super(config);
    this.organizationId = config.organizationId;
    this.temperature = config.temperature ?? 0.2;
    this.maxTokens = config.maxTokens ?? 512;
  }

  async analyze(request: AnalysisRequest, signal?: AbortSignal): Promise<unknown> {
    const response = await this.withTimeout(
      (requestSignal) => this.callOpenAIAPI(buildSentimentUserPrompt(request), requestSignal),
      signal
    );

    const parsed = this.parseJson(this.extractText(response));
    return this.clampScores(parsed);
  }

  /**
   * Clamp numeric score fields into [0, 1]; other shapes pass through untouched
   */
  private clampScores(parsed: unknown): unknown {
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      return parsed;
    }
    const record: Record<string, unknown> = { ...parsed };
    for (const field of SCORE_FIELDS) {
      const value = record[field];
      if (typeof value === 'number' && Number.isFinite(value)) {
        record[field] = clamp(value, 0, 1);
      }
    }
    return record;
  }

  /**
   * Build headers for OpenAI API
   */
  protected override buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'Authorization': `Bearer ${this.config.apiKey}`,
    };

    if (this.organizationId) {
      headers['OpenAI-Organization'] = this.organizationId;
    }

    return headers;
  }

  /**
   * Call the OpenAI API
   */
  private async callOpenAIAPI(prompt: string, signal: AbortSignal): Promise<OpenAIResponse> {
    const url = `${this.config.apiEndpoint}/v1/chat/completions`;

    const body = {
      model: this.config.modelId,
      messages: [
        { role: 'system', content: SENTIMENT_SYSTEM_PROMPT },
        { role: 'user', content: prompt },
      ],
      temperature: this.temperature,
      max_tokens: this.maxTokens,
      response_format: { type: 'json_object' },
    };

    const response = await fetch(url, {
      method: 'POST',
      headers: this.buildHeaders(),
      body: JSON.stringify(body),
      signal,
    });

    if (!response.ok) {
      const errorBody = await response.text();
      throw new AIProviderError(
        `OpenAI API error: ${response.status} - ${errorBody}`,
        this.providerType,
        response.status,
        response.status >= 500 || response.status === 429
      );
    }

    const data = await response.json() as OpenAIResponse;

    if (data.error) {
      throw new AIProviderError(
        `OpenAI API error: ${data.error.message}`,
        this.providerType,
        undefined,
        false
      );
    }

    return data;
  }

  /**
   * Extract text from OpenAI response
   */
  private extractText(response: OpenAIResponse): string {
    const text = response.choices?.[0]?.message?.content;
    if (!text) {
      throw new AIProviderError(
        'No text content in OpenAI response',
        this.providerType,
        undefined,
        true
      );
    }
    return text;
  }
}
