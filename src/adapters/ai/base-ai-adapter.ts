/**
 * Base AI Adapter - common plumbing for structured-analysis providers
 *
 * Implements the functionality shared by all providers:
 * - Request timeouts chained to the caller's abort signal
 * - Error classification (retryable vs. fatal)
 * - JSON clean-up and parsing of model output
 * - Request logging
 */

import { AnalysisRequest, StructuredAnalyzer } from '../../types/sentiment';
import { MalformedOutputError } from '../../types/errors';
import { PipelineLogger } from '../../types/logger';
import { consoleLogger } from '../../utils/logger';
import { timeoutController } from '../../utils/async';

export type ProviderType = 'OPENAI';

/**
 * Configuration for an AI adapter
 */
export interface AIAdapterConfig {
  apiKey: string;
  apiEndpoint: string;
  modelId: string;
  timeoutMs?: number;
  logger?: PipelineLogger;
}

/**
 * Error thrown when an AI provider request fails
 */
export class AIProviderError extends Error {
  constructor(
    message: string,
    public readonly providerType: ProviderType,
    public readonly statusCode?: number,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = 'AIProviderError';
  }
}

/**
 * Abstract base class for AI provider adapters
 */
export abstract class BaseAIAdapter implements StructuredAnalyzer {
  abstract readonly providerType: ProviderType;

  protected config: Required<Omit<AIAdapterConfig, 'logger'>>;
  protected logger: PipelineLogger;

  constructor(config: AIAdapterConfig) {
    this.config = {
      timeoutMs: 30000,
      apiKey: config.apiKey,
      apiEndpoint: config.apiEndpoint,
      modelId: config.modelId,
      ...(config.timeoutMs !== undefined && { timeoutMs: config.timeoutMs }),
    };
    this.logger = config.logger ?? consoleLogger;
  }

  get analyzerId(): string {
    return `${this.providerType.toLowerCase()}:${this.config.modelId}`;
  }

  /**
   * Run the provider call under the configured timeout.
   * Network failures and timeouts surface as retryable AIProviderErrors.
   */
  protected async withTimeout<T>(
    operation: (signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    const { controller, dispose } = timeoutController(this.config.timeoutMs, signal);
    const startTime = Date.now();

    try {
      const result = await operation(controller.signal);
      this.logger.debug('AI provider request completed', {
        analyzerId: this.analyzerId,
        durationMs: Date.now() - startTime,
      });
      return result;
    } catch (error) {
      this.logger.debug('AI provider request failed', {
        analyzerId: this.analyzerId,
        durationMs: Date.now() - startTime,
        error: error instanceof Error ? error.message : String(error),
      });
      if (error instanceof AIProviderError) {
        throw error;
      }
      if (controller.signal.aborted && !signal?.aborted) {
        throw new AIProviderError(
          `Request timed out after ${this.config.timeoutMs}ms`,
          this.providerType,
          undefined,
          true
        );
      }
      throw new AIProviderError(
        `Request failed: ${error instanceof Error ? error.message : String(error)}`,
        this.providerType,
        undefined,
        !signal?.aborted
      );
    } finally {
      dispose();
    }
  }

  /**
   * Determine if an error is retryable
   */
  static isRetryableError(error: unknown): boolean {
    if (error instanceof MalformedOutputError) {
      return true;
    }
    if (error instanceof AIProviderError) {
      return error.retryable;
    }
    return false;
  }

  /**
   * Strip markdown code fences around a JSON payload
   */
  protected cleanJsonResponse(text: string): string {
    return text
      .replace(/```json\n?/g, '')
      .replace(/```\n?/g, '')
      .trim();
  }

  /**
   * Parse model text into JSON, throwing MalformedOutputError on failure
   */
  protected parseJson(text: string): unknown {
    const cleaned = this.cleanJsonResponse(text);
    try {
      return JSON.parse(cleaned);
    } catch (e) {
      throw new MalformedOutputError(
        `Model output is not valid JSON: ${e instanceof Error ? e.message : 'Unknown error'}`,
        text
      );
    }
  }

  /**
   * Build common headers for API requests
   */
  protected buildHeaders(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
    };
  }

  abstract analyze(request: AnalysisRequest, signal?: AbortSignal): Promise<unknown>;
}
