/**
 * Schema Validator Service
 * Validates structured-analysis outputs and pipeline configuration against JSON schemas.
 */

import Ajv, { ErrorObject, ValidateFunction } from 'ajv';
import {
  SentimentExtractionSchema,
  SentimentExtractionOutput
} from '../schemas/sentiment-extraction';
import { PipelineConfigSchema } from '../schemas/pipeline-config';
import { PipelineConfig } from '../types/config';

export interface SchemaValidationError {
  path: string;
  message: string;
  keyword: string;
  params: Record<string, unknown>;
}

export interface SchemaValidationResult<T = unknown> {
  valid: boolean;
  errors: SchemaValidationError[];
  rawOutput: string;
  parsedOutput?: T;
}

export class SchemaValidator {
  private ajv: Ajv;
  private validateSentiment: ValidateFunction<SentimentExtractionOutput>;
  private validateConfig: ValidateFunction<PipelineConfig>;

  constructor() {
    this.ajv = new Ajv({ allErrors: true });
    this.validateSentiment = this.ajv.compile<SentimentExtractionOutput>(SentimentExtractionSchema);
    this.validateConfig = this.ajv.compile<PipelineConfig>(PipelineConfigSchema);
  }

  /**
   * Converts AJV errors to our SchemaValidationError format
   */
  private convertErrors(errors: ErrorObject[] | null | undefined): SchemaValidationError[] {
    if (!errors) return [];

    return errors.map((error) => ({
      path: error.instancePath || '/',
      message: error.message || 'Unknown validation error',
      keyword: error.keyword,
      params: { ...error.params }
    }));
  }

  /**
   * Parses raw output string to JSON
   */
  private parseOutput(rawOutput: string): { parsed: unknown; error?: string } {
    try {
      const parsed: unknown = JSON.parse(rawOutput);
      return { parsed };
    } catch (e) {
      return {
        parsed: null,
        error: `JSON parse error: ${e instanceof Error ? e.message : 'Unknown error'}`
      };
    }
  }

  private run<T>(validate: ValidateFunction<T>, output: unknown): SchemaValidationResult<T> {
    const rawOutput = typeof output === 'string' ? output : JSON.stringify(output) ?? 'undefined';

    let parsedOutput: unknown = output;
    if (typeof output === 'string') {
      const parseResult = this.parseOutput(output);
      if (parseResult.error) {
        return {
          valid: false,
          errors: [{
            path: '/',
            message: parseResult.error,
            keyword: 'parse',
            params: {}
          }],
          rawOutput
        };
      }
      parsedOutput = parseResult.parsed;
    }

    if (validate(parsedOutput)) {
      return {
        valid: true,
        errors: [],
        rawOutput,
        parsedOutput
      };
    }

    return {
      valid: false,
      errors: this.convertErrors(validate.errors),
      rawOutput
    };
  }

  /**
   * Validates sentiment extraction output against schema.
   * Accepts either the parsed object or the raw JSON text.
   */
  validateSentimentExtraction(output: unknown): SchemaValidationResult<SentimentExtractionOutput> {
    return this.run(this.validateSentiment, output);
  }

  /**
   * Validates a complete pipeline configuration
   */
  validatePipelineConfig(config: unknown): SchemaValidationResult<PipelineConfig> {
    return this.run(this.validateConfig, config);
  }
}

// Singleton instance for convenience
export const schemaValidator = new SchemaValidator();
