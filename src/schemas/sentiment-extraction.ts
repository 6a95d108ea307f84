/**
 * JSON Schema for per-article sentiment extraction responses.
 * Validates structured-analysis outputs before they become SentimentRecords.
 */

export type SentimentLabel = 'positive' | 'neutral' | 'negative';

export interface SentimentExtractionOutput {
  article_id?: string;
  sentiment: SentimentLabel;
  confidence: number;
  event_tags?: string[];
  impact_score: number;
  reasoning: string;
}

export const SentimentExtractionSchema = {
  type: 'object',
  required: ['sentiment', 'confidence', 'impact_score', 'reasoning'],
  properties: {
    article_id: { type: 'string' },
    sentiment: {
      type: 'string',
      enum: ['positive', 'neutral', 'negative']
    },
    confidence: {
      type: 'number',
      minimum: 0,
      maximum: 1
    },
    event_tags: {
      type: 'array',
      items: { type: 'string', minLength: 1, maxLength: 64 },
      maxItems: 20
    },
    impact_score: {
      type: 'number',
      minimum: 0,
      maximum: 1
    },
    reasoning: {
      type: 'string'
    }
  },
  additionalProperties: false
} as const;
