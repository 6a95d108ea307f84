/**
 * JSON Schema for PipelineConfig.
 * Range checks for windows and thresholds; cross-field rules live in the config service.
 */

const fraction = { type: 'number', minimum: 0, maximum: 1 } as const;
const positiveFraction = { type: 'number', exclusiveMinimum: 0, maximum: 1 } as const;

export const PipelineConfigSchema = {
  type: 'object',
  required: [
    'extraction',
    'runTimeoutMs',
    'priceFetchTimeoutMs',
    'allowDegraded',
    'correlationWindow',
    'correlation',
    'patterns'
  ],
  properties: {
    extraction: {
      type: 'object',
      required: ['concurrency', 'maxRetries', 'retryDelayMs'],
      properties: {
        concurrency: { type: 'integer', minimum: 1, maximum: 32 },
        maxRetries: { type: 'integer', minimum: 0, maximum: 10 },
        retryDelayMs: { type: 'integer', minimum: 0, maximum: 60000 }
      },
      additionalProperties: false
    },
    runTimeoutMs: { type: 'integer', minimum: 1 },
    priceFetchTimeoutMs: { type: 'integer', minimum: 1 },
    allowDegraded: { type: 'boolean' },
    correlationWindow: {
      type: 'object',
      required: ['lookbackDays', 'lookaheadDays'],
      properties: {
        lookbackDays: { type: 'integer', minimum: 0, maximum: 30 },
        lookaheadDays: { type: 'integer', minimum: 0, maximum: 30 }
      },
      additionalProperties: false
    },
    correlation: {
      type: 'object',
      required: ['minConfidence', 'agreementBoost', 'disagreementPenalty'],
      properties: {
        minConfidence: fraction,
        agreementBoost: fraction,
        disagreementPenalty: fraction
      },
      additionalProperties: false
    },
    patterns: {
      type: 'object',
      required: [
        'moveWindowDays',
        'moveThreshold',
        'breakoutLookbackDays',
        'breakoutThreshold',
        'reversalRunLength',
        'reversalThreshold',
        'sidewaysThreshold',
        'detectSideways'
      ],
      properties: {
        moveWindowDays: { type: 'integer', minimum: 1, maximum: 250 },
        moveThreshold: positiveFraction,
        breakoutLookbackDays: { type: 'integer', minimum: 1, maximum: 250 },
        breakoutThreshold: fraction,
        reversalRunLength: { type: 'integer', minimum: 1, maximum: 60 },
        reversalThreshold: positiveFraction,
        sidewaysThreshold: positiveFraction,
        detectSideways: { type: 'boolean' }
      },
      additionalProperties: false
    }
  },
  additionalProperties: false
} as const;
