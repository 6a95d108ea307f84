/**
 * Configuration Service
 *
 * Defaults, environment loading and fail-fast validation for the pipeline
 * and its collaborators. Invalid values raise ConfigurationError before any
 * stage runs.
 */

import { PipelineConfig, ProviderConfig } from '../types/config';
import { ConfigurationError } from '../types/errors';
import { ValidationError } from '../types/validation';
import { RunRequest } from '../types/run-state';
import { DateRange } from '../types/date-range';
import { DEFAULT_PATTERN_CONFIG } from './pattern-detector';
import { DEFAULT_CORRELATION_CONFIG, DEFAULT_CORRELATION_WINDOW } from './correlation-engine';
import { SchemaValidator, schemaValidator } from './schema-validator';
import { isIsoDate } from '../utils/dates';

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  extraction: {
    concurrency: 4,
    maxRetries: 2,
    retryDelayMs: 250
  },
  runTimeoutMs: 120000,
  priceFetchTimeoutMs: 15000,
  allowDegraded: true,
  correlationWindow: DEFAULT_CORRELATION_WINDOW,
  correlation: DEFAULT_CORRELATION_CONFIG,
  patterns: DEFAULT_PATTERN_CONFIG
};

export const DEFAULT_PROVIDER_CONFIG: ProviderConfig = {
  openaiModel: 'gpt-4o-mini',
  openaiEndpoint: 'https://api.openai.com',
  marketauxEndpoint: 'https://api.marketaux.com',
  yahooEndpoint: 'https://query1.finance.yahoo.com',
  awsRegion: 'us-east-1'
};

export type PipelineConfigOverrides = Partial<{
  extraction: Partial<PipelineConfig['extraction']>;
  runTimeoutMs: number;
  priceFetchTimeoutMs: number;
  allowDegraded: boolean;
  correlationWindow: Partial<PipelineConfig['correlationWindow']>;
  correlation: Partial<PipelineConfig['correlation']>;
  patterns: Partial<PipelineConfig['patterns']>;
}>;

type Env = Record<string, string | undefined>;

/**
 * Merge overrides into the defaults, one level deep
 */
export function resolvePipelineConfig(
  overrides: PipelineConfigOverrides = {},
  base: PipelineConfig = DEFAULT_PIPELINE_CONFIG
): PipelineConfig {
  return {
    extraction: { ...base.extraction, ...overrides.extraction },
    runTimeoutMs: overrides.runTimeoutMs ?? base.runTimeoutMs,
    priceFetchTimeoutMs: overrides.priceFetchTimeoutMs ?? base.priceFetchTimeoutMs,
    allowDegraded: overrides.allowDegraded ?? base.allowDegraded,
    correlationWindow: { ...base.correlationWindow, ...overrides.correlationWindow },
    correlation: { ...base.correlation, ...overrides.correlation },
    patterns: { ...base.patterns, ...overrides.patterns }
  };
}

/**
 * Validate a complete configuration: schema ranges plus cross-field rules.
 * Returns every problem found.
 */
export function validatePipelineConfig(
  config: PipelineConfig,
  validator: SchemaValidator = schemaValidator
): ValidationError[] {
  const result = validator.validatePipelineConfig(config);
  const errors: ValidationError[] = result.errors.map(error => ({
    field: error.path,
    message: error.message,
    code: error.keyword.toUpperCase()
  }));
  if (!result.valid) {
    return errors;
  }

  const { maxRetries, retryDelayMs } = config.extraction;
  const totalBackoffMs = retryDelayMs * (Math.pow(2, maxRetries) - 1);
  if (totalBackoffMs >= config.runTimeoutMs) {
    errors.push({
      field: '/extraction/retryDelayMs',
      message: `Retry backoff of ${totalBackoffMs}ms does not fit within runTimeoutMs (${config.runTimeoutMs}ms)`,
      code: 'BACKOFF_EXCEEDS_TIMEOUT'
    });
  }

  return errors;
}

/**
 * Throw ConfigurationError unless the configuration is valid
 */
export function assertValidPipelineConfig(config: PipelineConfig): PipelineConfig {
  const errors = validatePipelineConfig(config);
  if (errors.length > 0) {
    throw new ConfigurationError(
      `Invalid pipeline configuration: ${errors.map(e => `${e.field} ${e.message}`).join('; ')}`,
      errors
    );
  }
  return config;
}

/**
 * Check a run request and return its date range
 */
export function validateRunRequest(request: RunRequest): DateRange {
  const errors: ValidationError[] = [];

  if (typeof request.ticker !== 'string' || !request.ticker.trim()) {
    errors.push({ field: 'ticker', message: 'ticker is required', code: 'REQUIRED' });
  }
  if (typeof request.startDate !== 'string' || !isIsoDate(request.startDate)) {
    errors.push({ field: 'startDate', message: 'startDate must be a YYYY-MM-DD date', code: 'INVALID_DATE' });
  }
  if (typeof request.endDate !== 'string' || !isIsoDate(request.endDate)) {
    errors.push({ field: 'endDate', message: 'endDate must be a YYYY-MM-DD date', code: 'INVALID_DATE' });
  }
  if (errors.length === 0 && request.startDate > request.endDate) {
    errors.push({ field: 'startDate', message: 'startDate must not be after endDate', code: 'INVALID_RANGE' });
  }

  if (errors.length > 0) {
    throw new ConfigurationError(
      `Invalid run request: ${errors.map(e => e.message).join('; ')}`,
      errors
    );
  }

  return { startDate: request.startDate, endDate: request.endDate };
}

function parseInteger(env: Env, name: string, errors: ValidationError[]): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    errors.push({ field: name, message: `${name} must be an integer, got "${raw}"`, code: 'INVALID_INTEGER' });
    return undefined;
  }
  return value;
}

function parseNumber(env: Env, name: string, errors: ValidationError[]): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    errors.push({ field: name, message: `${name} must be a number, got "${raw}"`, code: 'INVALID_NUMBER' });
    return undefined;
  }
  return value;
}

function parseBoolean(env: Env, name: string, errors: ValidationError[]): boolean | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const normalized = raw.trim().toLowerCase();
  if (['true', '1', 'yes'].includes(normalized)) {
    return true;
  }
  if (['false', '0', 'no'].includes(normalized)) {
    return false;
  }
  errors.push({ field: name, message: `${name} must be a boolean, got "${raw}"`, code: 'INVALID_BOOLEAN' });
  return undefined;
}

/**
 * Load and validate the pipeline configuration from environment variables
 */
export function loadPipelineConfig(env: Env = process.env): PipelineConfig {
  const errors: ValidationError[] = [];

  const concurrency = parseInteger(env, 'EXTRACTION_CONCURRENCY', errors);
  const maxRetries = parseInteger(env, 'EXTRACTION_MAX_RETRIES', errors);
  const retryDelayMs = parseInteger(env, 'EXTRACTION_RETRY_DELAY_MS', errors);
  const lookbackDays = parseInteger(env, 'CORRELATION_LOOKBACK_DAYS', errors);
  const lookaheadDays = parseInteger(env, 'CORRELATION_LOOKAHEAD_DAYS', errors);
  const minConfidence = parseNumber(env, 'CORRELATION_MIN_CONFIDENCE', errors);
  const moveWindowDays = parseInteger(env, 'PATTERN_MOVE_WINDOW_DAYS', errors);
  const moveThreshold = parseNumber(env, 'PATTERN_MOVE_THRESHOLD', errors);
  const breakoutLookbackDays = parseInteger(env, 'PATTERN_BREAKOUT_LOOKBACK_DAYS', errors);
  const breakoutThreshold = parseNumber(env, 'PATTERN_BREAKOUT_THRESHOLD', errors);
  const reversalRunLength = parseInteger(env, 'PATTERN_REVERSAL_RUN_LENGTH', errors);
  const reversalThreshold = parseNumber(env, 'PATTERN_REVERSAL_THRESHOLD', errors);
  const sidewaysThreshold = parseNumber(env, 'PATTERN_SIDEWAYS_THRESHOLD', errors);
  const detectSideways = parseBoolean(env, 'PATTERN_DETECT_SIDEWAYS', errors);

  const config = resolvePipelineConfig({
    extraction: {
      ...(concurrency !== undefined && { concurrency }),
      ...(maxRetries !== undefined && { maxRetries }),
      ...(retryDelayMs !== undefined && { retryDelayMs })
    },
    runTimeoutMs: parseInteger(env, 'RUN_TIMEOUT_MS', errors),
    priceFetchTimeoutMs: parseInteger(env, 'PRICE_FETCH_TIMEOUT_MS', errors),
    allowDegraded: parseBoolean(env, 'ALLOW_DEGRADED', errors),
    correlationWindow: {
      ...(lookbackDays !== undefined && { lookbackDays }),
      ...(lookaheadDays !== undefined && { lookaheadDays })
    },
    correlation: {
      ...(minConfidence !== undefined && { minConfidence })
    },
    patterns: {
      ...(moveWindowDays !== undefined && { moveWindowDays }),
      ...(moveThreshold !== undefined && { moveThreshold }),
      ...(breakoutLookbackDays !== undefined && { breakoutLookbackDays }),
      ...(breakoutThreshold !== undefined && { breakoutThreshold }),
      ...(reversalRunLength !== undefined && { reversalRunLength }),
      ...(reversalThreshold !== undefined && { reversalThreshold }),
      ...(sidewaysThreshold !== undefined && { sidewaysThreshold }),
      ...(detectSideways !== undefined && { detectSideways })
    }
  });

  if (errors.length > 0) {
    throw new ConfigurationError(
      `Invalid environment: ${errors.map(e => e.message).join('; ')}`,
      errors
    );
  }

  return assertValidPipelineConfig(config);
}

/**
 * Load collaborator credentials and endpoints from environment variables
 */
export function loadProviderConfig(env: Env = process.env): ProviderConfig {
  const optional = (name: string): string | undefined => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };

  return {
    openaiApiKey: optional('OPENAI_API_KEY'),
    openaiModel: optional('OPENAI_MODEL') ?? DEFAULT_PROVIDER_CONFIG.openaiModel,
    openaiEndpoint: optional('OPENAI_ENDPOINT') ?? DEFAULT_PROVIDER_CONFIG.openaiEndpoint,
    marketauxApiKey: optional('MARKETAUX_API_KEY'),
    marketauxEndpoint: optional('MARKETAUX_ENDPOINT') ?? DEFAULT_PROVIDER_CONFIG.marketauxEndpoint,
    yahooEndpoint: optional('YAHOO_ENDPOINT') ?? DEFAULT_PROVIDER_CONFIG.yahooEndpoint,
    snapshotBucket: optional('RUN_SNAPSHOT_BUCKET'),
    awsRegion: optional('AWS_REGION') ?? DEFAULT_PROVIDER_CONFIG.awsRegion,
    s3Endpoint: optional('S3_ENDPOINT')
  };
}
