/**
 * Tests for the Configuration Service
 */

import * as fc from 'fast-check';
import {
  DEFAULT_PIPELINE_CONFIG,
  DEFAULT_PROVIDER_CONFIG,
  assertValidPipelineConfig,
  loadPipelineConfig,
  loadProviderConfig,
  resolvePipelineConfig,
  validatePipelineConfig,
  validateRunRequest
} from './config';
import { ConfigurationError } from '../types/errors';
import { dateRangeArb } from '../test/generators';

describe('Configuration Service', () => {
  describe('resolvePipelineConfig', () => {
    it('returns the defaults without overrides', () => {
      expect(resolvePipelineConfig()).toEqual(DEFAULT_PIPELINE_CONFIG);
    });

    it('merges nested overrides one level deep', () => {
      const config = resolvePipelineConfig({
        extraction: { concurrency: 8 },
        correlationWindow: { lookaheadDays: 5 },
        allowDegraded: false
      });

      expect(config.extraction).toEqual({ concurrency: 8, maxRetries: 2, retryDelayMs: 250 });
      expect(config.correlationWindow).toEqual({ lookbackDays: 3, lookaheadDays: 5 });
      expect(config.allowDegraded).toBe(false);
      expect(config.patterns).toEqual(DEFAULT_PIPELINE_CONFIG.patterns);
    });
  });

  describe('validatePipelineConfig', () => {
    it('accepts the defaults', () => {
      expect(validatePipelineConfig(DEFAULT_PIPELINE_CONFIG)).toEqual([]);
    });

    it('rejects a retry backoff longer than the run timeout', () => {
      const config = resolvePipelineConfig({
        extraction: { maxRetries: 3, retryDelayMs: 1000 },
        runTimeoutMs: 5000
      });

      expect(validatePipelineConfig(config)).toEqual([{
        field: '/extraction/retryDelayMs',
        message: 'Retry backoff of 7000ms does not fit within runTimeoutMs (5000ms)',
        code: 'BACKOFF_EXCEEDS_TIMEOUT'
      }]);
    });

    it('throws ConfigurationError with details', () => {
      const config = resolvePipelineConfig({ correlation: { minConfidence: 1.5 } });

      expect(() => assertValidPipelineConfig(config)).toThrow(ConfigurationError);
      try {
        assertValidPipelineConfig(config);
      } catch (error) {
        expect(error instanceof ConfigurationError && error.details[0].field).toBe('/correlation/minConfidence');
      }
    });
  });

  describe('validateRunRequest', () => {
    it('accepts any ordered date range', () => {
      fc.assert(
        fc.property(dateRangeArb(), (range) => {
          expect(validateRunRequest({ ticker: 'ACME', ...range })).toEqual(range);
        }),
        { numRuns: 100 }
      );
    });

    it('rejects a start after the end', () => {
      expect(() => validateRunRequest({ ticker: 'ACME', startDate: '2024-03-10', endDate: '2024-03-01' }))
        .toThrow('Invalid run request: startDate must not be after endDate');
    });

    it('rejects an empty ticker and impossible dates together', () => {
      let caught: unknown;
      try {
        validateRunRequest({ ticker: ' ', startDate: '2024-02-30', endDate: 'tomorrow' });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigurationError);
      if (caught instanceof ConfigurationError) {
        expect(caught.details.map(d => d.field)).toEqual(['ticker', 'startDate', 'endDate']);
      }
    });
  });

  describe('loadPipelineConfig', () => {
    it('uses defaults for an empty environment', () => {
      expect(loadPipelineConfig({})).toEqual(DEFAULT_PIPELINE_CONFIG);
    });

    it('reads every supported variable', () => {
      const config = loadPipelineConfig({
        EXTRACTION_CONCURRENCY: '8',
        EXTRACTION_MAX_RETRIES: '1',
        EXTRACTION_RETRY_DELAY_MS: '100',
        RUN_TIMEOUT_MS: '60000',
        PRICE_FETCH_TIMEOUT_MS: '5000',
        ALLOW_DEGRADED: 'false',
        CORRELATION_LOOKBACK_DAYS: '2',
        CORRELATION_LOOKAHEAD_DAYS: '4',
        CORRELATION_MIN_CONFIDENCE: '0.3',
        PATTERN_MOVE_WINDOW_DAYS: '10',
        PATTERN_MOVE_THRESHOLD: '0.08',
        PATTERN_BREAKOUT_LOOKBACK_DAYS: '15',
        PATTERN_BREAKOUT_THRESHOLD: '0.02',
        PATTERN_REVERSAL_RUN_LENGTH: '4',
        PATTERN_REVERSAL_THRESHOLD: '0.03',
        PATTERN_SIDEWAYS_THRESHOLD: '0.01',
        PATTERN_DETECT_SIDEWAYS: 'no'
      });

      expect(config).toEqual({
        extraction: { concurrency: 8, maxRetries: 1, retryDelayMs: 100 },
        runTimeoutMs: 60000,
        priceFetchTimeoutMs: 5000,
        allowDegraded: false,
        correlationWindow: { lookbackDays: 2, lookaheadDays: 4 },
        correlation: { minConfidence: 0.3, agreementBoost: 0.25, disagreementPenalty: 0.5 },
        patterns: {
          moveWindowDays: 10,
          moveThreshold: 0.08,
          breakoutLookbackDays: 15,
          breakoutThreshold: 0.02,
          reversalRunLength: 4,
          reversalThreshold: 0.03,
          sidewaysThreshold: 0.01,
          detectSideways: false
        }
      });
    });

    it('rejects values that are not integers', () => {
      expect(() => loadPipelineConfig({ EXTRACTION_CONCURRENCY: 'four' }))
        .toThrow('Invalid environment: EXTRACTION_CONCURRENCY must be an integer, got "four"');
    });

    it('rejects values that are not booleans', () => {
      expect(() => loadPipelineConfig({ ALLOW_DEGRADED: 'maybe' })).toThrow(ConfigurationError);
    });

    it('rejects integers outside the allowed range', () => {
      expect(() => loadPipelineConfig({ EXTRACTION_CONCURRENCY: '0' })).toThrow(ConfigurationError);
    });
  });

  describe('loadProviderConfig', () => {
    it('falls back to default endpoints', () => {
      expect(loadProviderConfig({})).toEqual({
        ...DEFAULT_PROVIDER_CONFIG,
        openaiApiKey: undefined,
        marketauxApiKey: undefined,
        snapshotBucket: undefined,
        s3Endpoint: undefined
      });
    });

    it('reads credentials and the snapshot bucket', () => {
      const config = loadProviderConfig({
        OPENAI_API_KEY: 'test-secret',
        OPENAI_MODEL: 'gpt-test',
        MARKETAUX_API_KEY: 'test-token',
        RUN_SNAPSHOT_BUCKET: 'runs-bucket',
        AWS_REGION: 'eu-west-1',
        S3_ENDPOINT: 'http://localhost:4566'
      });

      expect(config).toMatchObject({
        openaiApiKey: 'test-secret',
        openaiModel: 'gpt-test',
        marketauxApiKey: 'test-token',
        snapshotBucket: 'runs-bucket',
        awsRegion: 'eu-west-1',
        s3Endpoint: 'http://localhost:4566'
      });
    });
  });
});
