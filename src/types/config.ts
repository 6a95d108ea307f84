/**
 * Pipeline configuration types
 */

import { PatternDetectorConfig } from './pattern';
import { CorrelationConfig, CorrelationWindow } from './correlation';

export interface ExtractionConfig {
  concurrency: number;
  maxRetries: number;
  retryDelayMs: number;
}

export interface PipelineConfig {
  extraction: ExtractionConfig;
  /** Bounds the news fetch and extraction stages */
  runTimeoutMs: number;
  priceFetchTimeoutMs: number;
  /** Continue with empty optional stage outputs instead of failing */
  allowDegraded: boolean;
  correlationWindow: CorrelationWindow;
  correlation: CorrelationConfig;
  patterns: PatternDetectorConfig;
}

/**
 * Credentials and endpoints for the concrete collaborators
 */
export interface ProviderConfig {
  openaiApiKey?: string;
  openaiModel: string;
  openaiEndpoint: string;
  marketauxApiKey?: string;
  marketauxEndpoint: string;
  yahooEndpoint: string;
  snapshotBucket?: string;
  awsRegion: string;
  s3Endpoint?: string;
}
