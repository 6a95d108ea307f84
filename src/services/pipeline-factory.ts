/**
 * Pipeline Factory - wires the concrete collaborators from configuration
 */

import { PipelineConfig, ProviderConfig } from '../types/config';
import { PipelineLogger } from '../types/logger';
import { StructuredAnalyzer } from '../types/sentiment';
import { AIProviderError, OpenAIAdapter } from '../adapters/ai';
import { MarketAuxAdapter } from '../adapters/news';
import { YahooFinanceAdapter } from '../adapters/price';
import { RunSnapshotRepository } from '../repositories/run-snapshot';
import { WorkflowOrchestrator } from './workflow-orchestrator';
import { loadPipelineConfig, loadProviderConfig } from './config';
import { consoleLogger } from '../utils/logger';

/**
 * Analyzer used when no OpenAI key is configured: every call fails without retry
 */
const unconfiguredAnalyzer: StructuredAnalyzer = {
  analyzerId: 'unconfigured',
  async analyze() {
    throw new AIProviderError('OPENAI_API_KEY is not configured', 'OPENAI', undefined, false);
  }
};

export interface PipelineFactoryOptions {
  pipeline?: PipelineConfig;
  providers?: ProviderConfig;
  logger?: PipelineLogger;
}

export const PipelineFactory = {
  /**
   * Build an orchestrator from explicit configs, falling back to the environment
   *
   * @throws ConfigurationError when the environment holds invalid values
   */
  create(options: PipelineFactoryOptions = {}): WorkflowOrchestrator {
    const pipeline = options.pipeline ?? loadPipelineConfig();
    const providers = options.providers ?? loadProviderConfig();
    const logger = options.logger ?? consoleLogger;

    if (!providers.openaiApiKey) {
      logger.warn('OPENAI_API_KEY is not set; sentiment extraction will fail for every article');
    }
    const analyzer: StructuredAnalyzer = providers.openaiApiKey
      ? new OpenAIAdapter({
          apiKey: providers.openaiApiKey,
          apiEndpoint: providers.openaiEndpoint,
          modelId: providers.openaiModel,
          logger
        })
      : unconfiguredAnalyzer;

    return new WorkflowOrchestrator({
      newsSource: new MarketAuxAdapter({
        apiEndpoint: providers.marketauxEndpoint,
        apiKey: providers.marketauxApiKey,
        logger
      }),
      marketData: new YahooFinanceAdapter({
        apiEndpoint: providers.yahooEndpoint,
        timeoutMs: pipeline.priceFetchTimeoutMs,
        logger
      }),
      analyzer,
      config: pipeline,
      snapshotStore: providers.snapshotBucket
        ? new RunSnapshotRepository({
            bucket: providers.snapshotBucket,
            region: providers.awsRegion,
            endpoint: providers.s3Endpoint
          })
        : undefined,
      logger
    });
  }
};
