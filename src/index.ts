/**
 * News-pattern explainer: public entry points
 */

export { handler, explain } from './handlers/explain';
export { WorkflowOrchestrator, WorkflowDependencies, applyDelta, createInitialState } from './services/workflow-orchestrator';
export { PipelineFactory, PipelineFactoryOptions } from './services/pipeline-factory';
export { SentimentExtractor } from './services/sentiment-extractor';
export { PatternDetectorService, DEFAULT_PATTERN_CONFIG } from './services/pattern-detector';
export { CorrelationEngineService, DEFAULT_CORRELATION_CONFIG, DEFAULT_CORRELATION_WINDOW } from './services/correlation-engine';
export { ReportGeneratorService } from './services/report-generator';
export { PriceSeriesService } from './services/price-series';
export {
  DEFAULT_PIPELINE_CONFIG,
  loadPipelineConfig,
  loadProviderConfig,
  resolvePipelineConfig,
  validateRunRequest
} from './services/config';
export { RunSnapshotRepository } from './repositories/run-snapshot';

export * from './adapters/ai';
export * from './adapters/news';
export * from './adapters/price';

export * from './types/date-range';
export * from './types/news';
export * from './types/price';
export * from './types/sentiment';
export * from './types/pattern';
export * from './types/correlation';
export * from './types/report';
export * from './types/run-state';
export * from './types/config';
export * from './types/errors';
export * from './types/logger';
export * from './types/validation';
