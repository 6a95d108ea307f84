/**
 * AI Adapters - structured-analysis providers
 */

export * from './base-ai-adapter';
export * from './openai-adapter';
export * from './prompts';
