/**
 * Market Data Adapters
 */

export * from './yahoo-adapter';
