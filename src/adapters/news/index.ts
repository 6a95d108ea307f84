/**
 * News Adapters
 */

export * from './base-news-adapter';
export * from './marketaux-adapter';
