/**
 * Tests for the Workflow Orchestrator
 */

import {
  WorkflowOrchestrator,
  WorkflowDependencies,
  applyDelta,
  createInitialState
} from './workflow-orchestrator';
import { NewsArticle, NewsSource } from '../types/news';
import { MarketDataSource, RawPriceBar } from '../types/price';
import { Polarity, StructuredAnalyzer } from '../types/sentiment';
import { SentimentLabel } from '../schemas/sentiment-extraction';
import { ConfigurationError, InvalidTransitionError, MalformedOutputError } from '../types/errors';
import { RunSnapshotStore } from '../types/run-state';
import { addDays } from '../utils/dates';
import { silentLogger } from '../utils/logger';

const REQUEST = { ticker: 'ACME', startDate: '2024-03-01', endDate: '2024-03-14' };

function bars(startDate: string, closes: number[]): RawPriceBar[] {
  return closes.map((close, index) => ({
    date: addDays(startDate, index),
    open: close,
    high: close,
    low: close,
    close,
    volume: 1000
  }));
}

function article(articleId: string, date: string): NewsArticle {
  return {
    articleId,
    ticker: 'ACME',
    title: `Story ${articleId}`,
    url: `https://news.example.com/${articleId}`,
    source: 'Example Wire',
    publishedAt: `${date}T15:00:00.000Z`,
    summary: '',
    text: `Body of ${articleId}`,
    contentHash: `hash-${articleId}`
  };
}

const LABEL: Record<Polarity, SentimentLabel> = {
  BULLISH: 'positive',
  BEARISH: 'negative',
  NEUTRAL: 'neutral'
};

function analysis(polarity: Polarity) {
  return { sentiment: LABEL[polarity], confidence: 0.9, impact_score: 0.7, event_tags: [], reasoning: 'test' };
}

function newsSource(articles: NewsArticle[] | Error): NewsSource & { fetchNews: jest.Mock } {
  const fetchNews = articles instanceof Error
    ? jest.fn().mockRejectedValue(articles)
    : jest.fn().mockResolvedValue(articles);
  return { sourceId: 'fake-news', fetchNews };
}

function marketData(result: RawPriceBar[] | Error | 'hang'): MarketDataSource & { fetchPrices: jest.Mock } {
  const fetchPrices = result === 'hang'
    ? jest.fn().mockReturnValue(new Promise(() => undefined))
    : result instanceof Error
      ? jest.fn().mockRejectedValue(result)
      : jest.fn().mockResolvedValue(result);
  return { sourceId: 'fake-prices', fetchPrices };
}

function analyzer(polarity: Polarity = 'BULLISH'): StructuredAnalyzer & { analyze: jest.Mock } {
  return { analyzerId: 'fake', analyze: jest.fn(async () => analysis(polarity)) };
}

function orchestrator(deps: Partial<WorkflowDependencies>): WorkflowOrchestrator {
  return new WorkflowOrchestrator({
    newsSource: newsSource([]),
    marketData: marketData(bars('2024-03-01', [100, 100, 100, 100, 100, 110])),
    analyzer: analyzer(),
    logger: silentLogger,
    runIdFactory: () => 'run-test',
    ...deps
  });
}

describe('WorkflowOrchestrator', () => {
  it('completes in degraded mode without news (empty news, bullish move)', async () => {
    const fake = analyzer();
    const outcome = await orchestrator({ analyzer: fake }).run(REQUEST);

    expect(outcome.status).toBe('DONE');
    if (outcome.status !== 'DONE') return;

    expect(outcome.state.degraded).toBe(true);
    expect(outcome.report.sections).toEqual([]);
    expect(outcome.state.correlations).toEqual([]);
    expect(outcome.report.appendix.uncorrelatedPatterns.map(p => [p.kind, p.anchorDate])).toEqual([
      ['BULLISH_MOVE', '2024-03-06']
    ]);
    expect(outcome.warnings).toContain('No news articles found for ACME between 2024-03-01 and 2024-03-14');
    expect(fake.analyze).not.toHaveBeenCalled();
  });

  it('links a bearish article to a bearish reversal two days later', async () => {
    const outcome = await orchestrator({
      newsSource: newsSource([article('a1', '2024-03-10')]),
      analyzer: analyzer('BEARISH'),
      marketData: marketData(bars('2024-03-08', [100, 101, 102, 103, 104, 100])),
      config: { patterns: { detectSideways: false } }
    }).run(REQUEST);

    expect(outcome.status).toBe('DONE');
    expect(outcome.state.patterns.map(p => p.patternId)).toEqual(['REVERSAL:2024-03-12:BEARISH']);
    expect(outcome.state.correlations).toHaveLength(1);
    expect(outcome.state.correlations[0]).toMatchObject({
      articleId: 'a1',
      offsetDays: 2,
      directionalAgreement: true,
      confidence: 0.625
    });
    expect(outcome.state.degraded).toBe(false);
  });

  it('finds no breakout in a series shorter than the lookback', async () => {
    const outcome = await orchestrator({
      newsSource: newsSource([article('a1', '2024-03-02')]),
      marketData: marketData(bars('2024-03-01', [100, 104, 108, 112, 116, 120, 124, 128, 132, 136]))
    }).run(REQUEST);

    expect(outcome.status).toBe('DONE');
    expect(outcome.state.patterns.filter(p => p.kind === 'BREAKOUT')).toEqual([]);
  });

  it('completes when every article fails extraction, with a warning per article', async () => {
    const analyze = jest.fn().mockResolvedValue({ bad: true });

    const outcome = await orchestrator({
      newsSource: newsSource([article('a1', '2024-03-02'), article('a2', '2024-03-03')]),
      analyzer: { analyzerId: 'fake', analyze },
      config: { extraction: { maxRetries: 2, retryDelayMs: 0 } }
    }).run(REQUEST);

    expect(outcome.status).toBe('DONE');
    expect(outcome.state.sentiments).toEqual([]);
    expect(outcome.state.extractionFailures.map(f => [f.articleId, f.kind, f.attempts])).toEqual([
      ['a1', 'MALFORMED_OUTPUT', 3],
      ['a2', 'MALFORMED_OUTPUT', 3]
    ]);
    const perArticle = outcome.warnings.filter(w => w.startsWith('Sentiment extraction failed for '));
    expect(perArticle).toHaveLength(2);
    expect(perArticle[0].startsWith('Sentiment extraction failed for a1 (MALFORMED_OUTPUT after 3 attempt(s))')).toBe(true);
    expect(outcome.warnings).toContain('No sentiment records could be extracted from 2 article(s)');
    expect(analyze).toHaveBeenCalledTimes(6);
  });

  it('fails at PRICES_FETCHED when the series is empty', async () => {
    const outcome = await orchestrator({ marketData: marketData([]) }).run(REQUEST);

    expect(outcome.status).toBe('FAILED');
    if (outcome.status !== 'FAILED') return;
    expect(outcome.failure).toEqual({
      stage: 'PRICES_FETCHED',
      errorName: 'InsufficientDataError',
      reason: 'No price data for ACME between 2024-03-01 and 2024-03-14'
    });
    expect(outcome.state.status).toBe('FAILED');
    expect(outcome.state.report).toBeNull();
  });

  it('fails with FetchError when the price source errors', async () => {
    const outcome = await orchestrator({ marketData: marketData(new Error('socket hang up')) }).run(REQUEST);

    expect(outcome.status).toBe('FAILED');
    if (outcome.status !== 'FAILED') return;
    expect(outcome.failure).toEqual({
      stage: 'PRICES_FETCHED',
      errorName: 'FetchError',
      reason: 'Price fetch failed: socket hang up'
    });
  });

  it('fails with FetchError when the price fetch times out', async () => {
    const prices = marketData('hang');
    const outcome = await orchestrator({ marketData: prices, config: { priceFetchTimeoutMs: 20 } }).run(REQUEST);

    expect(outcome.status).toBe('FAILED');
    if (outcome.status !== 'FAILED') return;
    expect(outcome.failure).toEqual({
      stage: 'PRICES_FETCHED',
      errorName: 'FetchError',
      reason: 'Price fetch timed out after 20ms'
    });
    const signal: unknown = prices.fetchPrices.mock.calls[0][2];
    expect(signal instanceof AbortSignal && signal.aborted).toBe(true);
  });

  it('treats a news transport failure as a warning', async () => {
    const outcome = await orchestrator({ newsSource: newsSource(new Error('ECONNRESET')) }).run(REQUEST);

    expect(outcome.status).toBe('DONE');
    expect(outcome.warnings[0]).toBe('News fetch failed: ECONNRESET');
    expect(outcome.state.degraded).toBe(true);
  });

  it('fails on empty news when degraded runs are not allowed', async () => {
    const prices = marketData(bars('2024-03-01', [100, 101, 102]));
    const outcome = await orchestrator({ marketData: prices, config: { allowDegraded: false } }).run(REQUEST);

    expect(outcome.status).toBe('FAILED');
    if (outcome.status !== 'FAILED') return;
    expect(outcome.failure.stage).toBe('NEWS_FETCHED');
    expect(outcome.failure.errorName).toBe('InsufficientDataError');
    expect(prices.fetchPrices).not.toHaveBeenCalled();
  });

  it('applies the configured retry budget to extraction', async () => {
    const analyze = jest.fn().mockRejectedValue(new MalformedOutputError('Model output is not valid JSON', '{oops'));

    const outcome = await orchestrator({
      newsSource: newsSource([article('a1', '2024-03-02')]),
      analyzer: { analyzerId: 'fake', analyze },
      config: { extraction: { maxRetries: 0 } }
    }).run(REQUEST);

    expect(analyze).toHaveBeenCalledTimes(1);
    expect(outcome.state.extractionFailures).toEqual([
      { articleId: 'a1', kind: 'MALFORMED_OUTPUT', attempts: 1, reason: 'Model output is not valid JSON' }
    ]);
  });

  it('fails at SENTIMENT_EXTRACTED when no record survives and degraded runs are not allowed', async () => {
    const prices = marketData(bars('2024-03-01', [100, 101, 102]));

    const outcome = await orchestrator({
      newsSource: newsSource([article('a1', '2024-03-02')]),
      analyzer: { analyzerId: 'fake', analyze: jest.fn().mockResolvedValue({ bad: true }) },
      marketData: prices,
      config: { allowDegraded: false, extraction: { maxRetries: 0 } }
    }).run(REQUEST);

    expect(outcome.status).toBe('FAILED');
    if (outcome.status !== 'FAILED') return;
    expect(outcome.failure).toEqual({
      stage: 'SENTIMENT_EXTRACTED',
      errorName: 'InsufficientDataError',
      reason: 'No sentiment records could be extracted from 1 article(s)'
    });
    expect(prices.fetchPrices).not.toHaveBeenCalled();
  });

  it('fails at PATTERNS_DETECTED on a flat short series when degraded runs are not allowed', async () => {
    const outcome = await orchestrator({
      newsSource: newsSource([article('a1', '2024-03-02')]),
      marketData: marketData(bars('2024-03-01', [100, 100])),
      config: { allowDegraded: false }
    }).run(REQUEST);

    expect(outcome.status).toBe('FAILED');
    if (outcome.status !== 'FAILED') return;
    expect(outcome.failure).toEqual({
      stage: 'PATTERNS_DETECTED',
      errorName: 'InsufficientDataError',
      reason: 'No technical patterns detected in 2 price point(s)'
    });
    expect(outcome.state.sentiments.map(s => s.articleId)).toEqual(['a1']);
    expect(outcome.state.report).toBeNull();
  });

  it('keeps completed records and abandons the rest at the run timeout', async () => {
    const fast = article('a1', '2024-03-02');
    const slow = article('a2', '2024-03-03');
    const partial: StructuredAnalyzer = {
      analyzerId: 'fake',
      analyze: (request) => request.articleId === 'a1'
        ? Promise.resolve(analysis('BULLISH'))
        : new Promise<unknown>(() => undefined)
    };

    const outcome = await orchestrator({
      newsSource: newsSource([fast, slow]),
      analyzer: partial,
      config: { runTimeoutMs: 50, extraction: { retryDelayMs: 0 } }
    }).run(REQUEST);

    expect(outcome.status).toBe('DONE');
    expect(outcome.state.sentiments.map(s => s.articleId)).toEqual(['a1']);
    expect(outcome.state.extractionFailures).toEqual([
      { articleId: 'a2', kind: 'ABORTED', attempts: 0, reason: 'Abandoned at run timeout' }
    ]);
    expect(outcome.warnings).toContain(
      'Run timeout of 50ms reached during sentiment extraction; 1 article(s) abandoned'
    );
    expect(outcome.state.degraded).toBe(true);
  });

  it('merges extraction results in article order', async () => {
    const first = article('a1', '2024-03-02');
    const second = article('a2', '2024-03-03');
    const slowFirst: StructuredAnalyzer = {
      analyzerId: 'fake',
      analyze: async (request) => {
        if (request.articleId === 'a1') {
          await new Promise(resolve => setTimeout(resolve, 30));
        }
        return analysis('BULLISH');
      }
    };

    const outcome = await orchestrator({ newsSource: newsSource([first, second]), analyzer: slowFirst }).run(REQUEST);

    expect(outcome.state.sentiments.map(s => s.articleId)).toEqual(['a1', 'a2']);
  });

  it('produces the same report for the same inputs', async () => {
    const deps: Partial<WorkflowDependencies> = {
      newsSource: newsSource([article('a1', '2024-03-04'), article('a2', '2024-03-06')]),
      analyzer: analyzer('BULLISH')
    };

    const first = await orchestrator(deps).run(REQUEST);
    const second = await orchestrator(deps).run(REQUEST);

    expect(first.status).toBe('DONE');
    expect(second.status).toBe('DONE');
    if (first.status === 'DONE' && second.status === 'DONE') {
      expect(second.report).toEqual(first.report);
    }
  });

  it('normalizes the ticker before calling collaborators', async () => {
    const news = newsSource([]);
    await orchestrator({ newsSource: news }).run({ ...REQUEST, ticker: ' acme ' });

    expect(news.fetchNews.mock.calls[0][0]).toBe('ACME');
    expect(news.fetchNews.mock.calls[0][1]).toEqual({ startDate: '2024-03-01', endDate: '2024-03-14' });
  });

  it('rejects an invalid request before any stage runs', async () => {
    const news = newsSource([]);
    await expect(
      orchestrator({ newsSource: news }).run({ ticker: 'ACME', startDate: '2024-03-14', endDate: '2024-03-01' })
    ).rejects.toThrow(ConfigurationError);
    expect(news.fetchNews).not.toHaveBeenCalled();
  });

  it('rejects an invalid configuration at construction', () => {
    expect(() => orchestrator({ config: { correlationWindow: { lookbackDays: -1 } } })).toThrow(ConfigurationError);
  });

  it('saves a snapshot of the terminal state', async () => {
    const store: RunSnapshotStore & { saveSnapshot: jest.Mock } = { saveSnapshot: jest.fn().mockResolvedValue(undefined) };
    await orchestrator({ snapshotStore: store }).run(REQUEST);

    expect(store.saveSnapshot).toHaveBeenCalledTimes(1);
    expect(store.saveSnapshot.mock.calls[0][0]).toMatchObject({ runId: 'run-test', status: 'DONE' });
  });

  it('does not fail the run when the snapshot cannot be saved', async () => {
    const store: RunSnapshotStore = { saveSnapshot: jest.fn().mockRejectedValue(new Error('AccessDenied')) };
    const outcome = await orchestrator({ snapshotStore: store }).run(REQUEST);

    expect(outcome.status).toBe('DONE');
  });
});

describe('applyDelta', () => {
  const initial = createInitialState('run-1', 'ACME', { startDate: '2024-03-01', endDate: '2024-03-14' });

  it('advances to the next status', () => {
    const next = applyDelta(initial, { status: 'NEWS_FETCHED', articles: [], warnings: ['w'], degraded: true });

    expect(next.status).toBe('NEWS_FETCHED');
    expect(next.warnings).toEqual(['w']);
    expect(next.degraded).toBe(true);
    expect(initial.status).toBe('INIT');
  });

  it('rejects skipping a stage', () => {
    expect(() => applyDelta(initial, {
      status: 'PRICES_FETCHED',
      priceSeries: { ticker: 'ACME', points: [] },
      warnings: []
    })).toThrow(InvalidTransitionError);
  });

  it('allows FAILED from a non-terminal state only', () => {
    const failure = { stage: 'NEWS_FETCHED' as const, errorName: 'Error', reason: 'x' };
    const failed = applyDelta(initial, { status: 'FAILED', failure });

    expect(failed.status).toBe('FAILED');
    expect(failed.failure).toEqual(failure);
    expect(() => applyDelta(failed, { status: 'FAILED', failure })).toThrow(InvalidTransitionError);
    expect(() => applyDelta({ ...initial, status: 'DONE' }, { status: 'DONE' })).toThrow(InvalidTransitionError);
  });
});
