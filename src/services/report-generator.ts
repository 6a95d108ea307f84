/**
 * Report Generator Service
 *
 * Builds the explanatory report from a completed run state and renders it
 * as markdown. Both operations are pure: the same state always gives the
 * same report.
 */

import { RunState } from '../types/run-state';
import { Report, ReportSection, ReportSummary } from '../types/report';
import { CorrelationRecord } from '../types/correlation';
import { NewsArticle } from '../types/news';
import { Polarity, SentimentRecord } from '../types/sentiment';
import { PatternDirection, TechnicalPattern } from '../types/pattern';
import { formatScore, roundTo } from '../utils/format';

const POLARITY_WORD: Record<Polarity, string> = {
  BULLISH: 'positive',
  BEARISH: 'negative',
  NEUTRAL: 'neutral'
};

const ALIGNMENT_PHRASE: Record<CorrelationRecord['alignment'], string> = {
  AGREE: 'the price move agrees with the news tone',
  OPPOSE: 'the price move runs against the news tone',
  NEUTRAL: 'one side carries no direction'
};

function lagPhrase(offsetDays: number): string {
  if (offsetDays === 0) {
    return 'on the same day';
  }
  const days = Math.abs(offsetDays);
  const unit = days === 1 ? 'day' : 'days';
  return offsetDays > 0 ? `${days} ${unit} after the article` : `${days} ${unit} before the article`;
}

function countSigns(values: readonly (Polarity | PatternDirection)[]): Record<Polarity, number> {
  const counts: Record<Polarity, number> = { BULLISH: 0, BEARISH: 0, NEUTRAL: 0 };
  for (const value of values) {
    counts[value] += 1;
  }
  return counts;
}

export const ReportGeneratorService = {
  /**
   * Build the report. Sections are ordered by event date, then confidence
   * descending; remaining ties keep correlation order.
   */
  generate(state: RunState): Report {
    const articles = new Map<string, NewsArticle>(state.articles.map(a => [a.articleId, a]));
    const sentiments = new Map<string, SentimentRecord>(state.sentiments.map(s => [s.recordId, s]));
    const patterns = new Map<string, TechnicalPattern>(state.patterns.map(p => [p.patternId, p]));

    const ordered = state.correlations
      .map((correlation, index) => ({ correlation, index }))
      .sort((a, b) => {
        if (a.correlation.eventDate !== b.correlation.eventDate) {
          return a.correlation.eventDate < b.correlation.eventDate ? -1 : 1;
        }
        if (a.correlation.confidence !== b.correlation.confidence) {
          return b.correlation.confidence - a.correlation.confidence;
        }
        return a.index - b.index;
      })
      .map(entry => entry.correlation);

    const sections = ordered.map(correlation =>
      this.buildSection(
        correlation,
        articles.get(correlation.articleId),
        sentiments.get(correlation.sentimentId),
        patterns.get(correlation.patternId)
      )
    );

    return {
      ticker: state.ticker,
      dateRange: { ...state.dateRange },
      summary: this.buildSummary(state, ordered),
      sections,
      appendix: {
        uncorrelatedSentiments: [...state.uncorrelatedSentiments],
        uncorrelatedPatterns: [...state.uncorrelatedPatterns]
      },
      warnings: [...state.warnings]
    };
  },

  buildSection(
    correlation: CorrelationRecord,
    article: NewsArticle | undefined,
    sentiment: SentimentRecord | undefined,
    pattern: TechnicalPattern | undefined
  ): ReportSection {
    const title = article?.title || correlation.articleId;
    const patternLabel = pattern?.label ?? correlation.patternId;

    const parts: string[] = [];
    if (sentiment) {
      const tags = sentiment.eventTags.length > 0 ? ` [${sentiment.eventTags.join(', ')}]` : '';
      parts.push(
        `"${title}"${article?.source ? ` (${article.source})` : ''} reads ${POLARITY_WORD[sentiment.polarity]} ` +
        `with confidence ${formatScore(sentiment.confidence)} and impact ${formatScore(sentiment.magnitude)}${tags}.`
      );
      if (sentiment.reasoning) {
        parts.push(sentiment.reasoning);
      }
    } else {
      parts.push(`"${title}" was published on ${correlation.eventDate}.`);
    }
    parts.push(
      `${patternLabel} anchored on ${correlation.anchorDate}, ${lagPhrase(correlation.offsetDays)}; ` +
      `${ALIGNMENT_PHRASE[correlation.alignment]} (correlation ${formatScore(correlation.confidence)}).`
    );
    if (pattern?.notes) {
      parts.push(pattern.notes);
    }

    return {
      heading: `${correlation.eventDate}: ${title} -> ${patternLabel}`,
      narrative: parts.join(' '),
      correlation
    };
  },

  buildSummary(state: RunState, ordered: readonly CorrelationRecord[]): ReportSummary {
    const polarityCounts = countSigns(state.sentiments.map(s => s.polarity));
    const directionCounts = countSigns(state.patterns.map(p => p.direction));

    const agreeing = ordered.filter(c => c.directionalAgreement).length;
    const agreementRate = ordered.length > 0 ? roundTo(agreeing / ordered.length, 4) : null;

    let strongestLink: CorrelationRecord | null = null;
    for (const correlation of ordered) {
      if (!strongestLink || correlation.confidence > strongestLink.confidence) {
        strongestLink = correlation;
      }
    }

    return {
      articleCount: state.articles.length,
      sentimentCount: state.sentiments.length,
      patternCount: state.patterns.length,
      correlationCount: ordered.length,
      polarityCounts,
      directionCounts,
      agreementRate,
      newsTone: this.newsTone(polarityCounts),
      marketTone: this.marketTone(directionCounts),
      strongestLink
    };
  },

  newsTone(counts: Record<Polarity, number>): string {
    const { BULLISH: pos, BEARISH: neg, NEUTRAL: neu } = counts;
    const breakdown = `${pos} positive / ${neg} negative / ${neu} neutral articles`;
    if (pos + neg + neu === 0) {
      return 'No news sentiment was available for this period.';
    }
    if (pos > neg && pos > neu) {
      return `Overall positive (${breakdown}).`;
    }
    if (neg > pos && neg > neu) {
      return `Overall negative (${breakdown}).`;
    }
    return `Mixed or neutral (${breakdown}).`;
  },

  marketTone(counts: Record<PatternDirection, number>): string {
    if (counts.BULLISH > counts.BEARISH) {
      return 'Price action tilted bullish.';
    }
    if (counts.BEARISH > counts.BULLISH) {
      return 'Price action tilted bearish.';
    }
    return 'Price action remained balanced or sideways.';
  },

  /**
   * Render the report as a markdown document
   */
  renderMarkdown(report: Report): string {
    const { summary } = report;
    const lines: string[] = [
      `# News-Pattern Report: ${report.ticker}`,
      '',
      `**Date range:** ${report.dateRange.startDate} to ${report.dateRange.endDate}`,
      '',
      '## Summary',
      '',
      `- **News tone:** ${summary.newsTone}`,
      `- **Market tone:** ${summary.marketTone}`,
      `- **Articles:** ${summary.articleCount}, **sentiment records:** ${summary.sentimentCount}, ` +
        `**patterns:** ${summary.patternCount}, **correlations:** ${summary.correlationCount}`
    ];

    if (summary.agreementRate !== null) {
      lines.push(`- **Directional agreement:** ${formatScore(summary.agreementRate)}`);
    }
    if (summary.strongestLink) {
      const link = summary.strongestLink;
      lines.push(
        `- **Strongest link:** article \`${link.articleId}\` -> pattern \`${link.patternId}\` ` +
        `with correlation ${formatScore(link.confidence)} (${lagPhrase(link.offsetDays)}).`
      );
    }

    lines.push('', '## News Events and Market Reactions', '');
    if (report.sections.length === 0) {
      lines.push('_No news event could be linked to a price pattern in this period._');
    } else {
      report.sections.forEach((section, index) => {
        if (index > 0) {
          lines.push('');
        }
        lines.push(`### ${section.heading}`, '', section.narrative);
      });
    }

    lines.push('', '## Unlinked Patterns', '');
    if (report.appendix.uncorrelatedPatterns.length === 0) {
      lines.push('_None._');
    } else {
      for (const pattern of report.appendix.uncorrelatedPatterns) {
        lines.push(`- **${pattern.label}** (\`${pattern.kind}\`) ${pattern.startDate} to ${pattern.endDate}: ${pattern.notes}`);
      }
    }

    lines.push('', '## Unlinked News', '');
    if (report.appendix.uncorrelatedSentiments.length === 0) {
      lines.push('_None._');
    } else {
      for (const sentiment of report.appendix.uncorrelatedSentiments) {
        lines.push(
          `- \`${sentiment.articleId}\` on ${sentiment.eventDate}: ${POLARITY_WORD[sentiment.polarity]} ` +
          `(impact ${formatScore(sentiment.magnitude)})`
        );
      }
    }

    if (report.warnings.length > 0) {
      lines.push('', '## Warnings', '');
      for (const warning of report.warnings) {
        lines.push(`- ${warning}`);
      }
    }

    return lines.join('\n');
  }
};
