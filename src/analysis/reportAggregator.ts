import {
  Report,
  Sentiment,
  SentimentDistribution,
  SentimentRecord,
  TextGenerator,
} from '../types';
import { errorMessage } from '../errors';

const SUMMARY_TEMPERATURE = 0.5;
const TOP_KEY_POINTS = 10;
const TOP_EMOTIONS = 5;
const SAMPLE_COUNT = 5;
const SAMPLE_LENGTH = 200;

export const EMPTY_SUMMARY = 'No reviews to summarize.';

const SYSTEM_PROMPT =
  'You are a business analyst expert at summarizing customer feedback.';

export type SummaryData = {
  total_reviews: number;
  sentiment_breakdown: Partial<SentimentDistribution>;
  average_score: number;
  common_points: string[];
  common_emotions: string[];
};

/**
 * Returns the `limit` most frequent items, highest count first.
 * Equal counts keep the order in which the items first appeared.
 */
export function mostCommon(items: string[], limit: number): string[] {
  const counts = new Map<string, number>();
  for (const item of items) {
    counts.set(item, (counts.get(item) ?? 0) + 1);
  }
  return Array.from(counts.entries())
    .sort(([, a], [, b]) => b - a)
    .slice(0, limit)
    .map(([item]) => item);
}

export function buildSentimentDistribution(
  records: SentimentRecord[],
): SentimentDistribution {
  const counts: SentimentDistribution = {
    positive: 0,
    negative: 0,
    neutral: 0,
  };
  for (const record of records) {
    counts[record.sentiment] += 1;
  }
  return counts;
}

function mean(values: number[]): number {
  if (!values.length) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

function percentage(count: number, total: number): number {
  if (total === 0) return 0;
  return roundTo((count / total) * 100, 1);
}

function truncate(text: string): string {
  return text.length > SAMPLE_LENGTH ? `${text.slice(0, SAMPLE_LENGTH)}...` : text;
}

export function buildSummaryData(records: SentimentRecord[]): SummaryData {
  const distribution = buildSentimentDistribution(records);
  // Only labels that occur, in first-seen order.
  const breakdown: Partial<SentimentDistribution> = {};
  for (const record of records) {
    breakdown[record.sentiment] = distribution[record.sentiment];
  }

  return {
    total_reviews: records.length,
    sentiment_breakdown: breakdown,
    average_score: mean(records.map((r) => r.score)),
    common_points: mostCommon(
      records.flatMap((r) => r.key_points),
      TOP_KEY_POINTS,
    ),
    common_emotions: mostCommon(
      records.flatMap((r) => r.emotions),
      TOP_EMOTIONS,
    ),
  };
}

export function buildSummaryPrompt(records: SentimentRecord[]): string {
  const data = buildSummaryData(records);
  const samples = records.slice(0, SAMPLE_COUNT).map((r) => truncate(r.review));

  return `
Based on the following customer review analysis data, generate a concise executive summary:

Data:
${JSON.stringify(data, null, 2)}

Sample reviews:
${JSON.stringify(samples, null, 2)}

Generate a professional summary that includes:
1. Overall sentiment overview
2. Key themes and patterns
3. Main customer concerns or praises
4. Actionable insights for business improvement

Keep it under 300 words.
  `.trim();
}

export class ReportAggregator {
  constructor(private readonly generator: TextGenerator) {}

  /**
   * Asks the model for an executive summary of the records.
   * Failures come back as a message string; an empty list skips the call.
   */
  async summarize(records: SentimentRecord[]): Promise<string> {
    if (!records.length) return EMPTY_SUMMARY;

    try {
      return await this.generator.generate(
        [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: buildSummaryPrompt(records) },
        ],
        SUMMARY_TEMPERATURE,
      );
    } catch (err) {
      const message = errorMessage(err);
      console.warn(`Error generating summary: ${message}`);
      return `Error generating summary: ${message}`;
    }
  }

  async buildReport(records: SentimentRecord[]): Promise<Report> {
    const total = records.length;
    const distribution = buildSentimentDistribution(records);
    const pct = (label: Sentiment) => percentage(distribution[label], total);

    return {
      total_reviews: total,
      sentiment_distribution: distribution,
      average_rating: roundTo(mean(records.map((r) => r.score)), 2),
      positive_percentage: pct('positive'),
      negative_percentage: pct('negative'),
      neutral_percentage: pct('neutral'),
      failed_reviews: records.filter((r) => r.error !== undefined).length,
      summary: await this.summarize(records),
      detailed_results: records,
    };
  }
}
