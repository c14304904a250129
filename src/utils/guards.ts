import { Report, SENTIMENTS, Sentiment, SentimentRecord } from '../types';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

export function isSentiment(value: unknown): value is Sentiment {
  return SENTIMENTS.some((s) => s === value);
}

export function isSentimentRecord(value: unknown): value is SentimentRecord {
  return (
    isRecord(value) &&
    typeof value.review === 'string' &&
    isSentiment(value.sentiment) &&
    isNumber(value.score) &&
    isStringList(value.key_points) &&
    isStringList(value.emotions) &&
    (value.error === undefined || typeof value.error === 'string')
  );
}

/** Full structural check of a report received from outside the process. */
export function isReport(value: unknown): value is Report {
  if (!isRecord(value)) return false;
  const distribution = value.sentiment_distribution;
  return (
    isNumber(value.total_reviews) &&
    isNumber(value.average_rating) &&
    isNumber(value.positive_percentage) &&
    isNumber(value.negative_percentage) &&
    isNumber(value.neutral_percentage) &&
    isNumber(value.failed_reviews) &&
    typeof value.summary === 'string' &&
    isRecord(distribution) &&
    SENTIMENTS.every((s) => isNumber(distribution[s])) &&
    Array.isArray(value.detailed_results) &&
    value.detailed_results.every(isSentimentRecord)
  );
}
