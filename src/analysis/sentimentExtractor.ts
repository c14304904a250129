import { ProgressCallback, SentimentRecord, TextGenerator } from '../types';
import { DEFAULT_TEMPERATURE } from '../config/config';
import { errorMessage } from '../errors';
import { isRecord, isSentiment } from '../utils/guards';

const SYSTEM_PROMPT =
  'You are a sentiment analysis expert. Always respond with valid JSON.';

export function buildSentimentPrompt(review: string): string {
  return `
Analyze the sentiment of this customer review. Provide your response in JSON format with:
- sentiment: "positive", "negative", or "neutral"
- score: a number from 1-5 (1=very negative, 5=very positive)
- key_points: list of main points mentioned
- emotions: list of emotions detected (e.g., satisfied, frustrated, excited)

Review: ${review}

Respond with valid JSON only.
  `.trim();
}

export function fallbackRecord(review: string, error: string): SentimentRecord {
  return {
    review,
    sentiment: 'neutral',
    score: 3,
    key_points: [],
    emotions: [],
    error,
  };
}

function stringList(value: unknown, field: string): string[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new Error(`Invalid model response: "${field}" is not a list.`);
  }
  return value.filter((item): item is string => typeof item === 'string');
}

/**
 * Parses and validates the model's answer for one review.
 * Tolerates code fences or prose around a single JSON object.
 */
export function parseSentimentResponse(
  review: string,
  responseText: string,
): SentimentRecord {
  const jsonMatch = responseText.match(/\{[\s\S]*\}/);
  const parsed: unknown = JSON.parse(jsonMatch ? jsonMatch[0] : responseText);

  if (!isRecord(parsed)) {
    throw new Error('Invalid model response: expected a JSON object.');
  }
  const sentiment = parsed.sentiment;
  if (!isSentiment(sentiment)) {
    throw new Error(
      `Invalid model response: unknown sentiment ${JSON.stringify(sentiment)}.`,
    );
  }
  const score = parsed.score;
  if (typeof score !== 'number' || !Number.isFinite(score) || score < 1 || score > 5) {
    throw new Error(
      `Invalid model response: score ${JSON.stringify(score)} is not between 1 and 5.`,
    );
  }

  return {
    review,
    sentiment,
    score: Math.round(score),
    key_points: stringList(parsed.key_points, 'key_points'),
    emotions: stringList(parsed.emotions, 'emotions'),
  };
}

export type SentimentExtractorOptions = {
  temperature?: number;
};

export class SentimentExtractor {
  readonly temperature: number;

  constructor(
    private readonly generator: TextGenerator,
    options: SentimentExtractorOptions = {},
  ) {
    this.temperature = options.temperature ?? DEFAULT_TEMPERATURE;
  }

  /**
   * Classifies one review. Never throws: transport, parse and validation
   * failures all come back as a neutral record with `error` set.
   */
  async analyze(review: string): Promise<SentimentRecord> {
    try {
      const responseText = await this.generator.generate(
        [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: buildSentimentPrompt(review) },
        ],
        this.temperature,
      );
      return parseSentimentResponse(review, responseText);
    } catch (err) {
      const message = errorMessage(err) || 'Unknown error.';
      console.warn(`Error analyzing sentiment: ${message}`);
      return fallbackRecord(review, message);
    }
  }

  // One call at a time, in input order.
  async analyzeBatch(
    reviews: string[],
    onProgress?: ProgressCallback,
  ): Promise<SentimentRecord[]> {
    const results: SentimentRecord[] = [];
    for (const review of reviews) {
      results.push(await this.analyze(review));
      onProgress?.(results.length, reviews.length);
    }
    return results;
  }
}
