import { ProgressCallback, Report, TextGenerator } from '../types';
import { AppConfig } from '../config/config';
import { ChatCompletionClient } from '../llm/chatCompletionClient';
import { SentimentExtractor } from './sentimentExtractor';
import { ReportAggregator } from './reportAggregator';

export type AnalyzeReviews = (
  reviews: string[],
  onProgress?: ProgressCallback,
) => Promise<Report>;

export function createReviewAnalyzer(
  generator: TextGenerator,
  temperature?: number,
): AnalyzeReviews {
  const extractor = new SentimentExtractor(generator, { temperature });
  const aggregator = new ReportAggregator(generator);

  return async (reviews, onProgress) => {
    console.info(`Analyzing ${reviews.length} reviews...`);
    const records = await extractor.analyzeBatch(reviews, onProgress);

    const failed = records.filter((r) => r.error !== undefined).length;
    if (failed > 0) {
      console.warn(`${failed} of ${records.length} reviews could not be analyzed.`);
    }

    const report = await aggregator.buildReport(records);
    console.info('Report generated.');
    return report;
  };
}

export function createReviewAnalyzerFromConfig(config: AppConfig): AnalyzeReviews {
  const client = new ChatCompletionClient({
    apiKey: config.apiKey,
    model: config.model,
    apiUrl: config.apiUrl,
    timeoutMs: config.timeoutMs,
  });
  return createReviewAnalyzer(client, config.temperature);
}
