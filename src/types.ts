export type Sentiment = 'positive' | 'negative' | 'neutral';

export const SENTIMENTS: readonly Sentiment[] = ['positive', 'negative', 'neutral'];

// Wire shapes below stay snake_case: they are the JSON the model returns
// and the JSON document the report is written as.
export type SentimentRecord = {
  review: string;
  sentiment: Sentiment;
  score: number; // 1–5
  key_points: string[];
  emotions: string[];
  error?: string;
};

export type SentimentDistribution = Record<Sentiment, number>;

export type Report = {
  total_reviews: number;
  sentiment_distribution: SentimentDistribution;
  average_rating: number;
  positive_percentage: number;
  negative_percentage: number;
  neutral_percentage: number;
  failed_reviews: number;
  summary: string;
  detailed_results: SentimentRecord[];
};

export type ChatMessage = {
  role: 'system' | 'user';
  content: string;
};

export interface TextGenerator {
  generate(messages: ChatMessage[], temperature: number): Promise<string>;
}

export type ProgressCallback = (done: number, total: number) => void;
