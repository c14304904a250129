import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  SentimentExtractor,
  buildSentimentPrompt,
  parseSentimentResponse,
} from '../sentimentExtractor';
import { FakeGenerator, sentimentJson } from '../../__tests__/fakeGenerator';
import { ChatCompletionError } from '../../errors';

describe('SentimentExtractor', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('analyze', () => {
    it('returns the parsed record with the review attached', async () => {
      const generator = new FakeGenerator(
        sentimentJson('positive', 5, ['fast shipping'], ['satisfied']),
      );
      const extractor = new SentimentExtractor(generator);

      const record = await extractor.analyze('Arrived early, works great.');

      expect(record).toEqual({
        review: 'Arrived early, works great.',
        sentiment: 'positive',
        score: 5,
        key_points: ['fast shipping'],
        emotions: ['satisfied'],
      });
    });

    it('sends a system persona and the review in the user prompt', async () => {
      const generator = new FakeGenerator(sentimentJson('neutral', 3));
      const extractor = new SentimentExtractor(generator);

      await extractor.analyze('It is fine.');

      expect(generator.calls).toHaveLength(1);
      const [system, user] = generator.calls[0].messages;
      expect(system).toEqual({
        role: 'system',
        content: 'You are a sentiment analysis expert. Always respond with valid JSON.',
      });
      expect(user.role).toBe('user');
      expect(user.content).toBe(buildSentimentPrompt('It is fine.'));
      expect(user.content).toContain('Review: It is fine.\n');
    });

    it('uses 0.3 by default and the configured temperature otherwise', async () => {
      const defaults = new FakeGenerator(sentimentJson('neutral', 3));
      await new SentimentExtractor(defaults).analyze('x');
      expect(defaults.calls[0].temperature).toBe(0.3);

      const tuned = new FakeGenerator(sentimentJson('neutral', 3));
      await new SentimentExtractor(tuned, { temperature: 0.1 }).analyze('x');
      expect(tuned.calls[0].temperature).toBe(0.1);
    });

    it('falls back to a neutral record when the call fails', async () => {
      const generator = new FakeGenerator(
        new ChatCompletionError('Chat completion API error: 503 unavailable', 503),
      );
      const extractor = new SentimentExtractor(generator);

      const record = await extractor.analyze('Terrible support.');

      expect(record).toEqual({
        review: 'Terrible support.',
        sentiment: 'neutral',
        score: 3,
        key_points: [],
        emotions: [],
        error: 'Chat completion API error: 503 unavailable',
      });
      expect(console.warn).toHaveBeenCalledWith(
        'Error analyzing sentiment: Chat completion API error: 503 unavailable',
      );
    });

    it('falls back when the model does not answer with JSON', async () => {
      const extractor = new SentimentExtractor(
        new FakeGenerator('I think this review is positive.'),
      );

      const record = await extractor.analyze('Nice');

      expect(record.sentiment).toBe('neutral');
      expect(record.score).toBe(3);
      expect(record.review).toBe('Nice');
      expect(record.error).toBeTruthy();
    });

    it('falls back when the sentiment label is not recognised', async () => {
      const extractor = new SentimentExtractor(
        new FakeGenerator(sentimentJson('ecstatic', 5)),
      );

      const record = await extractor.analyze('Wow');

      expect(record.error).toBe('Invalid model response: unknown sentiment "ecstatic".');
      expect(record.sentiment).toBe('neutral');
    });

    it('falls back when the score is out of range', async () => {
      const extractor = new SentimentExtractor(
        new FakeGenerator(sentimentJson('positive', 9)),
      );

      const record = await extractor.analyze('Wow');

      expect(record.error).toBe('Invalid model response: score 9 is not between 1 and 5.');
      expect(record.score).toBe(3);
    });

    it('keeps an empty review verbatim', async () => {
      const extractor = new SentimentExtractor(new FakeGenerator(new Error('boom')));

      const record = await extractor.analyze('');

      expect(record.review).toBe('');
      expect(record.error).toBe('boom');
    });
  });

  describe('analyzeBatch', () => {
    it('returns one record per review in input order', async () => {
      const generator = new FakeGenerator(
        sentimentJson('positive', 5),
        new Error('timeout'),
        sentimentJson('negative', 1),
      );
      const extractor = new SentimentExtractor(generator);
      const reviews = ['Good product', 'Bad quality', 'Awful'];

      const records = await extractor.analyzeBatch(reviews);

      expect(records.map((r) => r.review)).toEqual(reviews);
      expect(records.map((r) => r.sentiment)).toEqual(['positive', 'neutral', 'negative']);
      expect(records[1].error).toBe('timeout');
      expect(generator.calls).toHaveLength(3);
    });

    it('reports progress after each review', async () => {
      const extractor = new SentimentExtractor(new FakeGenerator(sentimentJson('neutral', 3)));
      const progress: Array<[number, number]> = [];

      await extractor.analyzeBatch(['a', 'b'], (done, total) => progress.push([done, total]));

      expect(progress).toEqual([
        [1, 2],
        [2, 2],
      ]);
    });

    it('makes no calls for an empty batch', async () => {
      const generator = new FakeGenerator(sentimentJson('neutral', 3));

      const records = await new SentimentExtractor(generator).analyzeBatch([]);

      expect(records).toEqual([]);
      expect(generator.calls).toHaveLength(0);
    });
  });
});

describe('parseSentimentResponse', () => {
  it('accepts JSON wrapped in a markdown code fence', () => {
    const text = '```json\n{"sentiment": "negative", "score": 2, "key_points": ["late"], "emotions": []}\n```';

    expect(parseSentimentResponse('Late again', text)).toEqual({
      review: 'Late again',
      sentiment: 'negative',
      score: 2,
      key_points: ['late'],
      emotions: [],
    });
  });

  it('treats missing lists as empty and drops non-string entries', () => {
    const text = '{"sentiment": "positive", "score": 4, "key_points": ["price", 3, null]}';

    const record = parseSentimentResponse('Cheap', text);

    expect(record.key_points).toEqual(['price']);
    expect(record.emotions).toEqual([]);
  });

  it('rounds a fractional score', () => {
    const record = parseSentimentResponse('ok', '{"sentiment": "neutral", "score": 3.6}');

    expect(record.score).toBe(4);
  });

  it('rejects a list field that is not a list', () => {
    expect(() =>
      parseSentimentResponse('ok', '{"sentiment": "neutral", "score": 3, "emotions": "calm"}'),
    ).toThrow('Invalid model response: "emotions" is not a list.');
  });

  it('rejects a score given as text', () => {
    expect(() =>
      parseSentimentResponse('ok', '{"sentiment": "neutral", "score": "3"}'),
    ).toThrow('Invalid model response: score "3" is not between 1 and 5.');
  });

  it('rejects a JSON array', () => {
    expect(() => parseSentimentResponse('ok', '[1, 2]')).toThrow(
      'Invalid model response: expected a JSON object.',
    );
  });
});
