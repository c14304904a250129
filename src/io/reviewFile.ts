import { promises as fs } from 'fs';
import path from 'path';
import { Report } from '../types';
import { ReviewFileError, errorMessage } from '../errors';

export type ReviewFileFormat = 'json' | 'txt';

export const SAMPLE_REVIEWS_PATH = path.join(
  __dirname,
  '..',
  '..',
  'data',
  'sample_reviews.json',
);

export function formatFromPath(filePath: string): ReviewFileFormat {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === '.json') return 'json';
  if (ext === '.txt') return 'txt';
  throw new ReviewFileError(
    `Unsupported review file "${filePath}". Use a .json or .txt file.`,
  );
}

function reviewFromEntry(entry: unknown, idx: number): string {
  if (typeof entry === 'string') return entry;
  if (typeof entry === 'object' && entry !== null) {
    if ('review' in entry && typeof entry.review === 'string') return entry.review;
    if ('text' in entry && typeof entry.text === 'string') return entry.text;
  }
  throw new ReviewFileError(
    `Entry ${idx + 1} is neither a string nor an object with a "review" or "text" field.`,
  );
}

/**
 * JSON: an array of strings, or of objects with a `review`/`text` field.
 * TXT: one review per non-empty line.
 */
export function parseReviews(content: string, format: ReviewFileFormat): string[] {
  if (format === 'txt') {
    return content
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new ReviewFileError(`Invalid JSON: ${errorMessage(err)}`);
  }
  if (!Array.isArray(parsed)) {
    throw new ReviewFileError('Expected a JSON array of reviews.');
  }
  return parsed.map(reviewFromEntry);
}

export async function loadReviewsFromFile(filePath: string): Promise<string[]> {
  const format = formatFromPath(filePath);
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (err) {
    throw new ReviewFileError(`Cannot read "${filePath}": ${errorMessage(err)}`);
  }
  return parseReviews(content, format);
}

export function loadSampleReviews(): Promise<string[]> {
  return loadReviewsFromFile(SAMPLE_REVIEWS_PATH);
}

export async function saveReport(report: Report, filePath: string): Promise<void> {
  await fs.writeFile(filePath, `${JSON.stringify(report, null, 2)}\n`, 'utf8');
}
