import { parseArgs } from 'util';
import { Report } from '../types';
import { AnalyzeReviews } from '../analysis/analyzer';
import { loadReviewsFromFile, loadSampleReviews, saveReport } from '../io/reviewFile';
import { errorMessage } from '../errors';

export const DEFAULT_REPORT_FILE = 'analysis_report.json';

export const USAGE = `Usage: review-sentiment [reviews.json|reviews.txt] [--sample] [--out <file>]

  --sample      analyze the bundled sample reviews
  --out <file>  where to write the JSON report (default: ${DEFAULT_REPORT_FILE})
  --help        show this message`;

export type CliOptions = {
  input?: string;
  sample: boolean;
  out: string;
  help: boolean;
};

export function parseCliArgs(args: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      sample: { type: 'boolean', default: false },
      out: { type: 'string', short: 'o' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });
  if (positionals.length > 1) {
    throw new Error('Only one review file can be analyzed at a time.');
  }
  if (positionals.length && values.sample) {
    throw new Error('Pass either a review file or --sample, not both.');
  }
  return {
    input: positionals[0],
    sample: values.sample ?? false,
    out: values.out ?? DEFAULT_REPORT_FILE,
    help: values.help ?? false,
  };
}

export function formatReportHeadline(report: Report): string[] {
  const lines = [
    `Total reviews:   ${report.total_reviews}`,
    `Average rating:  ${report.average_rating} / 5`,
    `Positive:        ${report.positive_percentage}%`,
    `Negative:        ${report.negative_percentage}%`,
    `Neutral:         ${report.neutral_percentage}%`,
  ];
  if (report.failed_reviews > 0) {
    lines.push(`Failed:          ${report.failed_reviews}`);
  }
  return lines;
}

/**
 * Runs one analysis from the command line and returns the exit code.
 * The analyzer is created lazily so `--help` works without credentials.
 */
export async function runCli(
  args: string[],
  createAnalyzer: () => AnalyzeReviews,
): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(args);
  } catch (err) {
    console.error(errorMessage(err));
    console.error(USAGE);
    return 1;
  }
  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  try {
    const reviews =
      options.input && !options.sample
        ? await loadReviewsFromFile(options.input)
        : await loadSampleReviews();
    if (!reviews.length) {
      console.error('No reviews to analyze.');
      return 1;
    }

    const analyze = createAnalyzer();
    const report = await analyze(reviews, (done, total) => {
      console.log(`Analyzing review ${done}/${total}...`);
    });

    await saveReport(report, options.out);
    for (const line of formatReportHeadline(report)) console.log(line);
    console.log(`Report saved to ${options.out}`);
    return 0;
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    return 1;
  }
}
