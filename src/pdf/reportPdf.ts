import PDFDocument from 'pdfkit';
import { Report, SENTIMENTS, Sentiment } from '../types';

const DETAIL_TEXT_LENGTH = 300;

const SENTIMENT_LABELS: Record<Sentiment, string> = {
  positive: 'Positive',
  negative: 'Negative',
  neutral: 'Neutral',
};

function percentageOf(report: Report, sentiment: Sentiment): number {
  if (sentiment === 'positive') return report.positive_percentage;
  if (sentiment === 'negative') return report.negative_percentage;
  return report.neutral_percentage;
}

/**
 * Renders the report into `out` and ends the document.
 * Nothing is written to `out` if rendering throws.
 */
export function writeReportPdf(
  out: NodeJS.WritableStream,
  report: Report,
  title?: string,
) {
  const doc = new PDFDocument({ margin: 50 });

  doc.fontSize(20).text('Review Sentiment Report', { align: 'center' });
  if (title) {
    doc.moveDown(0.5);
    doc.fontSize(14).text(title, { align: 'center' });
  }
  doc.moveDown();

  doc.fontSize(12).text(`Generated at: ${new Date().toISOString()}`);
  doc.moveDown();

  doc.fontSize(16).text('Overview', { underline: true });
  doc.moveDown(0.5);
  doc.fontSize(12).text(`Total reviews: ${report.total_reviews}`);
  doc.text(`Average rating: ${report.average_rating} / 5`);
  if (report.failed_reviews > 0) {
    doc.text(`Reviews that could not be analyzed: ${report.failed_reviews}`);
  }
  doc.moveDown();

  doc.fontSize(16).text('Sentiment breakdown', { underline: true });
  doc.moveDown(0.5);
  for (const sentiment of SENTIMENTS) {
    const count = report.sentiment_distribution[sentiment];
    doc
      .fontSize(12)
      .text(
        `${SENTIMENT_LABELS[sentiment]}: ${count} reviews (${percentageOf(report, sentiment).toFixed(1)}%)`,
      );
  }
  doc.moveDown();

  doc.fontSize(16).text('Executive summary', { underline: true });
  doc.moveDown(0.5);
  doc.fontSize(12).text(report.summary);
  doc.moveDown();

  if (report.detailed_results.length) {
    doc.fontSize(16).text('Review details', { underline: true });
    doc.moveDown(0.5);
    report.detailed_results.forEach((record, idx) => {
      const text =
        record.review.length > DETAIL_TEXT_LENGTH
          ? `${record.review.slice(0, DETAIL_TEXT_LENGTH)}...`
          : record.review;
      doc
        .fontSize(13)
        .text(`${idx + 1}. ${SENTIMENT_LABELS[record.sentiment]} (${record.score}/5)`);
      doc.moveDown(0.25);
      doc.fontSize(11).text(text || '(empty review)');
      if (record.key_points.length) {
        doc.fontSize(11).text(`Key points: ${record.key_points.join(', ')}`);
      }
      if (record.error) {
        doc.fontSize(11).text(`Error: ${record.error}`);
      }
      doc.moveDown();
    });
  }

  // Piped last: nothing reaches `out` if layout throws.
  doc.pipe(out);
  doc.end();
}
