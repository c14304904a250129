import { describe, it, expect } from 'vitest';
import { PassThrough } from 'stream';
import { writeReportPdf } from '../reportPdf';
import { sampleReport } from '../../__tests__/reports';
import { Report } from '../../types';

function renderPdf(report: Report, title?: string): Promise<Buffer> {
  const out = new PassThrough();
  const chunks: Buffer[] = [];
  const done = new Promise<Buffer>((resolve, reject) => {
    out.on('data', (chunk: Buffer) => chunks.push(chunk));
    out.on('end', () => resolve(Buffer.concat(chunks)));
    out.on('error', reject);
  });
  writeReportPdf(out, report, title);
  return done;
}

describe('writeReportPdf', () => {
  it('writes nothing when the document cannot be laid out', () => {
    const broken: Report = JSON.parse(
      JSON.stringify({
        ...sampleReport(),
        detailed_results: [{ review: 'x', sentiment: 'positive', score: 5 }],
      }),
    );
    const out = new PassThrough();

    expect(() => writeReportPdf(out, broken)).toThrow(TypeError);
    expect(out.readableLength).toBe(0);
    expect(out.writableEnded).toBe(false);
  });

  it('writes a complete PDF document', async () => {
    const pdf = await renderPdf(sampleReport(), 'Spring catalogue');

    expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    expect(pdf.toString('latin1').trimEnd().endsWith('%%EOF')).toBe(true);
  });

  it('renders an empty report with failures noted', async () => {
    const pdf = await renderPdf(
      sampleReport({
        total_reviews: 1,
        failed_reviews: 1,
        detailed_results: [
          {
            review: '',
            sentiment: 'neutral',
            score: 3,
            key_points: [],
            emotions: [],
            error: 'timeout',
          },
        ],
      }),
    );

    expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
  });
});
