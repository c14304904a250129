import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import { AnalyzeReviews } from './analysis/analyzer';
import { writeReportPdf } from './pdf/reportPdf';
import { errorMessage } from './errors';
import { isReport } from './utils/guards';

export const MAX_REVIEWS = 500;

type AnalyzeRequestBody = {
  reviews?: unknown;
};

type PdfRequestBody = {
  report?: unknown;
  title?: unknown;
};

function isReviewList(value: unknown): value is string[] {
  return (
    Array.isArray(value) &&
    value.length > 0 &&
    value.length <= MAX_REVIEWS &&
    value.every((v) => typeof v === 'string')
  );
}

export function createApp(analyze: AnalyzeReviews): Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '2mb' }));

  app.post(
    '/api/analyze',
    async (req: Request<unknown, unknown, AnalyzeRequestBody>, res: Response) => {
      try {
        const { reviews } = req.body || {};
        if (!isReviewList(reviews)) {
          return res.status(400).json({
            error: 'INVALID_REVIEWS',
            message: `Provide "reviews" as 1 to ${MAX_REVIEWS} strings.`,
          });
        }

        const report = await analyze(reviews);
        return res.json({ report });
      } catch (err) {
        console.error(err);
        return res.status(500).json({
          error: 'ANALYSIS_FAILED',
          message: errorMessage(err) || 'Unknown error.',
        });
      }
    },
  );

  app.post(
    '/api/report/pdf',
    (req: Request<unknown, unknown, PdfRequestBody>, res: Response) => {
      try {
        const { report, title } = req.body || {};
        if (!isReport(report)) {
          return res.status(400).json({ error: 'Missing report.' });
        }

        res.setHeader('Content-Type', 'application/pdf');
        res.setHeader(
          'Content-Disposition',
          'attachment; filename="review-report.pdf"',
        );
        writeReportPdf(res, report, typeof title === 'string' ? title : undefined);
        return;
      } catch (err) {
        console.error(err);
        if (res.headersSent) return res.end();
        res.removeHeader('Content-Disposition');
        res.removeHeader('Content-Type');
        return res.status(500).json({
          error: 'PDF_FAILED',
          message: errorMessage(err) || 'Unknown error.',
        });
      }
    },
  );

  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  return app;
}
