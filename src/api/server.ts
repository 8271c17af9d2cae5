import express from 'express';
import type { ErrorRequestHandler, Express } from 'express';
import type { Server } from 'http';
import { basename, extname } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { processWorkbook } from '../pipeline/levels-pipeline.js';

export const XLSX_MIME = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';
export const PROCESSING_FAILED = 'Processing failed. Please check if the uploaded file has valid data.';

const DEFAULT_FILENAME = 'levels.xlsx';

export interface ServerOptions {
  maxUploadMb: number;
}

/** `Nifty feb.xlsx` → `Nifty feb_processed.xlsx`; directories and quotes are dropped. */
export function outputFileName(uploaded?: string): string {
  const clean = basename((uploaded ?? '').replace(/\\/g, '/')).replace(/["\r\n]/g, '').trim() || DEFAULT_FILENAME;
  const ext = extname(clean);
  return `${clean.slice(0, clean.length - ext.length)}_processed${ext}`;
}

function statusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') return err.status;
  return 500;
}

export function createApp(options: ServerOptions): Express {
  const app = express();

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  // Raw workbook upload → processed workbook download
  app.post(
    '/api/levels',
    express.raw({ type: () => true, limit: `${options.maxUploadMb}mb` }),
    async (req, res) => {
      if (!Buffer.isBuffer(req.body) || req.body.length === 0) {
        res.status(400).json({ error: 'Request body must be the workbook bytes' });
        return;
      }

      const runId = uuidv4();
      const name = typeof req.query['filename'] === 'string' ? req.query['filename'] : undefined;
      console.log(`[Server] ${runId.slice(0, 8)} Processing upload ${name ?? DEFAULT_FILENAME} (${req.body.length} bytes)`);

      try {
        const output = await processWorkbook(req.body, runId);
        if (!output) {
          res.status(422).json({ error: PROCESSING_FAILED });
          return;
        }
        res
          .status(200)
          .set('Content-Type', XLSX_MIME)
          .set('Content-Disposition', `attachment; filename="${outputFileName(name)}"`)
          .set('X-Run-Id', runId)
          .send(output);
      } catch (err) {
        res.status(500).json({ error: err instanceof Error ? err.message : String(err) });
      }
    },
  );

  const onError: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
    const status = statusOf(err);
    console.error(`[Server] Request failed (${status}):`, err instanceof Error ? err.message : err);
    res.status(status).json({ error: status === 413 ? `Upload exceeds ${options.maxUploadMb} MB` : 'Request failed' });
  };
  app.use(onError);

  return app;
}

export function startServer(port: number, options: ServerOptions): Server {
  const app = createApp(options);
  return app.listen(port, () => {
    console.log(`[Server] Listening on http://localhost:${port}`);
  });
}
