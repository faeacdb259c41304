import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import path from 'path';
import { z } from 'zod';
import { loadConfig } from './config.js';
import { defaultBackends } from './documentRenderer.js';
import { loadDotEnv, readSettings } from './env.js';
import { PipelineFailure, PrintError } from './errors.js';
import type { ErrorKind } from './errors.js';
import { runPipeline } from './pipeline.js';
import { DocumentPrinter } from './printer.js';
import { RunQueue } from './runQueue.js';

const RenderPayloadSchema = z.object({
  shipmentPath: z.string().min(1),
  masterPath: z.string().min(1),
  bomPath: z.string().min(1).nullable().optional(),
  outputDir: z.string().min(1).optional(),
  configPath: z.string().min(1).optional()
});

const PrintPayloadSchema = z.object({
  pdfPath: z.string().min(1),
  printerName: z.string().min(1).nullable().optional()
});

const STATUS_BY_KIND: Record<ErrorKind | 'unexpected', number> = {
  'input-file': 404,
  config: 400,
  schema: 400,
  parse: 400,
  'unresolved-reference': 422,
  encoding: 422,
  template: 422,
  render: 500,
  print: 500,
  unexpected: 500
};

async function start(): Promise<void> {
  await loadDotEnv();
  const settings = readSettings();
  const printer = new DocumentPrinter({ printerName: settings.printerName, autotest: settings.autotest });
  await printer.initialize();

  // One generation at a time; each request still gets its own pipeline state.
  const queue = new RunQueue();
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', queued: queue.size() });
  });

  app.get('/printers', async (_req, res, next) => {
    try {
      res.json({ printers: await printer.listPrinters(), default: printer.getPrinterName() });
    } catch (error) {
      next(error);
    }
  });

  app.post('/render', async (req, res, next) => {
    const parsed = RenderPayloadSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`) });
      return;
    }
    const payload = parsed.data;

    try {
      const result = await queue.run(async () => {
        const config = await loadConfig(payload.configPath ?? settings.configPath).catch((error: unknown) => {
          throw new PipelineFailure(error);
        });
        return runPipeline(
          {
            shipmentPath: payload.shipmentPath,
            masterPath: payload.masterPath,
            bomPath: payload.bomPath ?? null,
            outputDir: payload.outputDir ?? settings.outputDir,
            config
          },
          {
            backends: defaultBackends({
              wkhtmltopdfPath: settings.wkhtmltopdfPath,
              chromiumPath: settings.chromiumPath
            })
          }
        );
      });
      res.json({
        rows: result.rows.length,
        pages: result.pages.length,
        html: result.document.markupPath,
        pdf: result.document.documentPath,
        report: result.report
      });
    } catch (error) {
      next(error);
    }
  });

  app.post('/print', async (req, res, next) => {
    const parsed = PrintPayloadSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`) });
      return;
    }
    try {
      await printer.print(path.resolve(parsed.data.pdfPath), parsed.data.printerName ?? printer.getPrinterName());
      res.json({ status: 'queued' });
    } catch (error) {
      next(error);
    }
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof PipelineFailure || error instanceof PrintError) {
      const rows = error instanceof PipelineFailure ? error.affectedRows : error.rows;
      res.status(STATUS_BY_KIND[error.kind]).json({ error: error.message, kind: error.kind, rows });
      return;
    }
    console.error('Unexpected API error:', error);
    res.status(500).json({ error: error instanceof Error ? error.message : String(error), kind: 'unexpected' });
  });

  app.listen(settings.port, '127.0.0.1', () => {
    console.log(`Picking API listening on http://127.0.0.1:${settings.port}`);
  });
}

start().catch(error => {
  console.error('Picking API failed to start:', error);
  process.exitCode = 1;
});
