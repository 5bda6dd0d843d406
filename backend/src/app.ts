import express, { type ErrorRequestHandler, type Express as ExpressApp, type Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import { DEFAULT_ENGINE_CONFIG, resolveConfig, type EngineConfig } from '../../lib/config';
import { validateAndParseCSV } from '../../lib/csv-validator';
import { GraphEngineError } from '../../lib/errors';
import { logError } from '../../lib/logger';
import { generateSampleData } from '../../lib/sample-data';
import type { EmailRecord } from '../../lib/types';
import { analyzeEmailTraffic, findRoute } from './analysis-engine';
import {
  analyzeRequestSchema,
  describeIssue,
  shortestPathRequestSchema,
  validateRequestSchema,
} from './schemas';

type Traffic =
  | { ok: true; records: EmailRecord[]; errors: string[]; warnings: string[] }
  | { ok: false; body: Record<string, unknown> };

// Resolve uploaded file, CSV text or parsed records into email records
function readTraffic(
  file: Express.Multer.File | undefined,
  csvContent: string | undefined,
  records: EmailRecord[] | undefined
): Traffic {
  if (records && !file && csvContent === undefined) {
    if (records.length === 0) {
      return { ok: false, body: { success: false, error: 'No email records provided.' } };
    }
    return { ok: true, records, errors: [], warnings: [] };
  }

  const content = file ? file.buffer.toString('utf-8') : csvContent;
  if (content === undefined) {
    return {
      ok: false,
      body: {
        success: false,
        error: 'No CSV file or content provided. Send a file via multipart form, csvContent or records in JSON body.',
      },
    };
  }

  const validation = validateAndParseCSV(content);
  if (!validation.success || validation.records.length === 0) {
    return {
      ok: false,
      body: {
        success: false,
        validation: { errors: validation.errors, warnings: validation.warnings },
      },
    };
  }
  return { ok: true, records: validation.records, errors: validation.errors, warnings: validation.warnings };
}

function sendError(res: Response, error: unknown, context: string): void {
  if (error instanceof GraphEngineError) {
    res.status(400).json({ success: false, error: error.message, code: error.code });
    return;
  }
  const message = error instanceof Error ? error.message : String(error);
  logError(`${context} failed`, { message });
  res.status(500).json({
    success: false,
    error: `Internal server error during ${context}`,
    message,
  });
}

export function createApp(config: EngineConfig = DEFAULT_ENGINE_CONFIG): ExpressApp {
  const app = express();

  // Disconnected diameters are Infinity, which JSON would turn into null
  app.set('json replacer', (_key: string, value: unknown) =>
    value === Infinity ? 'Infinity' : value
  );

  app.use(cors({ origin: '*' }));
  app.use(express.json({ limit: '50mb' }));

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: 50 * 1024 * 1024 },
  });

  // ─── ROUTES ──────────────────────────────────────────────────────────────────

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.get('/api/config', (_req, res) => {
    res.json({ success: true, config });
  });

  // POST /api/analyze - CSV upload, csvContent or records, with optional config overrides
  app.post('/api/analyze', upload.single('file'), (req, res) => {
    try {
      const parsed = analyzeRequestSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ success: false, error: describeIssue(parsed.error) });
        return;
      }

      const traffic = readTraffic(req.file, parsed.data.csvContent, parsed.data.records);
      if (!traffic.ok) {
        res.status(400).json(traffic.body);
        return;
      }

      const effective = resolveConfig(parsed.data.config ?? {}, config);
      const result = analyzeEmailTraffic(traffic.records, effective);

      res.json({
        success: true,
        validation: {
          errors: traffic.errors,
          warnings: traffic.warnings,
          recordCount: traffic.records.length,
        },
        analysis: result,
      });
    } catch (error) {
      sendError(res, error, 'analysis');
    }
  });

  // POST /api/validate - check CSV without running analysis
  app.post('/api/validate', upload.single('file'), (req, res) => {
    try {
      const parsed = validateRequestSchema.safeParse(req.body ?? {});
      const csvContent = req.file
        ? req.file.buffer.toString('utf-8')
        : parsed.success
          ? parsed.data.csvContent
          : undefined;

      if (csvContent === undefined) {
        res.status(400).json({ success: false, error: 'No CSV file or content provided.' });
        return;
      }

      const validation = validateAndParseCSV(csvContent);
      res.json({
        success: validation.success,
        recordCount: validation.records.length,
        errors: validation.errors,
        warnings: validation.warnings,
      });
    } catch (error) {
      sendError(res, error, 'validation');
    }
  });

  app.get('/api/sample-data', (_req, res) => {
    try {
      res.json({ success: true, analysis: analyzeEmailTraffic(generateSampleData(), config) });
    } catch (error) {
      sendError(res, error, 'sample data');
    }
  });

  // POST /api/shortest-path - cheapest relay route between two addresses
  app.post('/api/shortest-path', (req, res) => {
    try {
      const parsed = shortestPathRequestSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ success: false, error: describeIssue(parsed.error) });
        return;
      }

      const traffic = readTraffic(undefined, parsed.data.csvContent, parsed.data.records);
      if (!traffic.ok) {
        res.status(400).json(traffic.body);
        return;
      }

      const { source, target } = parsed.data;
      res.json({ success: true, source, target, ...findRoute(traffic.records, source, target) });
    } catch (error) {
      sendError(res, error, 'shortest path');
    }
  });

  // Upload and body-parser failures land here
  const handleError: ErrorRequestHandler = (error, _req, res, _next) => {
    if (error instanceof multer.MulterError) {
      res.status(400).json({ success: false, error: error.message, code: error.code });
      return;
    }
    sendError(res, error, 'request');
  };
  app.use(handleError);

  return app;
}
