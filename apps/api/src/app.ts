import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import { z } from 'zod';

import { analyzeTable } from './analysis/pipeline';
import type { AnalysisResult } from './analysis/pipeline';
import { classifyColumn } from './canon/classify';
import { canonicalizeHeaders } from './canon/headers';
import { resolveCollisions } from './canon/collisions';
import { normalizeColumn } from './canon/values';
import { findClassificationRule, findNormalizationRule, loadRuleSet } from './config/rules';
import { AnalysisError, errorMessage } from './errors';
import { ingestBuffer, tableFromJson } from './ingest/table';
import { LastAnalysisStore } from './store';
import type { RuleSet } from './types/survey';

export type AppOptions = {
  rules?: RuleSet;
  store?: LastAnalysisStore;
  uploadLimitMb?: number;
  topLimit?: number;
};

const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const headersBody = z.object({ headers: z.array(z.string()) });
const valuesBody = z.object({ values: z.array(cellSchema) });
const textsBody = z.object({ texts: z.array(z.unknown()), field: z.string().optional() });

const sendError = (res: Response, err: unknown, fallback: string) => {
  if (err instanceof AnalysisError) {
    return res.status(err.status).json({ error: err.message, kind: err.kind });
  }
  return res.status(500).json({ error: errorMessage(err, fallback) });
};

const logSkipped = (result: AnalysisResult) => {
  result.diagnostics
    .filter(d => d.kind === 'MissingRequiredField')
    .forEach(d => console.warn(`[analyze] ${d.message}`));
};

export const createApp = (options: AppOptions = {}) => {
  const rules = options.rules ?? loadRuleSet();
  const store = options.store ?? new LastAnalysisStore();
  const topLimit = options.topLimit;

  const app = express();
  const upload = multer({ limits: { fileSize: (options.uploadLimitMb ?? 10) * 1024 * 1024 } });

  app.use(cors());
  app.use(express.json({ limit: '5mb' }));

  const finishAnalysis = (res: Response, result: AnalysisResult) => {
    store.record(result);
    logSkipped(result);
    res.json(result);
  };

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.get('/api/rules', (_req, res) => {
    res.json(rules);
  });

  app.post('/api/analyze', upload.single('file'), (req, res) => {
    try {
      const file = req.file;
      if (!file) return res.status(400).json({ error: 'A CSV, Excel or JSON file is required in field "file".' });

      const raw = ingestBuffer(file.buffer, file.originalname);
      finishAnalysis(res, analyzeTable(raw, rules, { topLimit }));
    } catch (err) {
      sendError(res, err, 'Analysis failed');
    }
  });

  app.post('/api/analyze/records', (req, res) => {
    try {
      const raw = tableFromJson(req.body, 'records');
      finishAnalysis(res, analyzeTable(raw, rules, { topLimit }));
    } catch (err) {
      sendError(res, err, 'Analysis failed');
    }
  });

  app.post('/api/canonicalize/headers', (req, res) => {
    const body = headersBody.safeParse(req.body);
    if (!body.success) return res.status(400).json({ error: 'headers must be an array of strings' });

    const mapping = canonicalizeHeaders(body.data.headers, rules.aliasTable);
    const headers = resolveCollisions(mapping.map(m => m.canonical));
    res.json({
      headers,
      mapping: mapping.map((match, index) => ({ ...match, canonical: headers[index] }))
    });
  });

  app.post('/api/normalize/:field', (req, res) => {
    const rule = findNormalizationRule(rules, req.params.field);
    if (!rule) {
      const available = rules.normalization.map(r => r.field).join(', ') || '(none)';
      return res.status(404).json({ error: `No value rule for field "${req.params.field}". Available: ${available}` });
    }
    const body = valuesBody.safeParse(req.body);
    if (!body.success) return res.status(400).json({ error: 'values must be an array of strings, numbers or nulls' });

    res.json(normalizeColumn(body.data.values, rule));
  });

  app.post('/api/classify', (req, res) => {
    const body = textsBody.safeParse(req.body);
    if (!body.success) return res.status(400).json({ error: 'texts must be an array' });

    const field = body.data.field;
    const rule = field ? findClassificationRule(rules, field) : rules.classification[0];
    if (!rule) return res.status(404).json({ error: `No classification rule for field "${field ?? ''}".` });

    res.json(classifyColumn(body.data.texts, rule, { topLimit }));
  });

  app.get('/api/debug/last', (_req, res) => {
    const last = store.read();
    if (!last) return res.status(404).json({ error: 'No analysis has been run yet.' });
    res.json(last);
  });

  // Upload limits and malformed JSON bodies surface here rather than in the handlers.
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(err);
    if (err instanceof multer.MulterError) return res.status(400).json({ error: err.message, kind: 'UnreadableSource' });
    if (err instanceof SyntaxError) return res.status(400).json({ error: 'Request body is not valid JSON.' });
    sendError(res, err, 'Request failed');
  });

  return app;
};
