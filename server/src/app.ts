// ============================================================
// Vision Analyzer - Express Application
// ============================================================

import { fileURLToPath } from 'node:url';
import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import { ANALYSIS_TYPES, SERVER_DEFAULTS } from '@shared/constants';
import type { VisionAnalyzer } from '../../src/analyzer';
import { createAnalyzeRouter } from './routes/analyze';

export const PUBLIC_DIR = fileURLToPath(new URL('../../public', import.meta.url));

export interface AppOptions {
  analyzer: VisionAnalyzer;
  uploadDir: string;
  maxFileSize: number;
}

export function createApp(options: AppOptions): Express {
  const app = express();

  // Middleware
  app.use(cors());

  // Static single-page UI at GET /
  app.use(express.static(PUBLIC_DIR));

  // Routes
  app.use('/analyze', createAnalyzeRouter(options));

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', version: SERVER_DEFAULTS.VERSION });
  });

  app.get('/api/models', (_req, res) => {
    res.json({
      models: options.analyzer.dispatcher.listProviders(),
      analysisTypes: ANALYSIS_TYPES,
    });
  });

  return app;
}
