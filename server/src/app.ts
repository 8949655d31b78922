// ============================================================
// Doc Analyzer - Express Application
// ============================================================

import express from 'express';
import cors from 'cors';
import type { LLMService } from '@agent/service';
import { createAnalyzeRouter } from './routes/analyze';

export const SERVER_VERSION = '0.1.0';

export function createApp(service: LLMService): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '50mb' }));

  // Routes
  app.use('/api/analyze', createAnalyzeRouter(service));

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', version: SERVER_VERSION });
  });

  return app;
}
