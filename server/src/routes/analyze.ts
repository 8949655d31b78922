// ============================================================
// POST /api/analyze
// Runs one structured analysis through the agent service and
// returns the structured output with its token usage
// ============================================================

import { Router } from 'express';
import { z } from 'zod';
import type { LLMService } from '@agent/service';
import { UsageTracker } from '@agent/usage';
import { errorMessage } from '@agent/errors';
import { createLogger } from '@shared/logger';
import type { Bitmap } from '@shared/types';
import { decodeBase64Image } from '../images/decode';
import type { ImageDecoder } from '../images/decode';

const log = createLogger('api/analyze');

const MAX_IMAGES = 20;

const analyzeBodySchema = z.object({
  prompt: z.string().trim().min(1, 'prompt is required'),
  schema: z
    .object({
      type: z.string().optional(),
      properties: z.record(z.unknown()).optional(),
      required: z.array(z.string()).optional(),
    })
    .passthrough(),
  images: z.array(z.string().min(1)).max(MAX_IMAGES).default([]),
  maxRetries: z.number().int().nonnegative().optional(),
  timeoutSeconds: z.number().positive().optional(),
});

/** The parts of an Express request/response the handler touches */
export interface AnalyzeRequest {
  body: unknown;
}

export interface JsonResponse {
  status(code: number): JsonResponse;
  json(body: unknown): unknown;
}

/**
 * Builds the request handler. Exposed separately so tests can drive it
 * with plain request/response stand-ins.
 */
export function createAnalyzeHandler(
  service: LLMService,
  decodeImage: ImageDecoder = decodeBase64Image,
) {
  return async (req: AnalyzeRequest, res: JsonResponse): Promise<void> => {
    const parsed = analyzeBodySchema.safeParse(req.body);

    if (!parsed.success) {
      res.status(400).json({
        success: false,
        error: 'Invalid request body',
        issues: parsed.error.issues.map(
          (issue) => `${issue.path.join('.') || '(body)'}: ${issue.message}`,
        ),
      });
      return;
    }

    const body = parsed.data;

    const images: Bitmap[] = [];
    for (let i = 0; i < body.images.length; i++) {
      try {
        images.push(await decodeImage(body.images[i]));
      } catch (err) {
        log.warn(`Image ${i + 1} could not be decoded: ${errorMessage(err)}`);
        res.status(400).json({
          success: false,
          error: `Image ${i + 1} could not be decoded`,
        });
        return;
      }
    }

    try {
      const usage = new UsageTracker();
      const data = await service.invoke({
        prompt: body.prompt,
        images,
        metadataSink: usage,
        responseSchema: body.schema,
        maxRetries: body.maxRetries,
        timeoutSeconds: body.timeoutSeconds,
      });

      if (Object.keys(data).length === 0) {
        res.status(502).json({
          success: false,
          error: 'Analysis unavailable',
          usage: usage.snapshot(),
        });
        return;
      }

      res.json({ success: true, data, usage: usage.snapshot() });
    } catch (err) {
      log.error(`Analyze request failed: ${errorMessage(err)}`);
      res.status(500).json({ success: false, error: 'Internal server error' });
    }
  };
}

export function createAnalyzeRouter(service: LLMService): Router {
  const router = Router();
  const handler = createAnalyzeHandler(service);
  router.post('/', (req, res, next) => {
    handler(req, res).catch(next);
  });
  return router;
}
