// ============================================================
// Integration tests for server/src/app.ts
// Runs the Express app on an ephemeral local port
// ============================================================

import type { Server } from 'http';
import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { createApp, SERVER_VERSION } from '../../server/src/app';
import type { AnalysisRequest, StructuredResult } from '../../src/index';

const service = {
  invoke: vi.fn(async (_request: AnalysisRequest): Promise<StructuredResult> => ({ heading: 'Lease' })),
};

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  server = await new Promise<Server>((resolve) => {
    const listening = createApp(service).listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('expected a TCP address');
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
});

describe('createApp', () => {
  it('should answer the health check', async () => {
    const response = await fetch(`${baseUrl}/api/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'ok', version: SERVER_VERSION });
  });

  it('should route JSON posts to the analyze handler', async () => {
    const response = await fetch(`${baseUrl}/api/analyze`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ prompt: 'Summarize', schema: { type: 'object' } }),
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      success: true,
      data: { heading: 'Lease' },
      usage: { totalTokens: 0, requestCount: 0 },
    });
    expect(service.invoke).toHaveBeenCalledTimes(1);
  });

  it('should allow cross-origin requests', async () => {
    const response = await fetch(`${baseUrl}/api/health`, {
      headers: { Origin: 'https://example.com' },
    });

    expect(response.headers.get('access-control-allow-origin')).toBe('*');
  });
});
