// ============================================================
// Doc Analyzer - Shared Type Definitions
// Core types used by the agent service and the HTTP server
// ============================================================

import os from 'os';
import type { Canvas, Image } from '@napi-rs/canvas';

/** Log levels understood by the console logger */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** In-memory bitmap accepted by the service */
export type Bitmap = Image | Canvas;

/**
 * JSON Schema describing the structured output the CLI must return.
 * Only `required` is read locally; the rest is passed through verbatim.
 */
export interface ResponseSchema {
  type?: string;
  properties?: Record<string, unknown>;
  required?: string[];
  [keyword: string]: unknown;
}

/** Structured output returned to callers (empty on failure) */
export type StructuredResult = Record<string, unknown>;

/** Token counters reported by the CLI */
export interface UsageBreakdown {
  input_tokens: number;
  cache_creation_input_tokens: number;
  cache_read_input_tokens: number;
  output_tokens: number;
}

/** Usage update forwarded to a metadata sink after a successful call */
export interface UsageUpdate {
  llmTokensUsed: number;
  llmRequestCount: number;
}

/**
 * Caller-owned accounting state. The service only writes to it.
 */
export interface MetadataSink {
  updateMetadata(update: UsageUpdate): void;
}

/** A single analysis request */
export interface AnalysisRequest {
  /** Natural-language instruction for the CLI */
  prompt: string;
  /** Zero, one or many images to attach by file path */
  images?: Bitmap | Bitmap[] | null;
  /** Receives one usage report per successful call */
  metadataSink?: MetadataSink | null;
  /** Expected shape of `structured_output` */
  responseSchema: ResponseSchema;
  /** Overrides the configured retry budget */
  maxRetries?: number;
  /** Overrides the configured per-attempt timeout */
  timeoutSeconds?: number;
}

/** Service configuration */
export interface AgentServiceConfig {
  /** Executable name or path of the CLI */
  cliPath: string;
  /** Model alias passed through `--model` (e.g. 'sonnet', 'haiku', 'opus') */
  model: string;
  /** Per-attempt wall-clock timeout (seconds) */
  timeoutSeconds: number;
  /** Retries after the first attempt */
  maxRetries: number;
  /** Base unit for linear backoff (seconds) */
  retryWaitTime: number;
  /** Tools enabled for the CLI; must include file reading for images */
  tools: string[];
  /** Permission mode passed through `--permission-mode` */
  permissionMode: string;
  /** Directory for temporary image files */
  tempDir: string;
  /** WEBP quality for temporary images (0-100) */
  imageQuality: number;
  /** Minimum level emitted by the logger */
  logLevel: LogLevel;
}

/** Default configuration values */
export const DEFAULT_AGENT_CONFIG: AgentServiceConfig = {
  cliPath: 'claude',
  model: 'sonnet',
  timeoutSeconds: 120,
  maxRetries: 2,
  retryWaitTime: 3,
  tools: ['Read'],
  permissionMode: 'bypassPermissions',
  tempDir: os.tmpdir(),
  imageQuality: 80,
  logLevel: 'info',
};
