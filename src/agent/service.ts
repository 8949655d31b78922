// ============================================================
// Doc Analyzer - Claude Agent Service
// Structured document analysis through the `claude` CLI with
// bounded retries, linear backoff and usage reporting
// ============================================================

import { resolveConfig } from '../shared/config';
import { createLogger } from '../shared/logger';
import type { Logger } from '../shared/logger';
import type {
  AgentServiceConfig,
  AnalysisRequest,
  Bitmap,
  MetadataSink,
  ResponseSchema,
  StructuredResult,
} from '../shared/types';
import { createTempImageStore, createWebpWriter, withTempImages } from '../images/temp-images';
import type { TempImageStore } from '../images/temp-images';
import { runCli } from './cli-runner';
import type { CliRunner } from './cli-runner';
import { backoffDelayMs, isTransientErrorMessage } from './classifier';
import type { ErrorClassifier } from './classifier';
import { parseEnvelope, missingRequiredFields } from './envelope';
import type { ParsedEnvelope } from './envelope';
import { AgentCliError, errorMessage } from './errors';
import { buildCliArgs, buildPromptWithImages } from './prompt';

/**
 * Common surface of LLM-backed analysis services.
 * An empty result means the analysis is unavailable.
 */
export interface LLMService {
  invoke(request: AnalysisRequest): Promise<StructuredResult>;
}

/** Collaborators that tests (or embedders) may replace */
export interface AgentServiceOptions {
  runner?: CliRunner;
  imageStore?: TempImageStore;
  sleep?: (ms: number) => Promise<void>;
  classifyError?: ErrorClassifier;
  logger?: Logger;
}

/**
 * Runs analysis requests through the `claude` CLI.
 *
 * Each call:
 * - writes its images to unique temp WEBP files and references them in the prompt
 * - retries timeouts and rate-limit errors with linear backoff
 * - retries an empty structured output immediately
 * - reports token usage once per successful call
 * - removes its temp files on every exit path
 *
 * Failures never throw; they resolve to `{}`.
 */
export class ClaudeAgentService implements LLMService {
  readonly config: AgentServiceConfig;

  private readonly runner: CliRunner;
  private readonly imageStore: TempImageStore;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly classifyError: ErrorClassifier;
  private readonly log: Logger;

  constructor(config: Partial<AgentServiceConfig> = {}, options: AgentServiceOptions = {}) {
    this.config = resolveConfig(config);
    this.log = options.logger ?? createLogger('claude-agent', this.config.logLevel);
    this.runner = options.runner ?? runCli;
    this.imageStore =
      options.imageStore ??
      createTempImageStore(
        this.config.tempDir,
        createWebpWriter(this.config.imageQuality),
        this.log,
      );
    this.sleep = options.sleep ?? sleep;
    this.classifyError = options.classifyError ?? isTransientErrorMessage;
  }

  async invoke(request: AnalysisRequest): Promise<StructuredResult> {
    if (request.prompt.trim().length === 0) {
      this.log.error('Empty prompt. Skipping Claude CLI call.');
      return {};
    }

    const maxRetries = this.resolveMaxRetries(request.maxRetries);
    const timeoutSeconds = this.resolveTimeout(request.timeoutSeconds);
    const images = normalizeImages(request.images);

    try {
      return await withTempImages(this.imageStore, images, (paths) =>
        this.runWithRetries(
          buildPromptWithImages(request.prompt, paths),
          request.responseSchema,
          request.metadataSink ?? null,
          maxRetries,
          timeoutSeconds,
        ),
      );
    } catch (err) {
      this.log.error(`Unexpected error during Claude CLI call: ${errorMessage(err)}`);
      return {};
    }
  }

  // ----------------------------------------------------------------
  // Retry loop
  // ----------------------------------------------------------------

  private async runWithRetries(
    prompt: string,
    responseSchema: ResponseSchema,
    metadataSink: MetadataSink | null,
    maxRetries: number,
    timeoutSeconds: number,
  ): Promise<StructuredResult> {
    const totalAttempts = maxRetries + 1;

    for (let attempt = 1; attempt <= totalAttempts; attempt++) {
      const isLastAttempt = attempt === totalAttempts;
      const progress = `(Attempt ${attempt}/${totalAttempts})`;

      let envelope: ParsedEnvelope;
      try {
        envelope = await this.callCli(prompt, responseSchema, timeoutSeconds);
      } catch (err) {
        const failure = this.classify(err);

        if (!failure.retryable) {
          this.log.error(`${describeFailure(failure)} ${progress}`);
          break;
        }

        if (isLastAttempt) {
          this.log.error(
            `${describeFailure(failure)}. Max retries reached. Giving up. ${progress}`,
          );
          break;
        }

        const delayMs = backoffDelayMs(attempt, this.config.retryWaitTime);
        this.log.warn(
          `${describeFailure(failure)}. Retrying in ${delayMs / 1000} seconds... ${progress}`,
        );
        await this.sleep(delayMs);
        continue;
      }

      const result = envelope.structuredOutput;

      if (Object.keys(result).length > 0) {
        if (metadataSink && envelope.totalTokens > 0) {
          metadataSink.updateMetadata({
            llmTokensUsed: envelope.totalTokens,
            llmRequestCount: 1,
          });
        }

        const missing = missingRequiredFields(result, responseSchema);
        if (missing.length > 0) {
          this.log.warn(`Structured output is missing required fields: ${missing.join(', ')}`);
        }

        return result;
      }

      if (isLastAttempt) {
        this.log.error(`Empty response from Claude CLI. Max retries reached. ${progress}`);
        break;
      }

      this.log.warn(`Empty response from Claude CLI. Retrying... ${progress}`);
    }

    return {};
  }

  /**
   * One CLI call. A tool-reported error inside a well-formed envelope
   * is raised the same way as a non-zero exit.
   */
  private async callCli(
    prompt: string,
    responseSchema: ResponseSchema,
    timeoutSeconds: number,
  ): Promise<ParsedEnvelope> {
    this.log.debug(`Calling Claude CLI with model: ${this.config.model}`);

    const { stdout } = await this.runner({
      command: this.config.cliPath,
      args: buildCliArgs(prompt, responseSchema, this.config),
      // execFile only takes whole milliseconds
      timeoutMs: Math.ceil(timeoutSeconds * 1000),
    });

    const envelope = parseEnvelope(stdout);
    this.log.debug(
      `CLI response: is_error=${envelope.isError}, tokens=${envelope.totalTokens}`,
    );

    if (envelope.isError) {
      throw new AgentCliError(
        `Claude CLI error: ${envelope.errorMessage}`,
        'TOOL_ERROR',
        false,
      );
    }

    return envelope;
  }

  /** Normalizes any thrown value and applies the rate-limit classifier */
  private classify(err: unknown): AgentCliError {
    if (!(err instanceof AgentCliError)) {
      return new AgentCliError(errorMessage(err), 'UNKNOWN', false);
    }

    if (err.code === 'TOOL_ERROR' && this.classifyError(err.message)) {
      return new AgentCliError(err.message, 'RATE_LIMIT', true);
    }

    return err;
  }

  private resolveMaxRetries(value: number | undefined): number {
    if (value === undefined) return this.config.maxRetries;
    if (Number.isInteger(value) && value >= 0) return value;
    this.log.warn(`Ignoring invalid maxRetries ${value}; using ${this.config.maxRetries}`);
    return this.config.maxRetries;
  }

  private resolveTimeout(value: number | undefined): number {
    if (value === undefined) return this.config.timeoutSeconds;
    if (Number.isFinite(value) && value > 0) return value;
    this.log.warn(`Ignoring invalid timeout ${value}; using ${this.config.timeoutSeconds}`);
    return this.config.timeoutSeconds;
  }
}

// ------------------------------------------------------------------
// Utilities
// ------------------------------------------------------------------

function normalizeImages(images: AnalysisRequest['images']): Bitmap[] {
  if (!images) return [];
  return Array.isArray(images) ? images : [images];
}

function describeFailure(failure: AgentCliError): string {
  switch (failure.code) {
    case 'TIMEOUT':
      return 'Timeout error';
    case 'RATE_LIMIT':
      return `Rate limit error: ${failure.message}`;
    case 'MALFORMED_RESPONSE':
      return failure.message;
    case 'TOOL_ERROR':
      return `Error during Claude CLI call: ${failure.message}`;
    case 'UNKNOWN':
      return `Unexpected error during Claude CLI call: ${failure.message}`;
  }
}

/**
 * Returns a promise that resolves after the specified delay.
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
