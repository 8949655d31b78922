// ============================================================
// Doc Analyzer - Public API
// ============================================================

export { ClaudeAgentService } from './agent/service';
export type { LLMService, AgentServiceOptions } from './agent/service';
export { AgentCliError } from './agent/errors';
export type { AgentErrorCode } from './agent/errors';
export { isTransientErrorMessage, backoffDelayMs } from './agent/classifier';
export type { ErrorClassifier } from './agent/classifier';
export { runCli } from './agent/cli-runner';
export type { CliRunner, CliInvocation, CliRunResult } from './agent/cli-runner';
export { parseEnvelope, missingRequiredFields } from './agent/envelope';
export { buildPromptWithImages, buildCliArgs } from './agent/prompt';
export { UsageTracker, totalTokens } from './agent/usage';
export {
  createTempImageStore,
  createWebpWriter,
  cleanupTempFiles,
  withTempImages,
} from './images/temp-images';
export type { TempImageStore, ImageWriter } from './images/temp-images';
export { resolveConfig, loadConfigFromEnv, ConfigurationError } from './shared/config';
export { createLogger, setLogLevel } from './shared/logger';
export { DEFAULT_AGENT_CONFIG } from './shared/types';
export type {
  AgentServiceConfig,
  AnalysisRequest,
  Bitmap,
  MetadataSink,
  ResponseSchema,
  StructuredResult,
  UsageBreakdown,
  UsageUpdate,
} from './shared/types';
