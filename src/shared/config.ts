// ============================================================
// Doc Analyzer - Configuration
// Merges explicit overrides and environment variables over the
// defaults, validated with zod
// ============================================================

import { z } from 'zod';
import { DEFAULT_AGENT_CONFIG } from './types';
import type { AgentServiceConfig } from './types';

/** Thrown when configuration values fail validation */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

const agentConfigSchema = z.object({
  cliPath: z.string().min(1, 'cliPath must not be empty'),
  model: z.string().min(1, 'model must not be empty'),
  timeoutSeconds: z.number().positive(),
  maxRetries: z.number().int().nonnegative(),
  retryWaitTime: z.number().nonnegative(),
  tools: z.array(z.string().min(1)),
  permissionMode: z.string().min(1),
  tempDir: z.string().min(1),
  imageQuality: z.number().int().min(0).max(100),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
});

/**
 * Validates a partial configuration merged over DEFAULT_AGENT_CONFIG.
 *
 * @throws {ConfigurationError} listing every invalid field
 */
export function resolveConfig(
  overrides: Partial<AgentServiceConfig> = {},
): AgentServiceConfig {
  const result = agentConfigSchema.safeParse({ ...DEFAULT_AGENT_CONFIG, ...overrides });

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new ConfigurationError(
      `Invalid agent configuration: ${issues.join('; ')}`,
      issues,
    );
  }

  return result.data;
}

// ------------------------------------------------------------------
// Environment
// ------------------------------------------------------------------

const numericEnv = (name: string) =>
  z
    .string()
    .trim()
    .regex(/^\d+(\.\d+)?$/, `${name} must be a non-negative number`)
    .transform(Number)
    .optional();

const envSchema = z.object({
  CLAUDE_CLI_PATH: z.string().trim().min(1).optional(),
  CLAUDE_AGENT_MODEL: z.string().trim().min(1).optional(),
  CLAUDE_AGENT_TIMEOUT_SECONDS: numericEnv('CLAUDE_AGENT_TIMEOUT_SECONDS'),
  CLAUDE_AGENT_MAX_RETRIES: numericEnv('CLAUDE_AGENT_MAX_RETRIES'),
  CLAUDE_AGENT_RETRY_WAIT_SECONDS: numericEnv('CLAUDE_AGENT_RETRY_WAIT_SECONDS'),
  CLAUDE_AGENT_TEMP_DIR: z.string().trim().min(1).optional(),
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['debug', 'info', 'warn', 'error']))
    .optional(),
});

/**
 * Builds the service configuration from environment variables.
 * Unset variables fall back to the defaults.
 *
 * @throws {ConfigurationError} when a variable is present but invalid
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): AgentServiceConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new ConfigurationError(
      `Invalid environment configuration: ${issues.join('; ')}`,
      issues,
    );
  }

  const vars = parsed.data;
  const overrides: Partial<AgentServiceConfig> = {};

  if (vars.CLAUDE_CLI_PATH !== undefined) overrides.cliPath = vars.CLAUDE_CLI_PATH;
  if (vars.CLAUDE_AGENT_MODEL !== undefined) overrides.model = vars.CLAUDE_AGENT_MODEL;
  if (vars.CLAUDE_AGENT_TIMEOUT_SECONDS !== undefined) {
    overrides.timeoutSeconds = vars.CLAUDE_AGENT_TIMEOUT_SECONDS;
  }
  if (vars.CLAUDE_AGENT_MAX_RETRIES !== undefined) {
    overrides.maxRetries = vars.CLAUDE_AGENT_MAX_RETRIES;
  }
  if (vars.CLAUDE_AGENT_RETRY_WAIT_SECONDS !== undefined) {
    overrides.retryWaitTime = vars.CLAUDE_AGENT_RETRY_WAIT_SECONDS;
  }
  if (vars.CLAUDE_AGENT_TEMP_DIR !== undefined) overrides.tempDir = vars.CLAUDE_AGENT_TEMP_DIR;
  if (vars.LOG_LEVEL !== undefined) overrides.logLevel = vars.LOG_LEVEL;

  return resolveConfig(overrides);
}
