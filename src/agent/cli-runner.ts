// ============================================================
// Doc Analyzer - CLI Runner
// Runs one CLI process to completion under a hard timeout
// ============================================================

import { execFile } from 'child_process';
import type { ExecFileException } from 'child_process';
import { AgentCliError } from './errors';

/** A single process invocation */
export interface CliInvocation {
  command: string;
  args: string[];
  /** Hard wall-clock limit; the process is killed when it elapses */
  timeoutMs: number;
}

export interface CliRunResult {
  stdout: string;
  stderr: string;
}

/**
 * Runs an invocation and resolves with its output on exit code 0.
 * Rejects with an AgentCliError otherwise:
 * TIMEOUT when killed by the timeout, TOOL_ERROR on a non-zero exit,
 * UNKNOWN when the process could not run at all.
 */
export type CliRunner = (invocation: CliInvocation) => Promise<CliRunResult>;

/** Output above this size is treated as a failed run */
const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

export const runCli: CliRunner = (invocation) =>
  new Promise((resolve, reject) => {
    execFile(
      invocation.command,
      invocation.args,
      {
        encoding: 'utf8',
        timeout: invocation.timeoutMs,
        killSignal: 'SIGKILL',
        maxBuffer: MAX_OUTPUT_BYTES,
        windowsHide: true,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr });
          return;
        }
        reject(toAgentError(error, stderr, invocation.timeoutMs));
      },
    );
  });

/**
 * Maps an execFile failure onto the agent error taxonomy.
 */
export function toAgentError(
  error: ExecFileException,
  stderr: string,
  timeoutMs: number,
): AgentCliError {
  // String codes (ENOENT, EACCES, ERR_CHILD_PROCESS_STDIO_MAXBUFFER)
  // mean the run itself failed, not the tool.
  if (typeof error.code === 'string') {
    return new AgentCliError(
      `Failed to run CLI: ${error.message}`,
      'UNKNOWN',
      false,
    );
  }

  if (error.killed) {
    return new AgentCliError(
      `CLI call timed out after ${timeoutMs}ms`,
      'TIMEOUT',
      true,
    );
  }

  const detail = stderr.trim() || 'Unknown CLI error';
  return new AgentCliError(`Claude CLI error: ${detail}`, 'TOOL_ERROR', false);
}
