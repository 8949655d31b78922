// ============================================================
// Doc Analyzer - CLI Response Envelope
// Validates the JSON printed by `claude --output-format json`
// ============================================================

import { z } from 'zod';
import { AgentCliError, errorMessage } from './errors';
import { totalTokens } from './usage';
import type { ResponseSchema, StructuredResult } from '../shared/types';

const tokenCount = z.number().int().nonnegative().default(0);

const usageSchema = z.object({
  input_tokens: tokenCount,
  cache_creation_input_tokens: tokenCount,
  cache_read_input_tokens: tokenCount,
  output_tokens: tokenCount,
});

const envelopeSchema = z.object({
  is_error: z.boolean().optional(),
  result: z.string().optional(),
  structured_output: z.record(z.unknown()).nullable().optional(),
  usage: usageSchema.optional(),
});

/** The parts of an envelope the retry loop acts on */
export interface ParsedEnvelope {
  structuredOutput: StructuredResult;
  totalTokens: number;
  isError: boolean;
  /** Tool-reported message when `isError` is set */
  errorMessage: string;
}

/**
 * Parses CLI stdout into a ParsedEnvelope.
 *
 * @throws {AgentCliError} MALFORMED_RESPONSE when stdout is not JSON
 *         or not an envelope
 */
export function parseEnvelope(stdout: string): ParsedEnvelope {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch (err) {
    throw new AgentCliError(
      `Failed to parse CLI response: ${errorMessage(err)}`,
      'MALFORMED_RESPONSE',
      false,
    );
  }

  const parsed = envelopeSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new AgentCliError(
      `CLI response does not match the expected envelope: ${issues}`,
      'MALFORMED_RESPONSE',
      false,
    );
  }

  const envelope = parsed.data;
  const usage = envelope.usage ?? usageSchema.parse({});

  return {
    structuredOutput: envelope.structured_output ?? {},
    totalTokens: totalTokens(usage),
    isError: envelope.is_error === true,
    errorMessage: envelope.result ?? 'CLI reported an error',
  };
}

/**
 * Lists the `required` fields of a schema that the payload lacks.
 */
export function missingRequiredFields(
  payload: StructuredResult,
  schema: ResponseSchema,
): string[] {
  const required = Array.isArray(schema.required) ? schema.required : [];
  return required.filter((field) => !(field in payload));
}
