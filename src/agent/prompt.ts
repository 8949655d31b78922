// ============================================================
// Doc Analyzer - Prompt & Argument Assembly
// ============================================================

import type { AgentServiceConfig, ResponseSchema } from '../shared/types';

/**
 * Prepends an enumerated list of image file references to the prompt
 * so the CLI reads each file with its Read tool. Returns the prompt
 * unchanged when there are no images.
 */
export function buildPromptWithImages(prompt: string, imagePaths: string[]): string {
  if (imagePaths.length === 0) {
    return prompt;
  }

  const imageRefs = imagePaths
    .map((imagePath, i) => `- Image ${i + 1}: ${imagePath}`)
    .join('\n');

  return `The following images are provided for analysis. Use the Read tool to view them:
${imageRefs}

${prompt}`;
}

type CliArgsConfig = Pick<AgentServiceConfig, 'model' | 'tools' | 'permissionMode'>;

/**
 * Builds the argument vector for a single non-interactive CLI call.
 */
export function buildCliArgs(
  prompt: string,
  responseSchema: ResponseSchema,
  config: CliArgsConfig,
): string[] {
  return [
    '-p', prompt,
    '--output-format', 'json',
    '--json-schema', JSON.stringify(responseSchema),
    '--tools', config.tools.join(','),
    '--permission-mode', config.permissionMode,
    '--model', config.model,
  ];
}
