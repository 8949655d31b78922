import type { MetadataSink, UsageBreakdown, UsageUpdate } from '../shared/types';

/** Sums the four token counters of a CLI usage block. */
export function totalTokens(usage: UsageBreakdown): number {
  return (
    usage.input_tokens +
    usage.cache_creation_input_tokens +
    usage.cache_read_input_tokens +
    usage.output_tokens
  );
}

/**
 * In-memory metadata sink that accumulates usage across calls.
 */
export class UsageTracker implements MetadataSink {
  private tokens = 0;
  private requests = 0;

  updateMetadata(update: UsageUpdate): void {
    this.tokens += update.llmTokensUsed;
    this.requests += update.llmRequestCount;
  }

  get tokensUsed(): number {
    return this.tokens;
  }

  get requestCount(): number {
    return this.requests;
  }

  snapshot(): { totalTokens: number; requestCount: number } {
    return { totalTokens: this.tokens, requestCount: this.requests };
  }
}
