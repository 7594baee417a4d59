/**
 * Rough, model-agnostic token estimate: about four characters per token.
 * Used both for admission checks and for post-call accounting.
 */
export function estimateTokens(text: string): number {
  if (text.trim().length === 0) {
    return 0;
  }

  return Math.ceil(text.length / 4);
}
