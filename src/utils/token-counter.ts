// Token counting utility for usage reporting
// The backend does not report usage for agent turns, so the HTTP facade estimates it

// Rule of thumb: ~4 characters per token for English text
const CHARS_PER_TOKEN = 4;

/**
 * Approximate token count of a string.
 */
export function countTokens(text: string): number {
  if (!text) return 0;

  const baseTokens = Math.ceil(text.length / CHARS_PER_TOKEN);

  // Adjust for whitespace (tokens often break on whitespace)
  const whitespaceBoost = (text.match(/\s+/g) || []).length * 0.1;

  // Adjust for special characters and punctuation
  const specialCharBoost = (text.match(/[^\w\s]/g) || []).length * 0.05;

  return Math.ceil(baseTokens + whitespaceBoost + specialCharBoost);
}

export interface UsageEstimate {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export function estimateUsage(prompt: string, completion: string): UsageEstimate {
  const promptTokens = countTokens(prompt);
  const completionTokens = countTokens(completion);
  return {
    prompt_tokens: promptTokens,
    completion_tokens: completionTokens,
    total_tokens: promptTokens + completionTokens,
  };
}
