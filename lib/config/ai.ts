/**
 * OpenAI configuration and pricing.
 *
 * The key comes from OPENAI_API_KEY; the model can be overridden with
 * OPENAI_MODEL_NAME.
 */

/**
 * Get the OpenAI model name to use for structuring.
 * Defaults to "gpt-4o-mini" (cost-effective, good for structured extraction).
 */
export function getAiModelName(env: NodeJS.ProcessEnv = process.env): string {
  return env.OPENAI_MODEL_NAME || "gpt-4o-mini";
}

/** USD per token. */
export type ModelPrice = {
  input: number;
  cachedInput: number;
  output: number;
};

export const MODEL_PRICES: Record<string, ModelPrice> = {
  "gpt-4o": { input: 0.0000025, cachedInput: 0.00000125, output: 0.00001 },
  "gpt-4o-mini": { input: 0.00000015, cachedInput: 0.000000075, output: 0.0000006 },
  "gpt-4.1": { input: 0.000002, cachedInput: 0.0000005, output: 0.000008 },
  "gpt-4.1-mini": { input: 0.0000004, cachedInput: 0.0000001, output: 0.0000016 },
};

export type TokenUsage = {
  promptTokens: number;
  cachedPromptTokens: number;
  completionTokens: number;
};

/**
 * Estimated cost of one completion. Unknown models cost 0 (and are logged
 * by the caller), cached prompt tokens are billed at the cached rate.
 */
export function estimateCostUsd(model: string, usage: TokenUsage): number {
  const price = MODEL_PRICES[model];
  if (!price) return 0;

  const uncached = Math.max(usage.promptTokens - usage.cachedPromptTokens, 0);
  return (
    uncached * price.input +
    usage.cachedPromptTokens * price.cachedInput +
    usage.completionTokens * price.output
  );
}
