import type { ProviderName } from "../types.js";

/**
 * Defines cost structure for LLM models.
 * Costs are per million tokens.
 */
export interface ModelCost {
  inputCostPerMillionTokens: number;
  outputCostPerMillionTokens: number;
}

/**
 * Known hosted model costs (USD per 1 million tokens). Local Ollama models
 * are absent and cost nothing.
 */
export const MODEL_COSTS: Record<string, ModelCost> = {
  "claude-sonnet-4-5": {
    inputCostPerMillionTokens: 3,
    outputCostPerMillionTokens: 15,
  },
  "claude-3-5-sonnet-20240620": {
    inputCostPerMillionTokens: 3,
    outputCostPerMillionTokens: 15,
  },
  "claude-3-5-haiku-20241022": {
    inputCostPerMillionTokens: 0.8,
    outputCostPerMillionTokens: 4,
  },
  "claude-3-haiku-20240307": {
    inputCostPerMillionTokens: 0.25,
    outputCostPerMillionTokens: 1.25,
  },
  "gemini-2.5-pro": {
    inputCostPerMillionTokens: 1.25,
    outputCostPerMillionTokens: 10.0,
  },
  "gemini-2.5-flash": {
    inputCostPerMillionTokens: 0.3,
    outputCostPerMillionTokens: 2.5,
  },
  "gemini-2.0-flash": {
    inputCostPerMillionTokens: 0.1,
    outputCostPerMillionTokens: 0.4,
  },
};

/**
 * Picks a backend from the model identifier. Anything that is not a Claude or
 * Gemini model is assumed to be served by Ollama.
 */
export function inferProvider(modelName: string): ProviderName {
  const name = modelName.toLowerCase();
  if (name.includes("claude")) return "anthropic";
  if (name.includes("gemini")) return "gemini";
  return "ollama";
}

/**
 * Calculates the cost of an LLM call.
 *
 * @returns The cost in USD, or 0 if the model has no known pricing.
 */
export function calculateCost(
  modelName: string,
  inputTokens: number,
  outputTokens: number
): number {
  const costs = MODEL_COSTS[modelName];
  if (!costs) return 0;

  const inputCost = (inputTokens / 1_000_000) * costs.inputCostPerMillionTokens;
  const outputCost =
    (outputTokens / 1_000_000) * costs.outputCostPerMillionTokens;

  return inputCost + outputCost;
}

export function hasKnownCost(modelName: string): boolean {
  return modelName in MODEL_COSTS;
}
