/**
 * AI Model Pricing Configuration
 *
 * Estimated prices in USD per 1000 tokens, used only for usage logging.
 */

export interface ModelPricing {
  inputTokenPrice: number;  // Price per 1000 input tokens
  outputTokenPrice: number; // Price per 1000 output tokens
}

export const AI_MODEL_PRICING: Record<string, ModelPricing> = {
  'gpt-4o-mini': {
    inputTokenPrice: 0.00015,
    outputTokenPrice: 0.0006
  },
  'gpt-4o': {
    inputTokenPrice: 0.0025,
    outputTokenPrice: 0.01
  },
  'gpt-4.1': {
    inputTokenPrice: 0.002,
    outputTokenPrice: 0.008
  },
  // Groq-hosted open models
  'llama-3.3-70b': {
    inputTokenPrice: 0.00059,
    outputTokenPrice: 0.00079
  },
  'llama3-70b': {
    inputTokenPrice: 0.00059,
    outputTokenPrice: 0.00079
  },
  'llama-3.1-8b': {
    inputTokenPrice: 0.00005,
    outputTokenPrice: 0.00008
  },
  'mixtral-8x7b': {
    inputTokenPrice: 0.00024,
    outputTokenPrice: 0.00024
  },
  'default': {
    inputTokenPrice: 0.001,
    outputTokenPrice: 0.002
  }
};

/**
 * Get pricing for a specific model. Keys are matched as substrings of the model
 * name in table order, so more specific keys are listed first.
 */
export function getModelPricing(model: string): ModelPricing {
  const exact = AI_MODEL_PRICING[model];
  if (exact) {
    return exact;
  }

  const lowered = model.toLowerCase();
  for (const [key, pricing] of Object.entries(AI_MODEL_PRICING)) {
    if (key !== 'default' && lowered.includes(key)) {
      return pricing;
    }
  }

  return AI_MODEL_PRICING.default;
}

export function calculateTokenCost(
  model: string,
  inputTokens: number,
  outputTokens: number
): { inputCost: number; outputCost: number; totalCost: number } {
  const pricing = getModelPricing(model);

  const inputCost = (inputTokens / 1000) * pricing.inputTokenPrice;
  const outputCost = (outputTokens / 1000) * pricing.outputTokenPrice;

  return {
    inputCost: Math.round(inputCost * 10000) / 10000, // 4 decimal places
    outputCost: Math.round(outputCost * 10000) / 10000,
    totalCost: Math.round((inputCost + outputCost) * 10000) / 10000
  };
}
