import { GoogleGenAI } from "@google/genai";
import type { BackendRequest, BackendResponse } from "../types.js";
import * as logger from "../utils/logger.js";

export interface GeminiBackendOptions {
  apiKey: string;
  timeoutSeconds?: number;
}

/**
 * Builds a backend that sends the prompt to a Gemini model with
 * generateContent and returns the text plus token counts.
 */
export function createGeminiBackend(options: GeminiBackendOptions) {
  const genAI = new GoogleGenAI({
    apiKey: options.apiKey,
    httpOptions:
      options.timeoutSeconds !== undefined
        ? { timeout: options.timeoutSeconds * 1000 }
        : undefined,
  });

  return async function callGemini(
    request: BackendRequest
  ): Promise<BackendResponse> {
    logger.debug(`Calling Gemini model: ${request.model}...`);

    const result = await genAI.models.generateContent({
      model: request.model,
      contents: [{ role: "user", parts: [{ text: request.prompt }] }],
    });

    const usageMetadata = result.usageMetadata;
    const inputTokens = usageMetadata?.promptTokenCount;
    const outputTokens = usageMetadata?.candidatesTokenCount;
    if (inputTokens !== undefined || outputTokens !== undefined) {
      logger.debug(
        `Gemini tokens - Input: ${inputTokens ?? "N/A"}, Output: ${
          outputTokens ?? "N/A"
        }`
      );
    }

    const text = result.text;
    if (!text || text.trim().length === 0) {
      const finishReason = result.candidates?.[0]?.finishReason;
      logger.warn(
        `Gemini response was empty${
          finishReason ? ` (finishReason=${finishReason})` : ""
        }.`
      );
      return { responseText: null, inputTokens, outputTokens };
    }
    return { responseText: text, inputTokens, outputTokens };
  };
}
