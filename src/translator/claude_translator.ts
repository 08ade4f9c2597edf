import { Anthropic } from "@anthropic-ai/sdk";
import type { BackendRequest, BackendResponse } from "../types.js";
import * as logger from "../utils/logger.js";

const MAX_OUTPUT_TOKENS = 8192;

export interface ClaudeBackendOptions {
  apiKey: string;
  timeoutSeconds?: number;
}

/**
 * Builds a backend that streams one user message to a Claude model and
 * collects the text deltas. API errors are thrown to the retry loop.
 */
export function createClaudeBackend(options: ClaudeBackendOptions) {
  const client = new Anthropic({
    apiKey: options.apiKey,
    timeout:
      options.timeoutSeconds !== undefined
        ? options.timeoutSeconds * 1000
        : undefined,
    maxRetries: 0, // Retries are handled by the translation invoker
  });

  return async function callClaude(
    request: BackendRequest
  ): Promise<BackendResponse> {
    logger.debug(`Calling Claude model (stream): ${request.model}...`);

    let responseText = "";
    const stream = client.messages.stream({
      model: request.model,
      max_tokens: MAX_OUTPUT_TOKENS,
      messages: [{ role: "user", content: request.prompt }],
    });
    stream.on("text", (textDelta) => {
      responseText += textDelta;
    });

    const finalMessage = await stream.finalMessage();
    const inputTokens = finalMessage.usage.input_tokens;
    const outputTokens = finalMessage.usage.output_tokens;
    logger.debug(
      `Claude tokens - Input: ${inputTokens}, Output: ${outputTokens}`
    );

    if (!responseText.trim()) {
      logger.warn("Claude stream response was empty.");
      return { responseText: null, inputTokens, outputTokens };
    }
    return { responseText, inputTokens, outputTokens };
  };
}
