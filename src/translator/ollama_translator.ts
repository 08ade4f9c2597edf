import { Ollama } from "ollama";
import type { BackendRequest, BackendResponse } from "../types.js";
import * as logger from "../utils/logger.js";

export const DEFAULT_OLLAMA_HOST = "http://127.0.0.1:11434";

export interface OllamaBackendOptions {
  host?: string;
}

/**
 * Builds a backend for a locally served Ollama model (chat endpoint,
 * non-streaming).
 */
export function createOllamaBackend(options: OllamaBackendOptions = {}) {
  const client = new Ollama({ host: options.host ?? DEFAULT_OLLAMA_HOST });

  return async function callOllama(
    request: BackendRequest
  ): Promise<BackendResponse> {
    logger.debug(`Calling Ollama model: ${request.model}...`);

    const response = await client.chat({
      model: request.model,
      messages: [{ role: "user", content: request.prompt }],
    });

    const inputTokens = response.prompt_eval_count;
    const outputTokens = response.eval_count;
    const content = response.message?.content;
    if (typeof content !== "string" || !content.trim()) {
      logger.warn("Ollama response had no message content.");
      return { responseText: null, inputTokens, outputTokens };
    }
    return { responseText: content, inputTokens, outputTokens };
  };
}
