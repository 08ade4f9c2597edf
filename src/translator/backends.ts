import type { Config, TranslationBackend } from "../types.js";
import { ConfigError } from "../utils/errors.js";
import { createClaudeBackend } from "./claude_translator.js";
import { createGeminiBackend } from "./gemini_translator.js";
import { createOllamaBackend } from "./ollama_translator.js";

/**
 * Creates the backend for the configured provider. Hosted providers need an
 * API key; a missing one is a configuration error.
 */
export function createBackend(
  config: Pick<
    Config,
    "provider" | "apiKeys" | "ollamaHost" | "timeoutSeconds"
  >
): TranslationBackend {
  switch (config.provider) {
    case "anthropic": {
      const apiKey = config.apiKeys.anthropic;
      if (!apiKey) {
        throw new ConfigError(
          "Anthropic API key is required for Claude models. Provide via --anthropic-api-key or ANTHROPIC_API_KEY env var."
        );
      }
      return createClaudeBackend({
        apiKey,
        timeoutSeconds: config.timeoutSeconds,
      });
    }
    case "gemini": {
      const apiKey = config.apiKeys.gemini;
      if (!apiKey) {
        throw new ConfigError(
          "Gemini API key is required for Gemini models. Provide via --gemini-api-key or GEMINI_API_KEY env var."
        );
      }
      return createGeminiBackend({
        apiKey,
        timeoutSeconds: config.timeoutSeconds,
      });
    }
    case "ollama":
      return createOllamaBackend({ host: config.ollamaHost });
  }
}
