import { getEncoding, type Tiktoken } from "js-tiktoken";

/** Encoding used for every chunk-fitting decision, whatever the backend. */
export const TOKEN_ENCODING = "cl100k_base";

let encoder: Tiktoken | null = null;

function getEncoder(): Tiktoken {
  if (!encoder) {
    encoder = getEncoding(TOKEN_ENCODING);
  }
  return encoder;
}

/**
 * Estimates how many tokens a language model would count for `text`.
 */
export function countTokens(text: string): number {
  if (!text) return 0;
  return getEncoder().encode(text).length;
}
