import type { TextChunk } from "../types.js";
import { cleanText } from "../utils/text_utils.js";
import { countTokens } from "../utils/token_utils.js";
import * as logger from "../utils/logger.js";
import { DEFAULT_LOCALE, splitIntoSentences } from "./sentence_splitter.js";

export { splitIntoSentences } from "./sentence_splitter.js";

export interface SplitOptions {
  locale?: string;
  countTokens?: (text: string) => number;
}

/**
 * Share of the model token limit given to chunk text. The other half is left
 * for the prompt scaffolding and the response; this is a heuristic, not a
 * measured bound on template overhead.
 */
export function chunkBudget(tokenLimit: number): number {
  return Math.floor(tokenLimit / 2);
}

/**
 * Packs sentences into chunks that stay within `maxTokens`.
 *
 * Sentences are never split: one whose own estimate exceeds the budget is
 * emitted as a chunk of its own.
 */
export function splitTextByTokens(
  text: string,
  maxTokens: number,
  options: SplitOptions = {}
): TextChunk[] {
  const count = options.countTokens ?? countTokens;
  const sentences = splitIntoSentences(text, options.locale ?? DEFAULT_LOCALE);

  const chunks: TextChunk[] = [];
  let currentChunk: string[] = [];
  let currentLength = 0;

  const flush = () => {
    if (currentChunk.length === 0) return;
    chunks.push({ text: currentChunk.join(" "), tokenCount: currentLength });
  };

  for (const sentence of sentences) {
    const sentenceCleaned = cleanText(sentence);
    if (!sentenceCleaned) continue;
    const sentenceLength = count(sentenceCleaned);

    if (currentLength + sentenceLength > maxTokens) {
      flush();
      currentChunk = [sentenceCleaned];
      currentLength = sentenceLength;
      if (sentenceLength > maxTokens) {
        logger.debug(
          `Sentence of ${sentenceLength} tokens exceeds chunk budget ${maxTokens}; sending it whole.`
        );
      }
    } else {
      currentChunk.push(sentenceCleaned);
      currentLength += sentenceLength;
    }
  }
  flush();

  return chunks;
}
