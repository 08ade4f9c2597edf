import type {
  BookMetadata,
  ChunkTranslationResult,
  ParagraphTranslationResult,
  TokenUsage,
  TranslationBackend,
  TranslationJob,
} from "../types.js";
import * as logger from "../utils/logger.js";
import { errorMessage } from "../utils/errors.js";
import { chunkBudget, splitTextByTokens } from "../splitter/index.js";
import { renderPrompt, type PromptTemplate } from "./prompt_generator.js";

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_DELAY_SECONDS = 2.0;

const delay = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

export interface InvokeOptions {
  model: string;
  maxRetries?: number; // Total attempts
  delaySeconds?: number; // Fixed wait between attempts
  sleep?: (ms: number) => Promise<void>;
  label?: string; // Log prefix, e.g. "[Paragraph 3, chunk 1/2]"
}

function emptyUsage(): TokenUsage {
  return { inputTokens: 0, outputTokens: 0 };
}

/**
 * Sends one prompt to the backend, retrying with a fixed delay.
 *
 * Backend failures never escape: after the last failed attempt the result
 * has `text: null` and the caller drops the chunk.
 */
export async function translateChunk(
  prompt: string,
  backend: TranslationBackend,
  options: InvokeOptions
): Promise<ChunkTranslationResult> {
  const maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_MAX_RETRIES);
  const waitMs = (options.delaySeconds ?? DEFAULT_RETRY_DELAY_SECONDS) * 1000;
  const sleep = options.sleep ?? delay;
  const label = options.label ? `${options.label} ` : "";
  const usage = emptyUsage();

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    logger.debug(`${label}Translation attempt ${attempt}/${maxRetries}`);
    try {
      const response = await backend({ model: options.model, prompt });
      usage.inputTokens += response.inputTokens ?? 0;
      usage.outputTokens += response.outputTokens ?? 0;

      if (typeof response.responseText === "string") {
        return {
          text: response.responseText.trim(),
          attempts: attempt,
          usage,
        };
      }
      logger.warn(
        `${label}Translation attempt ${attempt} failed: response had no text.`
      );
    } catch (error) {
      logger.error(
        `${label}Translation attempt ${attempt} failed: ${errorMessage(error)}`,
        error instanceof Error ? error.stack : undefined
      );
    }

    if (attempt < maxRetries) {
      logger.info(`${label}Retrying in ${waitMs / 1000}s...`);
      await sleep(waitMs);
    }
  }

  logger.error(
    `${label}Translation failed after ${maxRetries} attempts. Skipping chunk.`
  );
  return { text: null, attempts: maxRetries, usage };
}

export interface TranslateTextContext {
  backend: TranslationBackend;
  template: PromptTemplate;
  targetLanguage: string;
  genre: string;
  metadata: BookMetadata;
  model: string;
  tokenLimit: number;
  locale?: string;
  maxRetries?: number;
  delaySeconds?: number;
  sleep?: (ms: number) => Promise<void>;
  label?: string;
}

/**
 * Builds the translation jobs for a paragraph: one rendered prompt per chunk.
 */
export function buildTranslationJobs(
  text: string,
  context: Omit<
    TranslateTextContext,
    "backend" | "model" | "maxRetries" | "delaySeconds" | "sleep" | "label"
  >
): TranslationJob[] {
  const chunks = splitTextByTokens(text, chunkBudget(context.tokenLimit), {
    locale: context.locale,
  });
  return chunks.map((chunk) => ({
    chunk,
    prompt: renderPrompt(context.template, {
      language: context.targetLanguage,
      text: chunk.text,
      genre: context.genre,
      title: context.metadata.title,
      author: context.metadata.author,
    }),
  }));
}

/**
 * Translates a paragraph chunk by chunk, strictly in order, and joins the
 * chunks that succeeded with single spaces.
 */
export async function translateText(
  text: string,
  context: TranslateTextContext
): Promise<ParagraphTranslationResult> {
  const result: ParagraphTranslationResult = {
    text: "",
    chunksTotal: 0,
    chunksDropped: 0,
    attempts: 0,
    usage: emptyUsage(),
  };
  const trimmed = text.trim();
  if (!trimmed) return result;

  const jobs = buildTranslationJobs(trimmed, context);
  result.chunksTotal = jobs.length;
  const translatedChunks: string[] = [];
  const prefix = context.label ?? "";

  for (const [index, job] of jobs.entries()) {
    const chunkResult = await translateChunk(job.prompt, context.backend, {
      model: context.model,
      maxRetries: context.maxRetries,
      delaySeconds: context.delaySeconds,
      sleep: context.sleep,
      label: `${prefix}[Chunk ${index + 1}/${jobs.length}]`,
    });
    result.attempts += chunkResult.attempts;
    result.usage.inputTokens += chunkResult.usage.inputTokens;
    result.usage.outputTokens += chunkResult.usage.outputTokens;

    if (chunkResult.text === null) {
      result.chunksDropped++;
      continue;
    }
    translatedChunks.push(chunkResult.text);
  }

  result.text = translatedChunks.join(" ");
  return result;
}
