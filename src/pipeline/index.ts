import type {
  BookMetadata,
  Config,
  ProgressCallback,
  RunReport,
  TokenUsage,
  TranslationBackend,
  TranslationEstimate,
} from "../types.js";
import * as logger from "../utils/logger.js";
import { cleanText } from "../utils/text_utils.js";
import { countTokens } from "../utils/token_utils.js";
import { calculateCost } from "../config/models.js";
import {
  EpubDocument,
  type BookDocument,
} from "../document/epub_document.js";
import { XhtmlPart, countTextUnits } from "../document/xhtml_part.js";
import { chunkBudget } from "../splitter/index.js";
import {
  loadPromptTemplate,
  type PromptTemplate,
} from "../translator/prompt_generator.js";
import { createBackend } from "../translator/backends.js";
import { buildTranslationJobs, translateText } from "../translator/index.js";
import { formatBilingualParagraph } from "../finalizer/bilingual_formatter.js";
import { ProgressCounter } from "./progress.js";
import { resolveBookMetadata } from "./metadata.js";

export { resolveBookMetadata, FALLBACK_AUTHOR, FALLBACK_TITLE } from "./metadata.js";
export { ProgressCounter } from "./progress.js";

export interface WalkOptions {
  backend: TranslationBackend;
  template: PromptTemplate;
  metadata: BookMetadata;
  targetLanguage: string;
  genre: string;
  model: string;
  tokenLimit: number;
  bilingual?: boolean;
  locale?: string;
  maxRetries?: number;
  delaySeconds?: number;
  sleep?: (ms: number) => Promise<void>;
  onProgress?: ProgressCallback;
}

export type WalkResult = Omit<
  RunReport,
  "outputPath" | "metadata" | "estimatedCost" | "durationSeconds"
>;

/**
 * Number of paragraph elements across every part; the progress total.
 */
export function countParagraphs(document: BookDocument): number {
  return document.parts.reduce(
    (sum, part) => sum + countTextUnits(part.content),
    0
  );
}

/**
 * Translates every paragraph of an open document in place, one part, one
 * paragraph and one chunk at a time.
 */
export async function translateDocument(
  document: BookDocument,
  options: WalkOptions
): Promise<WalkResult> {
  const total = countParagraphs(document);
  const progress = new ProgressCounter(total, options.onProgress);
  const usage: TokenUsage = { inputTokens: 0, outputTokens: 0 };
  const result: WalkResult = {
    paragraphs: { total, translated: 0, skippedEmpty: 0 },
    chunks: { total: 0, translated: 0, dropped: 0 },
    backendAttempts: 0,
    usage,
  };
  logger.info(
    `Translating ${total} paragraph(s) in ${document.parts.length} part(s) to ${options.targetLanguage}.`
  );

  for (const part of document.parts) {
    const markup = XhtmlPart.load(part.content);
    const units = markup.textUnits();
    logger.debug(`[${part.name}] ${units.length} paragraph(s)`);

    for (const unit of units) {
      const paragraphNumber = progress.current + 1;
      const cleanParagraph = cleanText(unit.originalText);

      if (cleanParagraph) {
        const translated = await translateText(cleanParagraph, {
          backend: options.backend,
          template: options.template,
          targetLanguage: options.targetLanguage,
          genre: options.genre,
          metadata: options.metadata,
          model: options.model,
          tokenLimit: options.tokenLimit,
          locale: options.locale,
          maxRetries: options.maxRetries,
          delaySeconds: options.delaySeconds,
          sleep: options.sleep,
          label: `[Paragraph ${paragraphNumber}/${total}]`,
        });

        if (options.bilingual) {
          unit.replaceWithMarkup(
            formatBilingualParagraph(cleanParagraph, translated.text)
          );
        } else {
          unit.replaceWithText(translated.text);
        }

        result.paragraphs.translated++;
        result.chunks.total += translated.chunksTotal;
        result.chunks.dropped += translated.chunksDropped;
        result.chunks.translated +=
          translated.chunksTotal - translated.chunksDropped;
        result.backendAttempts += translated.attempts;
        usage.inputTokens += translated.usage.inputTokens;
        usage.outputTokens += translated.usage.outputTokens;
      } else {
        result.paragraphs.skippedEmpty++;
      }

      progress.advance();
    }

    part.content = markup.serialize();
  }

  if (result.chunks.dropped > 0) {
    logger.warn(
      `${result.chunks.dropped} of ${result.chunks.total} chunk(s) failed every attempt and were left out.`
    );
  }
  return result;
}

export interface EstimateOptions {
  template: PromptTemplate;
  metadata: BookMetadata;
  targetLanguage: string;
  genre: string;
  model: string;
  tokenLimit: number;
  locale?: string;
}

/**
 * Counts what a run would send without calling a backend or touching the
 * document.
 */
export function estimateDocument(
  document: BookDocument,
  options: EstimateOptions
): TranslationEstimate {
  const budget = chunkBudget(options.tokenLimit);
  const estimate: TranslationEstimate = {
    metadata: options.metadata,
    parts: document.parts.length,
    paragraphs: 0,
    emptyParagraphs: 0,
    chunks: 0,
    oversizedChunks: 0,
    promptTokens: 0,
    estimatedCost: 0,
  };

  for (const part of document.parts) {
    for (const unit of XhtmlPart.load(part.content).textUnits()) {
      estimate.paragraphs++;
      const cleanParagraph = cleanText(unit.originalText);
      if (!cleanParagraph) {
        estimate.emptyParagraphs++;
        continue;
      }
      for (const job of buildTranslationJobs(cleanParagraph, options)) {
        estimate.chunks++;
        if (job.chunk.tokenCount > budget) estimate.oversizedChunks++;
        estimate.promptTokens += countTokens(job.prompt);
      }
    }
  }

  // Output is assumed to be about as long as the input text.
  estimate.estimatedCost = calculateCost(
    options.model,
    estimate.promptTokens,
    estimate.promptTokens
  );
  return estimate;
}

export interface TranslateBookDeps {
  backend?: TranslationBackend;
  onProgress?: ProgressCallback;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Full run: load the template, open the book, translate it, write the
 * result. Template, configuration and document problems reject the promise;
 * backend failures only drop chunks.
 */
export async function translateBook(
  config: Config,
  deps: TranslateBookDeps = {}
): Promise<RunReport> {
  const startTime = Date.now();

  const template = await loadPromptTemplate(config.templatePath);
  const backend = deps.backend ?? createBackend(config);
  const document = await EpubDocument.open(config.inputPath);

  const metadata = resolveBookMetadata(document.metadata, {
    title: config.overrideTitle,
    author: config.overrideAuthor,
  });
  logger.info(`Book: "${metadata.title}" by ${metadata.author}`);

  if (config.updateMetadata) {
    if (config.overrideTitle.trim()) {
      document.setMetadata("title", config.overrideTitle.trim());
    }
    if (config.overrideAuthor.trim()) {
      document.setMetadata("creator", config.overrideAuthor.trim());
    }
  }

  const walk = await translateDocument(document, {
    backend,
    template,
    metadata,
    targetLanguage: config.targetLanguage,
    genre: config.genre,
    model: config.model,
    tokenLimit: config.tokenLimit,
    bilingual: config.bilingual,
    locale: config.sourceLocale,
    maxRetries: config.retries,
    delaySeconds: config.retryDelaySeconds,
    sleep: deps.sleep,
    onProgress: deps.onProgress,
  });

  await document.save(config.outputPath);
  logger.success(`Translated book written to ${config.outputPath}`);

  return {
    ...walk,
    outputPath: config.outputPath,
    metadata,
    estimatedCost: calculateCost(
      config.model,
      walk.usage.inputTokens,
      walk.usage.outputTokens
    ),
    durationSeconds: (Date.now() - startTime) / 1000,
  };
}

/**
 * Dry run over a book file: no backend, no output.
 */
export async function estimateBook(config: Config): Promise<TranslationEstimate> {
  const template = await loadPromptTemplate(config.templatePath);
  const document = await EpubDocument.open(config.inputPath);
  const metadata = resolveBookMetadata(document.metadata, {
    title: config.overrideTitle,
    author: config.overrideAuthor,
  });
  return estimateDocument(document, {
    template,
    metadata,
    targetLanguage: config.targetLanguage,
    genre: config.genre,
    model: config.model,
    tokenLimit: config.tokenLimit,
    locale: config.sourceLocale,
  });
}
