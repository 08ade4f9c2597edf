// Common types shared across the translation pipeline

export type ProviderName = "ollama" | "anthropic" | "gemini";

// Configuration options
export interface Config {
  inputPath: string; // Source EPUB
  outputPath: string; // Translated EPUB
  templatePath: string; // Prompt template with {{ language }}, {{ text }}, ...
  targetLanguage: string; // e.g. "Indonesian"
  model: string; // Backend model identifier, e.g. "llama3.2"
  provider: ProviderName;
  tokenLimit: number; // Model context size; chunks get half of it
  genre: string;
  bilingual: boolean; // Keep the original text above the translation
  overrideTitle: string; // Empty string means "use the book's own title"
  overrideAuthor: string;
  updateMetadata: boolean; // Write non-empty overrides into the output package
  sourceLocale: string; // Locale for sentence segmentation
  retries: number; // Attempts per chunk (not re-tries after the first)
  retryDelaySeconds: number;
  timeoutSeconds?: number; // Per request, where the backend SDK supports it
  ollamaHost?: string;
  apiKeys: {
    anthropic?: string;
    gemini?: string;
  };
  dryRun: boolean;
}

// Title and author as used in prompts, resolved once per run
export interface BookMetadata {
  title: string;
  author: string;
}

// A sentence-aligned piece of one paragraph
export interface TextChunk {
  text: string;
  tokenCount: number;
}

// One chunk together with the prompt built for it
export interface TranslationJob {
  chunk: TextChunk;
  prompt: string;
}

export interface BackendRequest {
  model: string;
  prompt: string;
}

/**
 * What a backend hands back. `responseText` is null when the service answered
 * without usable content; transport failures are thrown.
 */
export interface BackendResponse {
  responseText: string | null;
  inputTokens?: number;
  outputTokens?: number;
}

export type TranslationBackend = (
  request: BackendRequest
) => Promise<BackendResponse>;

export type ProgressCallback = (current: number, total: number) => void;

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

/** Outcome of translating one chunk through the retry loop. */
export interface ChunkTranslationResult {
  text: string | null; // null once every attempt failed
  attempts: number;
  usage: TokenUsage;
}

/** Outcome of translating one paragraph. */
export interface ParagraphTranslationResult {
  text: string;
  chunksTotal: number;
  chunksDropped: number;
  attempts: number;
  usage: TokenUsage;
}

/** Structure for the final report */
export interface RunReport {
  outputPath?: string;
  metadata: BookMetadata;
  paragraphs: {
    total: number;
    translated: number;
    skippedEmpty: number;
  };
  chunks: {
    total: number;
    translated: number;
    dropped: number;
  };
  backendAttempts: number;
  usage: TokenUsage;
  estimatedCost: number;
  durationSeconds: number;
}

/** Result of a dry run: what a real run would send. */
export interface TranslationEstimate {
  metadata: BookMetadata;
  parts: number;
  paragraphs: number;
  emptyParagraphs: number;
  chunks: number;
  oversizedChunks: number; // Single sentences above the chunk budget
  promptTokens: number;
  estimatedCost: number;
}
