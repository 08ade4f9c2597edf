import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { writeFile } from "fs/promises";
import { join } from "path";
import type {
  BackendRequest,
  BackendResponse,
  Config,
  TranslationBackend,
} from "../types.js";
import type { BookDocument } from "../document/epub_document.js";
import { EpubDocument } from "../document/epub_document.js";
import { parsePromptTemplate } from "../translator/prompt_generator.js";
import { ConfigError, DocumentError } from "../utils/errors.js";
import { countTokens } from "../utils/token_utils.js";
import { calculateCost } from "../config/models.js";
import { makeTempDir, writeEpub, xhtml } from "../test/epub_fixtures.js";
import {
  countParagraphs,
  estimateDocument,
  resolveBookMetadata,
  translateBook,
  translateDocument,
  ProgressCounter,
  FALLBACK_AUTHOR,
  FALLBACK_TITLE,
  type WalkOptions,
} from "./index.js";

const template = parsePromptTemplate("{{ text }}");

function bookOf(...bodies: string[]): BookDocument {
  return {
    metadata: { title: "Stub", creator: "Stub Author" },
    parts: bodies.map((body, i) => ({
      name: `OEBPS/ch${i + 1}.xhtml`,
      content: xhtml(body),
    })),
  };
}

function fixedBackend(responseText: string | null) {
  return vi.fn(
    async (_req: BackendRequest): Promise<BackendResponse> => ({ responseText })
  );
}

function walkOptions(
  backend: TranslationBackend,
  overrides: Partial<WalkOptions> = {}
): WalkOptions {
  return {
    backend,
    template,
    metadata: { title: "Stub", author: "Stub Author" },
    targetLanguage: "English",
    genre: "General",
    model: "test-model",
    tokenLimit: 512,
    sleep: async () => {},
    ...overrides,
  };
}

describe("translateDocument", () => {
  it("translates non-empty paragraphs and reports progress for every paragraph", async () => {
    const document = bookOf("<p>Hello world.</p><p></p>");
    const backend = fixedBackend("Halo dunia.");
    const progress: Array<[number, number]> = [];

    const result = await translateDocument(
      document,
      walkOptions(backend, {
        onProgress: (current, total) => progress.push([current, total]),
      })
    );

    expect(backend).toHaveBeenCalledTimes(1);
    expect(backend).toHaveBeenCalledWith({
      model: "test-model",
      prompt: "Hello world.",
    });
    expect(progress).toEqual([
      [1, 2],
      [2, 2],
    ]);
    expect(result.paragraphs).toEqual({
      total: 2,
      translated: 1,
      skippedEmpty: 1,
    });
    expect(result.chunks).toEqual({ total: 1, translated: 1, dropped: 0 });
    expect(result.backendAttempts).toBe(1);
    expect(document.parts[0].content).toContain("<p>Halo dunia.</p>");
  });

  it("keeps the original above the translation in bilingual mode", async () => {
    const document = bookOf("<p>Bonjour</p>");

    await translateDocument(
      document,
      walkOptions(fixedBackend("Hello"), { bilingual: true })
    );

    expect(document.parts[0].content).toContain(
      "<p>ORIGINAL: Bonjour<br/><br/><i>TRANSLATION: Hello</i></p>"
    );
  });

  it("replaces nested markup with the translated plain text", async () => {
    const document = bookOf("<p>Hello <b>bold</b> world.</p>");
    const backend = fixedBackend("Halo dunia tebal.");

    await translateDocument(document, walkOptions(backend));

    expect(backend).toHaveBeenCalledWith({
      model: "test-model",
      prompt: "Hello bold world.",
    });
    expect(document.parts[0].content).toContain("<p>Halo dunia tebal.</p>");
    expect(document.parts[0].content).not.toContain("<b>");
  });

  it("leaves whitespace-only paragraphs untouched", async () => {
    const document = bookOf("<p>   </p><p>Text.</p>");
    const backend = fixedBackend("Teks.");

    const result = await translateDocument(document, walkOptions(backend));

    expect(backend).toHaveBeenCalledTimes(1);
    expect(result.paragraphs.skippedEmpty).toBe(1);
    expect(document.parts[0].content).toContain("<p>   </p><p>Teks.</p>");
  });

  it("does not throw when every attempt fails; the paragraph ends up empty", async () => {
    const document = bookOf("<p>Hello world.</p>");
    const backend = vi.fn(async (): Promise<BackendResponse> => {
      throw new Error("connection refused");
    });

    const result = await translateDocument(
      document,
      walkOptions(backend, { maxRetries: 2 })
    );

    expect(backend).toHaveBeenCalledTimes(2);
    expect(result.chunks).toEqual({ total: 1, translated: 0, dropped: 1 });
    expect(result.backendAttempts).toBe(2);
    expect(result.paragraphs.translated).toBe(1);
    expect(document.parts[0].content).toMatch(/<body><p(><\/p>|\/>)<\/body>/);
  });

  it("walks parts in order and numbers paragraphs across them", async () => {
    const document = bookOf("<p>One.</p>", "<p>Two.</p><p>Three.</p>");
    const backend = vi.fn(
      async (req: BackendRequest): Promise<BackendResponse> => ({
        responseText: req.prompt.toUpperCase(),
      })
    );
    const progress: number[] = [];

    const result = await translateDocument(
      document,
      walkOptions(backend, { onProgress: (current) => progress.push(current) })
    );

    expect(backend.mock.calls.map(([req]) => req.prompt)).toEqual([
      "One.",
      "Two.",
      "Three.",
    ]);
    expect(progress).toEqual([1, 2, 3]);
    expect(result.paragraphs.total).toBe(3);
    expect(document.parts[0].content).toContain("<p>ONE.</p>");
    expect(document.parts[1].content).toContain("<p>TWO.</p><p>THREE.</p>");
  });

  it("passes book metadata and settings into the prompt", async () => {
    const document = bookOf("<p>Hi.</p>");
    const backend = fixedBackend("Hai.");

    await translateDocument(
      document,
      walkOptions(backend, {
        template: parsePromptTemplate(
          "{{ language }}/{{ genre }}/{{ title }}/{{ author }}: {{ text }}"
        ),
        targetLanguage: "Indonesian",
        genre: "Fantasy",
        metadata: { title: "A Title", author: "An Author" },
      })
    );

    expect(backend).toHaveBeenCalledWith({
      model: "test-model",
      prompt: "Indonesian/Fantasy/A Title/An Author: Hi.",
    });
  });
});

describe("countParagraphs", () => {
  it("sums paragraph elements over every part", () => {
    expect(countParagraphs(bookOf("<p>a</p><p></p>", "<div>x</div>", "<p>b</p>"))).toBe(3);
  });
});

describe("ProgressCounter", () => {
  it("refuses to advance past the total", () => {
    const counter = new ProgressCounter(1);
    counter.advance();
    expect(counter.current).toBe(1);
    expect(() => counter.advance()).toThrow(/Progress overflow/);
  });
});

describe("resolveBookMetadata", () => {
  it("prefers non-empty overrides", () => {
    expect(
      resolveBookMetadata(
        { title: "Book", creator: "Writer" },
        { title: " Other ", author: "Someone" }
      )
    ).toEqual({ title: "Other", author: "Someone" });
  });

  it("uses the document values when overrides are empty", () => {
    expect(
      resolveBookMetadata(
        { title: "Book", creator: "Writer" },
        { title: "", author: "   " }
      )
    ).toEqual({ title: "Book", author: "Writer" });
  });

  it("falls back when the document has no metadata", () => {
    expect(resolveBookMetadata({ title: null, creator: null })).toEqual({
      title: FALLBACK_TITLE,
      author: FALLBACK_AUTHOR,
    });
  });
});

describe("estimateDocument", () => {
  it("counts paragraphs, chunks and prompt tokens without changing the book", () => {
    const document = bookOf("<p>Hello world.</p><p> </p>");
    const before = document.parts[0].content;

    const estimate = estimateDocument(document, {
      template,
      metadata: { title: "Stub", author: "Stub Author" },
      targetLanguage: "English",
      genre: "General",
      model: "claude-3-haiku-20240307",
      tokenLimit: 512,
    });

    const promptTokens = countTokens("Hello world.");
    expect(estimate).toEqual({
      metadata: { title: "Stub", author: "Stub Author" },
      parts: 1,
      paragraphs: 2,
      emptyParagraphs: 1,
      chunks: 1,
      oversizedChunks: 0,
      promptTokens,
      estimatedCost: calculateCost(
        "claude-3-haiku-20240307",
        promptTokens,
        promptTokens
      ),
    });
    expect(document.parts[0].content).toBe(before);
  });

  it("flags single sentences above the chunk budget", () => {
    const estimate = estimateDocument(
      bookOf("<p>This sentence is certainly longer than two tokens.</p>"),
      {
        template,
        metadata: { title: "Stub", author: "Stub Author" },
        targetLanguage: "English",
        genre: "General",
        model: "test-model",
        tokenLimit: 4,
      }
    );
    expect(estimate.chunks).toBe(1);
    expect(estimate.oversizedChunks).toBe(1);
    expect(estimate.estimatedCost).toBe(0);
  });
});

describe("translateBook", () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  async function setup(overrides: Partial<Config> = {}): Promise<Config> {
    const inputPath = await writeEpub(dir, "book.epub", {
      title: "Source Title",
      creator: "Source Author",
      chapters: [
        { id: "c1", href: "ch1.xhtml", body: "<p>Good morning.</p><p/>" },
        { id: "c2", href: "ch2.xhtml", body: "<h1>Two</h1><p>Good night.</p>" },
      ],
    });
    const templatePath = join(dir, "prompt.template");
    await writeFile(templatePath, "Translate to {{ language }}: {{ text }}");
    return {
      inputPath,
      outputPath: join(dir, "out", "book_German.epub"),
      templatePath,
      targetLanguage: "German",
      model: "test-model",
      provider: "ollama",
      tokenLimit: 512,
      genre: "General",
      bilingual: false,
      overrideTitle: "",
      overrideAuthor: "",
      updateMetadata: false,
      sourceLocale: "en",
      retries: 3,
      retryDelaySeconds: 0,
      apiKeys: {},
      dryRun: false,
      ...overrides,
    };
  }

  const uppercaseBackend = () =>
    vi.fn(
      async (req: BackendRequest): Promise<BackendResponse> => ({
        responseText: req.prompt.replace("Translate to German: ", "").toUpperCase(),
        inputTokens: 10,
        outputTokens: 5,
      })
    );

  it("writes a translated copy and reports the run", async () => {
    const config = await setup();
    const backend = uppercaseBackend();
    const progress: number[] = [];

    const report = await translateBook(config, {
      backend,
      onProgress: (current) => progress.push(current),
    });

    expect(report.outputPath).toBe(config.outputPath);
    expect(report.metadata).toEqual({
      title: "Source Title",
      author: "Source Author",
    });
    expect(report.paragraphs).toEqual({ total: 3, translated: 2, skippedEmpty: 1 });
    expect(report.chunks).toEqual({ total: 2, translated: 2, dropped: 0 });
    expect(report.usage).toEqual({ inputTokens: 20, outputTokens: 10 });
    expect(report.estimatedCost).toBe(0);
    expect(progress).toEqual([1, 2, 3]);

    const output = await EpubDocument.open(config.outputPath);
    expect(output.parts.map((p) => p.name)).toEqual([
      "OEBPS/ch1.xhtml",
      "OEBPS/ch2.xhtml",
    ]);
    expect(output.parts[0].content).toContain("<p>GOOD MORNING.</p>");
    expect(output.parts[1].content).toContain("<h1>Two</h1><p>GOOD NIGHT.</p>");
    // Overrides are not written without updateMetadata.
    expect(output.metadata.title).toBe("Source Title");
  });

  it("uses overrides in prompts and writes them back when asked", async () => {
    const config = await setup({
      overrideTitle: "Neuer Titel",
      overrideAuthor: "Neue Autorin",
      updateMetadata: true,
    });

    const report = await translateBook(config, { backend: uppercaseBackend() });

    expect(report.metadata).toEqual({
      title: "Neuer Titel",
      author: "Neue Autorin",
    });
    const output = await EpubDocument.open(config.outputPath);
    expect(output.metadata).toEqual({
      title: "Neuer Titel",
      creator: "Neue Autorin",
    });
  });

  it("leaves the input book unchanged", async () => {
    const config = await setup();
    await translateBook(config, { backend: uppercaseBackend() });

    const input = await EpubDocument.open(config.inputPath);
    expect(input.parts[0].content).toContain("<p>Good morning.</p>");
  });

  it("fails with a ConfigError before any backend call when the template is missing", async () => {
    const config = await setup({ templatePath: join(dir, "missing.template") });
    const backend = uppercaseBackend();

    await expect(translateBook(config, { backend })).rejects.toBeInstanceOf(
      ConfigError
    );
    expect(backend).not.toHaveBeenCalled();
  });

  it("fails with a DocumentError when the input is not an EPUB", async () => {
    const config = await setup();
    await writeFile(config.inputPath, "this is not a zip archive");
    const backend = uppercaseBackend();

    await expect(translateBook(config, { backend })).rejects.toBeInstanceOf(
      DocumentError
    );
    expect(backend).not.toHaveBeenCalled();
  });
});
