#!/usr/bin/env node

import { realpathSync } from "fs";
import { fileURLToPath } from "url";
import { Command } from "commander";
import chalk from "chalk";
import boxen from "boxen";
import cliProgress from "cli-progress";
import type { Config, RunReport, TranslationEstimate } from "./types.js";
import * as logger from "./utils/logger.js";
import { PipelineError, errorMessage } from "./utils/errors.js";
import { resolveConfig, DEFAULTS, PRESETS, type CliOptions } from "./config/index.js";
import { hasKnownCost } from "./config/models.js";
import { estimateBook, translateBook } from "./pipeline/index.js";

type MainOptions = CliOptions & {
  logFile?: string;
  logLevel: string;
};

function buildProgram(): Command {
  return new Command()
    .name("epub-translate")
    .description(
      "Translate an EPUB paragraph by paragraph with a language model, keeping its markup"
    )
    .version("1.0.0")
    .requiredOption("-i, --input <path>", "Path to the source EPUB")
    .requiredOption("-o, --output <path>", "Path for the translated EPUB")
    .requiredOption(
      "-t, --template <path>",
      "Prompt template using {{ language }}, {{ text }}, {{ genre }}, {{ title }}, {{ author }}"
    )
    .option(
      "-l, --language <lang>",
      `Target language (default: ${DEFAULTS.targetLanguage})`
    )
    .option("-m, --model <name>", `Model identifier (default: ${DEFAULTS.model})`)
    .option(
      "--provider <name>",
      "Backend: auto, ollama, anthropic or gemini (auto picks from the model name)"
    )
    .option(
      "-k, --token-limit <n>",
      `Model token limit; half of it is the chunk budget (default: ${DEFAULTS.tokenLimit})`
    )
    .option("-g, --genre <genre>", `Book genre (default: ${DEFAULTS.genre})`)
    .option("-b, --bilingual", "Keep the original text above each translation")
    .option("--title <title>", "Override the book title used in prompts")
    .option("--author <author>", "Override the book author used in prompts")
    .option(
      "--update-metadata",
      "Also write --title/--author into the output book's metadata"
    )
    .option(
      "--source-locale <locale>",
      `Locale for sentence splitting (default: ${DEFAULTS.sourceLocale})`
    )
    .option(
      "-r, --retries <n>",
      `Attempts per chunk before it is skipped (default: ${DEFAULTS.retries})`
    )
    .option(
      "--retry-delay <seconds>",
      `Wait between attempts (default: ${DEFAULTS.retryDelaySeconds})`
    )
    .option("--timeout <seconds>", "Request timeout for hosted backends")
    .option("--ollama-host <url>", "Ollama server (or use OLLAMA_HOST env var)")
    .option(
      "--anthropic-api-key <key>",
      "Anthropic API key (or use ANTHROPIC_API_KEY env var)"
    )
    .option(
      "--gemini-api-key <key>",
      "Gemini API key (or use GEMINI_API_KEY env var)"
    )
    .option(
      "--preset <name>",
      `Model preset: ${Object.keys(PRESETS).join(", ")}. Individual options still override it.`
    )
    .option(
      "--dry-run",
      "Count paragraphs, chunks and prompt tokens without calling a backend"
    )
    .option("--log-file <path>", "Also write logs (debug level) to this file")
    .option("--log-level <level>", "Console log level (debug, info, warn, error)", "info")
    .addHelpText(
      "after",
      `
Examples:
  # Local model through Ollama
  epub-translate -i novel.epub -o novel_id.epub -t prompt.template -l Indonesian -m llama3.2

  # Claude, bilingual output, overriding the author
  epub-translate --preset claude -i novel.epub -o novel_fr.epub -t prompt.template -l French -b --author "A. Writer"

  # See how many chunks and tokens a run would take
  epub-translate -i novel.epub -o novel_id.epub -t prompt.template --dry-run
    `
    );
}

function formatRunReport(config: Config, report: RunReport): string {
  let reportContent = `Book: "${report.metadata.title}" by ${report.metadata.author}\n`;
  reportContent += `- Output: ${report.outputPath}\n`;
  reportContent += `- Paragraphs: ${report.paragraphs.total} (${report.paragraphs.translated} translated, ${report.paragraphs.skippedEmpty} empty)\n`;
  reportContent += `- Chunks: ${report.chunks.translated} / ${report.chunks.total} translated`;
  if (report.chunks.dropped > 0) {
    reportContent += chalk.red(` (${report.chunks.dropped} dropped)`);
  }
  reportContent += `\n- Backend attempts: ${report.backendAttempts}\n`;
  reportContent += `- Tokens: ${report.usage.inputTokens} in / ${report.usage.outputTokens} out\n`;
  if (hasKnownCost(config.model)) {
    reportContent += `- Estimated cost: $${report.estimatedCost.toFixed(4)} (Model: ${config.model})\n`;
  }
  reportContent += `- Duration: ${report.durationSeconds.toFixed(1)}s`;
  return reportContent;
}

function formatEstimate(config: Config, estimate: TranslationEstimate): string {
  let reportContent = `Book: "${estimate.metadata.title}" by ${estimate.metadata.author}\n`;
  reportContent += `- Parts: ${estimate.parts}\n`;
  reportContent += `- Paragraphs: ${estimate.paragraphs} (${estimate.emptyParagraphs} empty)\n`;
  reportContent += `- Chunks: ${estimate.chunks} at ${Math.floor(
    config.tokenLimit / 2
  )} tokens max`;
  if (estimate.oversizedChunks > 0) {
    reportContent += chalk.yellow(
      ` (${estimate.oversizedChunks} single sentence(s) over budget)`
    );
  }
  reportContent += `\n- Prompt tokens: ~${estimate.promptTokens}\n`;
  if (hasKnownCost(config.model)) {
    reportContent += `- Estimated cost: ~$${estimate.estimatedCost.toFixed(4)} (Model: ${config.model})\n`;
  }
  reportContent += `(Note: token counts use the cl100k_base encoding and are estimates.)`;
  return reportContent;
}

async function run(config: Config): Promise<void> {
  if (config.dryRun) {
    const estimate = await estimateBook(config);
    console.log(
      boxen(formatEstimate(config, estimate), {
        padding: 1,
        margin: 1,
        borderColor: "cyan",
        title: "Dry Run Estimate",
      })
    );
    return;
  }

  // --- Progress Bar Setup ---
  const multibar = new cliProgress.MultiBar(
    {
      clearOnComplete: false,
      hideCursor: true,
      format: `${chalk.cyan(
        "{bar}"
      )} | {percentage}% | {value}/{total} Paragraphs | ETA: {eta_formatted}`,
    },
    cliProgress.Presets.shades_classic
  );
  const progressBar = multibar.create(0, 0);
  logger.setActiveMultibar(multibar);

  let report: RunReport;
  try {
    report = await translateBook(config, {
      onProgress: (current, total) => {
        progressBar.setTotal(total);
        progressBar.update(current);
      },
    });
  } finally {
    multibar.stop();
    logger.setActiveMultibar(null);
  }

  logger.success(chalk.greenBright("Translation completed successfully!"));
  console.log(
    boxen(formatRunReport(config, report), {
      padding: 1,
      margin: 1,
      borderColor: report.chunks.dropped > 0 ? "yellow" : "green",
      title: "Translation Summary",
    })
  );
}

/**
 * CLI entry point. Resolves to the process exit code.
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  const program = buildProgram();
  program.parse(argv);
  const opts = program.opts<MainOptions>();

  const consoleLogLevel = logger.isLogLevel(opts.logLevel) ? opts.logLevel : "info";
  logger.configureLogger({
    logToFile: Boolean(opts.logFile),
    logFilePath: opts.logFile,
    consoleLogLevel,
    fileLogLevel: "debug",
  });
  if (consoleLogLevel !== opts.logLevel) {
    logger.warn(`Unknown log level "${opts.logLevel}"; using info.`);
  }

  try {
    const config = resolveConfig(opts);
    logger.debug(
      `Configuration: ${JSON.stringify(
        { ...config, apiKeys: { anthropic: "***", gemini: "***" } },
        null,
        2
      )}`
    );
    await run(config);
    return 0;
  } catch (err) {
    const kind = err instanceof PipelineError ? err.name : "Unexpected error";
    logger.error(
      `${kind}: ${errorMessage(err)}`,
      err instanceof Error ? err.stack : undefined
    );
    console.error(
      boxen(chalk.red(`Translation failed:\n${errorMessage(err)}`), {
        padding: 1,
        margin: 1,
        borderColor: "red",
        title: "Translation Failed",
      })
    );
    return 1;
  } finally {
    await logger.flushLogs();
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

// Run if this is the main module
if (isEntryPoint()) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    }
  );
}
