import { existsSync } from "fs";
import { resolve } from "path";
import type { Config, ProviderName } from "../types.js";
import { ConfigError } from "../utils/errors.js";
import { inferProvider } from "./models.js";

export const DEFAULTS = {
  targetLanguage: "Indonesian",
  model: "llama3.2",
  tokenLimit: 512,
  genre: "General",
  retries: 3,
  retryDelaySeconds: 2.0,
  sourceLocale: "en",
} as const;

// Define preset type
export type PresetConfig = {
  provider: ProviderName;
  model: string;
  tokenLimit: number;
};

// Define presets
export const PRESETS: Record<string, PresetConfig> = {
  local: {
    provider: "ollama",
    model: "llama3.2",
    tokenLimit: 512,
  },
  claude: {
    provider: "anthropic",
    model: "claude-sonnet-4-5",
    tokenLimit: 8000,
  },
  gemini: {
    provider: "gemini",
    model: "gemini-2.5-flash",
    tokenLimit: 8000,
  },
};

/** Raw option values as commander hands them over (all strings or flags). */
export type CliOptions = {
  input?: string;
  output?: string;
  template?: string;
  language?: string;
  model?: string;
  provider?: string;
  tokenLimit?: string;
  genre?: string;
  bilingual?: boolean;
  title?: string;
  author?: string;
  updateMetadata?: boolean;
  sourceLocale?: string;
  retries?: string;
  retryDelay?: string;
  timeout?: string;
  ollamaHost?: string;
  anthropicApiKey?: string;
  geminiApiKey?: string;
  preset?: string;
  dryRun?: boolean;
};

export type Env = Record<string, string | undefined>;

const PROVIDER_CHOICES = ["auto", "ollama", "anthropic", "gemini"] as const;

function requireText(value: string | undefined, option: string): string {
  const trimmed = value?.trim();
  if (!trimmed) {
    throw new ConfigError(`Missing required option ${option}.`);
  }
  return trimmed;
}

function parseInteger(
  value: string | undefined,
  option: string,
  fallback: number,
  min: number
): number {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ConfigError(
      `${option} must be an integer of at least ${min} (got "${value}").`
    );
  }
  return parsed;
}

function parseSeconds(
  value: string | undefined,
  option: string
): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new ConfigError(
      `${option} must be a non-negative number of seconds (got "${value}").`
    );
  }
  return parsed;
}

type ProviderChoice = (typeof PROVIDER_CHOICES)[number];

function isProviderChoice(value: string): value is ProviderChoice {
  const choices: readonly string[] = PROVIDER_CHOICES;
  return choices.includes(value);
}

function resolveProvider(value: string | undefined, model: string): ProviderName {
  const choice = value ?? "auto";
  if (!isProviderChoice(choice)) {
    throw new ConfigError(
      `Unknown provider "${choice}". Choose one of: ${PROVIDER_CHOICES.join(", ")}.`
    );
  }
  return choice === "auto" ? inferProvider(model) : choice;
}

/**
 * Builds a validated Config from CLI options, an optional preset and the
 * environment. Explicit options override the preset.
 */
export function resolveConfig(opts: CliOptions, env: Env = process.env): Config {
  let preset: PresetConfig | undefined;
  if (opts.preset) {
    preset = PRESETS[opts.preset];
    if (!preset) {
      throw new ConfigError(
        `Unknown preset "${opts.preset}". Available presets: ${Object.keys(
          PRESETS
        ).join(", ")}`
      );
    }
  }

  const inputPath = requireText(opts.input, "--input");
  if (!existsSync(inputPath)) {
    throw new ConfigError(`Input book does not exist: ${inputPath}`);
  }
  const templatePath = requireText(opts.template, "--template");
  const targetLanguage = requireText(
    opts.language ?? DEFAULTS.targetLanguage,
    "--language"
  );
  const model = requireText(
    opts.model ?? preset?.model ?? DEFAULTS.model,
    "--model"
  );
  const genre = requireText(opts.genre ?? DEFAULTS.genre, "--genre");
  const outputPath = requireText(opts.output, "--output");
  if (resolve(outputPath) === resolve(inputPath)) {
    throw new ConfigError("Output path must differ from the input path.");
  }

  const provider =
    opts.provider !== undefined || opts.model !== undefined || !preset
      ? resolveProvider(opts.provider, model)
      : preset.provider;

  return {
    inputPath,
    outputPath,
    templatePath,
    targetLanguage,
    model,
    provider,
    tokenLimit: parseInteger(
      opts.tokenLimit,
      "--token-limit",
      preset?.tokenLimit ?? DEFAULTS.tokenLimit,
      2
    ),
    genre,
    bilingual: opts.bilingual ?? false,
    overrideTitle: opts.title?.trim() ?? "",
    overrideAuthor: opts.author?.trim() ?? "",
    updateMetadata: opts.updateMetadata ?? false,
    sourceLocale: opts.sourceLocale?.trim() || DEFAULTS.sourceLocale,
    retries: parseInteger(opts.retries, "--retries", DEFAULTS.retries, 1),
    retryDelaySeconds:
      parseSeconds(opts.retryDelay, "--retry-delay") ??
      DEFAULTS.retryDelaySeconds,
    timeoutSeconds: parseSeconds(opts.timeout, "--timeout"),
    ollamaHost: opts.ollamaHost || env.OLLAMA_HOST,
    apiKeys: {
      anthropic: opts.anthropicApiKey || env.ANTHROPIC_API_KEY,
      gemini: opts.geminiApiKey || env.GEMINI_API_KEY,
    },
    dryRun: opts.dryRun ?? false,
  };
}
