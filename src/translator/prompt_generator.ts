import { readFile } from "fs/promises";
import { existsSync } from "fs";
import * as logger from "../utils/logger.js";
import { ConfigError, errorMessage } from "../utils/errors.js";

/** Names a prompt template may reference as `{{ name }}`. */
export const TEMPLATE_VARIABLES = [
  "language",
  "text",
  "genre",
  "title",
  "author",
] as const;

export type TemplateVariable = (typeof TEMPLATE_VARIABLES)[number];

export type PromptValues = Record<TemplateVariable, string>;

// Anything between double braces, so unsupported expressions are caught too.
const PLACEHOLDER_PATTERN = /{{\s*([^{}]*?)\s*}}/g;

/** A template that has been checked against TEMPLATE_VARIABLES. */
export interface PromptTemplate {
  source: string;
  path?: string;
  variables: TemplateVariable[];
}

function isTemplateVariable(name: string): name is TemplateVariable {
  const names: readonly string[] = TEMPLATE_VARIABLES;
  return names.includes(name);
}

/**
 * Checks a template's placeholders. Throws ConfigError on any reference that
 * rendering could not fill.
 */
export function parsePromptTemplate(
  source: string,
  path?: string
): PromptTemplate {
  const where = path ? ` in ${path}` : "";
  if (!source.trim()) {
    throw new ConfigError(`Prompt template is empty${where}.`);
  }

  const variables: TemplateVariable[] = [];
  const unknown: string[] = [];
  for (const match of source.matchAll(PLACEHOLDER_PATTERN)) {
    const name = match[1];
    if (isTemplateVariable(name)) {
      if (!variables.includes(name)) variables.push(name);
    } else if (!unknown.includes(name)) {
      unknown.push(name);
    }
  }

  if (unknown.length > 0) {
    throw new ConfigError(
      `Prompt template references undefined placeholder(s)${where}: ${unknown
        .map((name) => `{{ ${name} }}`)
        .join(", ")}. Allowed: ${TEMPLATE_VARIABLES.join(", ")}.`
    );
  }
  if (!variables.includes("text")) {
    logger.warn(
      `Prompt template${where} has no {{ text }} placeholder; chunk text will not be sent to the model.`
    );
  }

  return { source, path, variables };
}

/**
 * Loads and validates the prompt template file.
 */
export async function loadPromptTemplate(
  templatePath: string
): Promise<PromptTemplate> {
  if (!existsSync(templatePath)) {
    throw new ConfigError(`Prompt template file not found: ${templatePath}`);
  }
  let source: string;
  try {
    source = await readFile(templatePath, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Failed to read prompt template ${templatePath}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
  const template = parsePromptTemplate(source, templatePath);
  logger.debug(
    `Loaded prompt template from ${templatePath} (placeholders: ${template.variables.join(", ")})`
  );
  return template;
}

/**
 * Fills every placeholder of the template.
 */
export function renderPrompt(
  template: PromptTemplate,
  values: PromptValues
): string {
  return template.source.replace(PLACEHOLDER_PATTERN, (whole, name: string) =>
    isTemplateVariable(name) ? values[name] : whole
  );
}
