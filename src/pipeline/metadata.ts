import type { BookMetadata } from "../types.js";
import type { DocumentMetadata } from "../document/epub_document.js";

export const FALLBACK_TITLE = "Unknown Title";
export const FALLBACK_AUTHOR = "Unknown Author";

function pick(
  override: string | undefined,
  fromDocument: string | null,
  fallback: string
): string {
  if (override && override.trim()) return override.trim();
  if (fromDocument && fromDocument.trim()) return fromDocument.trim();
  return fallback;
}

/**
 * Title and author for prompts: a non-empty override wins, then the book's
 * own metadata, then a fixed fallback.
 */
export function resolveBookMetadata(
  documentMetadata: DocumentMetadata,
  overrides: { title?: string; author?: string } = {}
): BookMetadata {
  return {
    title: pick(overrides.title, documentMetadata.title, FALLBACK_TITLE),
    author: pick(overrides.author, documentMetadata.creator, FALLBACK_AUTHOR),
  };
}
