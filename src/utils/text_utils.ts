/**
 * Flattens extracted paragraph text: line breaks become spaces, curly single
 * quotes become straight apostrophes, whitespace runs collapse to one space.
 */
export function cleanText(text: string): string {
  return text
    .replace(/[\n\r]/g, " ")
    .replace(/[‘’]/g, "'")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Escapes text for use inside XHTML element content.
 */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}
