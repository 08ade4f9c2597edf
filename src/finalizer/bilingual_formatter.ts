import { escapeXml } from "../utils/text_utils.js";

export const ORIGINAL_MARKER = "ORIGINAL: ";
export const TRANSLATION_MARKER = "TRANSLATION: ";
export const BILINGUAL_SEPARATOR = "<br/><br/>";

/**
 * Paragraph markup for bilingual output: the original, a blank line, then the
 * translation in italics. Both texts are escaped.
 */
export function formatBilingualParagraph(
  original: string,
  translation: string
): string {
  return (
    `${ORIGINAL_MARKER}${escapeXml(original)}` +
    BILINGUAL_SEPARATOR +
    `<i>${TRANSLATION_MARKER}${escapeXml(translation)}</i>`
  );
}
