export const DEFAULT_LOCALE = "en";

const ENDS_WITH_WHITESPACE = /\s$/;

/**
 * Splits text into sentences with `Intl.Segmenter`. Segments keep their
 * trailing whitespace, so callers clean them before use.
 *
 * A boundary is only kept where whitespace follows it: segments such as
 * "Really?" in "Really?Yes." or "晴れ。" in "晴れ。雨。" are merged into the
 * next one, so joining sentences with a space never adds characters.
 * @param text Normalized paragraph text
 * @param locale BCP 47 locale used for the sentence boundary rules
 */
export function splitIntoSentences(
  text: string,
  locale: string = DEFAULT_LOCALE
): string[] {
  if (!text) return [];
  const segmenter = new Intl.Segmenter(locale, { granularity: "sentence" });

  const sentences: string[] = [];
  let pending = "";
  for (const { segment } of segmenter.segment(text)) {
    pending += segment;
    if (ENDS_WITH_WHITESPACE.test(pending)) {
      sentences.push(pending);
      pending = "";
    }
  }
  if (pending) sentences.push(pending);
  return sentences;
}
