import * as cheerio from "cheerio";

/** Elements treated as translatable paragraphs. */
export const PARAGRAPH_SELECTOR = "p";

/**
 * One paragraph element of a part. It is a position in the part's markup, so
 * writes go straight into the owning XhtmlPart.
 */
export interface TextUnit {
  readonly index: number;
  readonly originalText: string;
  replaceWithText(text: string): void;
  replaceWithMarkup(markup: string): void;
}

/**
 * Parsed markup of one document part.
 */
export class XhtmlPart {
  private readonly $: cheerio.CheerioAPI;

  private constructor(content: string) {
    this.$ = cheerio.load(content, { xmlMode: true });
  }

  static load(content: string): XhtmlPart {
    return new XhtmlPart(content);
  }

  textUnits(): TextUnit[] {
    const $ = this.$;
    return $(PARAGRAPH_SELECTOR)
      .toArray()
      .map((element, index) => {
        const node = $(element);
        return {
          index,
          originalText: node.text(),
          replaceWithText(text: string) {
            node.text(text);
          },
          replaceWithMarkup(markup: string) {
            node.html(markup);
          },
        };
      });
  }

  serialize(): string {
    return this.$.xml();
  }
}

export function countTextUnits(content: string): number {
  const $ = cheerio.load(content, { xmlMode: true });
  return $(PARAGRAPH_SELECTOR).length;
}
