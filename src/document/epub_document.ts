import { readFile } from "fs/promises";
import { existsSync } from "fs";
import { posix } from "path";
import JSZip from "jszip";
import * as cheerio from "cheerio";
import type { Element } from "domhandler";
import * as logger from "../utils/logger.js";
import { writeToFile } from "../utils/file_utils.js";
import { DocumentError, errorMessage } from "../utils/errors.js";

const CONTAINER_PATH = "META-INF/container.xml";
const MIMETYPE_PATH = "mimetype";
const EPUB_MIMETYPE = "application/epub+zip";
const DOCUMENT_MEDIA_TYPES = new Set(["application/xhtml+xml", "text/html"]);

export type MetadataField = "title" | "creator";

export interface DocumentMetadata {
  title: string | null;
  creator: string | null;
}

/** One content document of the book, addressed by its path in the archive. */
export interface DocumentPart {
  readonly name: string;
  content: string;
}

/**
 * What the translation walker needs from a book: its metadata and its
 * content documents in reading order. Parts are mutated in place.
 */
export interface BookDocument {
  readonly metadata: DocumentMetadata;
  readonly parts: DocumentPart[];
}

interface ManifestItem {
  id: string;
  href: string;
  mediaType: string;
  properties: string;
}

function localName(tagName: string): string {
  const name = tagName.toLowerCase();
  const colon = name.indexOf(":");
  return colon === -1 ? name : name.slice(colon + 1);
}

/** Elements matched by local name, so `dc:title` and `opf:item` both work. */
function elementsNamed($: cheerio.CheerioAPI, name: string) {
  return $<Element, "*">("*").filter((_, el) => localName(el.tagName) === name);
}

/** Resolves a manifest href against the package document's directory. */
function resolveHref(opfPath: string, href: string): string {
  const withoutFragment = href.split("#")[0];
  let decoded = withoutFragment;
  try {
    decoded = decodeURIComponent(withoutFragment);
  } catch {
    logger.warn(`Manifest href is not valid percent-encoding: ${href}`);
  }
  return posix.normalize(posix.join(posix.dirname(opfPath), decoded));
}

/**
 * Copy of `zip` that starts with an uncompressed mimetype entry, as readers
 * require. Other entries keep their order.
 */
async function withMimetypeFirst(zip: JSZip): Promise<JSZip> {
  const rebuilt = new JSZip();
  rebuilt.file(MIMETYPE_PATH, EPUB_MIMETYPE, { compression: "STORE" });
  for (const entry of Object.values(zip.files)) {
    if (entry.dir || entry.name === MIMETYPE_PATH) continue;
    rebuilt.file(entry.name, await entry.async("uint8array"));
  }
  return rebuilt;
}

/**
 * An EPUB archive held in memory for the length of a run.
 */
export class EpubDocument implements BookDocument {
  readonly parts: DocumentPart[];
  private metadataOverrides: Partial<Record<MetadataField, string>> = {};

  private constructor(
    private readonly zip: JSZip,
    private readonly opfPath: string,
    private readonly opf: cheerio.CheerioAPI,
    parts: DocumentPart[]
  ) {
    this.parts = parts;
  }

  /**
   * Reads an EPUB file. Any problem with the archive or its package document
   * is a DocumentError.
   */
  static async open(inputPath: string): Promise<EpubDocument> {
    if (!existsSync(inputPath)) {
      throw new DocumentError(`Input book does not exist: ${inputPath}`);
    }
    let data: Buffer;
    try {
      data = await readFile(inputPath);
    } catch (error) {
      throw new DocumentError(
        `Failed to read input book ${inputPath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
    return EpubDocument.fromBuffer(data, inputPath);
  }

  static async fromBuffer(
    data: Buffer | Uint8Array,
    sourceName = "<buffer>"
  ): Promise<EpubDocument> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(data);
    } catch (error) {
      throw new DocumentError(
        `${sourceName} is not a readable EPUB archive: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    if (Object.keys(zip.files)[0] !== MIMETYPE_PATH) {
      logger.warn(
        `${sourceName} does not start with a mimetype entry; it will be written first.`
      );
      zip = await withMimetypeFirst(zip);
    }

    const containerXml = await zip.file(CONTAINER_PATH)?.async("string");
    if (containerXml === undefined) {
      throw new DocumentError(`${sourceName} has no ${CONTAINER_PATH}.`);
    }
    const container = cheerio.load(containerXml, { xmlMode: true });
    const opfPath = elementsNamed(container, "rootfile")
      .first()
      .attr("full-path");
    if (!opfPath) {
      throw new DocumentError(`No rootfile found in ${CONTAINER_PATH}.`);
    }

    const opfXml = await zip.file(opfPath)?.async("string");
    if (opfXml === undefined) {
      throw new DocumentError(
        `Package document ${opfPath} is missing from ${sourceName}.`
      );
    }
    const opf = cheerio.load(opfXml, { xmlMode: true });

    const parts: DocumentPart[] = [];
    for (const name of EpubDocument.contentDocumentPaths(opf, opfPath)) {
      const content = await zip.file(name)?.async("string");
      if (content === undefined) {
        logger.warn(`Manifest lists ${name}, but it is not in the archive.`);
        continue;
      }
      parts.push({ name, content });
    }
    logger.debug(
      `Opened ${sourceName}: package ${opfPath}, ${parts.length} content document(s).`
    );

    return new EpubDocument(zip, opfPath, opf, parts);
  }

  /**
   * XHTML content documents in reading order: spine first, then any manifest
   * documents the spine leaves out. The navigation document is skipped.
   */
  private static contentDocumentPaths(
    opf: cheerio.CheerioAPI,
    opfPath: string
  ): string[] {
    const manifest = new Map<string, ManifestItem>();
    elementsNamed(opf, "item").each((_, el) => {
      const item = opf(el);
      const id = item.attr("id");
      const href = item.attr("href");
      if (!id || !href) return;
      manifest.set(id, {
        id,
        href,
        mediaType: item.attr("media-type") ?? "",
        properties: item.attr("properties") ?? "",
      });
    });

    const isContentDocument = (item: ManifestItem) =>
      DOCUMENT_MEDIA_TYPES.has(item.mediaType) &&
      !item.properties.split(/\s+/).includes("nav");

    const ordered: ManifestItem[] = [];
    elementsNamed(opf, "itemref").each((_, el) => {
      const idref = opf(el).attr("idref");
      const item = idref ? manifest.get(idref) : undefined;
      if (item && !ordered.includes(item)) ordered.push(item);
    });
    for (const item of manifest.values()) {
      if (!ordered.includes(item)) ordered.push(item);
    }

    return ordered
      .filter(isContentDocument)
      .map((item) => resolveHref(opfPath, item.href));
  }

  get metadata(): DocumentMetadata {
    return {
      title: this.readMetadata("title"),
      creator: this.readMetadata("creator"),
    };
  }

  private readMetadata(field: MetadataField): string | null {
    const override = this.metadataOverrides[field];
    if (override !== undefined) return override;
    const value = elementsNamed(this.opf, field).first().text().trim();
    return value || null;
  }

  /**
   * Replaces a metadata value in the package document written by save().
   */
  setMetadata(field: MetadataField, value: string): void {
    this.metadataOverrides[field] = value;
    const existing = elementsNamed(this.opf, field).first();
    if (existing.length > 0) {
      existing.text(value);
      return;
    }
    const metadata = elementsNamed(this.opf, "metadata").first();
    if (metadata.length === 0) {
      logger.warn(`Package document has no metadata element; ${field} not written.`);
      return;
    }
    const element = this.opf(`<dc:${field}/>`);
    element.text(value);
    metadata.append(element);
  }

  /**
   * Writes every part and the package document back into the archive and
   * saves it to `outputPath`.
   */
  async save(outputPath: string): Promise<void> {
    for (const part of this.parts) {
      this.zip.file(part.name, part.content);
    }
    this.zip.file(this.opfPath, this.opf.xml());
    // Stays the first entry; readers expect it uncompressed.
    this.zip.file(MIMETYPE_PATH, EPUB_MIMETYPE, { compression: "STORE" });

    try {
      const data = await this.zip.generateAsync({
        type: "nodebuffer",
        mimeType: EPUB_MIMETYPE,
        compression: "DEFLATE",
      });
      await writeToFile(outputPath, data);
    } catch (error) {
      throw new DocumentError(
        `Failed to write output book ${outputPath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
    logger.debug(`Saved book to ${outputPath}`);
  }
}
