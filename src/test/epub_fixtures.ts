import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import JSZip from "jszip";

export const CONTAINER_XML = `<?xml version="1.0" encoding="UTF-8"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles>
    <rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/>
  </rootfiles>
</container>`;

export function xhtml(body: string): string {
  return `<?xml version="1.0" encoding="utf-8"?>
<html xmlns="http://www.w3.org/1999/xhtml"><head><title>Chapter</title></head><body>${body}</body></html>`;
}

export interface FixtureChapter {
  id: string;
  href: string; // Relative to OEBPS/
  body: string;
  inSpine?: boolean;
}

export interface FixtureBook {
  title?: string;
  creator?: string;
  chapters: FixtureChapter[];
}

export function packageDocument(book: FixtureBook): string {
  const metadata = [
    book.title !== undefined ? `<dc:title>${book.title}</dc:title>` : "",
    book.creator !== undefined ? `<dc:creator>${book.creator}</dc:creator>` : "",
  ].join("");
  const items = book.chapters
    .map(
      (c) =>
        `<item id="${c.id}" href="${c.href}" media-type="application/xhtml+xml"/>`
    )
    .join("");
  const itemrefs = book.chapters
    .filter((c) => c.inSpine !== false)
    .map((c) => `<itemref idref="${c.id}"/>`)
    .join("");
  return `<?xml version="1.0" encoding="utf-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="3.0" unique-identifier="id">
<metadata xmlns:dc="http://purl.org/dc/elements/1.1/"><dc:identifier id="id">test-book</dc:identifier>${metadata}</metadata>
<manifest><item id="nav" href="nav.xhtml" media-type="application/xhtml+xml" properties="nav"/><item id="css" href="style.css" media-type="text/css"/>${items}</manifest>
<spine>${itemrefs}</spine>
</package>`;
}

export async function buildEpub(book: FixtureBook): Promise<Buffer> {
  const zip = new JSZip();
  zip.file("mimetype", "application/epub+zip", { compression: "STORE" });
  zip.file("META-INF/container.xml", CONTAINER_XML);
  zip.file("OEBPS/content.opf", packageDocument(book));
  zip.file(
    "OEBPS/nav.xhtml",
    xhtml(`<nav><ol><li><p>Navigation entry</p></li></ol></nav>`)
  );
  zip.file("OEBPS/style.css", "p { margin: 0; }");
  for (const chapter of book.chapters) {
    zip.file(`OEBPS/${chapter.href}`, xhtml(chapter.body));
  }
  return zip.generateAsync({ type: "nodebuffer" });
}

/** A temporary directory removed by the returned cleanup function. */
export async function makeTempDir(): Promise<{
  dir: string;
  cleanup: () => Promise<void>;
}> {
  const dir = await mkdtemp(join(tmpdir(), "epub-translate-test-"));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}

export async function writeEpub(
  dir: string,
  name: string,
  book: FixtureBook
): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, await buildEpub(book));
  return path;
}
