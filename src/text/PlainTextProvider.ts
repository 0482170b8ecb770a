/**
 * InvoiceParser – Plain-text provider
 *
 * Reads text that was extracted ahead of time (e.g. `pdftotext` output),
 * one page per form feed.
 */

import type { DocumentSource, TextProvider } from "./TextProvider";
import { TextExtractionError } from "./TextProvider";

const PAGE_BREAK = "\f";

export class PlainTextProvider implements TextProvider {
  readonly name = "plain-text";

  async isAvailable(): Promise<boolean> {
    return true;
  }

  supports(source: DocumentSource): boolean {
    if (source.mimeType) return source.mimeType.startsWith("text/");
    return /\.txt$/i.test(source.documentId);
  }

  async extractPages(source: DocumentSource): Promise<string[]> {
    let text: string;
    try {
      text = new TextDecoder("utf-8", { fatal: true }).decode(source.data);
    } catch (err) {
      throw new TextExtractionError(
        `${source.documentId} is not valid UTF-8 text`,
        this.name,
        err,
      );
    }

    const pages = text.split(PAGE_BREAK);
    // A trailing form feed closes the last page rather than opening a new one
    if (pages.length > 1 && pages[pages.length - 1].trim() === "") pages.pop();
    return pages;
  }
}
