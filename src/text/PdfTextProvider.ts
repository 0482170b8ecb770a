/**
 * InvoiceParser – pdf.js text provider
 *
 * Reads the embedded text layer of digitally generated PDFs with
 * pdfjs-dist. Image-only pages come back empty; OCR is out of scope.
 *
 * pdfjs-dist is loaded lazily, so hosts that only feed pre-extracted text
 * never pay for it.
 */

import type * as PdfJs from "pdfjs-dist";
import type { TextItem, TextMarkedContent } from "pdfjs-dist/types/src/display/api";
import type { DocumentSource, TextProvider } from "./TextProvider";
import { TextExtractionError } from "./TextProvider";

type PdfJsModule = typeof PdfJs;

function getPdfJs(): PdfJsModule | null {
  try {
    // Legacy build: CommonJS and no DOM globals required
    // eslint-disable-next-line @typescript-eslint/no-var-requires
    return require("pdfjs-dist/legacy/build/pdf.js") as PdfJsModule;
  } catch {
    return null;
  }
}

function isTextItem(item: TextItem | TextMarkedContent): item is TextItem {
  return "str" in item;
}

/**
 * Rebuild the page's lines from its text runs. pdf.js flags the run that
 * ends a line with `hasEOL`.
 */
export function textItemsToPageText(items: ReadonlyArray<TextItem | TextMarkedContent>): string {
  let text = "";
  for (const item of items) {
    if (!isTextItem(item)) continue;
    text += item.str;
    text += item.hasEOL ? "\n" : " ";
  }
  return text;
}

export class PdfTextProvider implements TextProvider {
  readonly name = "pdfjs";

  async isAvailable(): Promise<boolean> {
    return getPdfJs() !== null;
  }

  supports(source: DocumentSource): boolean {
    if (source.mimeType) return source.mimeType === "application/pdf";
    return /\.pdf$/i.test(source.documentId) || this.hasPdfSignature(source.data);
  }

  async extractPages(source: DocumentSource): Promise<string[]> {
    const pdfjs = getPdfJs();
    if (!pdfjs) {
      throw new TextExtractionError(
        "pdfjs-dist is not installed. Run: npm install pdfjs-dist",
        this.name,
      );
    }

    let doc: PdfJs.PDFDocumentProxy | null = null;
    try {
      doc = await pdfjs.getDocument({
        // pdf.js takes ownership of the buffer it is given
        data: new Uint8Array(source.data),
        useSystemFonts: true,
        disableFontFace: true,
        isEvalSupported: false,
      }).promise;

      const pages: string[] = [];
      for (let i = 1; i <= doc.numPages; i++) {
        const page = await doc.getPage(i);
        const content = await page.getTextContent();
        pages.push(textItemsToPageText(content.items));
        page.cleanup();
      }
      return pages;
    } catch (err) {
      throw new TextExtractionError(
        `Could not read ${source.documentId}: ${err instanceof Error ? err.message : String(err)}`,
        this.name,
        err,
      );
    } finally {
      if (doc) await doc.destroy();
    }
  }

  private hasPdfSignature(data: Uint8Array): boolean {
    // "%PDF"
    return data[0] === 0x25 && data[1] === 0x50 && data[2] === 0x44 && data[3] === 0x46;
  }
}
