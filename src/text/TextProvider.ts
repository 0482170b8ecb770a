/**
 * InvoiceParser – Page-text provider abstraction
 *
 * A provider turns one source document into the text of each of its
 * pages. Swapping providers (pdf.js, pre-extracted text, a host's own
 * extractor) never touches the parsing core.
 */

export interface DocumentSource {
  /** Identifier carried into every RawPage, usually the file name */
  documentId: string;
  data: Uint8Array;
  /** e.g. "application/pdf", "text/plain" */
  mimeType?: string;
}

/**
 * Every page-text provider must implement this contract.
 */
export interface TextProvider {
  /** Unique provider identifier – used to look up by key */
  readonly name: string;

  /** Return `true` if the provider can run in the current process */
  isAvailable(): Promise<boolean>;

  /** Return `true` if the provider understands this kind of document */
  supports(source: DocumentSource): boolean;

  /**
   * Text of every page, in page order.
   *
   * Implementations must wrap failures in TextExtractionError.
   */
  extractPages(source: DocumentSource): Promise<string[]>;
}

/**
 * Typed error thrown by text providers.
 */
export class TextExtractionError extends Error {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly cause?: unknown,
  ) {
    super(`[${provider}] ${message}`);
    this.name = "TextExtractionError";
  }
}
