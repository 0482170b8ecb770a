/**
 * InvoiceParser – Text engine
 *
 * Orchestrates page-text providers with fallback chain logic.
 * Default precedence: pdfjs → plain-text
 *
 * Providers can be added via InvoiceParser.configure({ textProvider }).
 */

import type { RawPage } from "../schema/InvoiceRecord";
import { InvoiceParserError } from "../core/validator";
import { tokenizePage } from "../parser/primitives";
import type { InvoiceParserLogger } from "../utils/logger";
import { silentLogger } from "../utils/logger";
import type { DocumentSource, TextProvider } from "./TextProvider";
import { TextExtractionError } from "./TextProvider";
import { PdfTextProvider } from "./PdfTextProvider";
import { PlainTextProvider } from "./PlainTextProvider";

// ─── Registry ────────────────────────────────────────────────────────────────

const _registry = new Map<string, TextProvider>();

// Register built-in providers
_registry.set("pdfjs", new PdfTextProvider());
_registry.set("plain-text", new PlainTextProvider());

/** Default provider resolution order */
const DEFAULT_PROVIDER_ORDER = ["pdfjs", "plain-text"];

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Register a custom text provider.
 * It is tried before the built-in ones.
 */
export function registerTextProvider(provider: TextProvider): void {
  _registry.set(provider.name, provider);
}

/**
 * Remove a provider. Built-in providers can be replaced but not removed.
 */
export function unregisterTextProvider(name: string): boolean {
  if (DEFAULT_PROVIDER_ORDER.includes(name)) return false;
  return _registry.delete(name);
}

/**
 * Retrieve a registered provider by name.
 */
export function getTextProvider(name: string): TextProvider | undefined {
  return _registry.get(name);
}

// ─── Engine ──────────────────────────────────────────────────────────────────

export class TextEngine {
  private readonly logger: InvoiceParserLogger;
  private readonly preferredProvider: string | undefined;

  constructor(logger: InvoiceParserLogger = silentLogger, preferredProvider?: string) {
    this.logger = logger;
    this.preferredProvider = preferredProvider;
  }

  /**
   * Read every page of a document as RawPages.
   *
   * @throws InvoiceParserError `DOCUMENT_UNREADABLE` when no provider
   *         produces any text
   */
  async readDocument(source: DocumentSource): Promise<RawPage[]> {
    let texts: string[];
    try {
      texts = await this.run(source);
    } catch (err) {
      throw new InvoiceParserError(
        `Document unreadable: ${source.documentId} (${err instanceof Error ? err.message : String(err)})`,
        "DOCUMENT_UNREADABLE",
        err,
      );
    }

    const pages = texts.map((text, i) => tokenizePage(text, i + 1, source.documentId));
    if (pages.every((p) => p.lines.length === 0)) {
      throw new InvoiceParserError(
        `Document unreadable: ${source.documentId} has no text layer`,
        "DOCUMENT_UNREADABLE",
      );
    }

    this.logger.debug(`Read ${pages.length} page(s) from ${source.documentId}`);
    return pages;
  }

  /**
   * Lines of one page (1-based), trimmed and never blank.
   *
   * @throws InvoiceParserError `DOCUMENT_UNREADABLE`, also when the page
   *         does not exist
   */
  async getPageLines(source: DocumentSource, pageIndex: number): Promise<string[]> {
    const pages = await this.readDocument(source);
    const page = pages.find((p) => p.pageIndex === pageIndex);
    if (!page) {
      throw new InvoiceParserError(
        `Document unreadable: ${source.documentId} has no page ${pageIndex}`,
        "DOCUMENT_UNREADABLE",
      );
    }
    return [...page.lines];
  }

  /**
   * Run the best available provider for the source.
   * Falls back to the next provider if one is unavailable or fails.
   */
  async run(source: DocumentSource): Promise<string[]> {
    const order = this.buildProviderOrder();

    let lastError: Error = new TextExtractionError(
      `No text provider supports ${source.documentId}`,
      "TextEngine",
    );

    for (const key of order) {
      const provider = _registry.get(key);
      if (!provider || !provider.supports(source)) continue;

      try {
        const available = await provider.isAvailable();
        if (!available) {
          this.logger.debug(`Text provider '${key}' is not available – skipping`);
          continue;
        }

        this.logger.info(`Extracting text with provider: ${key}`);
        const pages = await provider.extractPages(source);
        this.logger.debug(`Text result (${key}): ${pages.length} page(s)`);
        return pages;
      } catch (err) {
        this.logger.warn(
          `Text provider '${key}' failed: ${err instanceof Error ? err.message : String(err)}`,
        );
        lastError = err instanceof Error ? err : new Error(String(err));
      }
    }

    throw lastError;
  }

  private buildProviderOrder(): string[] {
    const builtIn = new Set(DEFAULT_PROVIDER_ORDER);
    const custom = Array.from(_registry.keys()).filter((k) => !builtIn.has(k));
    const order = [...custom, ...DEFAULT_PROVIDER_ORDER];
    if (this.preferredProvider) {
      return [this.preferredProvider, ...order.filter((k) => k !== this.preferredProvider)];
    }
    return order;
  }
}
