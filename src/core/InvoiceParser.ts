/**
 * InvoiceParser – Main parsing API
 *
 * Entry point for turning page text into invoice records.
 *
 * Usage:
 *   import { InvoiceParser } from "vendor-invoice-parser";
 *
 *   const records = InvoiceParser.parseDocument("Knife River", pages);
 *
 * Advanced usage:
 *   InvoiceParser.configure({
 *     debug: true,
 *     vendors: [myQuarryRuleSet],
 *     textProvider: new MyTextProvider(),
 *   });
 *   const records = await InvoiceParser.parseFile("farwest", source);
 */

import type { InvoiceRecord, RawPage } from "../schema/InvoiceRecord";
import type { VendorRuleSet } from "../schema/RuleSet";
import type { VendorParser } from "../vendors/RuleSetVendor";
import { VendorDispatcher } from "../vendors/VendorDispatcher";
import { BUILTIN_RULE_SETS, defaultDispatcher } from "../vendors";
import type { DocumentSource, TextProvider } from "../text/TextProvider";
import { TextEngine, registerTextProvider } from "../text/TextEngine";
import type { InvoiceParserLogger } from "../utils/logger";
import { createLogger } from "../utils/logger";
import { InvoiceParserError, sanitiseRecord, validatePages } from "./validator";

// ─── Global configuration ─────────────────────────────────────────────────────

interface InvoiceParserConfig {
  /** Print debug/info logs (default: false) */
  debug: boolean;
  /** Vendor table used when a call does not bring its own */
  dispatcher: VendorDispatcher;
  /** Text provider tried first by parseFile() */
  preferredTextProvider: string | undefined;
}

const _config: InvoiceParserConfig = {
  debug: false,
  dispatcher: defaultDispatcher,
  preferredTextProvider: undefined,
};

export interface InvoiceParserConfigureOptions {
  debug?: boolean;
  /** Extra rule sets, registered alongside the built-in vendors */
  vendors?: VendorRuleSet[];
  /** Replace the vendor table entirely */
  dispatcher?: VendorDispatcher;
  /** Register a custom text provider as the primary provider */
  textProvider?: TextProvider;
}

export interface ParseOptions {
  /** Overrides the configured debug flag for this call */
  debug?: boolean;
  /** Overrides the configured vendor table for this call */
  dispatcher?: VendorDispatcher;
  /** Overrides the logger built from `debug` */
  logger?: InvoiceParserLogger;
}

export interface ParseFileOptions extends ParseOptions {
  /** Text provider to try first */
  textProvider?: string;
}

// ─── Assembly ─────────────────────────────────────────────────────────────────

function assemble(
  vendor: VendorParser,
  page: RawPage,
  logger: InvoiceParserLogger,
): InvoiceRecord {
  const fields = vendor.extractFields(page);
  const items = vendor.extractItems(page, logger);
  logger.debug(
    `Page ${page.pageIndex}: invoice '${fields.invoiceNumber}', ` +
      `job '${fields.jobName}', ${items.length} item(s)`,
  );
  return sanitiseRecord({ ...fields, page: page.pageIndex, items });
}

/**
 * All pages of a document as one page, lines concatenated in page order.
 * Item windows may run across a page break.
 */
function mergePages(pages: readonly RawPage[]): RawPage {
  const first = pages[0];
  return Object.freeze({
    documentId: first.documentId,
    pageIndex: first.pageIndex,
    lines: Object.freeze(pages.flatMap((p) => [...p.lines])),
  });
}

/**
 * Parse the pages of one document into invoice records, ordered by page.
 *
 * The vendor's topology decides the shape of the result: `perPage` vendors
 * yield one record per page, `perDocument` vendors exactly one record. The
 * result is always an array.
 *
 * @throws InvoiceParserError `UNKNOWN_VENDOR` when no rule set matches the key
 * @throws InvoiceParserError `DOCUMENT_UNREADABLE` when there are no pages
 * @throws InvoiceParserError `INVALID_INPUT` when pages are malformed
 */
export function parseDocument(
  vendorKey: string,
  pages: readonly RawPage[],
  options: ParseOptions = {},
): InvoiceRecord[] {
  const logger = options.logger ?? createLogger(options.debug ?? _config.debug);
  const dispatcher = options.dispatcher ?? _config.dispatcher;

  const vendor = dispatcher.resolve(vendorKey);
  logger.info(`Dispatched '${vendorKey}' to ${vendor.displayName} (${vendor.topology})`);

  if (pages.length === 0) {
    throw new InvoiceParserError(
      `Document unreadable: no pages to parse for ${vendor.displayName}`,
      "DOCUMENT_UNREADABLE",
    );
  }

  const validation = validatePages(pages);
  if (!validation.valid) {
    throw new InvoiceParserError(
      `Invalid pages: ${validation.errors.join("; ")}`,
      "INVALID_INPUT",
    );
  }

  const ordered = [...pages].sort((a, b) => a.pageIndex - b.pageIndex);

  if (vendor.topology === "perDocument") {
    return [assemble(vendor, mergePages(ordered), logger)];
  }
  return ordered.map((page) => assemble(vendor, page, logger));
}

// ─── InvoiceParser namespace ──────────────────────────────────────────────────

export const InvoiceParser = {
  /**
   * Globally configure defaults and register vendors and providers.
   *
   * Call this once at startup before any parse calls.
   */
  configure(options: InvoiceParserConfigureOptions): void {
    if (options.debug !== undefined) {
      _config.debug = options.debug;
    }
    if (options.dispatcher) {
      _config.dispatcher = options.dispatcher;
    } else if (options.vendors) {
      _config.dispatcher = new VendorDispatcher([...BUILTIN_RULE_SETS, ...options.vendors]);
    }
    if (options.textProvider) {
      registerTextProvider(options.textProvider);
      _config.preferredTextProvider = options.textProvider.name;
    }
  },

  /** Restore the built-in defaults. */
  reset(): void {
    _config.debug = false;
    _config.dispatcher = defaultDispatcher;
    _config.preferredTextProvider = undefined;
  },

  /** Canonical keys of every vendor the configured table knows */
  vendors(): string[] {
    return _config.dispatcher.keys();
  },

  parseDocument,

  /**
   * Read a document through the text engine, then parse it.
   *
   * @throws InvoiceParserError `DOCUMENT_UNREADABLE` when no provider can
   *         read the document
   */
  async parseFile(
    vendorKey: string,
    source: DocumentSource,
    options: ParseFileOptions = {},
  ): Promise<InvoiceRecord[]> {
    const logger = options.logger ?? createLogger(options.debug ?? _config.debug);
    const dispatcher = options.dispatcher ?? _config.dispatcher;

    // An unknown vendor is reported before any text is extracted
    dispatcher.resolve(vendorKey);

    const engine = new TextEngine(
      logger,
      options.textProvider ?? _config.preferredTextProvider,
    );
    const pages = await engine.readDocument(source);
    return parseDocument(vendorKey, pages, { ...options, logger, dispatcher });
  },
};
