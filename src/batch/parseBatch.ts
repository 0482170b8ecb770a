/**
 * InvoiceParser – Batch driver
 *
 * Parses many documents concurrently. The vendor of each document is
 * derived from the folder it was found in. Any failure of one document is
 * recorded against that document and the rest of the batch carries on.
 */

import type { InvoiceRecord, RawPage } from "../schema/InvoiceRecord";
import { InvoiceParserError } from "../core/validator";
import type { InvoiceParserErrorCode } from "../core/validator";
import { parseDocument } from "../core/InvoiceParser";
import type { VendorDispatcher } from "../vendors/VendorDispatcher";
import { TextEngine } from "../text/TextEngine";
import type { DocumentSource } from "../text/TextProvider";
import type { InvoiceParserLogger } from "../utils/logger";
import { createLogger } from "../utils/logger";

export interface BatchDocument {
  /** Folder the document was found in, e.g. "2025/Knife River" */
  folder: string;
  source: DocumentSource;
}

/** Parser error codes, plus `PARSE_FAILED` for any other thrown error */
export type BatchFailureCode = InvoiceParserErrorCode | "PARSE_FAILED";

export type BatchResult =
  | {
      status: "parsed";
      documentId: string;
      vendorKey: string;
      records: InvoiceRecord[];
    }
  | {
      status: "failed";
      documentId: string;
      vendorKey: string;
      code: BatchFailureCode;
      message: string;
    };

export interface PageReader {
  readDocument(source: DocumentSource): Promise<RawPage[]>;
}

export interface BatchOptions {
  debug?: boolean;
  logger?: InvoiceParserLogger;
  dispatcher?: VendorDispatcher;
  /** Maps a folder to a vendor key (default: the folder's base name) */
  vendorKeyForFolder?: (folderName: string) => string;
  /** Page source (default: a TextEngine over the registered providers) */
  reader?: PageReader;
}

/** "C:\\Invoices\\2025\\Knife River\\" → "Knife River" */
export function vendorKeyForFolder(folderName: string): string {
  const segments = folderName.split(/[\\/]+/).filter((s) => s.trim().length > 0);
  return segments.length > 0 ? segments[segments.length - 1].trim() : "";
}

/**
 * Parse every document; results come back in input order. The returned
 * promise never rejects because of one document.
 */
export async function parseBatch(
  documents: readonly BatchDocument[],
  options: BatchOptions = {},
): Promise<BatchResult[]> {
  const logger = options.logger ?? createLogger(options.debug ?? false);
  const keyFor = options.vendorKeyForFolder ?? vendorKeyForFolder;
  const reader = options.reader ?? new TextEngine(logger);

  const results = await Promise.all(
    documents.map(async (doc): Promise<BatchResult> => {
      const documentId = doc.source.documentId;
      const vendorKey = keyFor(doc.folder);
      try {
        const pages = await reader.readDocument(doc.source);
        const records = parseDocument(vendorKey, pages, {
          logger,
          dispatcher: options.dispatcher,
        });
        return { status: "parsed", documentId, vendorKey, records };
      } catch (err) {
        const code: BatchFailureCode =
          err instanceof InvoiceParserError ? err.code : "PARSE_FAILED";
        const message = err instanceof Error ? err.message : String(err);
        logger.warn(`Skipped ${documentId} (${code}): ${message}`);
        return { status: "failed", documentId, vendorKey, code, message };
      }
    }),
  );

  const parsed = results.filter((r) => r.status === "parsed").length;
  logger.info(`Batch complete – ${parsed}/${results.length} document(s) parsed`);
  return results;
}
