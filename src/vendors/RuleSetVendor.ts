/**
 * InvoiceParser – Vendor parser built from a rule set
 *
 * Every supported vendor exposes the same two capabilities; what differs
 * between vendors is data, not code.
 */

import type { HeaderFields, LineItem, RawPage } from "../schema/InvoiceRecord";
import { HEADER_FIELDS } from "../schema/InvoiceRecord";
import type { InvoiceTopology, VendorRuleSet } from "../schema/RuleSet";
import { BlockExtractor } from "../parser/BlockExtractor";
import { evaluateFieldRule } from "../parser/fieldRules";
import type { InvoiceParserLogger } from "../utils/logger";
import { silentLogger } from "../utils/logger";

export interface VendorParser {
  /** Canonical dispatch key */
  readonly key: string;
  readonly displayName: string;
  readonly topology: InvoiceTopology;

  /** Header fields of the page; a field no rule could fill is "" */
  extractFields(page: RawPage): HeaderFields;

  /** Line items of the page in source order (none for header-only vendors) */
  extractItems(page: RawPage, logger?: InvoiceParserLogger): LineItem[];
}

export class RuleSetVendor implements VendorParser {
  readonly key: string;
  readonly displayName: string;
  readonly topology: InvoiceTopology;
  private readonly ruleSet: VendorRuleSet;

  constructor(ruleSet: VendorRuleSet) {
    this.ruleSet = ruleSet;
    this.key = ruleSet.key;
    this.displayName = ruleSet.displayName;
    this.topology = ruleSet.topology;
  }

  extractFields(page: RawPage): HeaderFields {
    const fields: HeaderFields = {
      vendor: "",
      invoiceNumber: "",
      jobName: "",
      date: "",
      total: "",
    };
    for (const field of HEADER_FIELDS) {
      fields[field] = evaluateFieldRule(this.ruleSet.fields[field], page) ?? "";
    }
    return fields;
  }

  extractItems(page: RawPage, logger: InvoiceParserLogger = silentLogger): LineItem[] {
    if (!this.ruleSet.items) return [];
    return new BlockExtractor(this.ruleSet.items, logger).extract(page);
  }
}
