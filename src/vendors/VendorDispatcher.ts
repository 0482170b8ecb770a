/**
 * InvoiceParser – Vendor dispatcher
 *
 * Maps a case-insensitive vendor key to its parser. Lookup tries the key
 * as given (lowercased, trimmed), then its normalised form. There is no
 * generic fallback: an unknown key is an error.
 */

import type { VendorRuleSet } from "../schema/RuleSet";
import { InvoiceParserError, validateRuleSet } from "../core/validator";
import type { VendorParser } from "./RuleSetVendor";
import { RuleSetVendor } from "./RuleSetVendor";

/**
 * Lowercase, read underscores as spaces, drop everything but letters,
 * digits and spaces, then join the words with underscores:
 * "Core & Main" → "core_main", "knife_river" → "knife_river".
 */
export function normalizeVendorKey(key: string): string {
  return key
    .toLowerCase()
    .replace(/_/g, " ")
    .replace(/[^a-z0-9\s]/g, "")
    .trim()
    .replace(/\s+/g, "_");
}

export class VendorDispatcher {
  private readonly exact = new Map<string, VendorParser>();
  private readonly normalised = new Map<string, VendorParser>();
  private readonly parsers: readonly VendorParser[];

  /**
   * @throws InvoiceParserError `INVALID_RULE_SET` when a rule set is
   *         malformed or two vendors claim the same key
   */
  constructor(ruleSets: readonly VendorRuleSet[]) {
    const parsers: VendorParser[] = [];

    for (const ruleSet of ruleSets) {
      const validation = validateRuleSet(ruleSet);
      if (!validation.valid) {
        throw new InvoiceParserError(
          `Invalid rule set '${ruleSet.key}': ${validation.errors.join("; ")}`,
          "INVALID_RULE_SET",
        );
      }

      const parser = new RuleSetVendor(ruleSet);
      for (const name of [ruleSet.key, ...ruleSet.aliases]) {
        this.register(this.exact, name.trim().toLowerCase(), parser);
        this.register(this.normalised, normalizeVendorKey(name), parser);
      }
      parsers.push(parser);
    }

    this.parsers = Object.freeze(parsers);
    Object.freeze(this);
  }

  /**
   * Resolve a vendor key, e.g. a folder name, to its parser.
   *
   * @throws InvoiceParserError `UNKNOWN_VENDOR`
   */
  resolve(vendorKey: string): VendorParser {
    const parser = this.find(vendorKey);
    if (!parser) {
      throw new InvoiceParserError(
        `No rule set registered for vendor '${vendorKey}'`,
        "UNKNOWN_VENDOR",
      );
    }
    return parser;
  }

  has(vendorKey: string): boolean {
    return this.find(vendorKey) !== undefined;
  }

  /** Canonical keys in registration order */
  keys(): string[] {
    return this.parsers.map((p) => p.key);
  }

  // ─── Private helpers ──────────────────────────────────────────────────────

  private find(vendorKey: string): VendorParser | undefined {
    return (
      this.exact.get(vendorKey.trim().toLowerCase()) ??
      this.normalised.get(normalizeVendorKey(vendorKey))
    );
  }

  private register(
    table: Map<string, VendorParser>,
    name: string,
    parser: VendorParser,
  ): void {
    if (name.length === 0) return;
    const existing = table.get(name);
    if (existing && existing.key !== parser.key) {
      throw new InvoiceParserError(
        `Vendor key '${name}' is claimed by both '${existing.key}' and '${parser.key}'`,
        "INVALID_RULE_SET",
      );
    }
    table.set(name, parser);
  }
}
