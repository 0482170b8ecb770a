import type { VendorRuleSet } from "../schema/RuleSet";
import { CORE_MAIN } from "./coreMain";
import { FARWEST } from "./farwest";
import { KNIFE_RIVER } from "./knifeRiver";
import { MISSOULA_LANDFILL } from "./missoulaLandfill";
import { VendorDispatcher } from "./VendorDispatcher";

export { CORE_MAIN, FARWEST, KNIFE_RIVER, MISSOULA_LANDFILL };
export { VendorDispatcher, normalizeVendorKey } from "./VendorDispatcher";
export { RuleSetVendor } from "./RuleSetVendor";
export type { VendorParser } from "./RuleSetVendor";

export const BUILTIN_RULE_SETS: readonly VendorRuleSet[] = Object.freeze([
  KNIFE_RIVER,
  CORE_MAIN,
  FARWEST,
  MISSOULA_LANDFILL,
]);

/** Dispatcher over the built-in vendors */
export const defaultDispatcher = new VendorDispatcher(BUILTIN_RULE_SETS);
