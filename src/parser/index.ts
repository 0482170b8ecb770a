export * from "./primitives";
export * from "./fieldRules";
export { BlockExtractor, findRejectedSlot, windowToLineItem } from "./BlockExtractor";
export type { ItemMatch } from "./BlockExtractor";
