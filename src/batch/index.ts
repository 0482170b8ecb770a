export { parseBatch, vendorKeyForFolder } from "./parseBatch";
export type {
  BatchDocument,
  BatchFailureCode,
  BatchOptions,
  BatchResult,
  PageReader,
} from "./parseBatch";
