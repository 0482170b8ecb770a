export { TextEngine, registerTextProvider, unregisterTextProvider, getTextProvider } from "./TextEngine";
export { PdfTextProvider, textItemsToPageText } from "./PdfTextProvider";
export { PlainTextProvider } from "./PlainTextProvider";
export { TextExtractionError } from "./TextProvider";
export type { DocumentSource, TextProvider } from "./TextProvider";
