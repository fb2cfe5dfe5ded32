import { ConverterRegistry } from "../registry";
import type { Converter } from "../types";
import { docxToTextConverter } from "./docx-text";
import { imageConverter } from "./image";
import { pdfPagesConverter } from "./pdf-pages";
import { pdfToTextConverter } from "./pdf-text";
import { textToDocxConverter } from "./text-docx";

export { imageConverter, computeTargetSize, imageOptionsSchema } from "./image";
export type { ImageOptions, Size } from "./image";
export { pdfToTextConverter, joinPages } from "./pdf-text";
export {
  docxToTextConverter,
  paragraphsFromRawText,
  linesToText,
  markBreaks,
  unmarkBreaks,
} from "./docx-text";
export { textToDocxConverter, textToLines, buildDocument, buildParagraphs } from "./text-docx";
export type { DocumentBody } from "./text-docx";
export {
  pdfPagesConverter,
  parsePageRanges,
  resolvePageIndices,
} from "./pdf-pages";
export type { PageRange, PdfPagesOptions } from "./pdf-pages";

/**
 * Registry with every built-in converter, frozen and ready for dispatch.
 */
export function createDefaultRegistry(): ConverterRegistry {
  const builtins: Converter[] = [
    imageConverter,
    pdfToTextConverter,
    docxToTextConverter,
    textToDocxConverter,
    pdfPagesConverter,
  ];
  const registry = new ConverterRegistry();
  for (const converter of builtins) {
    registry.register(converter.source, converter.target, converter);
  }
  return registry.freeze();
}
