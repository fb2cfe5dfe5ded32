/**
 * filecraft library exports
 *
 * The conversion core without the CLI: build requests, run them through
 * a dispatcher, or run many at once.
 */

// ============================================================================
// Conversion
// ============================================================================

export * from "./convert";
export {
  computeTargetSize,
  imageConverter,
  parsePageRanges,
  pdfPagesConverter,
  pdfToTextConverter,
  docxToTextConverter,
  textToDocxConverter,
} from "./convert/converters";
export type { ImageOptions, PageRange, PdfPagesOptions } from "./convert/converters";

// ============================================================================
// Shared registry and dispatcher
// ============================================================================

export { createDispatcher, getRegistry } from "./core/context";

// ============================================================================
// Configuration
// ============================================================================

export * from "./config";

// ============================================================================
// File inspection
// ============================================================================

export { describeFile } from "./info/describe";
export type { FileInfo } from "./info/describe";
