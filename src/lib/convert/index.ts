export { Dispatcher } from "./dispatcher";
export type { ExecuteOptions, TransitionListener } from "./dispatcher";
export { ConverterRegistry } from "./registry";
export type { RegistryEntry } from "./registry";
export { createRequest, deriveOutputPath } from "./request";
export type { RequestInit } from "./request";
export { runBatch, summarizeOutcomes } from "./batch";
export type { BatchOptions, BatchProgress, BatchSummary } from "./batch";
export { ConversionError, RegistryFrozenError, toConversionFailure } from "./errors";
export { detectFormat, kindForExtension, normalizeFormat, sniffFormat } from "./detect";
export type { DetectedFormat } from "./detect";
export { createDefaultRegistry } from "./converters";
export type {
  ConversionFailure,
  ConversionJob,
  ConversionOptions,
  ConversionOutcome,
  ConversionRequest,
  ConversionResult,
  Converter,
  ConverterReport,
  ErrorKind,
  FileKind,
  KnownFileKind,
  OptionValue,
  RequestState,
} from "./types";
export { loadManifest, manifestSchema } from "./manifest";
export type { ManifestEntry } from "./manifest";
