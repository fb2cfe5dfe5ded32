import type { z } from "zod";

/**
 * Logical format of a file, independent of its extension.
 */
export type FileKind =
  | "ImageRaster"
  | "PdfDocument"
  | "DocxDocument"
  | "PlainText"
  | "Unknown";

export type KnownFileKind = Exclude<FileKind, "Unknown">;

export type ErrorKind =
  | "UnrecognizedFileKind"
  | "UnsupportedConversion"
  | "InvalidOption"
  | "ConversionFailed"
  | "Timeout"
  | "IoError";

export type OptionValue = string | number | boolean | readonly string[];

export type ConversionOptions = Readonly<Record<string, OptionValue | undefined>>;

/**
 * One requested conversion. Frozen once built by `createRequest`.
 */
export interface ConversionRequest {
  readonly id: string;
  readonly inputPath: string;
  /** Left unset to let the dispatcher resolve it from the file */
  readonly inputKind?: KnownFileKind;
  /** Normalized output extension without the dot, e.g. "webp" */
  readonly targetFormat: string;
  readonly targetKind: FileKind;
  readonly outputPath: string;
  readonly options: ConversionOptions;
}

export interface ConversionResult {
  outputPath: string;
  bytesWritten: number;
  durationMs: number;
  warnings: string[];
  metadata?: Record<string, string | number>;
}

export interface ConversionFailure {
  kind: ErrorKind;
  message: string;
}

export type ConversionOutcome =
  | { status: "success"; request: ConversionRequest; result: ConversionResult }
  | { status: "failure"; request: ConversionRequest; error: ConversionFailure };

export type RequestState =
  | "Pending"
  | "Resolving"
  | "Validating"
  | "Converting"
  | "Succeeded"
  | "Failed";

/**
 * Everything a converter needs for a single run. Options are already
 * validated against the converter's schema.
 */
export interface ConversionJob<O> {
  inputPath: string;
  outputPath: string;
  targetFormat: string;
  options: O;
  signal: AbortSignal;
}

export interface ConverterReport {
  bytesWritten: number;
  warnings: string[];
  metadata?: Record<string, string | number>;
}

export interface Converter<O = unknown> {
  readonly name: string;
  readonly source: KnownFileKind;
  readonly target: KnownFileKind;
  /** Target formats this converter can write */
  readonly formats: readonly string[];
  readonly optionsSchema: z.ZodType<O, z.ZodTypeDef, unknown>;
  /** Whether the leading bytes of an input look like this converter's source */
  probe(head: Buffer): boolean;
  convert(job: ConversionJob<O>): Promise<ConverterReport>;
}
