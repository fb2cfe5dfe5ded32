import type { BatchSummary } from "../convert/batch";
import type { ConversionOutcome, ErrorKind } from "../convert/types";
import type { FileInfo } from "../info/describe";

export interface OutcomeJson {
  id: string;
  input: string;
  output: string;
  status: "success" | "failure";
  bytesWritten?: number;
  durationMs?: number;
  warnings?: string[];
  metadata?: Record<string, string | number>;
  error?: { kind: ErrorKind; message: string };
}

export interface JsonOutput {
  outcomes?: OutcomeJson[];
  summary?: BatchSummary;
  info?: FileInfo;
}

export function toOutcomeJson(outcome: ConversionOutcome): OutcomeJson {
  const base = {
    id: outcome.request.id,
    input: outcome.request.inputPath,
    output: outcome.request.outputPath,
  };
  if (outcome.status === "failure") {
    return { ...base, status: "failure", error: outcome.error };
  }
  const { bytesWritten, durationMs, warnings, metadata } = outcome.result;
  return { ...base, status: "success", bytesWritten, durationMs, warnings, metadata };
}

export function formatJson(data: JsonOutput): string {
  return JSON.stringify(data, null, 2);
}
