import { InvalidArgumentError } from "commander";
import { LOSSY_IMAGE_FORMATS } from "../config";
import { resolveDefaults } from "../lib/config";
import { createDispatcher } from "../lib/core/context";
import { normalizeFormat } from "../lib/convert/detect";
import type { ConversionOutcome, ConversionRequest } from "../lib/convert/types";
import { formatRelativePath } from "../lib/output/formatter";
import { createTaskSpinner } from "../lib/output/progress";
import { formatSize, formatTime } from "../lib/utils/format";

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

/**
 * The configured default quality applies to lossy targets only; an
 * explicit `-q` is always passed through so the converter can warn.
 */
export function effectiveQuality(
  format: string,
  explicit: number | undefined,
  fallback: number,
): number | undefined {
  if (explicit !== undefined) return explicit;
  return LOSSY_IMAGE_FORMATS.has(normalizeFormat(format)) ? fallback : undefined;
}

/**
 * Runs one request behind a spinner and reports it. Sets a failing exit
 * code when the conversion fails.
 */
export async function runSingleRequest(
  request: ConversionRequest,
  text: string,
): Promise<ConversionOutcome> {
  const { timeoutMs } = resolveDefaults();
  const spinner = createTaskSpinner(text);
  const outcome = await createDispatcher({ timeoutMs }).execute(request);

  if (outcome.status === "failure") {
    spinner.fail(`Error [${outcome.error.kind}]: ${outcome.error.message}`);
    process.exitCode = 1;
    return outcome;
  }

  const { result } = outcome;
  const output = formatRelativePath(process.cwd(), result.outputPath);
  spinner.succeed(
    `Saved to ${output} (${formatSize(result.bytesWritten)}, ${formatTime(result.durationMs)})`,
  );
  for (const warning of result.warnings) {
    console.log(`  ! ${warning}`);
  }
  return outcome;
}
