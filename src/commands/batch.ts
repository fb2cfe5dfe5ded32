import { Command } from "commander";
import { resolveDefaults } from "../lib/config";
import { createDispatcher } from "../lib/core/context";
import { runBatch, summarizeOutcomes } from "../lib/convert/batch";
import { loadManifest } from "../lib/convert/manifest";
import { createRequest } from "../lib/convert/request";
import type { ConversionRequest } from "../lib/convert/types";
import { formatOutcome, formatSummary } from "../lib/output/formatter";
import { formatJson, toOutcomeJson } from "../lib/output/json-formatter";
import { createBatchSpinner } from "../lib/output/progress";
import { parseInteger } from "./shared";

interface BatchFlags {
  concurrency?: number;
  timeout?: number;
  json?: boolean;
}

export const batch = new Command("batch")
  .description("Run every conversion listed in a JSON manifest")
  .argument("<manifest>", "JSON array of { input, format, output?, options? }")
  .option("-c, --concurrency <n>", "Conversions to run at once", parseInteger)
  .option("-t, --timeout <ms>", "Per-conversion deadline in milliseconds, 0 for none", parseInteger)
  .option("--json", "Print outcomes as JSON")
  .action(async (manifest: string, options: BatchFlags) => {
    let requests: ConversionRequest[];
    try {
      requests = loadManifest(manifest).map((init) => createRequest(init));
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      console.error("Failed to read manifest:", message);
      process.exitCode = 1;
      return;
    }

    const defaults = resolveDefaults();
    const timeoutMs = options.timeout ?? defaults.timeoutMs;
    const dispatcher = createDispatcher({ timeoutMs });
    const root = process.cwd();
    const progress = options.json ? undefined : createBatchSpinner(root);

    const outcomes = await runBatch(dispatcher, requests, {
      concurrency: options.concurrency ?? defaults.concurrency,
      timeoutMs,
      onOutcome: progress?.onOutcome,
    });
    const summary = summarizeOutcomes(outcomes);

    if (options.json) {
      console.log(formatJson({ outcomes: outcomes.map(toOutcomeJson), summary }));
    } else {
      const plain = !process.stdout.isTTY;
      progress?.spinner.stop();
      for (const outcome of outcomes) {
        console.log(formatOutcome(outcome, { root, plain }));
      }
      console.log(formatSummary(summary, { plain }));
    }

    if (summary.failed > 0) {
      process.exitCode = 1;
    }
  });
