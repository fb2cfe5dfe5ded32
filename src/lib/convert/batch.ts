import pLimit from "p-limit";
import { CONFIG } from "../../config";
import type { Dispatcher } from "./dispatcher";
import type { ConversionOutcome, ConversionRequest } from "./types";

export interface BatchProgress {
  outcome: ConversionOutcome;
  /** Position of the request in the input sequence */
  index: number;
  completed: number;
  total: number;
}

export interface BatchOptions {
  concurrency?: number;
  timeoutMs?: number;
  onOutcome?: (progress: BatchProgress) => void;
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
}

/**
 * Runs every request through the dispatcher on a bounded pool.
 *
 * Outcomes come back in request order whatever order they finish in, one
 * per request; a failed item never stops the others.
 */
export async function runBatch(
  dispatcher: Dispatcher,
  requests: readonly ConversionRequest[],
  options: BatchOptions = {},
): Promise<ConversionOutcome[]> {
  const limit = pLimit(Math.max(1, options.concurrency ?? CONFIG.BATCH_CONCURRENCY));
  let completed = 0;

  return Promise.all(
    requests.map((request, index) =>
      limit(async () => {
        const outcome = await dispatcher.execute(request, { timeoutMs: options.timeoutMs });
        completed += 1;
        options.onOutcome?.({ outcome, index, completed, total: requests.length });
        return outcome;
      }),
    ),
  );
}

export function summarizeOutcomes(outcomes: readonly ConversionOutcome[]): BatchSummary {
  const succeeded = outcomes.filter((o) => o.status === "success").length;
  return { total: outcomes.length, succeeded, failed: outcomes.length - succeeded };
}
