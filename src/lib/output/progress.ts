import ora, { type Ora } from "ora";
import type { BatchProgress } from "../convert/batch";
import { formatTime } from "../utils/format";
import { formatRelativePath } from "./formatter";

export interface BatchSpinner {
  spinner: Ora;
  onOutcome: (progress: BatchProgress) => void;
}

/**
 * Creates a spinner + progress callback pair for `runBatch`, with a
 * remaining-time estimate once the first item has finished.
 */
export function createBatchSpinner(
  root: string,
  label = "Converting files...",
): BatchSpinner {
  const spinner = ora({ text: label }).start();
  const startTime = Date.now();

  return {
    spinner,
    onOutcome({ outcome, completed, total }) {
      const rel = formatRelativePath(root, outcome.request.inputPath);
      let timeSuffix = "";
      if (completed > 0 && completed < total) {
        const rate = completed / (Date.now() - startTime || 1);
        const estimatedMs = (total - completed) / rate;
        if (Number.isFinite(estimatedMs) && estimatedMs > 0) {
          timeSuffix = ` • ~${formatTime(estimatedMs)} remaining`;
        }
      }
      spinner.text = `Converting files (${completed}/${total})${timeSuffix} • ${rel}`;
    },
  };
}

export function createTaskSpinner(text: string): Ora {
  return ora({ text }).start();
}
