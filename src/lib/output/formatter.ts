import * as path from "node:path";
import type { BatchSummary } from "../convert/batch";
import type { RegistryEntry } from "../convert/registry";
import type { ConversionOutcome } from "../convert/types";
import type { FileInfo } from "../info/describe";
import { formatSize, formatTime } from "../utils/format";

export interface FormatOptions {
  /** Paths under this directory print relative to it */
  root?: string;
  /** No ANSI colors */
  plain?: boolean;
}

const ansi = {
  bold: (s: string) => `\x1b[1m${s}\x1b[22m`,
  dim: (s: string) => `\x1b[2m${s}\x1b[22m`,
  green: (s: string) => `\x1b[32m${s}\x1b[39m`,
  red: (s: string) => `\x1b[31m${s}\x1b[39m`,
  yellow: (s: string) => `\x1b[33m${s}\x1b[39m`,
  cyan: (s: string) => `\x1b[36m${s}\x1b[39m`,
};

type Style = typeof ansi;

const identity = (s: string) => s;
const noColor: Style = {
  bold: identity,
  dim: identity,
  green: identity,
  red: identity,
  yellow: identity,
  cyan: identity,
};

function styleFor(options: FormatOptions): Style {
  return options.plain ? noColor : ansi;
}

/**
 * Paths inside `root` print relative to it; anything else stays absolute.
 */
export function formatRelativePath(root: string, filePath: string): string {
  const rel = path.relative(root, filePath);
  return rel && !rel.startsWith("..") && !path.isAbsolute(rel) ? rel : filePath;
}

/**
 * One line per outcome, plus one indented line per warning.
 */
export function formatOutcome(
  outcome: ConversionOutcome,
  options: FormatOptions = {},
): string {
  const style = styleFor(options);
  const root = options.root ?? process.cwd();
  const input = formatRelativePath(root, outcome.request.inputPath);

  if (outcome.status === "failure") {
    const { kind, message } = outcome.error;
    return `${style.red("✗")} ${input} ${style.red(`[${kind}]`)} ${message}`;
  }

  const { result } = outcome;
  const output = formatRelativePath(root, result.outputPath);
  const details = style.dim(
    `(${formatSize(result.bytesWritten)}, ${formatTime(result.durationMs)})`,
  );
  const lines = [`${style.green("✓")} ${input} → ${output} ${details}`];
  for (const warning of result.warnings) {
    lines.push(`  ${style.yellow("!")} ${warning}`);
  }
  return lines.join("\n");
}

export function formatSummary(summary: BatchSummary, options: FormatOptions = {}): string {
  const style = styleFor(options);
  const text = `${summary.succeeded}/${summary.total} succeeded`;
  if (summary.failed === 0) return style.green(text);
  return `${style.bold(text)}, ${style.red(`${summary.failed} failed`)}`;
}

export function formatFileInfo(info: FileInfo, options: FormatOptions = {}): string {
  const style = styleFor(options);
  const label = (name: string) => style.cyan(`${name}:`);
  const lines = [
    `${label("File")} ${info.name}`,
    `${label("Path")} ${info.path}`,
    `${label("Size")} ${info.size.toLocaleString("en-US")} bytes (${info.sizeLabel})`,
    `${label("Type")} ${info.extension || "(none)"} ${style.dim(`[${info.kind}]`)}`,
  ];
  if (info.image) {
    lines.push(`${label("Dimensions")} ${info.image.width} x ${info.image.height} pixels`);
    lines.push(`${label("Format")} ${info.image.format}`);
    lines.push(
      `${label("Channels")} ${info.image.channels}${info.image.hasAlpha ? " (with alpha)" : ""}`,
    );
  }
  if (info.pages !== undefined) lines.push(`${label("Pages")} ${info.pages}`);
  if (info.paragraphs !== undefined) lines.push(`${label("Paragraphs")} ${info.paragraphs}`);
  if (info.lines !== undefined) lines.push(`${label("Lines")} ${info.lines}`);
  return lines.join("\n");
}

export function formatRegistry(entries: RegistryEntry[], options: FormatOptions = {}): string {
  const style = styleFor(options);
  return entries
    .map(
      (e) =>
        `${style.bold(`${e.source} → ${e.target}`)} ${style.dim(`[${e.converter.name}]`)} ${e.converter.formats.join(", ")}`,
    )
    .join("\n");
}
