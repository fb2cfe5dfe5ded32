import * as os from "node:os";
import * as path from "node:path";

const DEFAULT_CONCURRENCY = (() => {
  const fromEnv = Number.parseInt(process.env.FILECRAFT_CONCURRENCY ?? "", 10);
  if (Number.isFinite(fromEnv) && fromEnv > 0) return fromEnv;

  const cores = os.cpus().length || 1;
  const HARD_CAP = 4;
  return Math.max(1, Math.min(HARD_CAP, cores));
})();

export const CONFIG = {
  CONVERT_QUALITY: 95,
  COMPRESS_QUALITY: 85,
  PNG_COMPRESSION_LEVEL: 9,
  BATCH_CONCURRENCY: DEFAULT_CONCURRENCY,
  // Enough for every magic number we sniff, including the AVIF ftyp box.
  SNIFF_BYTES: 4100,
  PAGE_SEPARATOR: "\f",
};

// 0 disables the deadline.
export const CONVERSION_TIMEOUT_MS = Number.parseInt(
  process.env.FILECRAFT_TIMEOUT_MS || "120000",
  10,
);

export const DEBUG =
  process.env.FILECRAFT_DEBUG === "1" || process.env.FILECRAFT_DEBUG === "true";

const GLOBAL_ROOT =
  process.env.FILECRAFT_HOME || path.join(os.homedir(), ".filecraft");

export const PATHS = {
  globalRoot: GLOBAL_ROOT,
  configFile: path.join(GLOBAL_ROOT, "config.json"),
};

export const IMAGE_EXTENSIONS: Set<string> = new Set([
  ".jpg",
  ".jpeg",
  ".png",
  ".webp",
  ".gif",
  ".tiff",
  ".tif",
  ".avif",
]);

export const PDF_EXTENSIONS: Set<string> = new Set([".pdf"]);

export const DOCX_EXTENSIONS: Set<string> = new Set([".docx"]);

export const TEXT_EXTENSIONS: Set<string> = new Set([
  ".txt",
  ".text",
  ".md",
  ".log",
  ".csv",
]);

// Formats sharp can encode; "jpeg" and "tif" are accepted aliases.
export const LOSSY_IMAGE_FORMATS: Set<string> = new Set(["jpg", "jpeg", "webp", "avif"]);
export const LOSSLESS_IMAGE_FORMATS: Set<string> = new Set(["png", "gif", "tiff", "tif"]);
