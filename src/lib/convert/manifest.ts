import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import type { RequestInit } from "./request";

const optionValueSchema = z.union([z.string(), z.number(), z.boolean(), z.array(z.string())]);

const manifestEntrySchema = z
  .object({
    input: z.string().min(1),
    format: z.string().min(1),
    output: z.string().min(1).optional(),
    options: z.record(optionValueSchema).optional(),
  })
  .strict();

export const manifestSchema = z.array(manifestEntrySchema);

export type ManifestEntry = z.infer<typeof manifestEntrySchema>;

/**
 * Reads a batch manifest: a JSON array of `{ input, format, output?, options? }`.
 * Relative paths resolve against the manifest's own directory.
 */
export function loadManifest(manifestPath: string): RequestInit[] {
  const absolute = path.resolve(manifestPath);
  const baseDir = path.dirname(absolute);
  const raw = fs.readFileSync(absolute, "utf-8");

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`${manifestPath} is not valid JSON`, { cause: err });
  }

  const result = manifestSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new Error(`Invalid manifest${where}: ${issue.message}`);
  }

  return result.data.map((entry) => ({
    inputPath: path.resolve(baseDir, entry.input),
    format: entry.format,
    outputPath: entry.output === undefined ? undefined : path.resolve(baseDir, entry.output),
    options: entry.options,
  }));
}
