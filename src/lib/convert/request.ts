import * as path from "node:path";
import { v4 as uuidv4 } from "uuid";
import { kindForExtension, normalizeFormat } from "./detect";
import type {
  ConversionOptions,
  ConversionRequest,
  KnownFileKind,
  OptionValue,
} from "./types";

export interface RequestInit {
  inputPath: string;
  format: string;
  outputPath?: string;
  inputKind?: KnownFileKind;
  options?: Record<string, OptionValue | undefined>;
}

/**
 * Same stem with a new extension, next to the input, optionally with a
 * suffix on the stem: `photo.png` + "webp" → `photo.webp`,
 * `photo.png` + "png" + "_compressed" → `photo_compressed.png`.
 */
export function deriveOutputPath(
  inputPath: string,
  format: string,
  stemSuffix = "",
): string {
  const parsed = path.parse(inputPath);
  return path.join(parsed.dir, `${parsed.name}${stemSuffix}.${normalizeFormat(format)}`);
}

function freezeOptions(
  options: Record<string, OptionValue | undefined> = {},
): ConversionOptions {
  const copy: Record<string, OptionValue> = {};
  for (const [key, value] of Object.entries(options)) {
    if (value === undefined) continue;
    copy[key] = Array.isArray(value) ? Object.freeze([...value]) : value;
  }
  return Object.freeze(copy);
}

export function createRequest(init: RequestInit): ConversionRequest {
  const targetFormat = normalizeFormat(init.format);
  const inputPath = path.resolve(init.inputPath);
  const outputPath = path.resolve(
    init.outputPath ?? deriveOutputPath(inputPath, targetFormat),
  );

  return Object.freeze({
    id: uuidv4(),
    inputPath,
    inputKind: init.inputKind,
    targetFormat,
    targetKind: kindForExtension(targetFormat),
    outputPath,
    options: freezeOptions(init.options),
  });
}
