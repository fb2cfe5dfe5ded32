import * as fs from "node:fs";
import * as path from "node:path";
import mammoth from "mammoth";
import { PDFDocument } from "pdf-lib";
import sharp from "sharp";
import { paragraphsFromRawText } from "../convert/converters/docx-text";
import { textToLines } from "../convert/converters/text-docx";
import { detectFormat, type DetectedFormat } from "../convert/detect";
import { ConversionError } from "../convert/errors";
import type { FileKind } from "../convert/types";
import { formatSize } from "../utils/format";

export interface FileInfo {
  name: string;
  path: string;
  size: number;
  sizeLabel: string;
  extension: string;
  kind: FileKind;
  format?: string;
  image?: {
    width: number;
    height: number;
    format: string;
    channels: number;
    hasAlpha: boolean;
  };
  pages?: number;
  paragraphs?: number;
  lines?: number;
}

async function detectOrUnknown(filePath: string): Promise<DetectedFormat | null> {
  try {
    return await detectFormat(filePath);
  } catch (err) {
    if (err instanceof ConversionError && err.kind === "UnrecognizedFileKind") {
      return null;
    }
    throw err;
  }
}

/**
 * Collects size, kind and kind-specific details (dimensions, page or
 * paragraph or line counts) for one file.
 */
export async function describeFile(filePath: string): Promise<FileInfo> {
  const absolute = path.resolve(filePath);
  const stats = await fs.promises.stat(absolute);
  if (!stats.isFile()) {
    throw new Error(`Path is not a file: ${absolute}`);
  }

  const detected = await detectOrUnknown(absolute);
  const info: FileInfo = {
    name: path.basename(absolute),
    path: absolute,
    size: stats.size,
    sizeLabel: formatSize(stats.size),
    extension: path.extname(absolute),
    kind: detected?.kind ?? "Unknown",
    format: detected?.format,
  };

  switch (detected?.kind) {
    case "ImageRaster": {
      const meta = await sharp(absolute).metadata();
      info.image = {
        width: meta.width ?? 0,
        height: meta.height ?? 0,
        format: meta.format ?? detected.format,
        channels: meta.channels ?? 0,
        hasAlpha: meta.hasAlpha ?? false,
      };
      break;
    }
    case "PdfDocument": {
      const pdf = await PDFDocument.load(await fs.promises.readFile(absolute), {
        ignoreEncryption: true,
        updateMetadata: false,
      });
      info.pages = pdf.getPageCount();
      break;
    }
    case "DocxDocument": {
      const { value } = await mammoth.extractRawText({ path: absolute });
      info.paragraphs = paragraphsFromRawText(value).length;
      break;
    }
    case "PlainText": {
      info.lines = textToLines(await fs.promises.readFile(absolute, "utf-8")).length;
      break;
    }
    default:
      break;
  }

  return info;
}
