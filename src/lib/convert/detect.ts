import * as fs from "node:fs";
import { extname } from "node:path";
import {
  CONFIG,
  DOCX_EXTENSIONS,
  IMAGE_EXTENSIONS,
  PDF_EXTENSIONS,
  TEXT_EXTENSIONS,
} from "../../config";
import { ConversionError } from "./errors";
import type { FileKind, KnownFileKind } from "./types";

export interface DetectedFormat {
  kind: KnownFileKind;
  /** Extension-style format name without the dot */
  format: string;
}

/**
 * Normalizes "JPG", ".jpg" and "jpg" to "jpg".
 */
export function normalizeFormat(format: string): string {
  return format.trim().toLowerCase().replace(/^\./, "");
}

export function kindForExtension(ext: string): FileKind {
  const normalized = `.${normalizeFormat(ext)}`;
  if (IMAGE_EXTENSIONS.has(normalized)) return "ImageRaster";
  if (PDF_EXTENSIONS.has(normalized)) return "PdfDocument";
  if (DOCX_EXTENSIONS.has(normalized)) return "DocxDocument";
  if (TEXT_EXTENSIONS.has(normalized)) return "PlainText";
  return "Unknown";
}

function startsWith(head: Buffer, bytes: number[], offset = 0): boolean {
  if (head.length < offset + bytes.length) return false;
  return bytes.every((b, i) => head[offset + i] === b);
}

function asciiAt(head: Buffer, text: string, offset = 0): boolean {
  return startsWith(head, Array.from(Buffer.from(text, "latin1")), offset);
}

export function sniffImageFormat(head: Buffer): string | null {
  if (startsWith(head, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) return "png";
  if (startsWith(head, [0xff, 0xd8, 0xff])) return "jpg";
  if (asciiAt(head, "GIF87a") || asciiAt(head, "GIF89a")) return "gif";
  if (asciiAt(head, "RIFF") && asciiAt(head, "WEBP", 8)) return "webp";
  if (startsWith(head, [0x49, 0x49, 0x2a, 0x00]) || startsWith(head, [0x4d, 0x4d, 0x00, 0x2a])) {
    return "tiff";
  }
  if (asciiAt(head, "ftyp", 4) && (asciiAt(head, "avif", 8) || asciiAt(head, "avis", 8))) {
    return "avif";
  }
  return null;
}

export function isPdfHead(head: Buffer): boolean {
  return asciiAt(head, "%PDF-");
}

// DOCX is a zip whose entries live under word/; the first local headers
// carry those names in the clear.
export function isDocxHead(head: Buffer): boolean {
  return (
    startsWith(head, [0x50, 0x4b, 0x03, 0x04]) &&
    head.includes(Buffer.from("word/", "latin1"))
  );
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Plain-text heuristic: no NUL bytes, decodes as UTF-8 and fewer than
 * 10% control characters other than whitespace.
 */
export function looksLikeText(head: Buffer): boolean {
  if (head.length === 0) return true;
  if (head.includes(0)) return false;

  let sample = head;
  try {
    utf8.decode(sample);
  } catch {
    // The sniff window may cut a multi-byte sequence; retry without the tail.
    sample = head.subarray(0, Math.max(0, head.length - 3));
    try {
      utf8.decode(sample);
    } catch {
      return false;
    }
  }

  let control = 0;
  for (const byte of sample) {
    const isWhitespace = byte === 0x09 || byte === 0x0a || byte === 0x0d || byte === 0x0c;
    if ((byte < 0x20 && !isWhitespace) || byte === 0x7f) control++;
  }
  return control / Math.max(1, sample.length) < 0.1;
}

export function sniffFormat(head: Buffer): DetectedFormat | null {
  const image = sniffImageFormat(head);
  if (image) return { kind: "ImageRaster", format: image };
  if (isPdfHead(head)) return { kind: "PdfDocument", format: "pdf" };
  if (isDocxHead(head)) return { kind: "DocxDocument", format: "docx" };
  if (looksLikeText(head)) return { kind: "PlainText", format: "txt" };
  return null;
}

export async function readHead(
  filePath: string,
  size = CONFIG.SNIFF_BYTES,
): Promise<Buffer> {
  const handle = await fs.promises.open(filePath, "r");
  try {
    const buffer = Buffer.alloc(size);
    const { bytesRead } = await handle.read(buffer, 0, size, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

/**
 * Resolves a file's kind and format: extension first, content sniffing
 * when the extension is missing or unknown.
 */
export async function detectFormat(filePath: string): Promise<DetectedFormat> {
  const ext = extname(filePath);
  if (ext) {
    const kind = kindForExtension(ext);
    if (kind !== "Unknown") {
      return { kind, format: normalizeFormat(ext) };
    }
  }

  const sniffed = sniffFormat(await readHead(filePath));
  if (!sniffed) {
    throw new ConversionError(
      "UnrecognizedFileKind",
      `Could not determine the file type of '${filePath}'`,
    );
  }
  return sniffed;
}
