import * as fs from "node:fs";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  detectFormat,
  isDocxHead,
  kindForExtension,
  looksLikeText,
  normalizeFormat,
  sniffFormat,
  sniffImageFormat,
} from "../src/lib/convert/detect";
import { ConversionError } from "../src/lib/convert/errors";
import { makeTempDir, removeDir, writePdf, writePng } from "./fixtures";

describe("normalizeFormat", () => {
  it("lowercases and drops a leading dot", () => {
    expect(normalizeFormat(".JPG")).toBe("jpg");
    expect(normalizeFormat(" WebP ")).toBe("webp");
  });
});

describe("kindForExtension", () => {
  it("maps extensions to kinds", () => {
    expect(kindForExtension(".png")).toBe("ImageRaster");
    expect(kindForExtension("TIF")).toBe("ImageRaster");
    expect(kindForExtension(".pdf")).toBe("PdfDocument");
    expect(kindForExtension("docx")).toBe("DocxDocument");
    expect(kindForExtension(".md")).toBe("PlainText");
    expect(kindForExtension(".mp4")).toBe("Unknown");
  });
});

describe("sniffing", () => {
  it("recognizes image magic numbers", () => {
    expect(sniffImageFormat(Buffer.from([0xff, 0xd8, 0xff, 0xe0]))).toBe("jpg");
    expect(sniffImageFormat(Buffer.from("GIF89a....", "latin1"))).toBe("gif");
    expect(sniffImageFormat(Buffer.from("RIFF\0\0\0\0WEBPVP8 ", "latin1"))).toBe("webp");
    expect(sniffImageFormat(Buffer.from("\0\0\0\x1cftypavif", "latin1"))).toBe("avif");
    expect(sniffImageFormat(Buffer.from("hello"))).toBeNull();
  });

  it("needs word/ entries to call a zip a docx", () => {
    const zip = Buffer.from([0x50, 0x4b, 0x03, 0x04]);
    expect(isDocxHead(Buffer.concat([zip, Buffer.from("xl/workbook.xml")]))).toBe(false);
    expect(isDocxHead(Buffer.concat([zip, Buffer.from("word/document.xml")]))).toBe(true);
  });

  it("treats binary with NUL bytes as not text", () => {
    expect(looksLikeText(Buffer.from("plain words\n"))).toBe(true);
    expect(looksLikeText(Buffer.from([0x61, 0x00, 0x62]))).toBe(false);
    expect(looksLikeText(Buffer.alloc(0))).toBe(true);
  });

  it("accepts a multi-byte character cut at the end of the window", () => {
    const head = Buffer.from("café", "utf-8").subarray(0, 4);
    expect(looksLikeText(head)).toBe(true);
  });

  it("classifies PDFs and text", () => {
    expect(sniffFormat(Buffer.from("%PDF-1.7\n"))).toEqual({ kind: "PdfDocument", format: "pdf" });
    expect(sniffFormat(Buffer.from("notes\n"))).toEqual({ kind: "PlainText", format: "txt" });
    expect(sniffFormat(Buffer.from([0x01, 0x02, 0x03, 0x00]))).toBeNull();
  });
});

describe("detectFormat", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("trusts a known extension without reading the file", async () => {
    const missing = path.join(dir, "never-written.webp");
    await expect(detectFormat(missing)).resolves.toEqual({ kind: "ImageRaster", format: "webp" });
  });

  it("sniffs files without an extension", async () => {
    const image = path.join(dir, "image");
    fs.renameSync(await writePng(path.join(dir, "x.png"), 4, 4), image);
    const doc = path.join(dir, "doc");
    fs.renameSync(await writePdf(path.join(dir, "x.pdf"), ["one"]), doc);

    await expect(detectFormat(image)).resolves.toEqual({ kind: "ImageRaster", format: "png" });
    await expect(detectFormat(doc)).resolves.toEqual({ kind: "PdfDocument", format: "pdf" });
  });

  it("rejects unrecognizable content", async () => {
    const blob = path.join(dir, "blob.bin");
    fs.writeFileSync(blob, Buffer.from([0x00, 0x01, 0x02, 0x03]));

    const error = await detectFormat(blob).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ConversionError);
    expect(error).toMatchObject({
      kind: "UnrecognizedFileKind",
      message: `Could not determine the file type of '${blob}'`,
    });
  });
});
