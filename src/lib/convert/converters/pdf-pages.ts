import * as fs from "node:fs";
import { PDFDocument } from "pdf-lib";
import { z } from "zod";
import { writeFileAtomic } from "../../utils/atomic-write";
import { isPdfHead } from "../detect";
import { ConversionError } from "../errors";
import type { ConversionJob, Converter, ConverterReport } from "../types";

const PAGE_RANGES = /^\s*\d+\s*(-\s*\d*\s*)?(,\s*\d+\s*(-\s*\d*\s*)?)*$/;

export const pdfPagesOptionsSchema = z
  .object({
    pages: z
      .string()
      .regex(PAGE_RANGES, "expected 1-based page ranges such as 1-3,5,7-")
      .optional(),
    append: z.array(z.string().min(1)).optional(),
  })
  .strict();

export type PdfPagesOptions = z.infer<typeof pdfPagesOptionsSchema>;

export interface PageRange {
  start: number;
  /** Inclusive; undefined runs to the last page */
  end?: number;
}

/**
 * Parses "2-4,7,9-" into ranges. Ranges keep the order they were given in.
 */
export function parsePageRanges(ranges: string): PageRange[] {
  return ranges.split(",").map((part) => {
    const [startText, endText] = part.split("-").map((s) => s.trim());
    const start = Number.parseInt(startText ?? "", 10);
    if (!Number.isFinite(start) || start < 1) {
      throw new ConversionError("InvalidOption", `Invalid option 'pages': ${part.trim()} is not a page number`);
    }
    if (endText === undefined) return { start, end: start };
    if (endText === "") return { start };

    const end = Number.parseInt(endText, 10);
    if (end < start) {
      throw new ConversionError(
        "InvalidOption",
        `Invalid option 'pages': range ${start}-${end} runs backwards`,
      );
    }
    return { start, end };
  });
}

/**
 * Expands ranges into zero-based page indices, rejecting any page outside
 * 1..pageCount instead of clamping.
 */
export function resolvePageIndices(ranges: PageRange[], pageCount: number): number[] {
  const indices: number[] = [];
  for (const range of ranges) {
    const end = range.end ?? pageCount;
    for (const page of [range.start, end]) {
      if (page < 1 || page > pageCount) {
        throw new ConversionError(
          "InvalidOption",
          `Page ${page} is out of range (1-${pageCount})`,
        );
      }
    }
    for (let page = range.start; page <= end; page++) {
      indices.push(page - 1);
    }
  }
  return indices;
}

async function loadPdf(filePath: string): Promise<PDFDocument> {
  const bytes = await fs.promises.readFile(filePath);
  return PDFDocument.load(bytes, { updateMetadata: false });
}

export const pdfPagesConverter: Converter<PdfPagesOptions> = {
  name: "pdf-pages",
  source: "PdfDocument",
  target: "PdfDocument",
  formats: ["pdf"],
  optionsSchema: pdfPagesOptionsSchema,

  probe: isPdfHead,

  async convert(job: ConversionJob<PdfPagesOptions>): Promise<ConverterReport> {
    const source = await loadPdf(job.inputPath);
    // No producer or timestamps: rerunning the same request gives the same bytes.
    const output = await PDFDocument.create({ updateMetadata: false });

    const indices = job.options.pages
      ? resolvePageIndices(parsePageRanges(job.options.pages), source.getPageCount())
      : source.getPageIndices();
    for (const page of await output.copyPages(source, indices)) {
      output.addPage(page);
    }

    const appended = job.options.append ?? [];
    for (const appendPath of appended) {
      job.signal.throwIfAborted();
      const extra = await loadPdf(appendPath);
      for (const page of await output.copyPages(extra, extra.getPageIndices())) {
        output.addPage(page);
      }
    }

    const bytes = await output.save();
    const bytesWritten = await writeFileAtomic(job.outputPath, bytes, { signal: job.signal });
    return {
      bytesWritten,
      warnings: [],
      metadata: { pages: output.getPageCount(), sources: 1 + appended.length },
    };
  },
};
