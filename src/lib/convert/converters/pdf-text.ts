import * as fs from "node:fs";
import { extractText, getDocumentProxy } from "unpdf";
import { CONFIG } from "../../../config";
import { writeFileAtomic } from "../../utils/atomic-write";
import { isPdfHead } from "../detect";
import type { ConversionJob, Converter, ConverterReport } from "../types";
import { noOptionsSchema, type NoOptions } from "./no-options";

/**
 * Joins per-page text with the page separator. Every page yields one
 * segment, empty pages included, so `split(PAGE_SEPARATOR).length` equals
 * the page count.
 */
export function joinPages(pages: string[]): string {
  return pages.join(CONFIG.PAGE_SEPARATOR);
}

export const pdfToTextConverter: Converter<NoOptions> = {
  name: "pdf-to-text",
  source: "PdfDocument",
  target: "PlainText",
  formats: ["txt", "text", "md", "log"],
  optionsSchema: noOptionsSchema,

  probe: isPdfHead,

  async convert(job: ConversionJob<NoOptions>): Promise<ConverterReport> {
    const buffer = await fs.promises.readFile(job.inputPath);
    const pdf = await getDocumentProxy(new Uint8Array(buffer));
    const { totalPages, text } = await extractText(pdf, { mergePages: false });

    const warnings: string[] = [];
    const blank = text.filter((page) => page.trim() === "").length;
    if (blank > 0) {
      warnings.push(`${blank} of ${totalPages} pages had no extractable text`);
    }

    const bytesWritten = await writeFileAtomic(job.outputPath, joinPages(text), {
      signal: job.signal,
    });
    return { bytesWritten, warnings, metadata: { pages: totalPages } };
  },
};
