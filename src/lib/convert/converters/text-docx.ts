import * as fs from "node:fs";
import * as path from "node:path";
import { Document, Packer, PageBreak, Paragraph, type ParagraphChild, TextRun } from "docx";
import { CONFIG } from "../../../config";
import { writeFileAtomic } from "../../utils/atomic-write";
import { looksLikeText } from "../detect";
import type { ConversionJob, Converter, ConverterReport } from "../types";
import { noOptionsSchema, type NoOptions } from "./no-options";

/**
 * Splits text into lines. A UTF-8 BOM is dropped and a single trailing
 * newline does not start another line.
 */
export function textToLines(text: string): string[] {
  const body = text.replace(/^\uFEFF/, "");
  if (body === "") return [];
  const lines = body.split(/\r?\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

// Characters XML 1.0 does not allow; \f is handled as a page break first.
const XML_FORBIDDEN = /[\x00-\x08\x0B\x0C\x0E-\x1F]/g;

export interface DocumentBody {
  paragraphs: Paragraph[];
  /** Control characters dropped because DOCX cannot store them */
  removed: number;
}

/**
 * One paragraph per line. A form feed becomes a page break inside the
 * paragraph.
 */
export function buildParagraphs(lines: string[]): DocumentBody {
  let removed = 0;
  const paragraphs = lines.map((line) => {
    const children: ParagraphChild[] = [];
    line.split(CONFIG.PAGE_SEPARATOR).forEach((segment, i) => {
      if (i > 0) children.push(new PageBreak());
      const clean = segment.replace(XML_FORBIDDEN, () => {
        removed += 1;
        return "";
      });
      if (clean) children.push(new TextRun(clean));
    });
    return new Paragraph({ children });
  });
  return { paragraphs, removed };
}

export function buildDocument(paragraphs: Paragraph[], title?: string): Document {
  return new Document({
    creator: "filecraft",
    title,
    sections: [{ children: paragraphs }],
  });
}

export const textToDocxConverter: Converter<NoOptions> = {
  name: "text-to-docx",
  source: "PlainText",
  target: "DocxDocument",
  formats: ["docx"],
  optionsSchema: noOptionsSchema,

  probe: looksLikeText,

  async convert(job: ConversionJob<NoOptions>): Promise<ConverterReport> {
    const text = await fs.promises.readFile(job.inputPath, "utf-8");
    const lines = textToLines(text);
    const { paragraphs, removed } = buildParagraphs(lines);
    const buffer = await Packer.toBuffer(buildDocument(paragraphs, path.parse(job.inputPath).name));

    const warnings =
      removed > 0
        ? [`removed ${removed} control character${removed === 1 ? "" : "s"} that DOCX cannot store`]
        : [];
    const bytesWritten = await writeFileAtomic(job.outputPath, buffer, { signal: job.signal });
    return { bytesWritten, warnings, metadata: { paragraphs: lines.length } };
  },
};
