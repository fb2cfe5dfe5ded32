import * as fs from "node:fs";
import JSZip from "jszip";
import mammoth from "mammoth";
import { CONFIG } from "../../../config";
import { writeFileAtomic } from "../../utils/atomic-write";
import { isDocxHead } from "../detect";
import { ConversionError } from "../errors";
import type { ConversionJob, Converter, ConverterReport } from "../types";
import { noOptionsSchema, type NoOptions } from "./no-options";

/**
 * mammoth's raw text ends every paragraph with a blank line, empty
 * paragraphs included. Undo that into one entry per paragraph.
 */
export function paragraphsFromRawText(raw: string): string[] {
  if (raw === "") return [];
  const paragraphs = raw.split("\n\n");
  if (paragraphs[paragraphs.length - 1] === "") {
    paragraphs.pop();
  }
  return paragraphs;
}

// mammoth's raw text drops <w:br/>; swap breaks for private-use marks it keeps.
const LINE_MARK = "\uE000";
const PAGE_MARK = "\uE001";
const BREAK_TAG = /<w:br(\s[^>]*)?\/>|<w:cr\s*\/>/g;

export function markBreaks(documentXml: string): string {
  return documentXml.replace(BREAK_TAG, (_tag, attrs: string | undefined) => {
    const mark = attrs?.includes('w:type="page"') ? PAGE_MARK : LINE_MARK;
    return `<w:t>${mark}</w:t>`;
  });
}

export function unmarkBreaks(text: string): string {
  return text.replaceAll(LINE_MARK, "\n").replaceAll(PAGE_MARK, CONFIG.PAGE_SEPARATOR);
}

async function withMarkedBreaks(docxPath: string): Promise<Buffer> {
  const zip = await JSZip.loadAsync(await fs.promises.readFile(docxPath));
  const entry = zip.file("word/document.xml");
  if (!entry) {
    throw new ConversionError("ConversionFailed", `'${docxPath}' has no word/document.xml`);
  }
  zip.file("word/document.xml", markBreaks(await entry.async("string")));
  return zip.generateAsync({ type: "nodebuffer" });
}

export function linesToText(lines: string[]): string {
  return lines.length > 0 ? `${lines.join("\n")}\n` : "";
}

export const docxToTextConverter: Converter<NoOptions> = {
  name: "docx-to-text",
  source: "DocxDocument",
  target: "PlainText",
  formats: ["txt", "text", "md", "log"],
  optionsSchema: noOptionsSchema,

  probe: isDocxHead,

  async convert(job: ConversionJob<NoOptions>): Promise<ConverterReport> {
    const buffer = await withMarkedBreaks(job.inputPath);
    const { value, messages } = await mammoth.extractRawText({ buffer });
    const paragraphs = paragraphsFromRawText(value).map(unmarkBreaks);

    const bytesWritten = await writeFileAtomic(job.outputPath, linesToText(paragraphs), {
      signal: job.signal,
    });
    return {
      bytesWritten,
      warnings: messages.map((m) => m.message),
      metadata: { paragraphs: paragraphs.length },
    };
  },
};
