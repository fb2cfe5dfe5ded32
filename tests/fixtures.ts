import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { Document, Packer, Paragraph, TextRun } from "docx";
import JSZip from "jszip";
import { PDFDocument, StandardFonts } from "pdf-lib";
import sharp from "sharp";

export function makeTempDir(prefix = "filecraft-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Every entry, dotfiles included, so leftover temporary writes show up. */
export function listFiles(dir: string): string[] {
  return fs.readdirSync(dir).sort();
}

export async function writePng(filePath: string, width: number, height: number): Promise<string> {
  await sharp({
    create: { width, height, channels: 3, background: { r: 200, g: 80, b: 40 } },
  })
    .png()
    .toFile(filePath);
  return filePath;
}

/** One page per entry; an empty string makes a page with no text. */
export async function writePdf(filePath: string, pages: string[]): Promise<string> {
  const pdf = await PDFDocument.create({ updateMetadata: false });
  const font = await pdf.embedFont(StandardFonts.Helvetica);
  for (const text of pages) {
    const page = pdf.addPage([300, 200]);
    if (text) {
      page.drawText(text, { x: 20, y: 150, size: 14, font });
    }
  }
  fs.writeFileSync(filePath, await pdf.save());
  return filePath;
}

export async function writeDocx(filePath: string, paragraphs: string[]): Promise<string> {
  const doc = new Document({
    sections: [
      {
        children: paragraphs.map(
          (text) => new Paragraph({ children: text ? [new TextRun(text)] : [] }),
        ),
      },
    ],
  });
  fs.writeFileSync(filePath, await Packer.toBuffer(doc));
  return filePath;
}

export async function pdfPageCount(filePath: string): Promise<number> {
  const pdf = await PDFDocument.load(fs.readFileSync(filePath));
  return pdf.getPageCount();
}

export async function readDocumentXml(docxPath: string): Promise<string> {
  const zip = await JSZip.loadAsync(fs.readFileSync(docxPath));
  const entry = zip.file("word/document.xml");
  if (!entry) throw new Error(`${docxPath} has no word/document.xml`);
  return entry.async("string");
}
