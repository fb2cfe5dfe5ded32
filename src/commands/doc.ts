import * as path from "node:path";
import { Command } from "commander";
import { createRequest, deriveOutputPath } from "../lib/convert/request";
import { runSingleRequest } from "./shared";

interface OutputFlags {
  output?: string;
}

export const convertDocument = new Command("convert")
  .description("Convert between PDF, DOCX and plain text")
  .argument("<input>", "Input document")
  .argument("<format>", "Output format (txt, docx)")
  .option("-o, --output <file>", "Output file (default: input name with the new extension)")
  .action(async (input: string, format: string, options: OutputFlags) => {
    const request = createRequest({ inputPath: input, format, outputPath: options.output });
    await runSingleRequest(request, `Converting ${input} to ${request.targetFormat}...`);
  });

export const extractPages = new Command("extract")
  .description("Copy a selection of pages into a new PDF")
  .argument("<input>", "Input PDF")
  .argument("<pages>", "1-based page ranges, e.g. 1-3,5,8-")
  .option("-o, --output <file>", "Output file (default: <name>_pages_<pages>.pdf)")
  .action(async (input: string, pages: string, options: OutputFlags) => {
    const suffix = `_pages_${pages.replace(/\s+/g, "")}`;
    const request = createRequest({
      inputPath: input,
      format: "pdf",
      outputPath: options.output ?? deriveOutputPath(input, "pdf", suffix),
      inputKind: "PdfDocument",
      options: { pages },
    });
    await runSingleRequest(request, `Extracting pages ${pages} from ${input}...`);
  });

export const mergePdfs = new Command("merge")
  .description("Concatenate PDFs in the order given")
  .argument("<output>", "Output PDF")
  .argument("<inputs...>", "PDFs to merge")
  .action(async (output: string, inputs: string[]) => {
    if (inputs.length < 2) {
      console.error("Merging needs at least two input files");
      process.exitCode = 1;
      return;
    }
    const [first, ...rest] = inputs;
    const request = createRequest({
      inputPath: first,
      format: "pdf",
      outputPath: output,
      inputKind: "PdfDocument",
      options: { append: rest.map((p) => path.resolve(p)) },
    });
    await runSingleRequest(request, `Merging ${inputs.length} files...`);
  });

export const doc = new Command("doc")
  .description("Document conversion and PDF page operations")
  .addCommand(convertDocument)
  .addCommand(extractPages)
  .addCommand(mergePdfs);
