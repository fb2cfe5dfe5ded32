import * as fs from "node:fs";
import * as path from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createDefaultRegistry } from "../src/lib/convert/converters";
import { noOptionsSchema, type NoOptions } from "../src/lib/convert/converters/no-options";
import { Dispatcher } from "../src/lib/convert/dispatcher";
import { ConverterRegistry } from "../src/lib/convert/registry";
import { createRequest } from "../src/lib/convert/request";
import type { ConversionJob, Converter, RequestState } from "../src/lib/convert/types";
import { writeFileAtomic } from "../src/lib/utils/atomic-write";
import { listFiles, makeTempDir, removeDir, writePng } from "./fixtures";

function textConverter(
  convert: (job: ConversionJob<NoOptions>) => Promise<number>,
): Converter<NoOptions> {
  return {
    name: "fake-text",
    source: "PlainText",
    target: "PlainText",
    formats: ["log"],
    optionsSchema: noOptionsSchema,
    probe: () => true,
    convert: async (job) => ({ bytesWritten: await convert(job), warnings: [] }),
  };
}

function dispatcherWith(converter: Converter<NoOptions>): Dispatcher {
  const registry = new ConverterRegistry();
  registry.register(converter.source, converter.target, converter);
  return new Dispatcher(registry.freeze());
}

describe("Dispatcher", () => {
  let dir: string;
  let textFile: string;

  beforeEach(() => {
    dir = makeTempDir();
    textFile = path.join(dir, "notes.txt");
    fs.writeFileSync(textFile, "line one\nline two\n");
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeDir(dir);
  });

  it("resolves file kinds", async () => {
    const dispatcher = new Dispatcher(createDefaultRegistry());
    await expect(dispatcher.resolve(textFile)).resolves.toBe("PlainText");
  });

  it("walks the states of a successful request", async () => {
    const dispatcher = dispatcherWith(
      textConverter((job) => writeFileAtomic(job.outputPath, "copied")),
    );
    const states: RequestState[] = [];
    const request = createRequest({ inputPath: textFile, format: "log" });

    const outcome = await dispatcher.execute(request, {
      onTransition: (_req, state) => states.push(state),
    });

    expect(states).toEqual(["Pending", "Resolving", "Validating", "Converting", "Succeeded"]);
    expect(outcome.status).toBe("success");
    if (outcome.status !== "success") return;
    expect(outcome.request.inputKind).toBe("PlainText");
    expect(outcome.result.outputPath).toBe(path.join(dir, "notes.log"));
    expect(outcome.result.bytesWritten).toBe(6);
    expect(outcome.result.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("rejects pairs without a converter and writes nothing", async () => {
    await writePng(path.join(dir, "photo.png"), 8, 8);
    const dispatcher = new Dispatcher(createDefaultRegistry());
    const states: RequestState[] = [];

    const outcome = await dispatcher.execute(
      createRequest({ inputPath: path.join(dir, "photo.png"), format: "docx" }),
      { onTransition: (_req, state) => states.push(state) },
    );

    expect(outcome.status).toBe("failure");
    if (outcome.status !== "failure") return;
    expect(outcome.error.kind).toBe("UnsupportedConversion");
    expect(outcome.error.message).toMatch(
      /^Conversion from ImageRaster to DocxDocument is not supported\. Supported conversions: /,
    );
    expect(states).toEqual(["Pending", "Resolving", "Validating", "Failed"]);
    expect(listFiles(dir)).toEqual(["notes.txt", "photo.png"]);
  });

  it("rejects formats the converter cannot write", async () => {
    const pdf = path.join(dir, "report.pdf");
    fs.writeFileSync(pdf, "%PDF-1.7\n");
    const dispatcher = new Dispatcher(createDefaultRegistry());

    const outcome = await dispatcher.execute(createRequest({ inputPath: pdf, format: "csv" }));

    expect(outcome).toMatchObject({
      status: "failure",
      error: {
        kind: "UnsupportedConversion",
        message: "pdf-to-text cannot write 'csv' (supported: txt, text, md, log)",
      },
    });
  });

  it("reports a missing input as an I/O error", async () => {
    const missing = path.join(dir, "missing.txt");
    const outcome = await new Dispatcher(createDefaultRegistry()).execute(
      createRequest({ inputPath: missing, format: "docx" }),
    );

    expect(outcome).toMatchObject({
      status: "failure",
      error: { kind: "IoError", message: `File '${missing}' not found` },
    });
  });

  it("reports unknown target formats", async () => {
    const outcome = await new Dispatcher(createDefaultRegistry()).execute(
      createRequest({ inputPath: textFile, format: "mp4" }),
    );

    expect(outcome).toMatchObject({
      status: "failure",
      error: { kind: "UnrecognizedFileKind", message: "Unknown target format 'mp4'" },
    });
  });

  it("rejects options the converter does not take", async () => {
    const pdf = path.join(dir, "report.pdf");
    fs.writeFileSync(pdf, "%PDF-1.7\n");

    const outcome = await new Dispatcher(createDefaultRegistry()).execute(
      createRequest({ inputPath: pdf, format: "txt", options: { quality: 80 } }),
    );

    expect(outcome).toMatchObject({
      status: "failure",
      error: { kind: "InvalidOption", message: "Unknown option 'quality'" },
    });
  });

  it("rejects content that does not match the extension", async () => {
    const fake = path.join(dir, "fake.pdf");
    fs.writeFileSync(fake, "just text");

    const outcome = await new Dispatcher(createDefaultRegistry()).execute(
      createRequest({ inputPath: fake, format: "txt" }),
    );

    expect(outcome).toMatchObject({
      status: "failure",
      error: {
        kind: "UnrecognizedFileKind",
        message: `Content of '${fake}' does not match PdfDocument`,
      },
    });
  });

  it("maps converter crashes to ConversionFailed", async () => {
    const dispatcher = dispatcherWith(
      textConverter(async () => {
        throw new Error("backend exploded");
      }),
    );

    const outcome = await dispatcher.execute(createRequest({ inputPath: textFile, format: "log" }));

    expect(outcome).toMatchObject({
      status: "failure",
      error: { kind: "ConversionFailed", message: "backend exploded" },
    });
  });

  it("times out slow conversions and drops their output", async () => {
    const dispatcher = dispatcherWith(
      textConverter(async (job) => {
        await sleep(200);
        return writeFileAtomic(job.outputPath, "too late", { signal: job.signal });
      }),
    );
    const request = createRequest({ inputPath: textFile, format: "log" });

    const outcome = await dispatcher.execute(request, { timeoutMs: 20 });

    expect(outcome).toMatchObject({
      status: "failure",
      error: { kind: "Timeout", message: `Conversion of '${textFile}' exceeded 20ms` },
    });
    expect(listFiles(dir)).toEqual(["notes.txt"]);
  });

  it("does not publish output when the deadline passes during the final write steps", async () => {
    const realStat = fs.promises.stat;
    vi.spyOn(fs.promises, "stat").mockImplementation(async (target, options) => {
      if (String(target).endsWith(".tmp")) await sleep(100);
      return realStat(target, options);
    });
    const dispatcher = dispatcherWith(
      textConverter((job) => writeFileAtomic(job.outputPath, "data", { signal: job.signal })),
    );

    const outcome = await dispatcher.execute(
      createRequest({ inputPath: textFile, format: "log" }),
      { timeoutMs: 50 },
    );

    expect(outcome.status === "failure" && outcome.error.kind).toBe("Timeout");
    expect(listFiles(dir)).toEqual(["notes.txt"]);
  });

  it("uses the constructor's timeout when the call gives none", async () => {
    const registry = new ConverterRegistry();
    const slow = textConverter(async (job) => {
      await sleep(200, undefined, { signal: job.signal });
      return 0;
    });
    registry.register(slow.source, slow.target, slow);
    const dispatcher = new Dispatcher(registry.freeze(), { timeoutMs: 20 });

    const outcome = await dispatcher.execute(createRequest({ inputPath: textFile, format: "log" }));

    expect(outcome.status === "failure" && outcome.error.kind).toBe("Timeout");
  });
});
