import * as fs from "node:fs";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadManifest } from "../src/lib/convert/manifest";
import { makeTempDir, removeDir } from "./fixtures";

describe("loadManifest", () => {
  let dir: string;
  let manifest: string;

  beforeEach(() => {
    dir = makeTempDir();
    manifest = path.join(dir, "jobs.json");
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("resolves paths against the manifest directory", () => {
    fs.writeFileSync(
      manifest,
      JSON.stringify([
        { input: "a.png", format: "webp", options: { quality: 80 } },
        { input: "/abs/doc.pdf", format: "txt", output: "out/doc.txt" },
      ]),
    );

    expect(loadManifest(manifest)).toEqual([
      { inputPath: path.join(dir, "a.png"), format: "webp", outputPath: undefined, options: { quality: 80 } },
      {
        inputPath: "/abs/doc.pdf",
        format: "txt",
        outputPath: path.join(dir, "out", "doc.txt"),
        options: undefined,
      },
    ]);
  });

  it("rejects invalid JSON", () => {
    fs.writeFileSync(manifest, "[");
    expect(() => loadManifest(manifest)).toThrow(`${manifest} is not valid JSON`);
  });

  it("points at the offending entry", () => {
    fs.writeFileSync(manifest, JSON.stringify([{ input: "a.png", format: "webp" }, { input: "b.png" }]));
    expect(() => loadManifest(manifest)).toThrow("Invalid manifest at 1.format: Required");
  });

  it("requires an array", () => {
    fs.writeFileSync(manifest, JSON.stringify({ input: "a.png", format: "webp" }));
    expect(() => loadManifest(manifest)).toThrow("Invalid manifest: Expected array, received object");
  });
});
