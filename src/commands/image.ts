import * as fs from "node:fs";
import { Command, InvalidArgumentError } from "commander";
import { resolveDefaults } from "../lib/config";
import { detectFormat } from "../lib/convert/detect";
import { createRequest, deriveOutputPath } from "../lib/convert/request";
import { formatReduction, formatSize } from "../lib/utils/format";
import { effectiveQuality, parseInteger, runSingleRequest } from "./shared";

interface ConvertFlags {
  output?: string;
  quality?: number;
}

interface CompressFlags {
  output?: string;
  quality?: number;
  maxWidth?: number;
  maxHeight?: number;
}

interface ResizeFlags {
  output?: string;
  width?: number;
  height?: number;
  maintainAspect: boolean;
}

export const convertImage = new Command("convert")
  .description("Convert an image to another format")
  .argument("<input>", "Input image file")
  .argument("<format>", "Output format (jpg, png, webp, gif, tiff, avif)")
  .option("-o, --output <file>", "Output file (default: input name with the new extension)")
  .option("-q, --quality <n>", "Quality for lossy formats, 1-100", parseInteger)
  .action(async (input: string, format: string, options: ConvertFlags) => {
    const defaults = resolveDefaults();
    const request = createRequest({
      inputPath: input,
      format,
      outputPath: options.output,
      options: { quality: effectiveQuality(format, options.quality, defaults.quality) },
    });
    await runSingleRequest(request, `Converting ${input} to ${request.targetFormat}...`);
  });

export const compressImage = new Command("compress")
  .description("Re-encode an image in its own format to reduce its size")
  .argument("<input>", "Input image file")
  .option("-o, --output <file>", "Output file (default: <name>_compressed.<ext>)")
  .option("-q, --quality <n>", "Compression quality, 1-100", parseInteger)
  .option("--max-width <px>", "Shrink to at most this width", parseInteger)
  .option("--max-height <px>", "Shrink to at most this height", parseInteger)
  .action(async (input: string, options: CompressFlags) => {
    try {
      const { format } = await detectFormat(input);
      const defaults = resolveDefaults();
      const request = createRequest({
        inputPath: input,
        format,
        outputPath: options.output ?? deriveOutputPath(input, format, "_compressed"),
        inputKind: "ImageRaster",
        options: {
          quality: effectiveQuality(format, options.quality, defaults.compressQuality),
          maxWidth: options.maxWidth,
          maxHeight: options.maxHeight,
        },
      });
      const before = fs.statSync(request.inputPath).size;
      const outcome = await runSingleRequest(request, `Compressing ${input}...`);
      if (outcome.status === "success") {
        const after = outcome.result.bytesWritten;
        console.log(`  Original:   ${formatSize(before)}`);
        console.log(`  Compressed: ${formatSize(after)}`);
        console.log(`  Reduction:  ${formatReduction(before, after)}`);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      console.error("Failed to compress:", message);
      process.exitCode = 1;
    }
  });

export const resizeImage = new Command("resize")
  .description("Resize an image, keeping its format")
  .argument("<input>", "Input image file")
  .option("-w, --width <px>", "Target width", parseInteger)
  .option("-H, --height <px>", "Target height", parseInteger)
  .option("-o, --output <file>", "Output file (default: <name>_resized_<w>x<h>.<ext>)")
  .option("--no-maintain-aspect", "Stretch to exactly --width x --height")
  .action(async (input: string, options: ResizeFlags) => {
    if (options.width === undefined && options.height === undefined) {
      console.error("At least one of --width or --height must be specified");
      process.exitCode = 1;
      return;
    }
    try {
      const { format } = await detectFormat(input);
      const suffix = `_resized_${options.width ?? "auto"}x${options.height ?? "auto"}`;
      const request = createRequest({
        inputPath: input,
        format,
        outputPath: options.output ?? deriveOutputPath(input, format, suffix),
        inputKind: "ImageRaster",
        options: {
          maxWidth: options.width,
          maxHeight: options.height,
          maintainAspect: options.maintainAspect,
        },
      });
      const outcome = await runSingleRequest(request, `Resizing ${input}...`);
      if (outcome.status === "success" && outcome.result.metadata) {
        const { width, height } = outcome.result.metadata;
        console.log(`  New size: ${width} x ${height}`);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      console.error("Failed to resize:", message);
      process.exitCode = 1;
    }
  });

function parseAngle(value: string): number {
  const angle = Number(value);
  if (value.trim() === "" || !Number.isFinite(angle)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return angle;
}

export const rotateImage = new Command("rotate")
  .description("Rotate an image counter-clockwise, growing the canvas to fit")
  .argument("<input>", "Input image file")
  .argument("<angle>", "Degrees counter-clockwise; negative turns clockwise", parseAngle)
  .option("-o, --output <file>", "Output file (default: <name>_rotated_<angle>.<ext>)")
  .action(async (input: string, angle: number, options: { output?: string }) => {
    try {
      const { format } = await detectFormat(input);
      const request = createRequest({
        inputPath: input,
        format,
        outputPath: options.output ?? deriveOutputPath(input, format, `_rotated_${angle}`),
        inputKind: "ImageRaster",
        options: { rotate: angle },
      });
      const outcome = await runSingleRequest(request, `Rotating ${input}...`);
      if (outcome.status === "success" && outcome.result.metadata) {
        const { width, height } = outcome.result.metadata;
        console.log(`  New size: ${width} x ${height}`);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      console.error("Failed to rotate:", message);
      process.exitCode = 1;
    }
  });

export const image = new Command("image")
  .description("Image conversion, compression, resizing and rotation")
  .addCommand(convertImage)
  .addCommand(compressImage)
  .addCommand(resizeImage)
  .addCommand(rotateImage);
