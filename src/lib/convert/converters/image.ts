import * as fs from "node:fs";
import sharp from "sharp";
import { z } from "zod";
import {
  CONFIG,
  LOSSLESS_IMAGE_FORMATS,
  LOSSY_IMAGE_FORMATS,
} from "../../../config";
import { writeFileAtomic } from "../../utils/atomic-write";
import { sniffImageFormat } from "../detect";
import { ConversionError } from "../errors";
import type { ConversionJob, Converter, ConverterReport } from "../types";

export const imageOptionsSchema = z
  .object({
    quality: z.number().int().min(1).max(100).optional(),
    maxWidth: z.number().int().positive().optional(),
    maxHeight: z.number().int().positive().optional(),
    maintainAspect: z.boolean().default(true),
    /** Degrees; positive turns counter-clockwise and the canvas grows to fit. */
    rotate: z.number().finite().min(-360).max(360).optional(),
  })
  .strict()
  .superRefine((opts, ctx) => {
    if (opts.maintainAspect) return;
    for (const key of ["maxWidth", "maxHeight"] as const) {
      if (opts[key] === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message:
            "both maxWidth and maxHeight must be given when not maintaining aspect ratio",
        });
      }
    }
  });

export type ImageOptions = z.infer<typeof imageOptionsSchema>;

export interface Size {
  width: number;
  height: number;
}

/**
 * Target dimensions for a resize, or null when no bound is set.
 *
 * With `maintainAspect`, a single bound scales the other side
 * proportionally and two bounds fit the image inside the box. Computed
 * sides round to the nearest pixel and never drop below 1.
 */
export function computeTargetSize(
  source: Size,
  opts: Pick<ImageOptions, "maxWidth" | "maxHeight" | "maintainAspect">,
): Size | null {
  const { maxWidth, maxHeight } = opts;
  if (maxWidth === undefined && maxHeight === undefined) return null;

  if (!opts.maintainAspect) {
    return {
      width: maxWidth ?? source.width,
      height: maxHeight ?? source.height,
    };
  }

  const scaled = (side: number, ratio: number) => Math.max(1, Math.round(side * ratio));

  if (maxWidth !== undefined && maxHeight !== undefined) {
    const ratio = Math.min(maxWidth / source.width, maxHeight / source.height);
    return { width: scaled(source.width, ratio), height: scaled(source.height, ratio) };
  }
  if (maxWidth !== undefined) {
    return { width: maxWidth, height: scaled(source.height, maxWidth / source.width) };
  }
  const height = maxHeight ?? source.height;
  return { width: scaled(source.width, height / source.height), height };
}

const FORMAT_ALIASES: Record<string, string> = { jpg: "jpeg", tif: "tiff" };

function encoderFormat(targetFormat: string): string {
  return FORMAT_ALIASES[targetFormat] ?? targetFormat;
}

function encode(
  pipeline: sharp.Sharp,
  format: string,
  quality: number,
): sharp.Sharp {
  switch (format) {
    case "jpeg":
      // JPEG has no alpha channel; composite transparency onto white.
      return pipeline.flatten({ background: "#ffffff" }).jpeg({ quality });
    case "webp":
      return pipeline.webp({ quality });
    case "avif":
      return pipeline.avif({ quality });
    case "png":
      return pipeline.png({ compressionLevel: CONFIG.PNG_COMPRESSION_LEVEL });
    case "gif":
      return pipeline.gif();
    case "tiff":
      return pipeline.tiff({ compression: "lzw" });
    default:
      throw new ConversionError("UnsupportedConversion", `Cannot encode images as '${format}'`);
  }
}

export const imageConverter: Converter<ImageOptions> = {
  name: "image-raster",
  source: "ImageRaster",
  target: "ImageRaster",
  formats: [...LOSSY_IMAGE_FORMATS, ...LOSSLESS_IMAGE_FORMATS],
  optionsSchema: imageOptionsSchema,

  probe(head: Buffer): boolean {
    return sniffImageFormat(head) !== null;
  },

  async convert(job: ConversionJob<ImageOptions>): Promise<ConverterReport> {
    const warnings: string[] = [];
    const format = encoderFormat(job.targetFormat);
    const { quality } = job.options;

    if (quality !== undefined && LOSSLESS_IMAGE_FORMATS.has(job.targetFormat)) {
      warnings.push(`quality is ignored for lossless ${job.targetFormat} output`);
    }

    // Read up front so converting a file onto itself is safe.
    let input: Buffer = await fs.promises.readFile(job.inputPath);
    const angle = job.options.rotate ?? 0;
    if (angle % 360 !== 0) {
      // sharp turns clockwise; uncovered corners are filled white.
      input = await sharp(input).rotate(-angle, { background: "#ffffff" }).png().toBuffer();
    }
    const { width, height } = await sharp(input).metadata();
    if (!width || !height) {
      throw new ConversionError("ConversionFailed", `Could not read image dimensions of '${job.inputPath}'`);
    }

    let pipeline = sharp(input);
    const size = computeTargetSize({ width, height }, job.options);
    if (size) {
      pipeline = pipeline.resize(size.width, size.height, { fit: "fill", kernel: "lanczos3" });
    }

    pipeline = encode(pipeline, format, quality ?? CONFIG.CONVERT_QUALITY);
    const { data, info } = await pipeline.toBuffer({ resolveWithObject: true });
    const bytesWritten = await writeFileAtomic(job.outputPath, data, { signal: job.signal });

    return {
      bytesWritten,
      warnings,
      metadata: { width: info.width, height: info.height, format: info.format },
    };
  },
};
