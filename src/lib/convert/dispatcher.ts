import * as fs from "node:fs";
import type { ZodIssue } from "zod";
import { DEBUG } from "../../config";
import { detectFormat, readHead } from "./detect";
import { ConversionError, toConversionFailure } from "./errors";
import type { ConverterRegistry } from "./registry";
import type {
  ConversionJob,
  ConversionOutcome,
  ConversionRequest,
  Converter,
  ConverterReport,
  FileKind,
  KnownFileKind,
  RequestState,
} from "./types";

export type TransitionListener = (
  request: ConversionRequest,
  state: RequestState,
) => void;

export interface ExecuteOptions {
  /** Abort the conversion after this many milliseconds; 0 or unset disables */
  timeoutMs?: number;
  onTransition?: TransitionListener;
}

function now(): bigint {
  return process.hrtime.bigint();
}

function toMs(start: bigint, end?: bigint): number {
  return Number((end ?? now()) - start) / 1_000_000;
}

function describeIssue(issue: ZodIssue): string {
  if (issue.code === "unrecognized_keys") {
    return `Unknown option ${issue.keys.map((k) => `'${k}'`).join(", ")}`;
  }
  const name = issue.path.join(".") || "options";
  return `Invalid option '${name}': ${issue.message}`;
}

async function ensureInputFile(inputPath: string): Promise<void> {
  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(inputPath);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new ConversionError("IoError", `File '${inputPath}' not found`, { cause: err });
    }
    throw err;
  }
  if (!stats.isFile()) {
    throw new ConversionError("IoError", `Path is not a file: ${inputPath}`);
  }
}

/**
 * Resolves requests against the registry and runs them. `execute` never
 * throws: every request ends as exactly one success or failure outcome.
 */
export class Dispatcher {
  constructor(
    private readonly registry: ConverterRegistry,
    private readonly defaults: ExecuteOptions = {},
  ) {}

  async resolve(filePath: string): Promise<FileKind> {
    const { kind } = await detectFormat(filePath);
    return kind;
  }

  async execute(
    request: ConversionRequest,
    options: ExecuteOptions = {},
  ): Promise<ConversionOutcome> {
    const timeoutMs = options.timeoutMs ?? this.defaults.timeoutMs ?? 0;
    let current = request;
    const transition = (state: RequestState) => {
      if (DEBUG) console.log(`[dispatcher] ${current.id} ${state}`);
      this.defaults.onTransition?.(current, state);
      options.onTransition?.(current, state);
    };

    const start = now();
    transition("Pending");
    try {
      transition("Resolving");
      await ensureInputFile(request.inputPath);
      const inputKind: KnownFileKind =
        request.inputKind ?? (await detectFormat(request.inputPath)).kind;
      current = Object.freeze({ ...request, inputKind });

      if (request.targetKind === "Unknown") {
        throw new ConversionError(
          "UnrecognizedFileKind",
          `Unknown target format '${request.targetFormat}'`,
        );
      }
      const targetKind = request.targetKind;

      transition("Validating");
      const converter = this.requireConverter(inputKind, targetKind, request.targetFormat);
      const parsed = converter.optionsSchema.safeParse(request.options);
      if (!parsed.success) {
        throw new ConversionError("InvalidOption", describeIssue(parsed.error.issues[0]));
      }
      const head = await readHead(request.inputPath);
      if (!converter.probe(head)) {
        throw new ConversionError(
          "UnrecognizedFileKind",
          `Content of '${request.inputPath}' does not match ${inputKind}`,
        );
      }

      transition("Converting");
      const report = await this.runWithDeadline(
        converter,
        {
          inputPath: request.inputPath,
          outputPath: request.outputPath,
          targetFormat: request.targetFormat,
          options: parsed.data,
        },
        timeoutMs,
      );

      const outcome: ConversionOutcome = {
        status: "success",
        request: current,
        result: {
          outputPath: request.outputPath,
          bytesWritten: report.bytesWritten,
          durationMs: toMs(start),
          warnings: report.warnings,
          metadata: report.metadata,
        },
      };
      transition("Succeeded");
      return outcome;
    } catch (error) {
      const failure = toConversionFailure(error);
      if (DEBUG) console.log(`[dispatcher] ${current.id} ${failure.kind}: ${failure.message}`);
      transition("Failed");
      return { status: "failure", request: current, error: failure };
    }
  }

  private requireConverter(
    source: KnownFileKind,
    target: KnownFileKind,
    format: string,
  ): Converter {
    const converter = this.registry.lookup(source, target);
    if (!converter) {
      const supported = this.registry
        .entries()
        .map((e) => `${e.source}→${e.target}`)
        .join(", ");
      throw new ConversionError(
        "UnsupportedConversion",
        `Conversion from ${source} to ${target} is not supported. Supported conversions: ${supported}`,
      );
    }
    if (!converter.formats.includes(format)) {
      throw new ConversionError(
        "UnsupportedConversion",
        `${converter.name} cannot write '${format}' (supported: ${converter.formats.join(", ")})`,
      );
    }
    return converter;
  }

  /**
   * Runs the converter with an abort deadline. A timed-out converter is
   * still awaited, so its batch slot stays taken until it has stopped and
   * cleaned up; if it finished anyway, its output was already committed
   * and the result stands.
   */
  private async runWithDeadline<O>(
    converter: Converter<O>,
    job: Omit<ConversionJob<O>, "signal">,
    timeoutMs: number,
  ): Promise<ConverterReport> {
    const controller = new AbortController();
    if (timeoutMs <= 0) {
      return converter.convert({ ...job, signal: controller.signal });
    }

    let timedOut: ConversionError | undefined;
    const timer = setTimeout(() => {
      timedOut = new ConversionError(
        "Timeout",
        `Conversion of '${job.inputPath}' exceeded ${timeoutMs}ms`,
      );
      controller.abort(timedOut);
    }, timeoutMs);

    try {
      return await converter.convert({ ...job, signal: controller.signal });
    } catch (error) {
      throw timedOut ?? error;
    } finally {
      clearTimeout(timer);
    }
  }
}
