import type { ConversionFailure, ErrorKind } from "./types";

export class ConversionError extends Error {
  constructor(
    readonly kind: ErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConversionError";
  }
}

export class RegistryFrozenError extends Error {
  constructor(message = "Converter registry is frozen; register converters during startup") {
    super(message);
    this.name = "RegistryFrozenError";
  }
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error) {
    const code = (error as NodeJS.ErrnoException).code;
    return typeof code === "string" && code.startsWith("E") ? code : undefined;
  }
  return undefined;
}

/**
 * Maps anything a converter throws onto the dispatcher's error kinds.
 * Backend error types never leak past this point.
 */
export function toConversionFailure(error: unknown): ConversionFailure {
  if (error instanceof ConversionError) {
    return { kind: error.kind, message: error.message };
  }
  const message = error instanceof Error ? error.message : String(error);
  if (errnoCode(error)) {
    return { kind: "IoError", message };
  }
  return { kind: "ConversionFailed", message: message || "Unknown conversion error" };
}
