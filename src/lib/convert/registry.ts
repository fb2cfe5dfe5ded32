import { DEBUG } from "../../config";
import { RegistryFrozenError } from "./errors";
import type { Converter, KnownFileKind } from "./types";

export interface RegistryEntry {
  source: KnownFileKind;
  target: KnownFileKind;
  converter: Converter;
}

function keyOf(source: KnownFileKind, target: KnownFileKind): string {
  return `${source}->${target}`;
}

/**
 * Dispatch table keyed by (source kind, target kind).
 *
 * Populated once at startup, then frozen. Lookups after `freeze()` never
 * race with writes, so concurrent batch items need no locking. A second
 * registration for the same pair replaces the first.
 */
export class ConverterRegistry {
  private entriesByKey = new Map<string, RegistryEntry>();
  private frozen = false;

  register<O>(source: KnownFileKind, target: KnownFileKind, converter: Converter<O>): void {
    if (this.frozen) {
      throw new RegistryFrozenError();
    }
    const key = keyOf(source, target);
    const previous = this.entriesByKey.get(key);
    if (previous && DEBUG) {
      console.log(
        `[registry] ${key}: ${converter.name} replaces ${previous.converter.name}`,
      );
    }
    this.entriesByKey.set(key, { source, target, converter });
  }

  lookup(source: KnownFileKind, target: KnownFileKind): Converter | undefined {
    return this.entriesByKey.get(keyOf(source, target))?.converter;
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  entries(): RegistryEntry[] {
    return Array.from(this.entriesByKey.values());
  }
}
