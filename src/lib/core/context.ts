import { CONVERSION_TIMEOUT_MS } from "../../config";
import { createDefaultRegistry } from "../convert/converters";
import { Dispatcher, type ExecuteOptions } from "../convert/dispatcher";
import type { ConverterRegistry } from "../convert/registry";

let sharedRegistry: ConverterRegistry | undefined;

/**
 * Process-wide registry, built and frozen on first use.
 */
export function getRegistry(): ConverterRegistry {
  sharedRegistry ??= createDefaultRegistry();
  return sharedRegistry;
}

/**
 * Creates a Dispatcher over the shared registry
 */
export function createDispatcher(defaults: ExecuteOptions = {}): Dispatcher {
  return new Dispatcher(getRegistry(), {
    timeoutMs: CONVERSION_TIMEOUT_MS,
    ...defaults,
  });
}
