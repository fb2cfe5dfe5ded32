import * as p from "@clack/prompts";
import { Command } from "commander";
import {
  getConfigFilePath,
  loadUserConfig,
  resolveDefaults,
  saveUserConfig,
  updateUserConfig,
} from "../lib/config";

export const config = new Command("config")
  .description("Configure default quality, concurrency and timeout")
  .option("--show", "Show current configuration")
  .option("--reset", "Reset configuration to defaults")
  .action(async (options: { show?: boolean; reset?: boolean }) => {
    if (options.show) {
      showConfig();
      return;
    }

    if (options.reset) {
      await resetConfig();
      return;
    }

    await runConfigWizard();
  });

function showConfig(): void {
  const config = loadUserConfig();
  const defaults = resolveDefaults(config);
  const mark = (set: boolean) => (set ? "" : " (default)");

  console.log(`\nConfiguration file: ${getConfigFilePath()}\n`);
  console.log("Image Settings:");
  console.log(`  Convert quality:  ${defaults.quality}${mark(config.image?.quality !== undefined)}`);
  console.log(
    `  Compress quality: ${defaults.compressQuality}${mark(config.image?.compressQuality !== undefined)}`,
  );
  console.log();
  console.log("Batch Settings:");
  console.log(
    `  Concurrency: ${defaults.concurrency}${mark(config.batch?.concurrency !== undefined)}`,
  );
  console.log(
    `  Timeout:     ${defaults.timeoutMs === 0 ? "none" : `${defaults.timeoutMs}ms`}${mark(config.batch?.timeoutMs !== undefined)}`,
  );
}

async function resetConfig(): Promise<void> {
  p.intro("Reset Configuration");

  const confirm = await p.confirm({
    message: "Are you sure you want to reset all configuration?",
    initialValue: false,
  });

  if (p.isCancel(confirm) || !confirm) {
    p.cancel("Reset cancelled.");
    return;
  }

  saveUserConfig({});
  p.outro("Configuration reset to defaults.");
}

function integerValidator(min: number, max = Number.MAX_SAFE_INTEGER) {
  return (value: string): string | undefined => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
      return max === Number.MAX_SAFE_INTEGER
        ? `Enter a whole number of at least ${min}`
        : `Enter a whole number from ${min} to ${max}`;
    }
    return undefined;
  };
}

async function askInteger(
  message: string,
  initial: number,
  min: number,
  max?: number,
): Promise<number | symbol> {
  const answer = await p.text({
    message,
    initialValue: String(initial),
    validate: integerValidator(min, max),
  });
  return p.isCancel(answer) ? answer : Number(answer);
}

async function runConfigWizard(): Promise<void> {
  const defaults = resolveDefaults();

  p.intro("filecraft Configuration");

  p.note(
    "Quality applies to lossy formats (jpg, webp, avif).\n" +
      "Lossless formats ignore it.",
    "Image Quality",
  );

  const quality = await askInteger("Default conversion quality (1-100):", defaults.quality, 1, 100);
  if (p.isCancel(quality)) {
    p.cancel("Configuration cancelled.");
    return;
  }

  const compressQuality = await askInteger(
    "Default compression quality (1-100):",
    defaults.compressQuality,
    1,
    100,
  );
  if (p.isCancel(compressQuality)) {
    p.cancel("Configuration cancelled.");
    return;
  }

  updateUserConfig({ image: { quality, compressQuality } });

  const concurrency = await askInteger("Conversions to run at once in a batch:", defaults.concurrency, 1);
  if (p.isCancel(concurrency)) {
    p.cancel("Configuration cancelled.");
    return;
  }

  const timeoutMs = await askInteger(
    "Per-conversion timeout in milliseconds (0 for none):",
    defaults.timeoutMs,
    0,
  );
  if (p.isCancel(timeoutMs)) {
    p.cancel("Configuration cancelled.");
    return;
  }

  updateUserConfig({ batch: { concurrency, timeoutMs } });
  p.outro(`Configuration saved to ${getConfigFilePath()}`);
}
