import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { CONFIG, CONVERSION_TIMEOUT_MS, PATHS } from "../../config";

const userConfigSchema = z.object({
  image: z
    .object({
      quality: z.number().int().min(1).max(100).optional(),
      compressQuality: z.number().int().min(1).max(100).optional(),
    })
    .optional(),
  batch: z
    .object({
      concurrency: z.number().int().positive().optional(),
      timeoutMs: z.number().int().nonnegative().optional(),
    })
    .optional(),
});

export type UserConfig = z.infer<typeof userConfigSchema>;

export interface ResolvedDefaults {
  quality: number;
  compressQuality: number;
  concurrency: number;
  timeoutMs: number;
}

/**
 * Load user configuration from ~/.filecraft/config.json
 */
export function loadUserConfig(configFile = PATHS.configFile): UserConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(configFile, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return {};
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    console.error(`Ignoring ${configFile}: not valid JSON`);
    return {};
  }
  const result = userConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    console.error(`Ignoring ${configFile}: ${issue.path.join(".")} ${issue.message}`);
    return {};
  }
  return result.data;
}

/**
 * Save user configuration to ~/.filecraft/config.json
 */
export function saveUserConfig(config: UserConfig, configFile = PATHS.configFile): void {
  fs.mkdirSync(path.dirname(configFile), { recursive: true });
  const content = JSON.stringify(userConfigSchema.parse(config), null, 2);
  fs.writeFileSync(configFile, `${content}\n`, "utf-8");
}

/**
 * Update specific sections of the user configuration
 */
export function updateUserConfig(
  updates: Partial<UserConfig>,
  configFile = PATHS.configFile,
): UserConfig {
  const current = loadUserConfig(configFile);
  const updated: UserConfig = {
    ...current,
    image: "image" in updates ? updates.image : current.image,
    batch: "batch" in updates ? updates.batch : current.batch,
  };
  saveUserConfig(updated, configFile);
  return updated;
}

/**
 * Built-in defaults overlaid with the user's configuration.
 */
export function resolveDefaults(config: UserConfig = loadUserConfig()): ResolvedDefaults {
  return {
    quality: config.image?.quality ?? CONFIG.CONVERT_QUALITY,
    compressQuality: config.image?.compressQuality ?? CONFIG.COMPRESS_QUALITY,
    concurrency: config.batch?.concurrency ?? CONFIG.BATCH_CONCURRENCY,
    timeoutMs: config.batch?.timeoutMs ?? CONVERSION_TIMEOUT_MS,
  };
}

export function getConfigFilePath(): string {
  return PATHS.configFile;
}
