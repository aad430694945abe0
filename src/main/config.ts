import fs from "fs";
import path from "path";
import { z } from "zod";
import { APP_DIR } from "./logger";

export const CONFIG_DIR = APP_DIR;
export const CONFIG_PATH = path.join(CONFIG_DIR, "config.json");

export const RegionSchema = z.object({
  left: z.number().int().nonnegative(),
  top: z.number().int().nonnegative(),
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

export const RecorderConfigSchema = z.object({
  saveDir: z.string().min(1),
  recordingKeys: z.array(z.string().min(1)).nonempty(),
  startKey: z.string().min(1).default("e"),
  exitKey: z.string().min(1).default("q"),
  finishRecordKey: z.string().min(1).default("space"),
  // discard the last N seconds so the stopping movement is not learnt
  discardTailSec: z.number().nonnegative().default(3),
  // stamp key events N seconds earlier to compensate for hook latency
  keyRecordingDelaySec: z.number().finite().default(-0.01),
  maxFps: z.number().positive().default(30),
  outputFormat: z
    .object({
      width: z.number().int().positive(),
      height: z.number().int().positive(),
    })
    .default({ width: 160, height: 120 }),
  region: RegionSchema.optional(),
  inconsistentKeyPolicy: z.enum(["ignore", "abort"]).default("ignore"),
  ffmpegPath: z.string().min(1).default("ffmpeg"),
  statsIntervalSec: z.number().positive().default(5),
});

export type RecorderConfig = z.infer<typeof RecorderConfigSchema>;
export type CaptureRegion = z.infer<typeof RegionSchema>;

export function getDefaultConfig(): RecorderConfig {
  return {
    saveDir: "data",
    recordingKeys: ["w", "a", "s", "d"],
    startKey: "e",
    exitKey: "q",
    finishRecordKey: "space",
    discardTailSec: 3,
    keyRecordingDelaySec: -0.01,
    maxFps: 30,
    outputFormat: { width: 160, height: 120 },
    inconsistentKeyPolicy: "ignore",
    ffmpegPath: "ffmpeg",
    statsIntervalSec: 5,
  };
}

function writeConfig(config: RecorderConfig): void {
  fs.writeFileSync(CONFIG_PATH, JSON.stringify(config, null, 2), "utf-8");
}

/**
 * Load the persisted config, creating it with defaults when missing and
 * resetting it when it no longer parses. Fields added since the file was
 * written are backfilled from the schema defaults.
 */
export function ensureConfigFile(): RecorderConfig {
  if (!fs.existsSync(CONFIG_DIR)) {
    fs.mkdirSync(CONFIG_DIR, { recursive: true });
  }

  const defaultConfig = getDefaultConfig();

  if (!fs.existsSync(CONFIG_PATH)) {
    writeConfig(defaultConfig);
    return defaultConfig;
  }
  try {
    const raw = fs.readFileSync(CONFIG_PATH, "utf-8");
    const parsed: unknown = JSON.parse(raw);
    const result = RecorderConfigSchema.safeParse(parsed);
    if (!result.success) {
      console.log(`[config] Invalid config at ${CONFIG_PATH}, restoring defaults`);
      writeConfig(defaultConfig);
      return defaultConfig;
    }
    const serialized = JSON.stringify(result.data, null, 2);
    if (serialized !== JSON.stringify(parsed, null, 2)) {
      fs.writeFileSync(CONFIG_PATH, serialized, "utf-8");
    }
    return result.data;
  } catch {
    writeConfig(defaultConfig);
    return defaultConfig;
  }
}

/** `saveDir` as an absolute path; relative paths follow the working directory. */
export function resolveSaveDir(config: Pick<RecorderConfig, "saveDir">): string {
  return path.resolve(config.saveDir);
}

export function updateConfig(partial: Partial<RecorderConfig>): RecorderConfig {
  const current = ensureConfigFile();
  const next = RecorderConfigSchema.parse({ ...current, ...partial });
  writeConfig(next);
  return next;
}
