#!/usr/bin/env node
import fs from "fs";
import { ensureConfigFile, resolveSaveDir, CONFIG_PATH } from "./config";
import { KeyboardHook, loadNativeKeyHook, validateKeyBindings } from "./keyboardHook";
import { logger } from "./logger";
import { Recorder } from "./recorder";
import { ScreenStreamer } from "./screenStreamer";
import { SessionExporter } from "./sessionExporter";
import { FfmpegVideoWriter } from "./videoWriter";
import { WindowRegion } from "./windowRegion";

async function main(): Promise<void> {
  const config = ensureConfigFile();
  logger.log(`[recorder] config loaded from ${CONFIG_PATH}, logging to ${logger.getLogPath()}`);

  const { backend, keyTable } = await loadNativeKeyHook();
  const hook = new KeyboardHook(backend, keyTable);
  validateKeyBindings(config, hook);
  hook.start();
  hook.addHotkey(config.exitKey, () => {
    logger.log("[recorder] exit key pressed - stopping");
    hook.stop();
    process.exit(0);
  });

  logger.log(`[recorder] press "${config.startKey}" to start recording.`);
  await hook.waitForKey(config.startKey);
  logger.log(
    `[recorder] start recording... (press "${config.exitKey}" to exit, ` +
      `press "${config.finishRecordKey}" to save and start next recording)`
  );

  const saveDir = resolveSaveDir(config);
  fs.mkdirSync(saveDir, { recursive: true });
  logger.log(`[recorder] saving sessions under ${saveDir}`);
  const region = config.region
    ? WindowRegion.from(config.region)
    : await WindowRegion.fromFirstMonitor();
  const exporter = new SessionExporter({
    saveDir,
    recordingKeys: config.recordingKeys,
    outputFormat: config.outputFormat,
    videoWriter: new FfmpegVideoWriter(config.ffmpegPath),
  });

  for (;;) {
    const recorder = new Recorder(
      {
        recordingKeys: config.recordingKeys,
        discardTailSec: config.discardTailSec,
        keyRecordingDelaySec: config.keyRecordingDelaySec,
        inconsistentKeyPolicy: config.inconsistentKeyPolicy,
      },
      () => ({
        frames: new ScreenStreamer({
          maxFps: config.maxFps,
          outputFormat: config.outputFormat,
          region,
          statsIntervalSec: config.statsIntervalSec,
        }),
        keys: hook.openChannel(),
        finish: hook.finishTrigger(config.finishRecordKey),
      }),
      exporter
    );
    const outcome = await recorder.record();
    logger.log(`[recorder] session ended: ${outcome.kind}, starting next recording`);
  }
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  logger.error(`[recorder] fatal: ${message}`);
  process.exit(1);
});
