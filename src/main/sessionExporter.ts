import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { DatasetItem, ImageFormat } from '../types/events';
import { logger } from './logger';
import { saveStackedUint8 } from './npy';
import { keysToDirections } from './transforms';
import { VideoWriter } from './videoWriter';

export const NP_KEYS_FILENAME = 'keys.npy';
export const NP_SCREENS_FILENAME = 'screens.npy';
export const AVI_VIDEO_FILENAME = 'video.avi';
export const SESSION_META_FILENAME = 'session.json';

export interface SessionExporterOptions {
  saveDir: string;
  recordingKeys: readonly string[];
  outputFormat: ImageFormat;
  videoWriter: VideoWriter;
}

export interface ExportSummary {
  sessionId: string;
  itemCount: number;
  averageFps: number;
  inconsistentReleases: number;
}

export interface SessionMetadata extends ExportSummary {
  folder: string;
  startedAt: number;
  endedAt: number;
  recordingKeys: string[];
  outputFormat: ImageFormat;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local-time folder name, e.g. 20240131-235959 */
export function sessionFolderName(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}-` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export class SessionExporter {
  constructor(private readonly opts: SessionExporterOptions) {}

  /**
   * Writes the aligned dataset to a fresh timestamped folder under `saveDir`
   * and returns that folder's name.
   */
  async export(
    dataset: readonly DatasetItem[],
    stats: { averageFps: number; inconsistentReleases: number },
    now: Date = new Date()
  ): Promise<string> {
    const { saveDir, recordingKeys, outputFormat } = this.opts;
    const folder = this.reserveFolder(now);
    const dir = path.join(saveDir, folder);

    try {
      saveStackedUint8(
        path.join(dir, NP_KEYS_FILENAME),
        dataset.map((item) => keysToDirections(item.keyCodes, recordingKeys)),
        [recordingKeys.length]
      );
      saveStackedUint8(
        path.join(dir, NP_SCREENS_FILENAME),
        dataset.map((item) => item.screen),
        [outputFormat.height, outputFormat.width, 3]
      );

      logger.log(`[export] average fps = ${stats.averageFps.toFixed(2)}`);
      await this.opts.videoWriter.write(
        path.join(dir, AVI_VIDEO_FILENAME),
        dataset.map((item) => item.screen),
        outputFormat,
        stats.averageFps
      );

      const meta: SessionMetadata = {
        sessionId: uuidv4(),
        folder,
        itemCount: dataset.length,
        averageFps: stats.averageFps,
        inconsistentReleases: stats.inconsistentReleases,
        startedAt: dataset.length > 0 ? dataset[0].timestamp : 0,
        endedAt: dataset.length > 0 ? dataset[dataset.length - 1].timestamp : 0,
        recordingKeys: [...recordingKeys],
        outputFormat,
      };
      fs.writeFileSync(path.join(dir, SESSION_META_FILENAME), JSON.stringify(meta, null, 2), 'utf-8');
    } catch (err) {
      // never leave a partial session folder behind
      fs.rmSync(dir, { recursive: true, force: true });
      logger.error(`[export] removed incomplete session folder ${folder}`);
      throw err;
    }
    return folder;
  }

  /** Two sessions finishing within the same second get a numeric suffix. */
  private reserveFolder(now: Date): string {
    fs.mkdirSync(this.opts.saveDir, { recursive: true });
    const base = sessionFolderName(now);
    for (let attempt = 0; ; attempt++) {
      const folder = attempt === 0 ? base : `${base}-${attempt}`;
      try {
        fs.mkdirSync(path.join(this.opts.saveDir, folder));
        return folder;
      } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'EEXIST') continue;
        throw err;
      }
    }
  }
}
