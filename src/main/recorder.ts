import { CaptureBackends, CaptureOrchestrator } from './captureOrchestrator';
import { BackendFailure, RecorderError } from './errors';
import { logger } from './logger';
import { SessionExporter } from './sessionExporter';
import { InconsistentKeyPolicy, averageFps, mergeStreams } from './streamMerger';
import { Clock } from '../types/events';

export interface RecorderOptions {
  recordingKeys: readonly string[];
  discardTailSec: number;
  keyRecordingDelaySec: number;
  inconsistentKeyPolicy: InconsistentKeyPolicy;
  clock?: Clock;
}

export type DiscardReason = 'empty' | 'too_short';

export type SessionOutcome =
  | {
      kind: 'saved';
      folder: string;
      itemCount: number;
      averageFps: number;
      inconsistentReleases: number;
    }
  | { kind: 'discarded'; reason: DiscardReason }
  | { kind: 'failed'; error: Error };

/**
 * One recording session: capture until the finish trigger, merge both
 * streams and export the aligned dataset. Never throws; every ending is
 * reported as a `SessionOutcome` so the caller can start the next session.
 */
export class Recorder {
  constructor(
    private readonly opts: RecorderOptions,
    private readonly openBackends: () => CaptureBackends,
    private readonly exporter: SessionExporter
  ) {}

  async record(): Promise<SessionOutcome> {
    try {
      return await this.recordSession();
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      if (error instanceof BackendFailure) {
        logger.error(`[recorder] session failed (${error.source} backend error): ${error.message}`);
      } else {
        logger.error(`[recorder] session failed: ${error.message}`);
      }
      return { kind: 'failed', error };
    }
  }

  private async recordSession(): Promise<SessionOutcome> {
    const orchestrator = new CaptureOrchestrator(
      {
        recordingKeys: this.opts.recordingKeys,
        keyRecordingDelaySec: this.opts.keyRecordingDelaySec,
        clock: this.opts.clock,
      },
      this.openBackends()
    );
    const { frames, keyEvents } = await orchestrator.run();

    const merged = mergeStreams(keyEvents, frames, {
      discardTailSec: this.opts.discardTailSec,
      inconsistentKeyPolicy: this.opts.inconsistentKeyPolicy,
    });
    logger.log(
      `[recorder] merged ${merged.items.length} item(s), discarded ${merged.discardedFrames} tail frame(s)`
    );

    if (merged.items.length === 0) {
      logger.log('[recorder] session discarded (empty): skipping saving dataset');
      return { kind: 'discarded', reason: 'empty' };
    }
    if (merged.items.length < 2) {
      logger.log('[recorder] session discarded (too short): a single frame has no frame rate');
      return { kind: 'discarded', reason: 'too_short' };
    }

    let fps: number;
    try {
      fps = averageFps(merged.items);
    } catch (err) {
      if (err instanceof RecorderError && err.code === 'DEGENERATE_RATE') {
        logger.log(`[recorder] session discarded (too short): ${err.message}`);
        return { kind: 'discarded', reason: 'too_short' };
      }
      throw err;
    }

    const folder = await this.exporter.export(merged.items, {
      averageFps: fps,
      inconsistentReleases: merged.inconsistentReleases,
    });
    logger.log(`[recorder] saved data to ${folder}`);
    return {
      kind: 'saved',
      folder,
      itemCount: merged.items.length,
      averageFps: fps,
      inconsistentReleases: merged.inconsistentReleases,
    };
  }
}
