import { CaptureSource, Clock, KeyEvent, ScreenFrame, systemClock } from '../types/events';
import { FrameChannel, FinishTrigger, KeyEventChannel, Unsubscribe } from '../types/capture';
import { SequenceBuffer } from './buffer';
import { CancellationSignal } from './cancellation';
import { BackendFailure } from './errors';
import { logger } from './logger';
import { ensureTimeOrdered } from './streamMerger';

export interface CaptureOrchestratorOptions {
  recordingKeys: readonly string[];
  keyRecordingDelaySec: number;
  clock?: Clock;
}

export interface CaptureBackends {
  frames: FrameChannel;
  keys: KeyEventChannel;
  finish: FinishTrigger;
}

export interface CaptureResult {
  frames: readonly ScreenFrame[];
  keyEvents: readonly KeyEvent[];
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Runs the screen producer, the key producer and the finish watcher of one
 * session side by side. They share nothing but the cancellation signal;
 * each producer fills its own buffer and hands it back once the signal is
 * set. Both channels are closed before `run` settles, whatever the outcome.
 */
export class CaptureOrchestrator {
  private readonly clock: Clock;

  constructor(
    private readonly opts: CaptureOrchestratorOptions,
    private readonly backends: CaptureBackends
  ) {
    this.clock = opts.clock ?? systemClock;
  }

  async run(): Promise<CaptureResult> {
    const signal = new CancellationSignal();
    const failures: BackendFailure[] = [];

    const guard = <T>(source: CaptureSource, task: Promise<T>): Promise<T> =>
      task.catch((err: unknown) => {
        const failure = new BackendFailure(source, err);
        failures.push(failure);
        logger.error(`[capture] ${failure.message}, stopping session`);
        signal.set();
        throw failure;
      });

    const [screen, keyboard, watcher] = await Promise.allSettled([
      guard('screen', this.recordScreen(signal)),
      guard('keyboard', this.recordKeyboard(signal)),
      guard('trigger', this.watchForFinish(signal)),
    ]);

    if (failures.length > 0) throw failures[0];
    if (screen.status === 'rejected') throw toError(screen.reason);
    if (keyboard.status === 'rejected') throw toError(keyboard.reason);
    if (watcher.status === 'rejected') throw toError(watcher.reason);

    logger.log(
      `[capture] session captured ${screen.value.length} frame(s), ${keyboard.value.length} key event(s)`
    );
    return {
      frames: ensureTimeOrdered(screen.value, 'frame'),
      keyEvents: ensureTimeOrdered(keyboard.value, 'key event'),
    };
  }

  private async recordScreen(signal: CancellationSignal): Promise<ScreenFrame[]> {
    const { frames } = this.backends;
    const buffer = new SequenceBuffer<ScreenFrame>();
    try {
      while (!signal.isSet) {
        const frame = await frames.next();
        if (frame === null) {
          logger.log('[capture] frame channel reached end of stream');
          break;
        }
        buffer.add(frame);
      }
    } finally {
      await frames.close();
    }
    return buffer.drain();
  }

  private recordKeyboard(signal: CancellationSignal): Promise<KeyEvent[]> {
    const { keys } = this.backends;
    const { recordingKeys, keyRecordingDelaySec } = this.opts;
    const buffer = new SequenceBuffer<KeyEvent>();

    return new Promise<KeyEvent[]>((resolve, reject) => {
      const unsubscribes: Unsubscribe[] = [];
      let finished = false;

      const finish = (failure?: Error): void => {
        if (finished) return;
        finished = true;
        unsubscribes.splice(0).forEach((unsubscribe) => unsubscribe());
        let error = failure;
        try {
          keys.close();
        } catch (err) {
          error ??= toError(err);
        }
        if (error) reject(error);
        else resolve(buffer.drain());
      };

      try {
        unsubscribes.push(keys.onError((err) => finish(err)));
        for (const keyCode of recordingKeys) {
          unsubscribes.push(
            keys.onTransition(keyCode, ({ down }) => {
              if (finished) return;
              buffer.add({ keyCode, down, timestamp: this.clock() + keyRecordingDelaySec });
            })
          );
        }
      } catch (err) {
        finish(toError(err));
        return;
      }
      unsubscribes.push(signal.onSet(() => finish()));
    });
  }

  private async watchForFinish(signal: CancellationSignal): Promise<void> {
    try {
      await this.backends.finish.wait(signal);
    } finally {
      signal.set();
    }
  }
}
