import fs from 'fs';
import os from 'os';
import path from 'path';
import { CancellationSignal } from '../src/main/cancellation';
import { VideoWriter } from '../src/main/videoWriter';
import { FinishTrigger, FrameChannel, KeyEventChannel, Unsubscribe } from '../src/types/capture';
import { ImageFormat, KeyEvent, KeyTransition, ScreenFrame } from '../src/types/events';

export const TINY_FORMAT: ImageFormat = { width: 2, height: 2 };

export function pixels(fill: number, format: ImageFormat = TINY_FORMAT): Buffer {
  return Buffer.alloc(format.width * format.height * 3, fill);
}

export function frameAt(timestamp: number, fill = 0): ScreenFrame {
  return { pixels: pixels(fill), timestamp };
}

export function framesAt(...timestamps: number[]): ScreenFrame[] {
  return timestamps.map((t, i) => frameAt(t, i));
}

export function down(keyCode: string, timestamp: number): KeyEvent {
  return { keyCode, down: true, timestamp };
}

export function up(keyCode: string, timestamp: number): KeyEvent {
  return { keyCode, down: false, timestamp };
}

/** Clock whose time only moves when the test sets it. */
export class ManualClock {
  constructor(public now = 0) {}
  readonly read = (): number => this.now;
}

export function nextTick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Replays a fixed list of frames and then reports end of stream.
 * `failAt` makes the n-th pull (0-based) reject instead.
 */
export class ListFrameChannel implements FrameChannel {
  pulls = 0;
  closed = false;

  constructor(
    private readonly frames: ScreenFrame[],
    private readonly failAt?: number
  ) {}

  async next(): Promise<ScreenFrame | null> {
    const index = this.pulls++;
    await nextTick();
    if (index === this.failAt) throw new Error('grab failed');
    return this.frames[index] ?? null;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** Produces a frame per macrotask, forever, with timestamps 0, 1, 2, ... */
export class EndlessFrameChannel implements FrameChannel {
  pulls = 0;
  closed = false;

  async next(): Promise<ScreenFrame | null> {
    await nextTick();
    return frameAt(this.pulls++);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeKeyChannel implements KeyEventChannel {
  closed = false;
  private readonly handlers = new Map<string, Set<(t: KeyTransition) => void>>();
  private readonly errorHandlers = new Set<(err: Error) => void>();

  constructor(private readonly knownKeys?: readonly string[]) {}

  onTransition(keyCode: string, handler: (t: KeyTransition) => void): Unsubscribe {
    if (this.knownKeys && !this.knownKeys.includes(keyCode)) {
      throw new Error(`unknown key identifier "${keyCode}"`);
    }
    const set = this.handlers.get(keyCode) ?? new Set();
    set.add(handler);
    this.handlers.set(keyCode, set);
    return () => {
      set.delete(handler);
    };
  }

  onError(handler: (err: Error) => void): Unsubscribe {
    this.errorHandlers.add(handler);
    return () => {
      this.errorHandlers.delete(handler);
    };
  }

  close(): void {
    this.closed = true;
  }

  emit(keyCode: string, isDown: boolean): void {
    [...(this.handlers.get(keyCode) ?? [])].forEach((h) => h({ keyCode, down: isDown }));
  }

  fail(err: Error): void {
    [...this.errorHandlers].forEach((h) => h(err));
  }

  get subscriptionCount(): number {
    let count = this.errorHandlers.size;
    this.handlers.forEach((set) => (count += set.size));
    return count;
  }
}

export class FakeFinishTrigger implements FinishTrigger {
  waiting = false;
  private fireFn: (() => void) | null = null;
  private failFn: ((err: Error) => void) | null = null;

  wait(signal: CancellationSignal): Promise<void> {
    this.waiting = true;
    return new Promise<void>((resolve, reject) => {
      const done = () => {
        this.waiting = false;
        resolve();
      };
      this.fireFn = done;
      this.failFn = (err) => {
        this.waiting = false;
        reject(err);
      };
      signal.onSet(done);
    });
  }

  fire(): void {
    this.fireFn?.();
  }

  fail(err: Error): void {
    this.failFn?.(err);
  }
}

export interface RecordedVideo {
  file: string;
  frameCount: number;
  format: ImageFormat;
  fps: number;
}

export class MemoryVideoWriter implements VideoWriter {
  readonly videos: RecordedVideo[] = [];

  constructor(private readonly failWith?: Error) {}

  async write(file: string, frames: readonly Buffer[], format: ImageFormat, fps: number): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.videos.push({ file, frameCount: frames.length, format, fps });
  }
}

export function makeTempDir(prefix = 'recorder-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}
