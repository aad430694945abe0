import screenshot from 'screenshot-desktop';
import sharp from 'sharp';
import { setTimeout as sleep } from 'timers/promises';
import { FrameChannel } from '../types/capture';
import { Clock, ImageFormat, ScreenFrame, systemClock } from '../types/events';
import { logger } from './logger';
import { WindowRegion } from './windowRegion';

export interface ScreenStreamerOptions {
  maxFps: number;
  outputFormat: ImageFormat;
  region: WindowRegion;
  statsIntervalSec: number;
  clock?: Clock;
  /** Encoded image of the whole display; defaults to screenshot-desktop. */
  grab?: () => Promise<Buffer>;
}

/** Periodically reports the frame rate actually reached. */
export class FrameRateMeter {
  private windowStart: number | null = null;
  private framesInWindow = 0;
  private total = 0;

  constructor(
    private readonly intervalSec: number,
    private readonly report: (fps: number, total: number) => void
  ) {}

  tick(timestamp: number): void {
    this.total++;
    if (this.windowStart === null) {
      this.windowStart = timestamp;
      return;
    }
    this.framesInWindow++;
    const elapsed = timestamp - this.windowStart;
    if (elapsed >= this.intervalSec) {
      this.report(this.framesInWindow / elapsed, this.total);
      this.windowStart = timestamp;
      this.framesInWindow = 0;
    }
  }

  get frameCount(): number {
    return this.total;
  }
}

/**
 * Frame channel over the desktop: grabs the display, crops the capture
 * region and scales it to the output format as packed RGB. Grabs are
 * spaced at least `1 / maxFps` seconds apart.
 */
export class ScreenStreamer implements FrameChannel {
  private readonly clock: Clock;
  private readonly grab: () => Promise<Buffer>;
  private readonly meter: FrameRateMeter;
  private lastGrabAt: number | null = null;
  private closed = false;

  constructor(private readonly opts: ScreenStreamerOptions) {
    this.clock = opts.clock ?? systemClock;
    this.grab = opts.grab ?? (() => screenshot({ format: 'png' }));
    this.meter = new FrameRateMeter(opts.statsIntervalSec, (fps, total) => {
      logger.log(`[capture] video recorder stats: ${fps.toFixed(1)} fps, ${total} frame(s)`);
    });
  }

  async next(): Promise<ScreenFrame | null> {
    if (this.closed) return null;
    await this.waitForSlot();
    this.lastGrabAt = this.clock();
    const encoded = await this.grab();
    const timestamp = this.clock();
    const pixels = await this.toRgb(encoded);
    this.meter.tick(timestamp);
    return { pixels, timestamp };
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    logger.log(`[capture] screen streamer closed after ${this.meter.frameCount} frame(s)`);
  }

  private async waitForSlot(): Promise<void> {
    if (this.lastGrabAt === null) return;
    const due = this.lastGrabAt + 1 / this.opts.maxFps;
    const remainingMs = (due - this.clock()) * 1000;
    if (remainingMs > 0) {
      await sleep(remainingMs);
    }
  }

  private async toRgb(encoded: Buffer): Promise<Buffer> {
    const image = sharp(encoded);
    const { width = 0, height = 0 } = await image.metadata();
    const region = this.opts.region.clampTo(width, height);
    const { width: outWidth, height: outHeight } = this.opts.outputFormat;
    return image
      .extract({ left: region.left, top: region.top, width: region.width, height: region.height })
      .resize(outWidth, outHeight, { fit: 'fill' })
      .removeAlpha()
      .toColourspace('srgb')
      .raw()
      .toBuffer();
  }
}
