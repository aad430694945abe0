import si from "systeminformation";
import { CaptureRegion } from "./config";
import { logger } from "./logger";

export class WindowRegion implements CaptureRegion {
  constructor(
    readonly left: number,
    readonly top: number,
    readonly width: number,
    readonly height: number
  ) {}

  static from(region: CaptureRegion): WindowRegion {
    return new WindowRegion(region.left, region.top, region.width, region.height);
  }

  /**
   * Whole area of the main display (or the first one listed), relative to
   * that display's captured image.
   */
  static async fromFirstMonitor(): Promise<WindowRegion> {
    const { displays } = await si.graphics();
    const display = displays.find((d) => d.main) ?? displays[0];
    const width = display?.currentResX ?? display?.resolutionX ?? 0;
    const height = display?.currentResY ?? display?.resolutionY ?? 0;
    if (!display || width <= 0 || height <= 0) {
      throw new Error("no display with a known resolution was found");
    }
    logger.log(`[capture] first monitor: ${width}x${height} (${display.model || "unknown model"})`);
    return new WindowRegion(0, 0, width, height);
  }

  /** This region clipped to an image of the given size. */
  clampTo(imageWidth: number, imageHeight: number): WindowRegion {
    const left = Math.min(this.left, Math.max(imageWidth - 1, 0));
    const top = Math.min(this.top, Math.max(imageHeight - 1, 0));
    return new WindowRegion(
      left,
      top,
      Math.max(1, Math.min(this.width, imageWidth - left)),
      Math.max(1, Math.min(this.height, imageHeight - top))
    );
  }
}
