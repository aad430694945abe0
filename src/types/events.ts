/** Seconds on a single monotonic wall clock shared by every producer. */
export type Clock = () => number;

export const systemClock: Clock = () =>
  (performance.timeOrigin + performance.now()) / 1000;

export interface KeyTransition {
  keyCode: string;
  down: boolean;
}

export interface KeyEvent extends KeyTransition {
  timestamp: number; // seconds, delay offset already applied
}

export interface ScreenFrame {
  pixels: Buffer; // packed RGB, height x width x 3
  timestamp: number;
}

export interface DatasetItem {
  screen: Buffer;
  keyCodes: string[];
  timestamp: number;
}

export interface ImageFormat {
  width: number;
  height: number;
}

export type CaptureSource = 'screen' | 'keyboard' | 'trigger';
