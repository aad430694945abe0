import type { CancellationSignal } from '../main/cancellation';
import { KeyTransition, ScreenFrame } from './events';

/** Timestamped frames from a screen region, in capture order. */
export interface FrameChannel {
  /** Resolves with the next frame, or null at end of stream. */
  next(): Promise<ScreenFrame | null>;
  close(): Promise<void>;
}

export type Unsubscribe = () => void;

/**
 * Key transitions delivered by an input hook. Delivery order is the order
 * callbacks fire, which the merge relies on being timestamp order.
 */
export interface KeyEventChannel {
  onTransition(keyCode: string, handler: (transition: KeyTransition) => void): Unsubscribe;
  onError(handler: (err: Error) => void): Unsubscribe;
  close(): void;
}

/** Resolves when the user asks to finish the session, or once `signal` is set. */
export interface FinishTrigger {
  wait(signal: CancellationSignal): Promise<void>;
}
