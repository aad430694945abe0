import { DatasetItem, KeyEvent, ScreenFrame } from '../types/events';
import { DegenerateRateError, InconsistentKeyStateError } from './errors';
import { logger } from './logger';

/**
 * What to do when a key is released that is not in the active set, e.g.
 * a key already held when recording started or a dropped press.
 * `ignore` leaves the set untouched and counts the occurrence.
 */
export type InconsistentKeyPolicy = 'ignore' | 'abort';

export interface MergeOptions {
  discardTailSec: number;
  inconsistentKeyPolicy?: InconsistentKeyPolicy;
}

export interface MergeResult {
  items: DatasetItem[];
  inconsistentReleases: number;
  discardedFrames: number;
}

/**
 * Two-pointer merge of the finished key and frame sequences.
 *
 * Every key event stamped strictly before a frame is applied before that
 * frame is emitted, so each item carries the key state that caused it.
 * Frames later than `last - discardTailSec` are dropped along with any key
 * events that follow the last retained frame.
 */
export function mergeStreams(
  keyEvents: readonly KeyEvent[],
  frames: readonly ScreenFrame[],
  opts: MergeOptions
): MergeResult {
  const policy = opts.inconsistentKeyPolicy ?? 'ignore';
  if (frames.length === 0) {
    return { items: [], inconsistentReleases: 0, discardedFrames: 0 };
  }

  const cutoff = frames[frames.length - 1].timestamp - opts.discardTailSec;
  const activeKeys = new Set<string>();
  const items: DatasetItem[] = [];
  let inconsistentReleases = 0;
  let ki = 0;
  let fi = 0;

  while (fi < frames.length) {
    const frame = frames[fi];
    const keyEvent = ki < keyEvents.length ? keyEvents[ki] : undefined;

    if (keyEvent !== undefined && keyEvent.timestamp < frame.timestamp) {
      if (keyEvent.down) {
        activeKeys.add(keyEvent.keyCode);
      } else if (!activeKeys.delete(keyEvent.keyCode)) {
        if (policy === 'abort') {
          throw new InconsistentKeyStateError(keyEvent.keyCode, keyEvent.timestamp);
        }
        inconsistentReleases++;
      }
      ki++;
      continue;
    }

    if (frame.timestamp > cutoff) break;
    items.push({
      screen: frame.pixels,
      keyCodes: Array.from(activeKeys),
      timestamp: frame.timestamp,
    });
    fi++;
  }

  if (inconsistentReleases > 0) {
    logger.warn(`[merge] ignored ${inconsistentReleases} key release(s) without a matching press`);
  }
  return { items, inconsistentReleases, discardedFrames: frames.length - items.length };
}

/** Frames per second actually achieved over the retained items. */
export function averageFps(items: readonly DatasetItem[]): number {
  if (items.length < 2) {
    throw new DegenerateRateError(items.length);
  }
  const span = items[items.length - 1].timestamp - items[0].timestamp;
  if (!(span > 0)) {
    throw new DegenerateRateError(items.length);
  }
  return (items.length - 1) / span;
}

/** True when timestamps never decrease along the sequence. */
export function isTimeOrdered(seq: readonly { timestamp: number }[]): boolean {
  for (let i = 1; i < seq.length; i++) {
    if (seq[i].timestamp < seq[i - 1].timestamp) return false;
  }
  return true;
}

/** Stable sort by timestamp; returns the input when it is already ordered. */
export function ensureTimeOrdered<T extends { timestamp: number }>(
  seq: readonly T[],
  label: string
): readonly T[] {
  if (isTimeOrdered(seq)) return seq;
  logger.warn(`[merge] ${label} sequence arrived out of timestamp order, re-sorting`);
  return [...seq].sort((a, b) => a.timestamp - b.timestamp);
}
