import { CaptureSource } from '../types/events';

export type RecorderErrorCode =
  | 'BACKEND_FAILURE'
  | 'INCONSISTENT_KEY_STATE'
  | 'DEGENERATE_RATE'
  | 'CONFIG';

export class RecorderError extends Error {
  constructor(readonly code: RecorderErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A screen or keyboard backend raised while the session was capturing. */
export class BackendFailure extends RecorderError {
  constructor(readonly source: CaptureSource, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('BACKEND_FAILURE', `${source} backend failed: ${detail}`, { cause });
  }
}

/** A key was released that the merge never saw pressed. */
export class InconsistentKeyStateError extends RecorderError {
  constructor(readonly keyCode: string, readonly timestamp: number) {
    super(
      'INCONSISTENT_KEY_STATE',
      `key "${keyCode}" released at ${timestamp.toFixed(3)}s without a matching press`
    );
  }
}

export class DegenerateRateError extends RecorderError {
  constructor(readonly itemCount: number) {
    super(
      'DEGENERATE_RATE',
      `cannot compute average frame rate over ${itemCount} item(s) spanning no time`
    );
  }
}

export class ConfigError extends RecorderError {
  constructor(message: string) {
    super('CONFIG', message);
  }
}
