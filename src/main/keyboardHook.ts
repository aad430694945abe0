import type { UiohookKeyboardEvent } from 'uiohook-napi';
import { CancellationSignal } from './cancellation';
import { ConfigError } from './errors';
import { logger } from './logger';
import { FinishTrigger, KeyEventChannel, Unsubscribe } from '../types/capture';
import { KeyTransition } from '../types/events';

type RawKeyListener = (keycode: number, down: boolean) => void;

/** The part of a global input hook the recorder needs. */
export interface KeyHookBackend {
  listen(listener: RawKeyListener): Unsubscribe;
  start(): void;
  stop(): void;
}

const ALIASES: Record<string, string> = {
  up: 'arrowup',
  down: 'arrowdown',
  left: 'arrowleft',
  right: 'arrowright',
  esc: 'escape',
  return: 'enter',
  control: 'ctrl',
};

export interface NativeKeyHook {
  backend: KeyHookBackend;
  keyTable: ReadonlyMap<string, number>;
}

/**
 * Loads uiohook-napi on demand so the native binding is only initialised
 * by the process that actually records.
 */
export async function loadNativeKeyHook(): Promise<NativeKeyHook> {
  const { uIOhook, UiohookKey } = await import('uiohook-napi');
  const keyTable = new Map(
    Object.entries(UiohookKey).map(([name, code]): [string, number] => [name.toLowerCase(), code])
  );
  const backend: KeyHookBackend = {
    listen(listener) {
      const onDown = (e: UiohookKeyboardEvent) => listener(e.keycode, true);
      const onUp = (e: UiohookKeyboardEvent) => listener(e.keycode, false);
      uIOhook.on('keydown', onDown);
      uIOhook.on('keyup', onUp);
      return () => {
        uIOhook.off('keydown', onDown);
        uIOhook.off('keyup', onUp);
      };
    },
    start: () => uIOhook.start(),
    stop: () => uIOhook.stop(),
  };
  return { backend, keyTable };
}

/** Key code for an identifier such as `w`, `space` or `ArrowUp`. */
export function resolveKeyCode(name: string, table: ReadonlyMap<string, number>): number {
  const normalized = name.trim().toLowerCase();
  const code = table.get(ALIASES[normalized] ?? normalized);
  if (code === undefined) {
    throw new ConfigError(`unknown key identifier "${name}"`);
  }
  return code;
}

/**
 * Process-wide keyboard hook. Delivers press and release transitions per
 * key in the order the OS fires them; repeated presses of a key that is
 * already held are dropped.
 */
export class KeyboardHook {
  private readonly handlers = new Map<number, Set<(down: boolean) => void>>();
  private readonly errorHandlers = new Set<(err: Error) => void>();
  private readonly held = new Set<number>();
  private detach: Unsubscribe | null = null;

  constructor(
    private readonly backend: KeyHookBackend,
    private readonly keyTable: ReadonlyMap<string, number>
  ) {}

  resolve(key: string): number {
    return resolveKeyCode(key, this.keyTable);
  }

  get running(): boolean {
    return this.detach !== null;
  }

  start(): void {
    if (this.detach) return;
    this.detach = this.backend.listen((keycode, down) => this.dispatch(keycode, down));
    try {
      this.backend.start();
    } catch (err) {
      this.detach();
      this.detach = null;
      throw err;
    }
    logger.log('[keyboard] hook started');
  }

  stop(): void {
    if (!this.detach) return;
    this.detach();
    this.detach = null;
    this.held.clear();
    this.backend.stop();
    logger.log('[keyboard] hook stopped');
  }

  /** Calls `handler(down)` on each press and release of `key`. */
  subscribe(key: string, handler: (down: boolean) => void): Unsubscribe {
    const code = this.resolve(key);
    let set = this.handlers.get(code);
    if (!set) {
      set = new Set();
      this.handlers.set(code, set);
    }
    const wrapped = (down: boolean) => handler(down);
    set.add(wrapped);
    return () => {
      const current = this.handlers.get(code);
      current?.delete(wrapped);
      if (current && current.size === 0) this.handlers.delete(code);
    };
  }

  onError(handler: (err: Error) => void): Unsubscribe {
    this.errorHandlers.add(handler);
    return () => {
      this.errorHandlers.delete(handler);
    };
  }

  addHotkey(key: string, fn: () => void): Unsubscribe {
    return this.subscribe(key, (down) => {
      if (down) fn();
    });
  }

  /** Resolves on the next press of `key`, or once `signal` is set. */
  waitForKey(key: string, signal?: CancellationSignal): Promise<void> {
    return new Promise<void>((resolve) => {
      let dropSignal: Unsubscribe = () => {};
      const unsubscribe = this.addHotkey(key, () => {
        unsubscribe();
        dropSignal();
        resolve();
      });
      if (signal) {
        dropSignal = signal.onSet(() => {
          unsubscribe();
          resolve();
        });
      }
    });
  }

  finishTrigger(key: string): FinishTrigger {
    this.resolve(key);
    return { wait: (signal) => this.waitForKey(key, signal) };
  }

  /**
   * A session-scoped view of the hook. Every subscription made through it
   * is removed on `close()`, leaving the process-wide hook running.
   */
  openChannel(): KeyEventChannel {
    const owned = new Set<Unsubscribe>();
    const track = (unsubscribe: Unsubscribe): Unsubscribe => {
      owned.add(unsubscribe);
      return () => {
        if (owned.delete(unsubscribe)) unsubscribe();
      };
    };
    return {
      onTransition: (keyCode, handler: (transition: KeyTransition) => void) =>
        track(this.subscribe(keyCode, (down) => handler({ keyCode, down }))),
      onError: (handler) => track(this.onError(handler)),
      close: () => {
        owned.forEach((unsubscribe) => unsubscribe());
        owned.clear();
      },
    };
  }

  private dispatch(keycode: number, down: boolean): void {
    if (down) {
      if (this.held.has(keycode)) return;
      this.held.add(keycode);
    } else {
      this.held.delete(keycode);
    }
    const set = this.handlers.get(keycode);
    if (!set) return;
    for (const handler of [...set]) {
      try {
        handler(down);
      } catch (err) {
        this.reportError(err instanceof Error ? err : new Error(String(err)));
      }
    }
  }

  private reportError(err: Error): void {
    if (this.errorHandlers.size === 0) {
      logger.error(`[keyboard] unhandled hook error: ${err.message}`);
      return;
    }
    [...this.errorHandlers].forEach((handler) => handler(err));
  }
}

export interface KeyBindings {
  recordingKeys: readonly string[];
  startKey: string;
  exitKey: string;
  finishRecordKey: string;
}

/**
 * Every key must be known to the hook, and the control keys must not
 * share a key code with any recording key.
 */
export function validateKeyBindings(bindings: KeyBindings, hook: KeyboardHook): void {
  const recording = new Map<number, string>();
  for (const key of bindings.recordingKeys) {
    const code = hook.resolve(key);
    if (!recording.has(code)) recording.set(code, key);
  }
  const controls = [
    ['start', bindings.startKey],
    ['exit', bindings.exitKey],
    ['finish', bindings.finishRecordKey],
  ] as const;
  for (const [role, key] of controls) {
    const clash = recording.get(hook.resolve(key));
    if (clash !== undefined) {
      throw new ConfigError(`${role} key "${key}" must not be the recording key "${clash}"`);
    }
  }
}
