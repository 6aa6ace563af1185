import { rm } from 'node:fs/promises';
import { rmSync } from 'node:fs';
import type { EventEmitter } from 'node:events';
import chalk from 'chalk';
import { icons } from './output.js';

const SIGNAL_NUMBERS = { SIGHUP: 1, SIGINT: 2, SIGTERM: 15 } as const;
export type HandledSignal = keyof typeof SIGNAL_NUMBERS;
const HANDLED_SIGNALS: readonly HandledSignal[] = ['SIGHUP', 'SIGINT', 'SIGTERM'];

export type CleanupErrorHandler = (path: string, err: unknown) => void;

/** Where termination signals are delivered from. `process` outside of tests. */
export type SignalSource = Pick<EventEmitter, 'on' | 'off'>;

export interface CleanupScopeOptions {
  onError?: CleanupErrorHandler;
  signals?: SignalSource;
}

export class InterruptedError extends Error {
  readonly exitCode: number;

  constructor(public readonly signal: HandledSignal) {
    super(`Interrupted by ${signal}`);
    this.name = 'InterruptedError';
    this.exitCode = 128 + SIGNAL_NUMBERS[signal];
  }
}

function warnCleanupFailure(path: string, err: unknown): void {
  const reason = err instanceof Error ? err.message : String(err);
  console.warn(`${icons.warning} ${chalk.yellow(`Could not remove ${path}: ${reason}`)}`);
}

/**
 * Paths that must not outlive the current run. `dispose()` belongs in a
 * `finally`; `listen()` extends the guarantee to SIGINT, SIGTERM and SIGHUP.
 *
 * Work started through `run()` receives the scope's AbortSignal. On a
 * signal the scope aborts that work and waits for it to settle before it
 * removes anything, so a child process cannot recreate a removed file.
 */
export class CleanupScope {
  private readonly paths: string[] = [];
  private readonly pending = new Set<Promise<unknown>>();
  private readonly controller = new AbortController();
  private disposed = false;
  private listening = false;
  private interruption: InterruptedError | null = null;
  private readonly onError: CleanupErrorHandler;
  private readonly signals: SignalSource;

  private readonly handlers: Record<HandledSignal, () => void> = {
    SIGHUP: () => this.handleSignal('SIGHUP'),
    SIGINT: () => this.handleSignal('SIGINT'),
    SIGTERM: () => this.handleSignal('SIGTERM'),
  };

  constructor(options: CleanupScopeOptions = {}) {
    this.onError = options.onError ?? warnCleanupFailure;
    this.signals = options.signals ?? process;
  }

  get tracked(): readonly string[] {
    return this.paths;
  }

  get interrupted(): InterruptedError | null {
    return this.interruption;
  }

  track(path: string): void {
    if (this.disposed) {
      throw new Error(`Cleanup scope already disposed; cannot track ${path}`);
    }
    this.paths.push(path);
  }

  listen(): void {
    if (this.listening || this.disposed) return;
    for (const signal of HANDLED_SIGNALS) {
      this.signals.on(signal, this.handlers[signal]);
    }
    this.listening = true;
  }

  throwIfInterrupted(): void {
    if (this.interruption) throw this.interruption;
  }

  /** Run abortable work; an interrupt surfaces as InterruptedError once the work has settled. */
  async run<T>(task: (signal: AbortSignal) => Promise<T>): Promise<T> {
    this.throwIfInterrupted();
    const work = task(this.controller.signal);
    this.pending.add(work);
    try {
      return await work;
    } catch (err) {
      throw this.interruption ?? err;
    } finally {
      this.pending.delete(work);
    }
  }

  /**
   * Abort in-flight work, wait for it to settle, remove tracked paths and
   * exit the way a shell reports a fatal signal.
   */
  async interrupt(signal: HandledSignal): Promise<void> {
    const interruption = new InterruptedError(signal);
    this.interruption = interruption;
    this.controller.abort(interruption);

    await Promise.allSettled([...this.pending]);

    this.removeAllSync();
    process.exit(interruption.exitCode);
  }

  async dispose(): Promise<void> {
    if (this.interruption) {
      // The exit is near; finish before anything else gets a turn
      this.removeAllSync();
      return;
    }
    if (this.disposed) return;
    this.disposed = true;
    this.detach();

    for (const path of [...this.paths].reverse()) {
      try {
        await rm(path, { recursive: true, force: true });
      } catch (err) {
        this.onError(path, err);
      }
    }
  }

  private handleSignal(signal: HandledSignal): void {
    if (this.interruption) {
      // Second signal while waiting: stop waiting
      this.removeAllSync();
      process.exit(this.interruption.exitCode);
    }
    // Work started through run() still rejects with the InterruptedError
    this.interrupt(signal).catch((err: unknown) => {
      console.error(err instanceof Error ? err.message : err);
    });
  }

  private removeAllSync(): void {
    this.disposed = true;
    this.detach();

    for (const path of [...this.paths].reverse()) {
      try {
        rmSync(path, { recursive: true, force: true });
      } catch (err) {
        this.onError(path, err);
      }
    }
  }

  private detach(): void {
    if (!this.listening) return;
    for (const signal of HANDLED_SIGNALS) {
      this.signals.off(signal, this.handlers[signal]);
    }
    this.listening = false;
  }
}
