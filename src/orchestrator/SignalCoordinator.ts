import { getLoggerFor } from 'global-logger-factory';

export interface SignalSource {
  on: (event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void) => unknown;
  off: (event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void) => unknown;
}

const DEFAULT_SIGNALS: readonly NodeJS.Signals[] = [ 'SIGINT', 'SIGTERM' ];

/**
 * Turns termination signals into a cancellation token for one run.
 *
 * The handler only records the signal and aborts the token; the run loop
 * observes the token and performs teardown itself, exactly once.
 */
export class SignalCoordinator {
  protected readonly logger = getLoggerFor(this);
  private readonly controller = new AbortController();
  private installed = false;
  private receivedSignal?: NodeJS.Signals;
  private teardown?: Promise<void>;

  public constructor(
    private readonly source: SignalSource = process,
    private readonly signals: readonly NodeJS.Signals[] = DEFAULT_SIGNALS,
  ) {}

  public get signal(): AbortSignal {
    return this.controller.signal;
  }

  public get isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  public get received(): NodeJS.Signals | undefined {
    return this.receivedSignal;
  }

  public get tearingDown(): boolean {
    return this.teardown !== undefined;
  }

  public install(): void {
    if (this.installed) {
      return;
    }
    this.installed = true;
    for (const signal of this.signals) {
      this.source.on(signal, this.handleSignal);
    }
  }

  public dispose(): void {
    if (!this.installed) {
      return;
    }
    this.installed = false;
    for (const signal of this.signals) {
      this.source.off(signal, this.handleSignal);
    }
  }

  /**
   * Cancels the run without a signal, e.g. after a fatal crash.
   */
  public cancel(reason: string): void {
    if (!this.isCancelled) {
      this.logger.debug(`Run cancelled: ${reason}`);
      this.controller.abort(reason);
    }
  }

  /**
   * Runs `fn` the first time only; later callers share the same promise.
   */
  public async runTeardown(fn: () => Promise<void>): Promise<void> {
    if (!this.teardown) {
      this.teardown = fn();
    }
    return this.teardown;
  }

  private readonly handleSignal = (signal: NodeJS.Signals): void => {
    if (this.receivedSignal) {
      this.logger.warn(`Received ${signal} while shutting down, ignoring`);
      return;
    }
    this.receivedSignal = signal;
    this.logger.info(`Received ${signal}, shutting down...`);
    this.controller.abort(signal);
  };
}
