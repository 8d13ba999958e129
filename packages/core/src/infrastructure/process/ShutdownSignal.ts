import type { EventEmitter } from 'node:events';
import type { ILogger } from '../../application/ports/ILogger.ts';

export const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP', 'SIGQUIT'];

/**
 * Funnels the termination signals into one AbortSignal that fires once.
 * A second signal exits at once, so a stuck flush can be force-quit.
 */
export class ShutdownSignal {
  private readonly controller = new AbortController();
  private readonly listeners = new Map<NodeJS.Signals, () => void>();

  constructor(
    private readonly logger?: ILogger,
    private readonly target: EventEmitter = process,
    private readonly exit: (code: number) => void = (code) => process.exit(code)
  ) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get triggered(): boolean {
    return this.controller.signal.aborted;
  }

  install(signals: readonly NodeJS.Signals[] = SHUTDOWN_SIGNALS): this {
    for (const name of signals) {
      if (this.listeners.has(name)) continue;
      const listener = () => this.trigger(name);
      this.listeners.set(name, listener);
      this.target.on(name, listener);
    }
    return this;
  }

  trigger(reason: string): void {
    if (this.triggered) {
      this.logger?.warn(`Received ${reason} again, exiting`);
      this.exit(1);
      return;
    }
    this.logger?.info(`Received ${reason}, shutting down`);
    this.controller.abort(new Error(`Shutdown requested (${reason})`));
  }

  dispose(): void {
    for (const [name, listener] of this.listeners) {
      this.target.off(name, listener);
    }
    this.listeners.clear();
  }
}
