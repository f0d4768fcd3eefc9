import type { EventEmitter } from "node:events";
import type { Logger } from "../observability";

export const FORCED_EXIT_CODE = 130;

export interface ShutdownControllerOptions {
  logger: Logger;
  forceExitTimeoutMs: number;
  exit?: (code: number) => void;
  target?: EventEmitter;
}

/**
 * Cooperative stop flag wired to process signals.
 *
 * The first SIGINT/SIGTERM aborts `signal`; long waits resolve early and work
 * loops stop at the next unit boundary. A second SIGINT/SIGTERM, any SIGQUIT,
 * or the force-exit timer terminates the process without cleanup.
 */
export class ShutdownController {
  private readonly controller = new AbortController();
  private readonly handlers: Array<[NodeJS.Signals, () => void]> = [];
  private interrupts = 0;
  private forceTimer?: NodeJS.Timeout;

  constructor(private readonly options: ShutdownControllerOptions) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get requested(): boolean {
    return this.controller.signal.aborted;
  }

  install(): void {
    const target = this.options.target ?? process;
    const onInterrupt = (signalName: NodeJS.Signals) => () => this.handleInterrupt(signalName);
    this.handlers.push(["SIGINT", onInterrupt("SIGINT")]);
    this.handlers.push(["SIGTERM", onInterrupt("SIGTERM")]);
    this.handlers.push(["SIGQUIT", () => this.force("SIGQUIT")]);
    for (const [signalName, handler] of this.handlers) {
      target.on(signalName, handler);
    }
  }

  request(reason: string): void {
    if (this.requested) {
      return;
    }
    this.options.logger.warn("shutdown_requested", {
      reason,
      forceExitTimeoutMs: this.options.forceExitTimeoutMs,
    });
    this.controller.abort();
    this.forceTimer = setTimeout(() => this.force("shutdown_timeout"), this.options.forceExitTimeoutMs);
    this.forceTimer.unref();
  }

  dispose(): void {
    const target = this.options.target ?? process;
    for (const [signalName, handler] of this.handlers) {
      target.off(signalName, handler);
    }
    this.handlers.length = 0;
    if (this.forceTimer) {
      clearTimeout(this.forceTimer);
      this.forceTimer = undefined;
    }
  }

  private handleInterrupt(signalName: NodeJS.Signals): void {
    this.interrupts += 1;
    if (this.interrupts > 1) {
      this.force(`second_${signalName}`);
      return;
    }
    this.request(signalName);
  }

  private force(reason: string): void {
    this.options.logger.error("shutdown_forced", { reason });
    if (this.options.exit) {
      this.options.exit(FORCED_EXIT_CODE);
      return;
    }
    process.exit(FORCED_EXIT_CODE);
  }
}
