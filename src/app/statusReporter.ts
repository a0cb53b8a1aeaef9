import type { Logger } from 'pino';

import type { StatusReport } from '../events/events.js';
import type { EventBus } from '../events/eventBus.js';

export type StatusSource = {
  latestPrice(): number | null;
  positionState(): StatusReport['positionState'];
  completedTradeCount(): number;
};

export type StatusReporterOptions = {
  intervalMs: number;
  source: StatusSource;
  eventBus: EventBus;
  logger: Logger;
  now?: () => number;
};

/** Periodic heartbeat on its own timer, independent of the poll cadence. */
export class StatusReporter {
  private readonly options: StatusReporterOptions;
  private readonly now: () => number;
  private timer: NodeJS.Timeout | null = null;

  constructor(options: StatusReporterOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => this.report(), this.options.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) {
      return;
    }

    clearInterval(this.timer);
    this.timer = null;
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  report(): StatusReport {
    const { source } = this.options;
    const status: StatusReport = {
      currentTime: this.now(),
      latestPrice: source.latestPrice(),
      positionState: source.positionState(),
      completedTradeCount: source.completedTradeCount()
    };

    this.options.logger.info(
      { ...status, currentTime: new Date(status.currentTime).toISOString() },
      'status'
    );
    this.options.eventBus.emit('status.reported', status);
    return status;
  }
}
