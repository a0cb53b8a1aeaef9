#!/usr/bin/env node
import { loadConfig } from '../config/index.js';
import { createLogger } from '../config/logger.js';
import { ConfigurationError } from '../domain/errors.js';

import { bootRuntime, type RuntimeOptions } from './runtime.js';
import type { SchedulerResult } from './scheduler.js';

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

const SIGNAL_EXIT_CODES: Record<string, number> = {
  SIGINT: 130,
  SIGTERM: 143
};

export type BootstrapOptions = RuntimeOptions & {
  /** Called on a second shutdown signal while the first is still closing out. */
  exit?: (code: number) => void;
};

export async function bootstrap(options: BootstrapOptions = {}): Promise<SchedulerResult> {
  const { exit = (code: number) => process.exit(code), ...runtimeOptions } = options;
  const config = runtimeOptions.config ?? loadConfig();
  const logger = runtimeOptions.logger ?? createLogger(config);
  const runtime = bootRuntime({ ...runtimeOptions, config, logger });

  let shutdownRequested = false;
  const onSignal = (signal: NodeJS.Signals) => {
    if (shutdownRequested) {
      logger.warn({ signal }, 'second shutdown signal; exiting without waiting for close');
      exit(SIGNAL_EXIT_CODES[signal] ?? 1);
      return;
    }

    shutdownRequested = true;
    logger.info({ signal }, 'shutdown signal received');
    runtime.scheduler.cancel();
  };
  for (const signal of SHUTDOWN_SIGNALS) {
    process.on(signal, onSignal);
  }

  runtime.statusReporter.start();
  logger.info({ symbol: runtime.strategy.symbol, csv: runtime.csvSink?.filePath }, 'Bot booted');

  try {
    const result = await runtime.scheduler.start();
    runtime.statusReporter.report();
    logger.info({ summary: runtime.journal.summarize() }, 'Bot stopped');
    return result;
  } finally {
    runtime.statusReporter.stop();
    for (const signal of SHUTDOWN_SIGNALS) {
      process.off(signal, onSignal);
    }
  }
}

if (require.main === module) {
  bootstrap().catch((error: unknown) => {
    if (error instanceof ConfigurationError) {
      console.error(error.message);
    } else {
      console.error('Bot failed', error);
    }
    process.exit(1);
  });
}
