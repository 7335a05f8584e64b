#!/usr/bin/env node
/**
 * music-sidecar - Command-Line Entry Point
 *
 * Loads settings from the environment, validates the library roots, and runs
 * scans until the configured interval says stop (or SIGINT/SIGTERM arrives).
 *
 * Exit codes: 0 after a clean finish or a requested shutdown, 1 when the
 * configuration is unusable.
 */

import type { ScanSummary } from '../shared/types';
import { isPipelineError } from './services/errors';
import { Logger, LogSummary } from './services/logger';
import { createProvider } from './services/providerFactory';
import { LibraryScanner } from './services/libraryScanner';
import { assertSettingsUsable, loadSettingsFromEnv } from './services/settingsLoader';

/**
 * Formats the per-scan counters on one line.
 */
export function formatSummary(summary: ScanSummary): string {
  const parts = [
    `processed=${summary.processed}`,
    `skipped=${summary.skipped}`,
    `matched=${summary.matched}`,
    `unmatched=${summary.unmatched}`,
    `failed=${summary.failed}`,
    `lyrics=${summary.lyricsWritten}`,
    `covers=${summary.coversWritten}`,
    `tags=${summary.tagsUpdated}`,
  ];
  if (summary.cancelled > 0) parts.push(`cancelled=${summary.cancelled}`);
  return `Scan summary: ${parts.join(' ')}`;
}

/**
 * Formats the shutdown line: problem counts, then the categories behind them.
 */
export function formatLogSummary(summary: LogSummary): string {
  const categories = Object.entries(summary.problemsByCategory)
    .map(([category, count]) => `${category}=${count}`)
    .join(', ');
  return (
    `Stopped (${summary.errorCount} errors, ${summary.warnCount} warnings logged` +
    (categories ? `: ${categories}` : '') +
    ')' +
    (summary.logFilePath ? `; log file: ${summary.logFilePath}` : '')
  );
}

/**
 * Runs the service.
 *
 * @param env - Environment to read settings from
 * @returns Process exit code
 */
export async function main(env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let logger: Logger | null = null;

  try {
    const settings = loadSettingsFromEnv(env);

    logger = new Logger({
      logDir: settings.logDir ?? undefined,
      minLevel: settings.logLevel,
      writeToFile: settings.logToFile,
      writeToConsole: true,
    });
    await logger.initialize();

    await assertSettingsUsable(settings);

    logger.info(
      `Starting: provider=${settings.provider}, roots=${settings.libraryRoots.join(', ')}, ` +
        `concurrency=${settings.concurrency}, interval=${settings.scanIntervalDays}d`,
    );

    const controller = new AbortController();
    const activeLogger = logger;
    const requestShutdown = (signalName: string): void => {
      if (controller.signal.aborted) return;
      activeLogger.info(`${signalName} received, finishing tracks in progress`);
      controller.abort();
    };
    const onSigint = (): void => requestShutdown('SIGINT');
    const onSigterm = (): void => requestShutdown('SIGTERM');
    process.on('SIGINT', onSigint);
    process.on('SIGTERM', onSigterm);

    try {
      const scanner = new LibraryScanner({
        settings,
        provider: createProvider(settings, logger),
        logger,
        onScanComplete: (summary) => activeLogger.info(formatSummary(summary)),
      });
      await scanner.runForever(controller.signal);
    } finally {
      process.off('SIGINT', onSigint);
      process.off('SIGTERM', onSigterm);
    }

    logger.info(formatLogSummary(logger.getSummary()));
    return 0;
  } catch (error: unknown) {
    if (isPipelineError(error) && error.category === 'ConfigError') {
      if (logger) {
        logger.logPipelineError(error);
      } else {
        process.stderr.write(`${error.toUserMessage()}\n`);
      }
      return 1;
    }
    logger?.logError(error, { step: 'startup' });
    throw error;
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`Fatal: ${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
      process.exitCode = 1;
    },
  );
}
