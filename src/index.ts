import 'dotenv/config';

import path from 'path';
import logger from './util/logger';
import { loadConfig } from './util/config';
import { describeError } from './util/errors';
import { formatFileSize } from './util/files';
import { runQueue } from './util/queues';
import { TmdbClient } from './api/tmdb';
import { createPosterRun, loadQueries, ProgressEvent, RunReport } from './pipeline';

function formatDuration(ms: number): string {
  const seconds = Math.round(ms / 1000);
  if (seconds < 60) return `${seconds}s`;
  return `${Math.floor(seconds / 60)}m${String(seconds % 60).padStart(2, '0')}s`;
}

export function logProgress(event: ProgressEvent): void {
  const { outcome } = event;
  const prefix = `[${event.index}/${event.total}]`;
  const eta = event.index < event.total ? ` (ETA ${formatDuration(event.etaMs)})` : '';

  if (outcome.status === 'success') {
    const verb = outcome.skipped ? 'kept existing' : 'saved';
    logger.info(`${prefix} ${outcome.query.raw}: ${verb} ${path.basename(outcome.savedPath)}${eta}`);
  } else {
    logger.warn(`${prefix} ${outcome.query.raw}: ${outcome.reason} - ${outcome.message}${eta}`);
  }
}

export function logSummary(report: RunReport): void {
  const { summary } = report;
  logger.info('='.repeat(50));
  logger.info(`Run ${report.runId} ${report.state.toLowerCase()}${report.cancelled ? ' (cancelled)' : ''}`);
  logger.info(`Titles:      ${summary.total}`);
  logger.info(`Downloaded:  ${summary.downloaded} (${formatFileSize(summary.bytesDownloaded)})`);
  logger.info(`Skipped:     ${summary.skipped}`);
  if (summary.duplicates > 0) logger.info(`Duplicates:  ${summary.duplicates}`);
  logger.info(`Failed:      ${summary.failed}`);
  if (summary.aborted > 0) logger.info(`Aborted:     ${summary.aborted}`);
  if (summary.cancelled > 0) logger.info(`Cancelled:   ${summary.cancelled}`);
  if (report.failureReportPath) logger.info(`Failure report: ${report.failureReportPath}`);
  if (report.failureReportError) logger.warn(`Failure report not written: ${report.failureReportError}`);
  if (report.archivePath) logger.info(`Archive: ${report.archivePath}`);
  if (report.archiveError) logger.warn(`Archive not created: ${report.archiveError}`);
  logger.info('='.repeat(50));
}

/** Runs once and resolves to the process exit code. */
export async function main(): Promise<number> {
  const { run: config, input } = loadConfig();
  const queries = await loadQueries(input);

  const client = new TmdbClient({
    apiKey: config.apiKey,
    minRequestIntervalMs: config.requestDelaySeconds * 1000,
    timeoutMs: config.requestTimeoutSeconds * 1000,
  });

  if (config.verifyApiKey) {
    logger.info('Verifying TMDB API key...');
    await client.verifyApiKey();
  }

  const controller = new AbortController();
  const onSigint = () => {
    logger.warn('Interrupt received, finishing the current title then stopping...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    const run = createPosterRun(config, queries, { client });
    const report = await runQueue.add(() => run.execute({ onProgress: logProgress, signal: controller.signal }));
    logSummary(report);
    return report.state === 'Aborted' ? 1 : 0;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((e: unknown) => {
      logger.error(describeError(e));
      process.exitCode = 1;
    });
}
