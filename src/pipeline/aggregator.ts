import fs from 'fs';
import path from 'path';
import archiver from 'archiver';
import Bluebird from 'bluebird';
import logger from '../util/logger';
import { FAILED_REPORT_FILENAME } from '../util/constants';
import { WriteFailedError, describeError } from '../util/errors';
import { pathExists, sidecarPathFor, tempPath, writeFileAtomic } from '../util/files';
import {
    AssetMetadata,
    DownloadOutcome,
    FailureOutcome,
    ResolvedAsset,
    SuccessOutcome,
} from './types';

export interface AggregatorOptions {
    outputDir: string;
    saveMetadata: boolean;
    zipOutput: boolean;
}

/** Write failures here are logged and reported, never thrown. */
export interface FinalizeResult {
    failureReportPath?: string;
    failureReportError?: string;
    archivePath?: string;
    archiveError?: string;
    /** Names of the files placed in the archive. */
    archivedFiles: string[];
}

const REPORT_RULE = '='.repeat(50);

export function buildMetadata(asset: ResolvedAsset, downloadedAt: Date = new Date()): AssetMetadata {
    const { candidate } = asset;
    return {
        query: asset.query.raw,
        matchedId: candidate.id,
        matchedTitle: candidate.title,
        originalTitle: candidate.originalTitle ?? null,
        mediaType: candidate.mediaType,
        releaseYear: candidate.releaseYear,
        language: candidate.language,
        quality: asset.quality,
        sourceUrl: asset.imageUrl,
        popularity: candidate.popularity ?? null,
        voteAverage: candidate.voteAverage ?? null,
        overview: candidate.overview ?? null,
        downloadedAt: downloadedAt.toISOString(),
    };
}

export function formatFailureReport(outcomes: readonly DownloadOutcome[]): string {
    const failures = outcomes.filter((o): o is FailureOutcome => o.status === 'failure');
    const lines = [REPORT_RULE, 'FAILED POSTER DOWNLOADS', REPORT_RULE, ''];

    if (failures.length === 0) {
        lines.push('No failed downloads.');
    } else {
        lines.push(`Total failed: ${failures.length}`, '');
        for (const failure of failures) {
            lines.push(`- ${failure.query.raw} [${failure.reason}] ${failure.message}`);
        }
    }

    return `${lines.join('\n')}\n`;
}

/**
 * Collects outcomes in input order, writes sidecars as successes arrive
 * and produces the failure report and archive once the run ends.
 */
export class ResultAggregator {
    private readonly outcomes: DownloadOutcome[] = [];

    constructor(private readonly options: AggregatorOptions) { }

    get results(): readonly DownloadOutcome[] {
        return this.outcomes;
    }

    /**
     * Stores an outcome and returns it as recorded. A fresh success whose
     * sidecar cannot be written is recorded as a WriteFailed failure.
     */
    async record(outcome: DownloadOutcome): Promise<DownloadOutcome> {
        const recorded = outcome.status === 'success' ? await this.withSidecar(outcome) : outcome;
        this.outcomes.push(recorded);
        return recorded;
    }

    async finalize(): Promise<FinalizeResult> {
        const result: FinalizeResult = { archivedFiles: [] };

        try {
            result.failureReportPath = await this.writeFailureReport();
        } catch (error) {
            result.failureReportError = describeError(error);
            logger.error(result.failureReportError);
        }

        if (!this.options.zipOutput) {
            return result;
        }

        const files = await this.archivableFiles();
        if (files.length === 0) {
            logger.info('No successful downloads to archive.');
            return result;
        }

        try {
            result.archivePath = await this.writeArchive(files);
            result.archivedFiles = files.map(file => path.basename(file));
        } catch (error) {
            result.archiveError = describeError(error);
            logger.error(`Archive not created: ${result.archiveError}`);
        }
        return result;
    }

    private async withSidecar(outcome: SuccessOutcome): Promise<DownloadOutcome> {
        if (!this.options.saveMetadata || outcome.skipped || !outcome.metadata) {
            return outcome;
        }

        const sidecarPath = sidecarPathFor(outcome.savedPath);
        try {
            await writeFileAtomic(sidecarPath, `${JSON.stringify(outcome.metadata, null, 2)}\n`);
        } catch (error) {
            const failure = new WriteFailedError(sidecarPath, { cause: error });
            logger.error(failure.message);
            return {
                status: 'failure',
                query: outcome.query,
                reason: 'WriteFailed',
                message: failure.message,
                retriesAttempted: 0,
                strandedPath: outcome.savedPath,
            };
        }

        logger.debug(`Saved metadata for '${outcome.query.raw}' to ${path.basename(sidecarPath)}`);
        return { ...outcome, sidecarPath };
    }

    private async writeFailureReport(): Promise<string> {
        const reportPath = path.join(this.options.outputDir, FAILED_REPORT_FILENAME);
        try {
            await writeFileAtomic(reportPath, formatFailureReport(this.outcomes));
        } catch (error) {
            throw new WriteFailedError(reportPath, { cause: error });
        }
        logger.info(`Failure report written to ${reportPath}`);
        return reportPath;
    }

    /** Existing images of successful outcomes, each followed by its sidecar when present. */
    private async archivableFiles(): Promise<string[]> {
        const successes = this.outcomes.filter((o): o is SuccessOutcome => o.status === 'success');

        const groups = await Bluebird.map(successes, async (outcome) => {
            const sidecar = outcome.sidecarPath ?? sidecarPathFor(outcome.savedPath);
            const [hasImage, hasSidecar] = await Promise.all([
                pathExists(outcome.savedPath),
                pathExists(sidecar),
            ]);

            if (!hasImage) {
                logger.warn(`Image for '${outcome.query.raw}' is missing, leaving it out of the archive.`);
                return [];
            }
            return hasSidecar ? [outcome.savedPath, sidecar] : [outcome.savedPath];
        }, { concurrency: 8 });

        // Duplicate queries resolve to the same file.
        return [...new Set(groups.flat())];
    }

    private async writeArchive(files: readonly string[]): Promise<string> {
        const outputDir = path.resolve(this.options.outputDir);
        const archivePath = `${outputDir}.zip`;
        const partial = tempPath(archivePath);

        logger.info(`Archiving ${files.length} file(s) to ${archivePath}...`);

        try {
            const output = fs.createWriteStream(partial);
            const archive = archiver('zip', { zlib: { level: 9 } });
            const closed = new Promise<void>((resolve, reject) => {
                output.on('close', () => resolve());
                output.on('error', (error: Error) => reject(error));
                archive.on('error', (error: Error) => reject(error));
            });

            archive.pipe(output);
            for (const file of files) {
                archive.file(file, { name: path.basename(file) });
            }
            // The stream can fail before the archive finishes.
            await Promise.all([closed, archive.finalize()]);
            await fs.promises.rename(partial, archivePath);
        } catch (error) {
            await fs.promises.rm(partial, { force: true }).catch((cleanupError: unknown) => {
                logger.warn(`Could not remove partial archive ${partial}: ${describeError(cleanupError)}`);
            });
            throw new WriteFailedError(archivePath, { cause: error });
        }

        return archivePath;
    }
}
