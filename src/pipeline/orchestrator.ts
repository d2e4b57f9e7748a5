import logger from '../util/logger';
import { createRunId, runWithRunId } from '../util/context';
import { FailureReason, PosterError, describeError, isFileSystemError, isRunFatal } from '../util/errors';
import { Sleeper, sleep } from '../util/retry';
import { ResultAggregator, buildMetadata } from './aggregator';
import { AssetFetcher } from './fetcher';
import { MetadataResolver } from './resolver';
import {
    DownloadOutcome,
    FailureOutcome,
    OverwritePolicy,
    ProgressEvent,
    Query,
    RunHooks,
    RunReport,
    RunState,
    RunSummary,
} from './types';

export interface PosterRunComponents {
    resolver: Pick<MetadataResolver, 'resolve'>;
    fetcher: Pick<AssetFetcher, 'fetch' | 'findExisting'>;
    aggregator: ResultAggregator;
}

export interface PosterRunOptions {
    overwritePolicy: OverwritePolicy;
    /** Pause between titles that touched the network. */
    requestDelayMs: number;
    runId?: string;
    sleep?: Sleeper;
    now?: () => number;
}

interface QueryResult {
    outcome: DownloadOutcome;
    networked: boolean;
}

export function summarize(outcomes: readonly DownloadOutcome[]): RunSummary {
    const summary: RunSummary = {
        total: outcomes.length,
        succeeded: 0,
        downloaded: 0,
        skipped: 0,
        duplicates: 0,
        failed: 0,
        aborted: 0,
        cancelled: 0,
        bytesDownloaded: 0,
    };

    for (const outcome of outcomes) {
        if (outcome.status === 'success') {
            summary.succeeded++;
            if (outcome.skipped) {
                summary.skipped++;
            } else {
                summary.downloaded++;
                summary.bytesDownloaded += outcome.bytes;
                if (outcome.duplicateOf !== undefined) summary.duplicates++;
            }
        } else if (outcome.reason === 'Aborted') {
            summary.aborted++;
        } else if (outcome.reason === 'Cancelled') {
            summary.cancelled++;
        } else {
            summary.failed++;
        }
    }

    return summary;
}

function failure(query: Query, reason: FailureReason, message: string, retriesAttempted: number = 0): FailureOutcome {
    return { status: 'failure', query, reason, message, retriesAttempted };
}

/** Reason recorded for an error no pipeline stage turned into an outcome. */
export function unexpectedFailureReason(error: unknown): FailureReason {
    if (error instanceof PosterError) return error.reason;
    if (isFileSystemError(error)) return 'WriteFailed';
    return 'NetworkError';
}

/**
 * One pass over an ordered list of queries: Idle -> Running -> Completed | Aborted.
 * Titles are processed one after another and every query gets exactly one outcome.
 */
export class PosterRun {
    readonly runId: string;
    private currentState: RunState = 'Idle';
    private cancelRequested = false;
    /** Content hash of each fresh download, by the raw query that saved it first. */
    private readonly seenHashes = new Map<string, string>();

    constructor(
        private readonly queries: readonly Query[],
        private readonly components: PosterRunComponents,
        private readonly options: PosterRunOptions
    ) {
        this.runId = options.runId ?? createRunId();
    }

    get state(): RunState {
        return this.currentState;
    }

    /** Stops the run after the title in flight; remaining titles are recorded as Cancelled. */
    cancel(): void {
        this.cancelRequested = true;
    }

    execute(hooks: RunHooks = {}): Promise<RunReport> {
        if (this.currentState !== 'Idle') {
            return Promise.reject(new Error(`Run ${this.runId} has already been executed`));
        }
        this.currentState = 'Running';
        return runWithRunId(this.runId, () => this.run(hooks));
    }

    private isCancelled(hooks: RunHooks): boolean {
        return this.cancelRequested || hooks.signal?.aborted === true;
    }

    private async run(hooks: RunHooks): Promise<RunReport> {
        const now = this.options.now ?? Date.now;
        const wait = this.options.sleep ?? sleep;
        const startedAt = now();
        const total = this.queries.length;
        let cancelled = false;
        let completed = 0;

        logger.info(`Starting run for ${total} title(s).`);

        const emit = (outcome: DownloadOutcome) => {
            completed++;
            const elapsedMs = now() - startedAt;
            const event: ProgressEvent = {
                index: completed,
                total,
                outcome,
                elapsedMs,
                etaMs: Math.round((elapsedMs / completed) * (total - completed)),
            };
            try {
                hooks.onProgress?.(event);
            } catch (error) {
                logger.warn(`Progress callback threw: ${describeError(error)}`);
            }
        };

        const fill = async (from: number, reason: 'Aborted' | 'Cancelled', message: string) => {
            for (const query of this.queries.slice(from)) {
                emit(await this.components.aggregator.record(failure(query, reason, message)));
            }
        };

        for (const [i, query] of this.queries.entries()) {
            if (this.isCancelled(hooks)) {
                cancelled = true;
                logger.warn(`Run cancelled, ${total - i} title(s) not processed.`);
                await fill(i, 'Cancelled', 'Run was cancelled before this title was processed');
                break;
            }

            let result: QueryResult;
            try {
                result = await this.processQuery(query);
            } catch (error) {
                if (isRunFatal(error)) {
                    logger.error(`Aborting run: ${error.message}`);
                    emit(await this.components.aggregator.record(failure(query, error.reason, error.message)));
                    await fill(i + 1, 'Aborted', `Run aborted after ${error.reason} on '${query.raw}'`);
                    this.currentState = 'Aborted';
                    break;
                }

                logger.error(`Unexpected error while processing '${query.raw}': ${describeError(error)}`);
                result = { outcome: failure(query, unexpectedFailureReason(error), describeError(error)), networked: true };
            }

            emit(await this.components.aggregator.record(result.outcome));

            const isLast = i === total - 1;
            if (result.networked && !isLast && this.options.requestDelayMs > 0) {
                await wait(this.options.requestDelayMs);
            }
        }

        if (this.currentState === 'Running') {
            this.currentState = 'Completed';
        }

        const finalized = await this.components.aggregator.finalize();
        const outcomes = [...this.components.aggregator.results];
        const summary = summarize(outcomes);
        const finishedAt = now();

        logger.info(
            `Run ${this.currentState.toLowerCase()}${cancelled ? ' (cancelled)' : ''}: ` +
            `${summary.succeeded}/${summary.total} succeeded, ${summary.failed} failed.`
        );

        return {
            runId: this.runId,
            state: this.currentState === 'Aborted' ? 'Aborted' : 'Completed',
            cancelled,
            outcomes,
            summary,
            failureReportPath: finalized.failureReportPath,
            failureReportError: finalized.failureReportError,
            archivePath: finalized.archivePath,
            archiveError: finalized.archiveError,
            startedAt: new Date(startedAt).toISOString(),
            finishedAt: new Date(finishedAt).toISOString(),
        };
    }

    private async processQuery(query: Query): Promise<QueryResult> {
        const { resolver, fetcher } = this.components;

        if (this.options.overwritePolicy === 'skip-if-exists') {
            const existing = await fetcher.findExisting(query);
            if (existing) {
                logger.info(`Skipping '${query.raw}', poster already exists.`);
                return {
                    outcome: { status: 'success', query, savedPath: existing, skipped: true, bytes: 0 },
                    networked: false,
                };
            }
        }

        const resolved = await resolver.resolve(query);
        if (!resolved.ok) {
            return {
                outcome: failure(query, resolved.reason, resolved.message, resolved.retriesAttempted),
                networked: true,
            };
        }

        const fetched = await fetcher.fetch(resolved.asset);
        if (!fetched.ok) {
            return {
                outcome: failure(query, fetched.reason, fetched.message, fetched.retriesAttempted),
                networked: true,
            };
        }

        return {
            outcome: {
                status: 'success',
                query,
                savedPath: fetched.savedPath,
                skipped: fetched.skipped,
                bytes: fetched.bytes,
                contentHash: fetched.contentHash,
                duplicateOf: this.firstWithHash(query, fetched.contentHash),
                metadata: fetched.skipped ? undefined : buildMetadata(resolved.asset),
            },
            networked: true,
        };
    }

    private firstWithHash(query: Query, hash: string | undefined): string | undefined {
        if (hash === undefined) return undefined;

        const first = this.seenHashes.get(hash);
        if (first === undefined) {
            this.seenHashes.set(hash, query.raw);
            return undefined;
        }
        logger.info(`Duplicate artwork: '${query.raw}' has the same poster as '${first}'.`);
        return first;
    }
}
