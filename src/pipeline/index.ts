import { TmdbClient } from '../api/tmdb';
import { loadQueriesFromFile, toQueries } from '../input';
import type { InputSource, RunConfig } from '../util/config';
import { EmptyInputError } from '../util/errors';
import { runQueue } from '../util/queues';
import { Sleeper, exponentialBackoff } from '../util/retry';
import { ResultAggregator } from './aggregator';
import { AssetFetcher } from './fetcher';
import { PosterRun } from './orchestrator';
import { MetadataResolver } from './resolver';
import { ImageSource, MetadataSearch, Query, RunHooks, RunReport } from './types';

export * from './types';
export { PosterRun, summarize } from './orchestrator';

export interface PipelineDependencies {
    client?: MetadataSearch & ImageSource;
    sleep?: Sleeper;
    runId?: string;
}

/** Reads the configured input file and inline titles, in that order. */
export async function loadQueries(input: InputSource): Promise<Query[]> {
    const queries: Query[] = [];
    if (input.file) {
        queries.push(...await loadQueriesFromFile(input.file, {
            format: input.format,
            csvHasHeader: input.csvHasHeader,
        }));
    }
    if (input.titles.length > 0) {
        queries.push(...toQueries(input.titles));
    }
    if (queries.length === 0) {
        throw new EmptyInputError('the configured input');
    }
    return queries;
}

/** Wires resolver, fetcher and aggregator for one run over `queries`. */
export function createPosterRun(
    config: RunConfig,
    queries: readonly Query[],
    deps: PipelineDependencies = {}
): PosterRun {
    const client = deps.client ?? new TmdbClient({
        apiKey: config.apiKey,
        minRequestIntervalMs: config.requestDelaySeconds * 1000,
        timeoutMs: config.requestTimeoutSeconds * 1000,
    });
    const backoff = exponentialBackoff(config.retryDelaySeconds * 1000);

    const resolver = new MetadataResolver(client, client, {
        language: config.language,
        fallbackLanguages: config.fallbackLanguages,
        mediaType: config.mediaType,
        quality: config.quality,
        retries: config.maxRetries,
        backoff,
        sleep: deps.sleep,
    });
    const fetcher = new AssetFetcher(client, {
        outputDir: config.outputDir,
        overwritePolicy: config.overwritePolicy,
        maxRetries: config.maxRetries,
        backoff,
        sleep: deps.sleep,
    });
    const aggregator = new ResultAggregator({
        outputDir: config.outputDir,
        saveMetadata: config.saveMetadata,
        zipOutput: config.zipOutput,
    });

    return new PosterRun(queries, { resolver, fetcher, aggregator }, {
        overwritePolicy: config.overwritePolicy,
        requestDelayMs: config.requestDelaySeconds * 1000,
        runId: deps.runId,
        sleep: deps.sleep,
    });
}

/**
 * Parses the input, then queues a run. Input errors (MalformedInput,
 * EmptyInput) reject before any request is made.
 */
export async function runPipeline(
    config: RunConfig,
    input: InputSource,
    hooks: RunHooks = {},
    deps: PipelineDependencies = {}
): Promise<RunReport> {
    const queries = await loadQueries(input);
    const run = createPosterRun(config, queries, deps);
    return runQueue.add(() => run.execute(hooks));
}
