import type { FailureReason } from '../util/errors';

export type MediaType = 'movie' | 'tv';
export type MediaTypeFilter = MediaType | 'both';
export type MediaTypeHint = MediaType | 'unspecified';
export type QualityTier = 'original' | 'w500' | 'w342' | 'w185';
export type OverwritePolicy = 'skip-if-exists' | 'overwrite';

export interface Query {
    /** The trimmed input line the query was parsed from. */
    readonly raw: string;
    readonly text: string;
    readonly yearHint?: number;
    readonly mediaTypeHint: MediaTypeHint;
}

export interface MatchCandidate {
    id: number;
    title: string;
    originalTitle?: string;
    releaseYear: number | null;
    mediaType: MediaType;
    posterPath: string | null;
    /** Language of the search that produced this candidate. */
    language: string;
    popularity?: number;
    voteAverage?: number;
    overview?: string;
}

export interface ResolvedAsset {
    readonly query: Query;
    readonly candidate: MatchCandidate;
    readonly quality: QualityTier;
    readonly imageUrl: string;
}

export interface AssetMetadata {
    query: string;
    matchedId: number;
    matchedTitle: string;
    originalTitle: string | null;
    mediaType: MediaType;
    releaseYear: number | null;
    language: string;
    quality: QualityTier;
    sourceUrl: string;
    popularity: number | null;
    voteAverage: number | null;
    overview: string | null;
    downloadedAt: string;
}

export interface SuccessOutcome {
    status: 'success';
    query: Query;
    savedPath: string;
    /** True when an existing file was kept and nothing was fetched. */
    skipped: boolean;
    bytes: number;
    /** SHA-256 of a freshly downloaded image. */
    contentHash?: string;
    /** Raw query of an earlier title in the run that saved identical bytes. */
    duplicateOf?: string;
    metadata?: AssetMetadata;
    sidecarPath?: string;
}

export interface FailureOutcome {
    status: 'failure';
    query: Query;
    reason: FailureReason;
    message: string;
    retriesAttempted: number;
    /** Files written before the failure was recorded; never archived. */
    strandedPath?: string;
}

export type DownloadOutcome = SuccessOutcome | FailureOutcome;

export type RunState = 'Idle' | 'Running' | 'Completed' | 'Aborted';

export interface RunSummary {
    total: number;
    succeeded: number;
    downloaded: number;
    skipped: number;
    /** Fresh downloads whose bytes match an earlier download in the run. */
    duplicates: number;
    failed: number;
    aborted: number;
    cancelled: number;
    bytesDownloaded: number;
}

export interface RunReport {
    runId: string;
    state: Extract<RunState, 'Completed' | 'Aborted'>;
    cancelled: boolean;
    outcomes: DownloadOutcome[];
    summary: RunSummary;
    /** Absent when the report could not be written; see `failureReportError`. */
    failureReportPath?: string;
    failureReportError?: string;
    archivePath?: string;
    archiveError?: string;
    startedAt: string;
    finishedAt: string;
}

export interface ProgressEvent {
    /** 1-based position of the query that just finished. */
    index: number;
    total: number;
    outcome: DownloadOutcome;
    elapsedMs: number;
    /** Estimated time to finish, extrapolated from the average so far. */
    etaMs: number;
}

/** Anything with a pollable `aborted` flag, e.g. an AbortSignal. */
export interface CancellationToken {
    readonly aborted: boolean;
}

export interface RunHooks {
    onProgress?: (event: ProgressEvent) => void;
    signal?: CancellationToken;
}

export interface SearchRequest {
    text: string;
    mediaType: MediaTypeFilter;
    language: string;
}

/** Search-by-title side of the metadata API. */
export interface MetadataSearch {
    search(request: SearchRequest): Promise<MatchCandidate[]>;
}

/** Fetch-by-URL side of the metadata API. */
export interface ImageSource {
    imageUrl(posterPath: string, quality: QualityTier): string;
    downloadImage(url: string): Promise<Buffer>;
}
