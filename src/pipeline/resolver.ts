import logger from '../util/logger';
import { NetworkError, isRunFatal } from '../util/errors';
import { Backoff, RetryExhaustedError, Sleeper, retryOperation } from '../util/retry';
import {
    ImageSource,
    MatchCandidate,
    MediaTypeFilter,
    MetadataSearch,
    QualityTier,
    Query,
    ResolvedAsset,
} from './types';

export interface ResolverOptions {
    language: string;
    fallbackLanguages: readonly string[];
    mediaType: MediaTypeFilter;
    quality: QualityTier;
    /** Retries for searches that fail with a NetworkError. */
    retries: number;
    backoff: Backoff;
    sleep?: Sleeper;
}

export type ResolveResult =
    | { ok: true; asset: ResolvedAsset }
    | { ok: false; reason: 'NoMatch' | 'NoPoster'; message: string; retriesAttempted: 0 }
    | { ok: false; reason: 'NetworkError'; message: string; retriesAttempted: number };

/** Preferred language first, then each fallback once, in configured order. */
export function searchLanguages(preferred: string, fallbacks: readonly string[]): string[] {
    return [...new Set([preferred, ...fallbacks])];
}

function normalizeTitle(title: string): string {
    return title.trim().toLocaleLowerCase();
}

function isExactMatch(candidate: MatchCandidate, text: string): boolean {
    const wanted = normalizeTitle(text);
    return normalizeTitle(candidate.title) === wanted
        || (candidate.originalTitle !== undefined && normalizeTitle(candidate.originalTitle) === wanted);
}

/**
 * Orders candidates best-first:
 * 1. exact (case-insensitive) title match
 * 2. closest release year to the query's year hint, unknown years last
 * 3. higher popularity, where known
 * 4. order returned by the API
 */
export function rankCandidates(candidates: readonly MatchCandidate[], query: Query): MatchCandidate[] {
    const { yearHint } = query;

    return candidates
        .map((candidate, position) => ({
            candidate,
            position,
            exact: isExactMatch(candidate, query.text) ? 0 : 1,
            distance: yearHint === undefined
                ? 0
                : candidate.releaseYear === null
                    ? Number.POSITIVE_INFINITY
                    : Math.abs(candidate.releaseYear - yearHint),
            popularity: candidate.popularity ?? Number.NEGATIVE_INFINITY,
        }))
        .sort((a, b) =>
            a.exact - b.exact
            || compareNumbers(a.distance, b.distance)
            || compareNumbers(b.popularity, a.popularity)
            || a.position - b.position
        )
        .map(entry => entry.candidate);
}

// Subtraction would give NaN for Infinity - Infinity.
function compareNumbers(a: number, b: number): number {
    if (a === b) return 0;
    return a < b ? -1 : 1;
}

export class MetadataResolver {
    constructor(
        private readonly search: MetadataSearch,
        private readonly images: Pick<ImageSource, 'imageUrl'>,
        private readonly options: ResolverOptions
    ) { }

    /**
     * Finds the best match with a poster for one query.
     * AuthFailure and QuotaExceeded errors are thrown; every other outcome is returned.
     */
    async resolve(query: Query): Promise<ResolveResult> {
        const mediaType = query.mediaTypeHint === 'unspecified' ? this.options.mediaType : query.mediaTypeHint;
        const languages = searchLanguages(this.options.language, this.options.fallbackLanguages);

        let candidates: MatchCandidate[] = [];
        for (const [i, language] of languages.entries()) {
            if (i > 0) {
                logger.debug(`No results for '${query.text}' yet, trying fallback language '${language}'`);
            }

            try {
                candidates = await this.searchWithRetry(query.text, mediaType, language);
            } catch (error) {
                if (error instanceof RetryExhaustedError && error.lastError instanceof NetworkError) {
                    return {
                        ok: false,
                        reason: 'NetworkError',
                        message: error.lastError.message,
                        retriesAttempted: error.attempts - 1,
                    };
                }
                throw error;
            }

            if (candidates.length > 0) break;
        }

        if (candidates.length === 0) {
            logger.warn(`No match found for '${query.text}' in any configured language.`);
            return {
                ok: false,
                reason: 'NoMatch',
                message: `No ${mediaType === 'both' ? 'movie or TV' : mediaType} results in ${languages.join(', ')}`,
                retriesAttempted: 0,
            };
        }

        const winner = rankCandidates(candidates, query).find(candidate => candidate.posterPath);
        const posterPath = winner?.posterPath;
        if (!winner || !posterPath) {
            logger.warn(`None of the ${candidates.length} matches for '${query.text}' has a poster.`);
            return {
                ok: false,
                reason: 'NoPoster',
                message: `${candidates.length} match(es) found but none has a poster`,
                retriesAttempted: 0,
            };
        }

        const year = winner.releaseYear ?? 'unknown year';
        logger.info(`Matched '${query.raw}' -> '${winner.title}' (${year}, ${winner.mediaType}, ${winner.language})`);

        return {
            ok: true,
            asset: {
                query,
                candidate: winner,
                quality: this.options.quality,
                imageUrl: this.images.imageUrl(posterPath, this.options.quality),
            },
        };
    }

    private searchWithRetry(text: string, mediaType: MediaTypeFilter, language: string): Promise<MatchCandidate[]> {
        return retryOperation(
            () => this.search.search({ text, mediaType, language }),
            `search for '${text}'`,
            {
                retries: this.options.retries,
                backoff: this.options.backoff,
                sleep: this.options.sleep,
                shouldRetry: error => !isRunFatal(error) && error instanceof NetworkError,
            }
        );
    }
}
