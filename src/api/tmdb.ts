import Axios from 'axios';
import { z } from 'zod';
import logger from '../util/logger';
import { TMDB_API_BASE_URL, TMDB_IMAGE_BASE_URL } from '../util/constants';
import { createLimiter, createRateLimitedAxios, RateLimitedAxios } from '../util/queues';
import { AuthFailureError, DownloadFailedError, NetworkError, QuotaExceededError, describeError } from '../util/errors';
import { isAccessToken } from '../util/apiKey';
import {
    ImageSource,
    MatchCandidate,
    MediaType,
    MetadataSearch,
    QualityTier,
    SearchRequest,
} from '../pipeline/types';

export interface TmdbClientOptions {
    apiKey: string;
    /** Minimum spacing between API requests. */
    minRequestIntervalMs?: number;
    timeoutMs?: number;
}

const SearchResultSchema = z.object({
    id: z.number().int(),
    media_type: z.string().optional(),
    title: z.string().optional(),
    name: z.string().optional(),
    original_title: z.string().optional(),
    original_name: z.string().optional(),
    release_date: z.string().nullish(),
    first_air_date: z.string().nullish(),
    poster_path: z.string().nullish(),
    popularity: z.number().optional(),
    vote_average: z.number().optional(),
    overview: z.string().nullish(),
});

const SearchResponseSchema = z.object({
    results: z.array(z.unknown()).default([]),
});

const ErrorBodySchema = z.object({
    status_message: z.string(),
});

type SearchResult = z.infer<typeof SearchResultSchema>;

function parseYear(date: string | null | undefined): number | null {
    const match = /^(\d{4})/.exec(date ?? '');
    return match ? Number(match[1]) : null;
}

/**
 * Maps a raw search result to a candidate. Movie and TV results name their
 * fields differently; multi-search results say which kind they are.
 */
export function toCandidate(result: SearchResult, mediaType: MediaType, language: string): MatchCandidate | null {
    const title = mediaType === 'tv' ? result.name : result.title;
    if (!title) return null;

    const originalTitle = mediaType === 'tv' ? result.original_name : result.original_title;
    return {
        id: result.id,
        title,
        originalTitle,
        releaseYear: parseYear(mediaType === 'tv' ? result.first_air_date : result.release_date),
        mediaType,
        posterPath: result.poster_path ?? null,
        language,
        popularity: result.popularity,
        voteAverage: result.vote_average,
        overview: result.overview ?? undefined,
    };
}

/**
 * Sorts an axios failure into the pipeline's error taxonomy.
 * 401 means the key is bad, 429 means the quota is spent; everything else is a network problem.
 */
export function classifyRequestError(error: unknown, action: string): Error {
    if (!Axios.isAxiosError(error)) {
        return new NetworkError(`Failed to ${action}: ${describeError(error)}`, undefined, { cause: error });
    }

    const status = error.response?.status;
    const body = ErrorBodySchema.safeParse(error.response?.data);
    const detail = body.success ? body.data.status_message : error.message;

    if (status === 401) {
        return new AuthFailureError(`TMDB rejected the API key: ${detail}`, { cause: error });
    }
    if (status === 429) {
        return new QuotaExceededError(`TMDB request quota exceeded: ${detail}`, { cause: error });
    }
    return new NetworkError(`Failed to ${action}${status ? ` (HTTP ${status})` : ''}: ${detail}`, status, { cause: error });
}

export class TmdbClient implements MetadataSearch, ImageSource {
    private readonly api: RateLimitedAxios;
    private readonly images: RateLimitedAxios;

    constructor(options: TmdbClientOptions) {
        const timeout = options.timeoutMs ?? 15_000;
        const bearer = isAccessToken(options.apiKey);

        const apiAxios = Axios.create({
            baseURL: TMDB_API_BASE_URL,
            timeout,
            headers: {
                Accept: 'application/json',
                ...(bearer ? { Authorization: `Bearer ${options.apiKey}` } : {}),
            },
            params: bearer ? {} : { api_key: options.apiKey },
        });

        const imageAxios = Axios.create({
            timeout: timeout * 2,
            responseType: 'arraybuffer',
        });

        this.api = createRateLimitedAxios(
            apiAxios,
            createLimiter('TMDB', { minTime: options.minRequestIntervalMs ?? 0 }),
            'TMDB'
        );
        this.images = createRateLimitedAxios(imageAxios, createLimiter('TMDB Images'), 'TMDB Images');
    }

    /** Checks the credential against the configuration endpoint. */
    async verifyApiKey(): Promise<void> {
        try {
            await this.api.get('/configuration');
            logger.debug('TMDB API key accepted.');
        } catch (error) {
            throw classifyRequestError(error, 'verify API key');
        }
    }

    async search(request: SearchRequest): Promise<MatchCandidate[]> {
        const endpoint = request.mediaType === 'both' ? 'multi' : request.mediaType;
        logger.debug(`Searching ${endpoint} for '${request.text}' in '${request.language}'`);

        let data: unknown;
        try {
            const response = await this.api.get<unknown>(`/search/${endpoint}`, {
                params: {
                    query: request.text,
                    language: request.language,
                    include_adult: false,
                    page: 1,
                },
            });
            data = response.data;
        } catch (error) {
            throw classifyRequestError(error, `search for '${request.text}'`);
        }

        const parsed = SearchResponseSchema.safeParse(data);
        if (!parsed.success) {
            throw new NetworkError(`Unexpected search response for '${request.text}'`);
        }

        const candidates: MatchCandidate[] = [];
        for (const item of parsed.data.results) {
            const result = SearchResultSchema.safeParse(item);
            if (!result.success) {
                logger.debug(`Skipping unparseable search result for '${request.text}'`);
                continue;
            }

            const mediaType = request.mediaType === 'both' ? result.data.media_type : request.mediaType;
            if (mediaType !== 'movie' && mediaType !== 'tv') continue;

            const candidate = toCandidate(result.data, mediaType, request.language);
            if (candidate) candidates.push(candidate);
        }

        return candidates;
    }

    imageUrl(posterPath: string, quality: QualityTier): string {
        const normalized = posterPath.startsWith('/') ? posterPath : `/${posterPath}`;
        return `${TMDB_IMAGE_BASE_URL}/${quality}${normalized}`;
    }

    /** Fetches image bytes. Non-2xx statuses and empty bodies are failures. */
    async downloadImage(url: string): Promise<Buffer> {
        let body: unknown;
        try {
            const response = await this.images.get<unknown>(url);
            body = response.data;
        } catch (error) {
            const status = Axios.isAxiosError(error) ? error.response?.status : undefined;
            throw new DownloadFailedError(
                `Image request failed${status ? ` (HTTP ${status})` : ''}: ${describeError(error)}`,
                status
            );
        }

        const bytes = Buffer.isBuffer(body)
            ? body
            : body instanceof ArrayBuffer
                ? Buffer.from(body)
                : null;

        if (!bytes) {
            throw new DownloadFailedError(`Image response from ${url} was not binary`);
        }
        if (bytes.length === 0) {
            throw new DownloadFailedError(`Image response from ${url} was empty`);
        }
        return bytes;
    }
}
