import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import logger from '../util/logger';
import { DEFAULT_IMAGE_EXTENSION, IMAGE_EXTENSIONS } from '../util/constants';
import { DownloadFailedError, WriteFailedError, describeError } from '../util/errors';
import { formatFileSize, pathExists, sidecarPathFor, writeFileAtomic } from '../util/files';
import { UNTITLED, sanitizeFilename } from '../util/naming';
import { Backoff, RetryExhaustedError, Sleeper, retryOperation } from '../util/retry';
import { ImageSource, OverwritePolicy, Query, ResolvedAsset } from './types';

export interface FetcherOptions {
    outputDir: string;
    overwritePolicy: OverwritePolicy;
    /** Retries after the first download attempt. */
    maxRetries: number;
    backoff: Backoff;
    sleep?: Sleeper;
}

export type FetchResult =
    | { ok: true; savedPath: string; bytes: number; skipped: boolean; attempts: number; contentHash?: string }
    | { ok: false; reason: 'DownloadFailed' | 'WriteFailed'; message: string; retriesAttempted: number };

const SidecarOwnerSchema = z.object({ query: z.string() });

/** Base file name (no extension) an image for this query is saved under, before any disambiguation. */
export function targetBaseName(query: Query): string {
    return sanitizeFilename(query.raw);
}

function imageExtension(imageUrl: string): string {
    const ext = path.extname(imageUrl.split(/[?#]/)[0]).toLowerCase();
    return IMAGE_EXTENSIONS.includes(ext) ? ext : DEFAULT_IMAGE_EXTENSION;
}

export function contentHash(data: Uint8Array): string {
    return crypto.createHash('sha256').update(data).digest('hex');
}

export class AssetFetcher {
    /** Base names used so far in this run, by the raw query that took them. */
    private readonly claimed = new Map<string, string>();

    constructor(
        private readonly images: Pick<ImageSource, 'downloadImage'>,
        private readonly options: FetcherOptions
    ) { }

    /**
     * Path of an image already saved for this query, if any. Titles whose
     * base name is "untitled" or belongs to another title can only be
     * looked up once resolved, so they return null here.
     */
    async findExisting(query: Query): Promise<string | null> {
        const base = await this.ownBaseName(query);
        if (!base) return null;

        const existing = await this.existingImage(base);
        if (existing) this.claimed.set(base, query.raw);
        return existing;
    }

    /**
     * Downloads the asset and moves it into place. Under skip-if-exists an
     * existing file short-circuits without any network call.
     */
    async fetch(asset: ResolvedAsset): Promise<FetchResult> {
        const { query } = asset;
        const ownBase = await this.ownBaseName(query);
        const base = ownBase ?? `${targetBaseName(query)}_${asset.candidate.id}`;
        if (!ownBase) {
            logger.debug(`'${query.raw}' cannot use '${targetBaseName(query)}', saving as '${base}'`);
        }
        this.claimed.set(base, query.raw);

        if (this.options.overwritePolicy === 'skip-if-exists') {
            const existing = await this.existingImage(base);
            if (existing) {
                logger.info(`Skipping '${query.raw}', poster already exists.`);
                return { ok: true, savedPath: existing, bytes: 0, skipped: true, attempts: 0 };
            }
        }

        const finalPath = path.join(this.options.outputDir, `${base}${imageExtension(asset.imageUrl)}`);

        let data: Buffer;
        let attempts = 0;
        try {
            data = await retryOperation(
                async (attempt) => {
                    attempts = attempt;
                    const bytes = await this.images.downloadImage(asset.imageUrl);
                    if (bytes.length === 0) {
                        throw new DownloadFailedError(`Image response from ${asset.imageUrl} was empty`);
                    }
                    return bytes;
                },
                `download poster for '${query.raw}'`,
                {
                    retries: this.options.maxRetries,
                    backoff: this.options.backoff,
                    sleep: this.options.sleep,
                }
            );
        } catch (error) {
            const cause = error instanceof RetryExhaustedError ? error.lastError : error;
            logger.error(`Giving up on '${query.raw}' after ${attempts} attempt(s): ${describeError(cause)}`);
            return {
                ok: false,
                reason: 'DownloadFailed',
                message: cause instanceof DownloadFailedError ? cause.message : `Download failed: ${describeError(cause)}`,
                retriesAttempted: Math.max(0, attempts - 1),
            };
        }

        try {
            await writeFileAtomic(finalPath, data);
        } catch (error) {
            const failure = new WriteFailedError(finalPath, { cause: error });
            logger.error(failure.message);
            return { ok: false, reason: 'WriteFailed', message: failure.message, retriesAttempted: attempts - 1 };
        }

        await this.removeOtherExtensions(base, finalPath);

        logger.info(`Downloaded '${query.raw}' (${formatFileSize(data.length)}).`);
        return {
            ok: true,
            savedPath: finalPath,
            bytes: data.length,
            skipped: false,
            attempts,
            contentHash: contentHash(data),
        };
    }

    /**
     * The sanitized base name, unless it is "untitled" or is already taken
     * by another title, in this run or (per its sidecar) an earlier one.
     */
    private async ownBaseName(query: Query): Promise<string | null> {
        const base = targetBaseName(query);
        if (base === UNTITLED) return null;

        const owner = this.claimed.get(base) ?? await this.sidecarOwner(base);
        return owner === undefined || owner === query.raw ? base : null;
    }

    private async sidecarOwner(base: string): Promise<string | undefined> {
        const sidecar = sidecarPathFor(path.join(this.options.outputDir, `${base}${DEFAULT_IMAGE_EXTENSION}`));
        if (!await pathExists(sidecar)) return undefined;

        const content = await fs.promises.readFile(sidecar, 'utf8');
        let parsed: unknown;
        try {
            parsed = JSON.parse(content);
        } catch (error) {
            logger.warn(`Ignoring unreadable metadata file ${sidecar}: ${describeError(error)}`);
            return undefined;
        }
        const result = SidecarOwnerSchema.safeParse(parsed);
        return result.success ? result.data.query : undefined;
    }

    private async existingImage(base: string): Promise<string | null> {
        const stem = path.join(this.options.outputDir, base);
        for (const ext of IMAGE_EXTENSIONS) {
            if (await pathExists(`${stem}${ext}`)) return `${stem}${ext}`;
        }
        return null;
    }

    // A replaced poster may have changed format; only one image per base name survives.
    private async removeOtherExtensions(base: string, keep: string): Promise<void> {
        const stem = path.join(this.options.outputDir, base);
        for (const ext of IMAGE_EXTENSIONS) {
            const candidate = `${stem}${ext}`;
            if (candidate === keep || !await pathExists(candidate)) continue;
            try {
                await fs.promises.rm(candidate);
                logger.debug(`Removed stale ${path.basename(candidate)}`);
            } catch (error) {
                logger.warn(`Could not remove stale poster ${candidate}: ${describeError(error)}`);
            }
        }
    }
}
