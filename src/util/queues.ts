import PQueue from 'p-queue';
import Bottleneck from 'bottleneck';
import type { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import logger from './logger';

// ============================================================================
// P-QUEUE: Run scheduling
// ============================================================================

/**
 * Run Queue
 * Download runs execute one at a time, off the caller's call stack.
 * Queries inside a run are sequential as well.
 */
export const runQueue = new PQueue({ concurrency: 1 });

// ============================================================================
// BOTTLENECK: HTTP Rate Limiting
// ============================================================================

export interface LimiterOptions {
    maxConcurrent?: number;
    minTime?: number;
}

/**
 * Creates a limiter with the shared error/failed logging attached.
 * Retries are handled by retryOperation, never by Bottleneck itself.
 */
export function createLimiter(serviceName: string, options: LimiterOptions = {}): Bottleneck {
    const limiter = new Bottleneck({
        maxConcurrent: options.maxConcurrent ?? 1,
        minTime: options.minTime ?? 0
    });

    limiter.on('error', (err) => {
        logger.error({ err }, `[${serviceName} Limiter] Unhandled error in queue`);
    });

    limiter.on('failed', (err: Error) => {
        logger.debug(`[${serviceName}] Job failed: ${err.message}`);
        return null;
    });

    return limiter;
}

// ============================================================================
// RATE-LIMITED AXIOS FACTORY
// ============================================================================

export interface RateLimitedAxios {
    get: <T = unknown>(url: string, config?: AxiosRequestConfig) => Promise<AxiosResponse<T>>;
}

/**
 * Wraps an axios instance so every call is queued through the limiter.
 */
export function createRateLimitedAxios(
    baseAxios: AxiosInstance,
    limiter: Bottleneck,
    serviceName: string
): RateLimitedAxios {
    return {
        get: <T = unknown>(url: string, config?: AxiosRequestConfig) => {
            logger.debug(`[${serviceName}] Scheduling GET ${url}`);
            return limiter.schedule(() => baseAxios.get<T>(url, config));
        },
    };
}
