/**
 * Error taxonomy for the poster pipeline.
 *
 * Parser errors abort before a run starts. `AuthFailureError` and
 * `QuotaExceededError` abort a run in progress. Everything else is
 * recorded against a single title and the run continues.
 */

export type FailureReason =
    | 'MalformedInput'
    | 'EmptyInput'
    | 'NoMatch'
    | 'NoPoster'
    | 'AuthFailure'
    | 'QuotaExceeded'
    | 'NetworkError'
    | 'DownloadFailed'
    | 'WriteFailed'
    | 'Aborted'
    | 'Cancelled';

export abstract class PosterError extends Error {
    abstract readonly reason: FailureReason;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class MalformedInputError extends PosterError {
    readonly reason = 'MalformedInput' as const;

    constructor(message: string, options?: { cause?: unknown }) {
        super(`Malformed input: ${message}`, options);
    }
}

export class EmptyInputError extends PosterError {
    readonly reason = 'EmptyInput' as const;

    constructor(source: string) {
        super(`No titles found in ${source}`);
    }
}

export class AuthFailureError extends PosterError {
    readonly reason = 'AuthFailure' as const;
}

export class QuotaExceededError extends PosterError {
    readonly reason = 'QuotaExceeded' as const;
}

export class NetworkError extends PosterError {
    readonly reason = 'NetworkError' as const;

    constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
        super(message, options);
    }
}

export class DownloadFailedError extends PosterError {
    readonly reason = 'DownloadFailed' as const;

    constructor(message: string, readonly status?: number) {
        super(message);
    }
}

export class WriteFailedError extends PosterError {
    readonly reason = 'WriteFailed' as const;

    constructor(readonly filePath: string, options?: { cause?: unknown }) {
        super(`Failed to write ${filePath}: ${describeError(options?.cause)}`, options);
    }
}

/** Errors after which no further title should be attempted. */
export function isRunFatal(error: unknown): error is AuthFailureError | QuotaExceededError {
    return error instanceof AuthFailureError || error instanceof QuotaExceededError;
}

/** An errno failure raised by `fs` (it names the path it was working on). */
export function isFileSystemError(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error
        && 'code' in error && typeof error.code === 'string'
        && 'path' in error && typeof error.path === 'string';
}

export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
