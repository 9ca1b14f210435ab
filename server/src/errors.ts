/**
 * The persistence backend cannot be reached or is not usable (missing
 * directory, unreadable file, not a database, I/O failure). Fatal for a run.
 */
export class StoreUnavailableError extends Error {
    constructor(message: string, cause?: unknown) {
        const detail = cause instanceof Error ? `: ${cause.message}` : '';
        super(`${message}${detail}`, { cause });
        this.name = 'StoreUnavailableError';
    }
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export const describeError = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);
