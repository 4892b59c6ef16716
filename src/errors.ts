/**
 * Error conditions of a curve ingestion run
 */

export class FetchExhaustedError extends Error {
    constructor(
        readonly url: string,
        readonly attempts: number,
        readonly lastFailure: string
    ) {
        super(`Fetch failed after ${attempts} attempt(s): ${lastFailure}`);
        this.name = 'FetchExhaustedError';
    }
}

export class NoAnchorDataError extends Error {
    constructor(readonly key: string) {
        super(`${key} empty via all configured endpoints`);
        this.name = 'NoAnchorDataError';
    }
}

export class EmptyResultSetError extends Error {
    constructor() {
        super('no series fetched');
        this.name = 'EmptyResultSetError';
    }
}

export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/**
 * Extract error message from various error types
 */
export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return `${error.name}: ${error.message}`;
    }
    return String(error);
}
