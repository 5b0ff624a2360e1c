import { DownloadOutcome } from './types';

/**
 * Base class for errors raised by the download components.
 * The category lets the calling job decide between retrying at a higher level and aborting.
 */
export class DownloadError extends Error {
    public readonly category: string;

    constructor(message: string, category: string = 'Service') {
        super(message);
        this.name = new.target.name;
        this.category = category;
    }
}

/**
 * The call cannot proceed with the current configuration: no credential and no fallback,
 * missing OAuth settings or a malformed retry policy.
 */
export class ConfigurationError extends DownloadError {
    constructor(message: string) {
        super(message, 'Configuration');
    }
}

/**
 * The authorization code exchange did not produce a token.
 */
export class TokenExchangeError extends DownloadError {
    public readonly statusCode?: number;

    constructor(message: string, statusCode?: number) {
        super(message, 'TokenExchange');
        this.statusCode = statusCode;
    }
}

export class ForbiddenError extends DownloadError {
    constructor(message: string) {
        super(message, 'Forbidden');
    }
}

export class ServerError extends DownloadError {
    constructor(message: string) {
        super(message, 'Server');
    }
}

export class CanceledError extends DownloadError {
    constructor(message: string = 'Request canceled') {
        super(message, 'Canceled');
    }
}

/**
 * Converts a failed download outcome into the matching error.
 * @throws Error if given a successful outcome
 */
export function outcomeToError(outcome: DownloadOutcome): DownloadError {
    switch (outcome.kind) {
        case 'forbidden':
        case 'consent-required':
            return new ForbiddenError(outcome.message);
        case 'server-failure':
            return new ServerError(outcome.message);
        case 'success':
            throw new Error('A successful download outcome has no error');
    }
}
