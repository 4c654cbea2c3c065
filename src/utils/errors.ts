/**
 * src/utils/errors.ts
 *
 * Errors that abort a run before any fetch happens. Everything that can go
 * wrong after that point is reported as data (fetch outcomes, failed pages,
 * failed queries) instead of being thrown.
 */

export class PreconditionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'PreconditionError';
    }
}

export class MissingCredentialError extends PreconditionError {
    readonly credential: string;

    constructor(credential: string, hint?: string) {
        super(`${credential} is not set${hint ? ` (${hint})` : ''}`);
        this.name = 'MissingCredentialError';
        this.credential = credential;
    }
}

/** Message of an unknown thrown value, for log lines and failure reasons. */
export function errorMessage(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}
