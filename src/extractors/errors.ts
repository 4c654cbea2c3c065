/**
 * src/extractors/errors.ts
 */

/** A payload that could not be read at all. Individual bad records never raise this. */
export class ExtractionError extends Error {
    readonly sourceUrl: string;

    constructor(sourceUrl: string, message: string) {
        super(`${sourceUrl}: ${message}`);
        this.name = 'ExtractionError';
        this.sourceUrl = sourceUrl;
    }
}
