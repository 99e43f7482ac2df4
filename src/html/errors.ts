export type HtmlCleaningFailureReason = 'dom-unavailable' | 'parse-failed' | 'pass-failed' | 'serialize-failed';

const FAILURE_MESSAGES: Record<HtmlCleaningFailureReason, string> = {
    'dom-unavailable': 'DOM APIs unavailable; cannot parse HTML.',
    'parse-failed': 'HTML could not be parsed into a fragment.',
    'pass-failed': 'A cleaning pass failed; the fragment was left in an unknown state.',
    'serialize-failed': 'The cleaned fragment could not be serialized back to HTML.',
};

export interface HtmlCleaningErrorOptions {
    readonly passName?: string;
    readonly cause?: unknown;
}

/**
 * Thrown when the cleaning pipeline cannot produce a trustworthy result.
 *
 * The sanitizer catches it and hands back the untouched input, so callers of
 * `ArtifactSanitizer.sanitize` never see it. `sanitizeFragment` lets it propagate
 * so the caller can discard the mutated tree.
 */
export class HtmlCleaningError extends Error {
    readonly reason: HtmlCleaningFailureReason;
    readonly passName?: string;

    constructor(reason: HtmlCleaningFailureReason, options: HtmlCleaningErrorOptions = {}) {
        const base = FAILURE_MESSAGES[reason];
        super(options.passName ? `${options.passName}: ${base}` : base, { cause: options.cause });
        this.name = 'HtmlCleaningError';
        this.reason = reason;
        this.passName = options.passName;
    }
}
