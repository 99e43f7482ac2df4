import { JSDOM } from 'jsdom';
import { HtmlCleaningError } from '../errors';

const EMPTY_DOCUMENT = '<!DOCTYPE html><html><head></head><body></body></html>';

let parser: DOMParser | null = null;

// One parser per process; every call still gets a fresh document from it.
function getParser(): DOMParser {
    if (!parser) {
        const { window } = new JSDOM('');
        parser = new window.DOMParser();
    }
    return parser;
}

/**
 * Parse an HTML string into a detached container element.
 *
 * Uses the fragment parsing algorithm in a body context (the same as assigning
 * `innerHTML` on a `<div>`), so leading comments and stray text survive and malformed
 * markup is repaired the way a browser would repair it.
 */
export function parseFragment(html: string): HTMLElement {
    let doc: Document;
    try {
        doc = getParser().parseFromString(EMPTY_DOCUMENT, 'text/html');
    } catch (err) {
        throw new HtmlCleaningError('dom-unavailable', { cause: err });
    }

    const container = doc.createElement('div');
    try {
        container.innerHTML = html;
    } catch (err) {
        throw new HtmlCleaningError('parse-failed', { cause: err });
    }
    return container;
}

export function serializeFragment(root: Element): string {
    try {
        return root.innerHTML;
    } catch (err) {
        throw new HtmlCleaningError('serialize-failed', { cause: err });
    }
}
