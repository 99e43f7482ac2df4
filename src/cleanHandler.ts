import { ArtifactSanitizer } from './html/cleanHtml';
import type { CleanOutcome, EditorHost } from './types';
import logger from './logger';

/**
 * Reads the selected range as HTML. Returns null when the host cannot materialize it,
 * which sends the caller down the whole-document path.
 */
function readSelectionHtml(host: EditorHost): string | null {
    try {
        const html = host.getSelectedHtml();
        return typeof html === 'string' ? html : null;
    } catch (err) {
        logger.warn('Failed to read selected content; cleaning the whole document instead', err);
        return null;
    }
}

/**
 * Cleans the selection only. Returns null when the selection path cannot complete and
 * the whole document should be cleaned instead.
 */
function cleanSelection(host: EditorHost, sanitizer: ArtifactSanitizer): CleanOutcome | null {
    const selectedHtml = readSelectionHtml(host);
    if (selectedHtml === null) return null;

    const result = sanitizer.sanitize(selectedHtml);
    if (!result.changed) {
        logger.debug('No artifacts found in selection');
        return { scope: 'selection', changed: false, selectionFallback: false };
    }

    try {
        host.replaceSelection(result.html);
    } catch (err) {
        logger.warn('Failed to replace selected content; cleaning the whole document instead', err);
        return null;
    }
    return { scope: 'selection', changed: true, selectionFallback: false };
}

function cleanDocument(host: EditorHost, sanitizer: ArtifactSanitizer, selectionFallback: boolean): CleanOutcome {
    const currentHtml = host.getDocumentHtml();
    const result = sanitizer.sanitize(currentHtml);

    // Only touch the host when something changed so no empty undo step is recorded
    if (result.changed) {
        host.setDocumentHtml(result.html);
    } else {
        logger.debug('No artifacts found in document');
    }
    return { scope: 'document', changed: result.changed, selectionFallback };
}

/**
 * Cleans the current selection, or the whole document when the selection is collapsed.
 * Each path replaces content at most once, as a single edit on the host.
 */
export function cleanEditorContent(
    host: EditorHost,
    sanitizer: ArtifactSanitizer = new ArtifactSanitizer()
): CleanOutcome {
    if (host.hasSelection()) {
        logger.debug('Cleaning selected content');
        const outcome = cleanSelection(host, sanitizer);
        if (outcome) return outcome;
        return cleanDocument(host, sanitizer, true);
    }

    logger.debug('No selection; cleaning entire document');
    return cleanDocument(host, sanitizer, false);
}
