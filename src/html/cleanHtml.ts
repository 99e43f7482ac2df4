/**
 * HTML cleaning pipeline for Word / Office authoring artifacts.
 *
 * Pipeline: normalize non-breaking spaces in the source string, parse into a detached
 * fragment, run the `clean` passes (text normalization, element attribute cleanup), then
 * the `structure` passes (wrapper unwrapping, empty block pruning), and serialize.
 *
 * Key invariants:
 * - `sanitize` never throws. Any failure leaves the input untouched (`changed: false`).
 * - When no pass modifies anything the input string is returned byte for byte, so parser
 *   normalization (attribute quoting, `<br/>` vs `<br>`) alone never reports a change.
 * - Running the pipeline on its own output is a no-op.
 */

import type { ArtifactRuleSet, CleanResult } from '../types';
import { DEFAULT_ARTIFACT_RULES } from '../rules';
import { countNbspEntities, normalizeNbspEntities } from './pre/normalizeEntities';
import { parseFragment, serializeFragment } from './shared/parser';
import { getProcessingPasses } from './passes/registry';
import { runPasses } from './passes/runner';
import type { ProcessingPass } from './passes/types';
import logger from '../logger';

function unchanged(html: string, warnings: readonly string[] = []): CleanResult {
    return { html, changed: false, modifications: 0, warnings };
}

export class ArtifactSanitizer {
    readonly rules: ArtifactRuleSet;
    private readonly passes: readonly ProcessingPass[];

    constructor(rules: ArtifactRuleSet = DEFAULT_ARTIFACT_RULES) {
        this.rules = rules;
        this.passes = getProcessingPasses();
    }

    sanitize(html: string): CleanResult {
        if (!html || typeof html !== 'string') return unchanged(html);

        try {
            const entities = countNbspEntities(html);
            const root = parseFragment(normalizeNbspEntities(html));
            const modifications = entities + this.sanitizeFragment(root);
            if (modifications === 0) {
                logger.debug('No artifacts found');
                return unchanged(html);
            }

            const cleaned = serializeFragment(root);
            logger.debug(`Cleaned ${modifications} artifact(s); ${html.length} -> ${cleaned.length} chars`);
            return { html: cleaned, changed: cleaned !== html, modifications, warnings: [] };
        } catch (err) {
            logger.warn('Cleaning failed; leaving content unchanged', err);
            const message = err instanceof Error ? err.message : String(err);
            return unchanged(html, [message]);
        }
    }

    /**
     * Run the DOM passes on a tree the caller already holds, NBSPs in text and attribute
     * values included.
     * Throws `HtmlCleaningError` on failure, after which the tree must be discarded.
     */
    sanitizeFragment(root: HTMLElement): number {
        return runPasses(this.passes, root, this.rules).modifications;
    }
}

export function cleanHtml(html: string, rules: ArtifactRuleSet = DEFAULT_ARTIFACT_RULES): CleanResult {
    return new ArtifactSanitizer(rules).sanitize(html);
}
