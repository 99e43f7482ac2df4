import type { ArtifactRuleSet } from '../../types';
import type { ProcessingPass } from './types';
import { HtmlCleaningError } from '../errors';
import logger from '../../logger';

export interface RunPassesResult {
    readonly modifications: number;
}

/**
 * Run passes in order. The first failure aborts the run: a half-cleaned tree is never
 * handed back, the error is rethrown as `HtmlCleaningError('pass-failed')`.
 */
export function runPasses(
    passes: readonly ProcessingPass[],
    root: HTMLElement,
    rules: ArtifactRuleSet
): RunPassesResult {
    let modifications = 0;

    for (const pass of passes) {
        if (pass.condition && !pass.condition(rules)) continue;
        try {
            const count = pass.execute(root, rules);
            if (count > 0) logger.debug(`${pass.name}: ${count} change(s)`);
            modifications += count;
        } catch (err) {
            logger.warn(`${pass.name} failed`, err);
            throw new HtmlCleaningError('pass-failed', { passName: pass.name, cause: err });
        }
    }

    return { modifications };
}
