import { normalizeNbspAttributes, normalizeNbspText } from '../pre/normalizeEntities';
import { cleanAllElements } from '../clean/elementCleaner';
import { unwrapVendorWrappers } from '../post/wrappers';
import { pruneEmptyBlocks } from '../post/emptyBlocks';

import type { ProcessingPass } from './types';

const CLEAN_PASSES: readonly ProcessingPass[] = [
    {
        name: 'Non-breaking space normalization',
        phase: 'clean',
        priority: 10,
        execute: (root) => normalizeNbspText(root),
    },
    {
        name: 'Element attribute cleanup',
        phase: 'clean',
        priority: 20,
        execute: (root, rules) => cleanAllElements(root, rules),
    },
    {
        name: 'Attribute non-breaking space normalization',
        phase: 'clean',
        priority: 30, // after cleanup so removed attributes are not counted
        execute: (root) => normalizeNbspAttributes(root),
    },
];

const STRUCTURE_PASSES: readonly ProcessingPass[] = [
    {
        name: 'Vendor wrapper unwrapping',
        phase: 'structure',
        priority: 10, // before pruning so <p><o:p> </o:p></p> reads as empty
        condition: (rules) => rules.unwrapWrappers,
        execute: (root, rules) => unwrapVendorWrappers(root, rules),
    },
    {
        name: 'Empty block pruning',
        phase: 'structure',
        priority: 20,
        execute: (root, rules) => pruneEmptyBlocks(root, rules.prunableBlockTags),
    },
];

function validatePriorities(passes: readonly ProcessingPass[]): void {
    if (process.env.NODE_ENV === 'production') return;
    const seen = new Map<number, string>();
    passes.forEach((pass) => {
        if (seen.has(pass.priority)) {
            throw new Error(`Duplicate priority detected for passes "${seen.get(pass.priority)}" and "${pass.name}"`);
        }
        seen.set(pass.priority, pass.name);
    });
}

function sortPasses(passes: readonly ProcessingPass[]): ProcessingPass[] {
    return [...passes].sort((a, b) => a.priority - b.priority);
}

/**
 * All passes in execution order: every `clean` pass, then every `structure` pass.
 */
export function getProcessingPasses(): ProcessingPass[] {
    validatePriorities(CLEAN_PASSES);
    validatePriorities(STRUCTURE_PASSES);

    return [...sortPasses(CLEAN_PASSES), ...sortPasses(STRUCTURE_PASSES)];
}

export const __TEST__ = {
    validatePriorities,
    sortPasses,
};
