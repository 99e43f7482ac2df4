import { describe, expect, test } from '@jest/globals';
import { getProcessingPasses, __TEST__ } from '../html/passes/registry';
import { runPasses } from '../html/passes/runner';
import { parseFragment } from '../html/shared/parser';
import { buildArtifactRules, DEFAULT_ARTIFACT_RULES } from '../rules';
import type { ProcessingPass } from '../html/passes/types';

function findPass(name: string): ProcessingPass {
    const pass = getProcessingPasses().find((candidate) => candidate.name === name);
    if (!pass) throw new Error(`No pass named ${name}`);
    return pass;
}

describe('passes registry', () => {
    test('runs clean passes before structure passes', () => {
        const passes = getProcessingPasses();

        expect(passes.map((pass) => pass.name)).toEqual([
            'Non-breaking space normalization',
            'Element attribute cleanup',
            'Attribute non-breaking space normalization',
            'Vendor wrapper unwrapping',
            'Empty block pruning',
        ]);
        expect(passes.map((pass) => pass.phase)).toEqual(['clean', 'clean', 'clean', 'structure', 'structure']);
    });

    test('unwraps vendor wrappers before pruning so wrapped spacers read as empty', () => {
        const root = parseFragment('<p><o:p> </o:p></p><p>kept</p>');

        runPasses(getProcessingPasses(), root, DEFAULT_ARTIFACT_RULES);

        expect(root.innerHTML).toBe('<p>kept</p>');
    });

    test('skips wrapper unwrapping when the rule set turns it off', () => {
        const rules = buildArtifactRules({ unwrapWrappers: false });
        const unwrapping = findPass('Vendor wrapper unwrapping');
        expect(unwrapping.condition?.(DEFAULT_ARTIFACT_RULES)).toBe(true);
        expect(unwrapping.condition?.(rules)).toBe(false);

        const root = parseFragment('<p><o:p> </o:p></p>');
        runPasses(getProcessingPasses(), root, rules);

        expect(root.querySelectorAll('p')).toHaveLength(1);
    });

    test('validatePriorities accepts the registered passes', () => {
        const passes = getProcessingPasses();
        expect(() => __TEST__.validatePriorities(passes.filter((pass) => pass.phase === 'clean'))).not.toThrow();
        expect(() => __TEST__.validatePriorities(passes.filter((pass) => pass.phase === 'structure'))).not.toThrow();
    });

    test('validatePriorities rejects a pass that reuses a structure priority', () => {
        const pruning = findPass('Empty block pruning');
        const extra: ProcessingPass = { ...pruning, name: 'Second pruning' };

        expect(() => __TEST__.validatePriorities([pruning, extra])).toThrow(
            'Duplicate priority detected for passes "Empty block pruning" and "Second pruning"'
        );
    });

    test('validatePriorities rejects duplicates even for unnamed passes', () => {
        const unnamed: ProcessingPass = { ...findPass('Element attribute cleanup'), name: '' };
        const clash: ProcessingPass = { ...unnamed, name: 'Clash' };

        expect(() => __TEST__.validatePriorities([unnamed, clash])).toThrow(/Duplicate priority/);
    });

    test('sortPasses puts unwrapping ahead of pruning whatever the input order', () => {
        const structure = getProcessingPasses().filter((pass) => pass.phase === 'structure');

        const ordered = __TEST__.sortPasses([...structure].reverse());

        expect(ordered.map((pass) => pass.name)).toEqual(['Vendor wrapper unwrapping', 'Empty block pruning']);
    });
});
