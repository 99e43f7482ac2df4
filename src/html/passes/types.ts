import type { ArtifactRuleSet } from '../../types';

export type PassPhase = 'clean' | 'structure';

export interface ProcessingPass {
    /** Human-readable name for logging and debugging */
    readonly name: string;
    /** Processing phase - `structure` passes run after every `clean` pass */
    readonly phase: PassPhase;
    /** Execution priority within phase (lower numbers run first) */
    readonly priority: number;
    /** Optional condition to determine if pass should run */
    readonly condition?: (rules: ArtifactRuleSet) => boolean;
    /**
     * Execute the processing pass.
     * @param root Fragment container to mutate.
     * @returns Number of modifications made.
     */
    readonly execute: (root: HTMLElement, rules: ArtifactRuleSet) => number;
}
