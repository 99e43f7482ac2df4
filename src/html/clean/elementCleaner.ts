import type { ArtifactRuleSet } from '../../types';
import { $all } from '../shared/dom';

/**
 * Drop every class token whose lowercased form contains a vendor substring.
 * Surviving tokens keep their order and are joined by single spaces.
 */
export function filterClassTokens(value: string, vendorSubstrings: readonly string[]): {
    readonly kept: string[];
    readonly dropped: number;
} {
    const tokens = value.split(/\s+/).filter(Boolean);
    const kept = tokens.filter((token) => {
        const lower = token.toLowerCase();
        return !vendorSubstrings.some((substring) => lower.includes(substring));
    });
    return { kept, dropped: tokens.length - kept.length };
}

function cleanClassAttribute(element: Element, rules: ArtifactRuleSet): number {
    const value = element.getAttribute('class');
    if (value === null) return 0;

    const { kept, dropped } = filterClassTokens(value, rules.vendorClassSubstrings);
    if (kept.length === 0) {
        element.removeAttribute('class');
        return 1;
    }
    if (dropped === 0) return 0;
    element.setAttribute('class', kept.join(' '));
    return 1;
}

/**
 * Decide whether a single attribute is authoring metadata. `class` and `style`
 * are handled before this runs.
 */
export function isArtifactAttribute(name: string, value: string, rules: ArtifactRuleSet): boolean {
    const lower = name.toLowerCase();
    if (rules.unconditionalRemoveAttrs.has(lower)) return true;
    if (lower.startsWith(rules.eventHandlerPrefix)) return true;
    if (rules.vendorNamespaceAttrs.has(lower)) return true;
    if (rules.vendorNamespacePrefixes.some((prefix) => lower.startsWith(prefix))) return true;

    const predicate = rules.conditionalRemoveAttrs.get(lower);
    return predicate ? predicate(value) : false;
}

/**
 * Strip artifact attributes from one element. Never removes the element itself.
 * Returns the number of attribute mutations.
 */
export function cleanElement(element: Element, rules: ArtifactRuleSet): number {
    let changed = 0;

    // Every inline style goes, authored or exported.
    if (element.hasAttribute('style')) {
        element.removeAttribute('style');
        changed++;
    }

    changed += cleanClassAttribute(element, rules);

    // Snapshot first: removing while iterating a live NamedNodeMap skips entries.
    const attributes = Array.from(element.attributes).map((attr) => ({ name: attr.name, value: attr.value }));
    for (const { name, value } of attributes) {
        if (name === 'class') continue;
        if (isArtifactAttribute(name, value, rules)) {
            element.removeAttribute(name);
            changed++;
        }
    }

    const presentational = rules.presentationalAttrsByTag.get(element.localName.toLowerCase());
    if (presentational) {
        for (const name of presentational) {
            if (element.hasAttribute(name)) {
                element.removeAttribute(name);
                changed++;
            }
        }
    }

    return changed;
}

export function cleanAllElements(root: Element, rules: ArtifactRuleSet): number {
    return $all(root, '*').reduce((total, element) => total + cleanElement(element, rules), 0);
}
