import type { ArtifactRuleSet } from '../../types';
import { $all, hasTag, unwrapElement } from '../shared/dom';
import logger from '../../logger';

function isVendorNamespacedElement(element: Element, rules: ArtifactRuleSet): boolean {
    const name = element.localName.toLowerCase();
    return rules.vendorNamespacePrefixes.some((prefix) => name.startsWith(prefix));
}

/**
 * Replace wrapper elements that carry no meaning with their children:
 * - Word's namespaced elements such as `<o:p>` and `<st1:place>`
 * - `<span>` elements left without any attribute after cleaning
 */
export function unwrapVendorWrappers(root: Element, rules: ArtifactRuleSet): number {
    // Deepest first so nested wrappers unwrap into their parents in one pass
    const wrappers = $all(root, '*')
        .filter(
            (el) => isVendorNamespacedElement(el, rules) || (hasTag(el, 'span') && el.attributes.length === 0)
        )
        .reverse();

    wrappers.forEach((el) => unwrapElement(el));
    if (wrappers.length > 0) {
        logger.debug(`Unwrapped ${wrappers.length} wrapper element(s)`);
    }
    return wrappers.length;
}
