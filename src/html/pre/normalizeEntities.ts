import { $all, walkTextNodes } from '../shared/dom';

// &nbsp;, &#160; / &#0160;, &#xA0; / &#XA0; / &#x00a0;, and the literal U+00A0
const NBSP_PATTERN = /&nbsp;|&#0*160;|&#[xX]0*[aA]0;|\u00A0/g;

/**
 * Replace every non-breaking-space representation in an HTML string with a plain space.
 * Non-string or empty input is returned as is.
 */
export function normalizeNbspEntities(html: string): string {
    if (!html || typeof html !== 'string') return html;
    return html.replace(NBSP_PATTERN, ' ');
}

export function countNbspEntities(html: string): number {
    if (!html || typeof html !== 'string') return 0;
    return html.match(NBSP_PATTERN)?.length ?? 0;
}

/**
 * Text-node counterpart of `normalizeNbspEntities` for trees that were not built from a
 * normalized string. Parsed text only ever holds the literal character.
 * Returns the number of text nodes rewritten.
 */
export function normalizeNbspText(root: Element): number {
    let updated = 0;
    walkTextNodes(root, (textNode) => {
        const originalText = textNode.data;
        if (!originalText.includes('\u00A0')) return;
        textNode.data = originalText.replace(/\u00A0/g, ' ');
        updated++;
    });
    return updated;
}

/**
 * Attribute counterpart of `normalizeNbspText`. Catches references the string pass does
 * not match (`&NonBreakingSpace;`, `&nbsp` or `&#160` without the semicolon), which the
 * parser decodes and the serializer would write back as `&nbsp;`.
 * Returns the number of attribute values rewritten.
 */
export function normalizeNbspAttributes(root: Element): number {
    let updated = 0;
    $all(root, '*').forEach((element) => {
        Array.from(element.attributes).forEach((attr) => {
            if (!attr.value.includes('\u00A0')) return;
            attr.value = attr.value.replace(/\u00A0/g, ' ');
            updated++;
        });
    });
    return updated;
}
