import { $all, hasOnlyLineBreakChildren } from '../shared/dom';
import logger from '../../logger';

/**
 * Remove block elements left without content, e.g. Word's `<p class="MsoNormal">&nbsp;</p>`
 * spacers once the non-breaking space has been normalized.
 *
 * A block is empty when its trimmed text is empty and it has no element children
 * other than `<br>`. Must run after entity normalization.
 */
export function pruneEmptyBlocks(root: Element, tags: ReadonlySet<string>): number {
    if (tags.size === 0) return 0;

    const selector = Array.from(tags).join(', ');
    // Reverse document order: descendants are decided before their ancestors
    const blocks = $all(root, selector).reverse();

    let removed = 0;
    blocks.forEach((block) => {
        const text = (block.textContent ?? '').trim();
        if (text === '' && hasOnlyLineBreakChildren(block)) {
            block.remove();
            removed++;
        }
    });

    if (removed > 0) {
        logger.debug(`Removed ${removed} empty block element(s)`);
    }
    return removed;
}
