// Node type constants. Documents built by DOMParser have no defaultView, so the
// Node / NodeFilter globals of a window are not reachable from them.
const TEXT_NODE = 3;
const SHOW_TEXT = 0x4;

/** Narrows by `nodeType`. */
export function isTextNode(node: Node): node is Text {
    return node.nodeType === TEXT_NODE;
}

/**
 * Walk all text nodes in a subtree.
 * Text nodes are collected before the callback runs, so the callback may rewrite them.
 */
export function walkTextNodes(root: Element, callback: (node: Text) => void): void {
    const doc = root.ownerDocument;
    const walker = doc.createTreeWalker(root, SHOW_TEXT, null);
    const nodes: Text[] = [];

    let node: Node | null;
    while ((node = walker.nextNode())) {
        if (isTextNode(node)) nodes.push(node);
    }
    nodes.forEach(callback);
}

/**
 * Unwrap an element by replacing it with its children.
 * Moves all child nodes to the parent and removes the wrapper element.
 */
export function unwrapElement(element: Element): void {
    const parent = element.parentNode;
    if (!parent) return;

    while (element.firstChild) {
        parent.insertBefore(element.firstChild, element);
    }
    parent.removeChild(element);
}

/**
 * Query selector helper that returns an array instead of NodeList.
 * Eliminates the need for Array.from() boilerplate throughout the codebase.
 */
export function $all<T extends Element = Element>(root: ParentNode, selector: string): T[] {
    return Array.from(root.querySelectorAll<T>(selector));
}

/**
 * Check if an element has one of the specified tag names (case-insensitive).
 *
 * @example
 * hasTag(element, 'hr') // instead of element.tagName === 'HR'
 */
export function hasTag(element: Element, ...tags: string[]): boolean {
    const lowerName = element.localName.toLowerCase();
    return tags.some((tag) => tag.toLowerCase() === lowerName);
}

/**
 * Check if every element child is a line break (vacuously true with no element children).
 */
export function hasOnlyLineBreakChildren(element: Element): boolean {
    return Array.from(element.children).every((child) => hasTag(child, 'br'));
}
