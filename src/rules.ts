// Centralized rule tables for Word / Office artifact removal so new vendor classes or
// attributes can be added in one place.
import type { ArtifactRuleOptions, ArtifactRuleSet, AttributePredicate } from './types';

// Matched as case-insensitive substrings: "MsoNormal" also covers "MsoNormalTable".
export const VENDOR_CLASS_SUBSTRINGS = [
    'OutlineElement',
    'Ltr',
    'SCXW',
    'BCX',
    'ListContainerWrapper',
    'NormalTextRun',
    'EOP',
    'Paragraph',
    'MsoNormal',
    'MsoListParagraph',
    'MsoBodyText',
    'MsoTitle',
    'MsoSubtitle',
    'MsoQuote',
    'WordSection',
    'SpellingError',
    'WACImage',
];

export const UNCONDITIONAL_REMOVE_ATTRS = [
    'paraid',
    'paraeid',
    'lang',
    'xml:lang',
    // Office Online paragraph and run metadata
    'data-ccp-props',
    'data-ccp-parastyle',
    'data-ccp-charstyle',
    'data-contrast',
    'data-leveltext',
    'data-listid',
    'data-font',
];

export const HR_PRESENTATIONAL_ATTRS = ['align', 'size', 'width', 'color', 'noshade'];

export const VENDOR_NAMESPACE_PREFIXES = ['xmlns:', 'o:', 'w:', 'v:', 'm:', 'st1:'];
export const VENDOR_NAMESPACE_ATTRS = ['xmlns'];

export const EVENT_HANDLER_PREFIX = 'on';

// Bookmarks Word inserts on its own (pasted links, table of contents, cross references)
export const WORD_ID_PATTERN = /^(OLE_LINK|_Toc|_Ref)\d*$/;
export const MSO_ANCHOR_PATTERN = /^(OLE_LINK|_Toc|_Ref|_Hlk|_GoBack)\d*$/;
export const VENDOR_ID_SUBSTRINGS = ['Word', 'Office'];

export const PRUNABLE_BLOCK_TAGS = ['p'];

function toLowerSet(values: readonly string[]): ReadonlySet<string> {
    return new Set(values.map((v) => v.trim().toLowerCase()).filter(Boolean));
}

// test() must not depend on lastIndex left over from a previous element
function toPattern(value: RegExp | string): RegExp {
    if (typeof value === 'string') return new RegExp(value);
    return value.global || value.sticky ? new RegExp(value.source, value.flags.replace(/[gy]/g, '')) : value;
}

export function buildArtifactRules(opts: ArtifactRuleOptions = {}): ArtifactRuleSet {
    const wordIdPattern = toPattern(opts.wordIdPattern ?? WORD_ID_PATTERN);
    const msoAnchorPattern = toPattern(opts.msoAnchorPattern ?? MSO_ANCHOR_PATTERN);

    const isVendorId: AttributePredicate = (value) =>
        wordIdPattern.test(value) || VENDOR_ID_SUBSTRINGS.some((name) => value.includes(name));
    const isVendorAnchor: AttributePredicate = (value) => msoAnchorPattern.test(value);

    const rules: ArtifactRuleSet = {
        vendorClassSubstrings: Object.freeze(
            (opts.vendorClassSubstrings ?? VENDOR_CLASS_SUBSTRINGS).map((s) => s.toLowerCase()).filter(Boolean)
        ),
        unconditionalRemoveAttrs: toLowerSet(opts.unconditionalRemoveAttrs ?? UNCONDITIONAL_REMOVE_ATTRS),
        conditionalRemoveAttrs: new Map<string, AttributePredicate>([
            ['id', isVendorId],
            ['name', isVendorAnchor],
        ]),
        eventHandlerPrefix: EVENT_HANDLER_PREFIX,
        vendorNamespacePrefixes: Object.freeze([...VENDOR_NAMESPACE_PREFIXES]),
        vendorNamespaceAttrs: toLowerSet(VENDOR_NAMESPACE_ATTRS),
        presentationalAttrsByTag: new Map([['hr', toLowerSet(opts.hrPresentationalAttrs ?? HR_PRESENTATIONAL_ATTRS)]]),
        wordIdPattern,
        msoAnchorPattern,
        prunableBlockTags: toLowerSet(opts.prunableBlockTags ?? PRUNABLE_BLOCK_TAGS),
        unwrapWrappers: opts.unwrapWrappers ?? true,
    };
    return Object.freeze(rules);
}

export const DEFAULT_ARTIFACT_RULES: ArtifactRuleSet = buildArtifactRules();
