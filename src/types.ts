export type AttributePredicate = (value: string) => boolean;

/**
 * Immutable rule tables consulted while cleaning. Built once by `buildArtifactRules`
 * and never modified during traversal.
 */
export interface ArtifactRuleSet {
    /** Lowercased substrings; any class token containing one is dropped */
    readonly vendorClassSubstrings: readonly string[];
    /** Lowercased attribute names removed whenever present */
    readonly unconditionalRemoveAttrs: ReadonlySet<string>;
    /** Attributes removed only when their value matches the predicate */
    readonly conditionalRemoveAttrs: ReadonlyMap<string, AttributePredicate>;
    readonly eventHandlerPrefix: string;
    readonly vendorNamespacePrefixes: readonly string[];
    readonly vendorNamespaceAttrs: ReadonlySet<string>;
    readonly presentationalAttrsByTag: ReadonlyMap<string, ReadonlySet<string>>;
    readonly wordIdPattern: RegExp;
    readonly msoAnchorPattern: RegExp;
    /** Block tags removed when they end up empty */
    readonly prunableBlockTags: ReadonlySet<string>;
    /** Unwrap namespaced vendor elements and attribute-less spans */
    readonly unwrapWrappers: boolean;
}

// Injectable overrides for the default rule tables
export interface ArtifactRuleOptions {
    vendorClassSubstrings?: string[];
    unconditionalRemoveAttrs?: string[];
    hrPresentationalAttrs?: string[];
    wordIdPattern?: RegExp | string;
    msoAnchorPattern?: RegExp | string;
    prunableBlockTags?: string[];
    unwrapWrappers?: boolean;
}

export interface CleanResult {
    /** Cleaned HTML, or the input verbatim when nothing changed */
    readonly html: string;
    readonly changed: boolean;
    readonly modifications: number;
    readonly warnings: readonly string[];
}

export type CleanScope = 'selection' | 'document';

export interface CleanOutcome {
    readonly scope: CleanScope;
    readonly changed: boolean;
    /** true when a selection was present but could not be cleaned on its own */
    readonly selectionFallback: boolean;
}

/**
 * What the cleaner needs from the rich-text editor it is embedded in.
 * `replaceSelection` and `setDocumentHtml` must each be applied as one undoable edit.
 */
export interface EditorHost {
    readonly isReadOnly: boolean;
    /** true when the selection spans a non-empty range */
    hasSelection(): boolean;
    /** HTML of the selected range, or null when the host cannot materialize it */
    getSelectedHtml(): string | null;
    getDocumentHtml(): string;
    replaceSelection(html: string): void;
    setDocumentHtml(html: string): void;
    focus?(): void;
}

// Generic validation result for host-provided options
export interface ValidationResult<T> {
    readonly isValid: boolean;
    readonly value?: T;
    readonly error?: string;
}

export type OptionsInput = Partial<Record<string, unknown>>;
