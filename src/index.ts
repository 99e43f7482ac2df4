export { ArtifactSanitizer, cleanHtml } from './html/cleanHtml';
export { HtmlCleaningError } from './html/errors';
export type { HtmlCleaningFailureReason } from './html/errors';
export { countNbspEntities, normalizeNbspAttributes, normalizeNbspEntities, normalizeNbspText } from './html/pre/normalizeEntities';
export { parseFragment, serializeFragment } from './html/shared/parser';
export { cleanElement, filterClassTokens } from './html/clean/elementCleaner';
export { pruneEmptyBlocks } from './html/post/emptyBlocks';
export { unwrapVendorWrappers } from './html/post/wrappers';
export { buildArtifactRules, DEFAULT_ARTIFACT_RULES } from './rules';
export { validateRuleOptions } from './utils';
export { cleanEditorContent } from './cleanHandler';
export { CleanTextStylesCommand, createToolbarControl } from './command';
export type { ToolbarControl } from './command';
export { COMMANDS, LABELS } from './constants';
export type {
    ArtifactRuleOptions,
    ArtifactRuleSet,
    CleanOutcome,
    CleanResult,
    CleanScope,
    EditorHost,
    ValidationResult,
} from './types';
