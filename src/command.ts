import { COMMANDS, LABELS } from './constants';
import { cleanEditorContent } from './cleanHandler';
import { ArtifactSanitizer } from './html/cleanHtml';
import type { CleanOutcome, EditorHost } from './types';
import logger from './logger';

/**
 * The single editor command. Enabled while the host is editable; a second execution
 * cannot start while one is running.
 */
export class CleanTextStylesCommand {
    readonly name = COMMANDS.CLEAN_TEXT_STYLES;
    private executing = false;

    constructor(
        private readonly host: EditorHost,
        private readonly sanitizer: ArtifactSanitizer = new ArtifactSanitizer()
    ) {}

    get isEnabled(): boolean {
        return !this.host.isReadOnly && !this.executing;
    }

    execute(): CleanOutcome | null {
        if (!this.isEnabled) {
            logger.debug(`${this.name} ignored: command disabled`);
            return null;
        }

        this.executing = true;
        try {
            const outcome = cleanEditorContent(this.host, this.sanitizer);
            logger.info(`${this.name}: ${outcome.changed ? 'cleaned' : 'nothing to clean in'} ${outcome.scope}`);
            return outcome;
        } finally {
            this.executing = false;
        }
    }
}

export interface ToolbarControl {
    readonly label: string;
    readonly tooltip: boolean;
    isEnabled(): boolean;
    onExecute(): void;
}

/**
 * Toolbar button bound to the command. Hands focus back to the editing surface after
 * each press.
 */
export function createToolbarControl(command: CleanTextStylesCommand, host: EditorHost): ToolbarControl {
    return {
        label: LABELS.CLEAN_TEXT_STYLES,
        tooltip: true,
        isEnabled: () => command.isEnabled,
        onExecute: () => {
            command.execute();
            host.focus?.();
        },
    };
}
