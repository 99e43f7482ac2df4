export const COMMANDS = {
    CLEAN_TEXT_STYLES: 'cleanTextStyles',
} as const;

export const LABELS = {
    CLEAN_TEXT_STYLES: 'Clean Text Styles',
} as const;

export const LOGGER_NAME = 'clean-text-styles';

export const ENV = {
    LOG_LEVEL: 'CLEAN_TEXT_STYLES_LOG_LEVEL',
} as const;
