import Logger, { TargetType, LogLevel } from '@joplin/utils/Logger';
import { ENV, LOGGER_NAME } from './constants';

const LEVELS: Record<string, LogLevel> = {
    none: LogLevel.None,
    error: LogLevel.Error,
    warn: LogLevel.Warn,
    info: LogLevel.Info,
    debug: LogLevel.Debug,
};

export function resolveLogLevel(raw: string | undefined): LogLevel {
    if (!raw) return LogLevel.Warn;
    return LEVELS[raw.trim().toLowerCase()] ?? LogLevel.Warn;
}

const globalLogger = new Logger();
globalLogger.addTarget(TargetType.Console);
globalLogger.setLevel(resolveLogLevel(process.env[ENV.LOG_LEVEL]));
Logger.initializeGlobalLogger(globalLogger);

export const logger = Logger.create(LOGGER_NAME);

export default logger;
