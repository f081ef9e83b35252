import { Level, Logger, isLevel } from './Logger.js';

export interface RecordConfig {
    /** Threshold for the collaborators' loggers. */
    logLevel: Level;
    /** Indentation used by toText when the caller gives none. */
    textIndent: number;
}

export const DEFAULT_CONFIG: Readonly<RecordConfig> = Object.freeze({
    logLevel: Level.WARNING,
    textIndent: 0
});

export const ENV_LOG_LEVEL = 'ATTRIBUTE_RECORD_LOG_LEVEL';
export const ENV_TEXT_INDENT = 'ATTRIBUTE_RECORD_TEXT_INDENT';

const configLogger = Logger.get('Config', Level.WARNING);

export function loadConfig(env: Record<string, string | undefined> = process.env): Readonly<RecordConfig> {
    const config: RecordConfig = { ...DEFAULT_CONFIG };

    const rawLevel = env[ENV_LOG_LEVEL];
    if (rawLevel !== undefined && rawLevel !== '') {
        const level = rawLevel.trim().toUpperCase();
        if (isLevel(level)) {
            config.logLevel = level;
        } else {
            configLogger.warning(`Ignoring ${ENV_LOG_LEVEL}`, { value: rawLevel });
        }
    }

    const rawIndent = env[ENV_TEXT_INDENT];
    if (rawIndent !== undefined && rawIndent !== '') {
        const indent = Number(rawIndent);
        if (Number.isInteger(indent) && indent >= 0 && indent <= 10) {
            config.textIndent = indent;
        } else {
            configLogger.warning(`Ignoring ${ENV_TEXT_INDENT}`, { value: rawIndent });
        }
    }

    return Object.freeze(config);
}
