/**
 * Console logger shared by the collaborators around the record core.
 * The core itself never logs.
 */

export enum Level {
    DEBUG = 'DEBUG',
    INFO = 'INFO',
    WARNING = 'WARNING',
    ERROR = 'ERROR',
    CRITICAL = 'CRITICAL',
    SILENT = 'SILENT'
}

const SEVERITY: Record<Level, number> = {
    [Level.DEBUG]: 10,
    [Level.INFO]: 20,
    [Level.WARNING]: 30,
    [Level.ERROR]: 40,
    [Level.CRITICAL]: 50,
    [Level.SILENT]: 60
};

// ANSI colour per level
const COLOURS: Record<Level, string> = {
    [Level.CRITICAL]: '\u001b[91m',
    [Level.DEBUG]: '\u001b[94m',
    [Level.ERROR]: '\u001b[93m',
    [Level.INFO]: '\u001b[92m',
    [Level.SILENT]: '\u001b[90m',
    [Level.WARNING]: '\u001b[95m'
};
const RESET = '\u001b[0m';

export type LogContext = Record<string, unknown>;

export function isLevel(value: string): value is Level {
    return Object.values(Level).some((level) => level === value);
}

function pad(n: number): string {
    return String(n).padStart(2, '0');
}

export function formatTimestamp(date: Date): string {
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
        `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export class Logger {
    constructor(
        public name: string,
        public level: Level = Level.INFO
    ) { }

    public static get(name: string, level: Level = Level.INFO): Logger {
        return new Logger(name, level);
    }

    public enabled(level: Level): boolean {
        if (this.level === Level.SILENT || level === Level.SILENT) return false;
        return SEVERITY[level] >= SEVERITY[this.level];
    }

    public format(level: Level, message: string, context?: LogContext, now: Date = new Date()): string {
        let line = `[${formatTimestamp(now)}] - [${level}] - [${this.name}] - ${message}`;
        if (context) {
            const pairs = Object.entries(context).map(([key, value]) => `${key}=${String(value)}`);
            if (pairs.length > 0) line += ` ${pairs.join(', ')}`;
        }
        return `${COLOURS[level]}${line}${RESET}`;
    }

    public log(level: Level, message: string, context?: LogContext): void {
        if (!this.enabled(level)) return;
        const line = this.format(level, message, context);
        switch (level) {
            case Level.CRITICAL:
            case Level.ERROR:
                console.error(line);
                break;
            case Level.WARNING:
                console.warn(line);
                break;
            default:
                console.log(line);
        }
    }

    public critical(message: string, context?: LogContext) { this.log(Level.CRITICAL, message, context); }
    public error(message: string, context?: LogContext) { this.log(Level.ERROR, message, context); }
    public warning(message: string, context?: LogContext) { this.log(Level.WARNING, message, context); }
    public info(message: string, context?: LogContext) { this.log(Level.INFO, message, context); }
    public debug(message: string, context?: LogContext) { this.log(Level.DEBUG, message, context); }
}
