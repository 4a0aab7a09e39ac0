export enum LogLevel {
    DEBUG = 'DEBUG',
    INFO = 'INFO',
    WARN = 'WARN',
    ERROR = 'ERROR'
}

const LEVEL_ORDER: LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

export class Logger {
    private static instance: Logger;
    private logLevel: LogLevel = LogLevel.INFO;

    private constructor() { }

    static getInstance(): Logger {
        if (!Logger.instance) {
            Logger.instance = new Logger();
        }
        return Logger.instance;
    }

    setLogLevel(level: LogLevel): void {
        this.logLevel = level;
    }

    getLogLevel(): LogLevel {
        return this.logLevel;
    }

    /** Logger whose messages are prefixed with `[instrument]` or `[instrument/system]`. */
    forInstrument(instrument: string, systemId?: string): InstrumentLogger {
        return new InstrumentLogger(this, systemId ? `[${instrument}/${systemId}]` : `[${instrument}]`);
    }

    debug(message: string, data?: unknown): void {
        if (this.shouldLog(LogLevel.DEBUG)) {
            this.log(LogLevel.DEBUG, message, data);
        }
    }

    info(message: string, data?: unknown): void {
        if (this.shouldLog(LogLevel.INFO)) {
            this.log(LogLevel.INFO, message, data);
        }
    }

    warn(message: string, data?: unknown): void {
        if (this.shouldLog(LogLevel.WARN)) {
            this.log(LogLevel.WARN, message, data);
        }
    }

    error(message: string, error?: unknown): void {
        if (this.shouldLog(LogLevel.ERROR)) {
            this.log(LogLevel.ERROR, message, error);
        }
    }

    private shouldLog(level: LogLevel): boolean {
        return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.logLevel);
    }

    private log(level: LogLevel, message: string, data?: unknown): void {
        const timestamp = new Date().toISOString().replace('T', ' ').substring(0, 19);
        const logMessage = `[${timestamp}] [${level}] ${message}`;
        const payload = data ?? '';

        switch (level) {
            case LogLevel.DEBUG:
            case LogLevel.INFO:
                console.log(logMessage, payload);
                break;
            case LogLevel.WARN:
                console.warn(logMessage, payload);
                break;
            case LogLevel.ERROR:
                console.error(logMessage, payload);
                break;
        }
    }
}

export class InstrumentLogger {
    constructor(private readonly base: Logger, readonly prefix: string) { }

    debug(message: string, data?: unknown): void {
        this.base.debug(`${this.prefix} ${message}`, data);
    }

    info(message: string, data?: unknown): void {
        this.base.info(`${this.prefix} ${message}`, data);
    }

    warn(message: string, data?: unknown): void {
        this.base.warn(`${this.prefix} ${message}`, data);
    }

    error(message: string, error?: unknown): void {
        this.base.error(`${this.prefix} ${message}`, error);
    }
}
