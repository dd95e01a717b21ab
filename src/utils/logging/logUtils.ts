// src/utils/logging/logUtils.ts

import type { ILogFacility, ILogger } from '../../@types/index.ts';

import chalk, { type ChalkInstance } from 'chalk';

type LogLevel = 'info' | 'success' | 'warn' | 'error' | 'debug';

const levelStyles: Record<LogLevel, { label: string; colour: ChalkInstance }> = {
    info: { label: 'INFO', colour: chalk.blue },
    success: { label: 'SUCCESS', colour: chalk.green },
    warn: { label: 'WARNING', colour: chalk.yellow },
    error: { label: 'ERROR', colour: chalk.red },
    debug: { label: 'DEBUG', colour: chalk.magenta },
};

const loggerMap: Record<string, ILogger> = {};

export const NoopLogFacility: ILogFacility = {
    log: (..._input: unknown[]): void => {},
    warn: (..._input: unknown[]): void => {},
    error: (..._input: unknown[]): void => {},
};

/**
 * Named logger writing coloured, level-prefixed lines to a log facility. Every message is also
 * kept per level so callers (and tests) can inspect what was reported.
 */
class Logger implements ILogger {
    infoMessages: string[] = [];
    successMessages: string[] = [];
    warnMessages: string[] = [];
    errorMessages: string[] = [];
    debugMessages: string[] = [];

    constructor(
        readonly name: string,
        readonly facility: ILogFacility,
        readonly verbose = false,
    ) {}

    info(message: string) {
        this.facility.log(this.format('info', message));
        this.infoMessages.push(message);
    }

    success(message: string) {
        this.facility.log(this.format('success', message));
        this.successMessages.push(message);
    }

    warn(message: string) {
        this.facility.warn(this.format('warn', message));
        this.warnMessages.push(message);
    }

    error(message: string) {
        this.facility.error(this.format('error', message));
        this.errorMessages.push(message);
    }

    debug(message: string) {
        if (this.verbose) {
            this.facility.log(this.format('debug', message));
        }
        this.debugMessages.push(message);
    }

    private format(level: LogLevel, message: string): string {
        const { label, colour } = levelStyles[level];
        return colour(`[${label}] ${this.name} :: ${message}`);
    }
}

/**
 * Retrieves logger by name. If the logger does not already exist, it creates a new one; later
 * calls with the same name return the first instance regardless of the other arguments.
 *
 * @param {string} name - The name identifier for the logger.
 * @param {ILogFacility} [logFacility=console] - The log facility where logs will be sent.
 * @param {boolean} [verbose=false] - Optional flag to enable verbose logging.
 * @return {ILogger} The logger instance associated with the provided name.
 */
export function getLogger(name: string, logFacility: ILogFacility = console, verbose: boolean = false): ILogger {
    const existing = loggerMap[name];
    if (existing) {
        return existing;
    }
    const logger = new Logger(name, logFacility, verbose);
    loggerMap[name] = logger;
    return logger;
}

/**
 * Creates a logger that is not cached, for callers that need their own facility or verbosity.
 */
export function createLogger(name: string, logFacility: ILogFacility = console, verbose: boolean = false): ILogger {
    return new Logger(name, logFacility, verbose);
}
