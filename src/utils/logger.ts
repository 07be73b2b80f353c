import pino, { DestinationStream, Logger } from 'pino';
import pretty, { PrettyOptions } from 'pino-pretty';
import { config, LogLevel } from '../config/index.js';

export type { Logger };

/**
 * Console layout: `[2010/12/12 13:46:36] INFO (module): message`
 */
export const PRETTY_OPTIONS: PrettyOptions = {
    translateTime: 'SYS:yyyy/mm/dd HH:MM:ss',
    ignore: 'pid,hostname',
};

export interface LoggerOptions {
    level?: LogLevel;
    destination?: DestinationStream;
}

let consoleDestination: DestinationStream | null = null;

// One synchronous pretty stream shared by every module logger
function getConsoleDestination(): DestinationStream {
    if (consoleDestination === null) {
        consoleDestination = pretty({ ...PRETTY_OPTIONS, sync: true });
    }
    return consoleDestination;
}

/**
 * Create a logger tagged with the module name, filtered by LOG_LEVEL.
 */
export function createLogger(module: string, options: LoggerOptions = {}): Logger {
    return pino(
        {
            name: module,
            level: options.level ?? config.logging.level,
        },
        options.destination ?? getConsoleDestination()
    );
}
