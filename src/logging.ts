import Path from 'path';
import {chalk} from 'zx';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const levelRank: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

export interface Logger {
    debug(msg: string): void;
    info(msg: string): void;
    warn(msg: string): void;
    error(msg: string): void;
}

export type LogSink = (line: string, level: LogLevel) => void;

export interface LoggerOptions {
    level?: LogLevel;
    /** Where formatted lines go.  Defaults to the console; the progress view swaps in its own log. */
    sink?: LogSink;
}

const consoleSink: LogSink = (line, level) => {
    if(level === 'error') console.error(line);
    else if(level === 'warn') console.warn(line);
    else console.log(line);
};

const colorize: Record<LogLevel, (s: string) => string> = {
    debug: s => chalk.gray(s),
    info: s => s,
    warn: s => chalk.yellow(s),
    error: s => chalk.red(s),
};

export function createLogger(options: LoggerOptions = {}): Logger {
    const threshold = levelRank[options.level ?? 'info'];
    const sink = options.sink ?? consoleSink;
    function log(level: LogLevel, msg: string) {
        if(levelRank[level] < threshold) return;
        sink(colorize[level](msg), level);
    }
    return {
        debug: msg => log('debug', msg),
        info: msg => log('info', msg),
        warn: msg => log('warn', msg),
        error: msg => log('error', msg),
    };
}

export const silentLogger: Logger = {
    debug() {},
    info() {},
    warn() {},
    error() {},
};

export function getLoggableFilename(filename: string) {
    return Path.relative(process.cwd(), filename);
}
