import { LogLevel, parseLogLevel } from '../config/env';

const RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40
};

let threshold: LogLevel = parseLogLevel(process.env.LOG_LEVEL);
const enabled = process.env.NODE_ENV !== 'test';

function pad(num: number, size = 2): string {
    return num.toString().padStart(size, '0');
}

function timestamp(): string {
    const d = new Date();
    return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} `
        + `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}.${pad(d.getMilliseconds(), 3)}`;
}

function write(level: LogLevel, args: unknown[]): void {
    if (!enabled || RANK[level] < RANK[threshold]) return;
    const prefix = `[${timestamp()}] [${level.toUpperCase()}]`;
    if (level === 'warn' || level === 'error') {
        console.error(prefix, ...args);
    } else {
        console.log(prefix, ...args);
    }
}

export function setLogLevel(level: LogLevel): void {
    threshold = level;
}

export const logger = {
    debug: (...args: unknown[]) => write('debug', args),
    info: (...args: unknown[]) => write('info', args),
    warn: (...args: unknown[]) => write('warn', args),
    error: (...args: unknown[]) => write('error', args)
};
