import * as fs from 'fs';
import * as path from 'path';
import { LogLevel } from '../types';
import config from '../config';

/**
 * General purpose logger
 */
const isDev = process.env.NODE_ENV !== 'production';
// Color codes for console output
const colors: Record<LogLevel, string> = {
    debug: '#6c757d',  // gray
    info: '#0d6efd',   // blue
    warn: '#ffc107',   // yellow
    error: '#dc3545',  // red
};
const severity: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

const LOG_DIR = path.resolve(__dirname, '../../logs');
const MAX_LINES = 1000;

let minLevel: LogLevel = config.logging.level;
let currentFileIndex = 1;
let currentLineCount = 0;
let logStream: fs.WriteStream | null = null;

function ensureLogDir() {
    if (!fs.existsSync(LOG_DIR)) {
        fs.mkdirSync(LOG_DIR, { recursive: true });
    }
}

function getLogFilePath(index: number) {
    return path.join(LOG_DIR, `log_${index}.txt`);
}

function openLogStream(): fs.WriteStream {
    ensureLogDir();
    if (logStream) logStream.end();
    logStream = fs.createWriteStream(getLogFilePath(currentFileIndex), { flags: 'a' });
    return logStream;
}

function writeLogLine(line: string) {
    let stream = logStream ?? openLogStream();
    if (currentLineCount >= MAX_LINES) {
        currentFileIndex++;
        currentLineCount = 0;
        stream = openLogStream();
    }
    stream.write(line + '\n');
    currentLineCount++;
}

export function setLogLevel(level: LogLevel): void {
    minLevel = level;
}

export function getLogLevel(): LogLevel {
    return minLevel;
}

export const log = (level: LogLevel, message: string, ...args: unknown[]) => {
    if (severity[level] < severity[minLevel]) return;

    if (isDev) {
        const color = colors[level];
        switch (level) {
            case 'debug':
                console.debug(`%c${message}`, `color: ${color}`, ...args);
                break;
            case 'info':
                console.info(`%c${message}`, `color: ${color}`, ...args);
                break;
            case 'warn':
                console.warn(`%c${message}`, `color: ${color}`, ...args);
                break;
            case 'error':
                console.error(`%c${message}`, `color: ${color}`, ...args);
                break;
        }
    } else {
        const timestamp = new Date().toISOString();
        const logLine = `[${timestamp}] [${level.toUpperCase()}] ${message}` + (args.length ? ' ' + args.map(a => JSON.stringify(a)).join(' ') : '');
        writeLogLine(logLine);
    }
};

// Close log stream on process exit
process.on('exit', () => {
    if (logStream) logStream.end();
});
