import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const logsDir = process.env.LOG_DIR || path.join(__dirname, '..', 'logs');
const logToFile = process.env.LOG_TO_FILE !== 'false';

if (logToFile && !fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
}

const validLogLevels = ['fatal', 'error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly', 'trace'];

let logLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();

if (!validLogLevels.includes(logLevel)) {
    console.warn(`Invalid LOG_LEVEL "${logLevel}" specified. Using "info" instead.`);
    console.warn(`Valid levels are: ${validLogLevels.join(', ')}`);
    logLevel = 'info';
}

const nodeIdentifier = process.env.ENGINE_NODE_ID || `${process.pid}`;
const logFile = path.join(logsDir, `engine-${nodeIdentifier}.log`);

// Console format with timestamp first
const consoleFormat = winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaStr = Object.keys(meta).length ? JSON.stringify(meta, (_key, value) => (typeof value === 'bigint' ? value.toString() : value)) : '';
        return `[${timestamp}] ${level}: ${message} ${metaStr}`;
    })
);

const customLevels = {
    levels: {
        fatal: 0,
        error: 1,
        warn: 2,
        info: 3,
        http: 4,
        verbose: 5,
        debug: 6,
        silly: 7,
        trace: 8,
    },
    colors: {
        fatal: 'redBG white',
        error: 'red',
        warn: 'yellow',
        info: 'green',
        http: 'cyan',
        verbose: 'blue',
        debug: 'white',
        silly: 'grey',
        trace: 'grey',
    },
};

winston.addColors(customLevels.colors);

const transports: winston.transport[] = [new winston.transports.Console({ format: consoleFormat })];
if (logToFile) {
    transports.push(
        new winston.transports.File({
            filename: logFile,
            level: logLevel,
            format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        })
    );
}

const logr = winston.createLogger({
    levels: customLevels.levels,
    level: logLevel,
    format: winston.format.errors({ stack: true }),
    transports,
});

const logger = Object.assign(logr, {
    setLogLevel: (level: string) => {
        const newLevel = level.toLowerCase();
        if (!validLogLevels.includes(newLevel)) {
            logr.warn(`Invalid log level: ${newLevel}. Valid levels are: ${validLogLevels.join(', ')}`);
            return;
        }
        logr.level = newLevel;
        logr.info(`Log level changed to: ${newLevel}`);
    },
});

export default logger;
