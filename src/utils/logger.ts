import winston from 'winston';

const LOG_LEVEL = process.env.LOG_LEVEL;
const LOG_FILE = process.env.LOG_FILE;

// Jest sets NODE_ENV=test; keep test output clean unless a level is asked for
const SILENT = process.env.NODE_ENV === 'test' && !LOG_LEVEL;

const transports: winston.transport[] = [
    new winston.transports.Console({
        format: winston.format.combine(
            winston.format.colorize(),
            winston.format.simple()
        ),
    }),
];

if (LOG_FILE) {
    transports.push(new winston.transports.File({ filename: LOG_FILE }));
}

const logger = winston.createLogger({
    level: LOG_LEVEL || 'info',
    silent: SILENT,
    format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
    ),
    transports,
});

export default logger;
