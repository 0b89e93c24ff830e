import winston from 'winston';

// Define the log levels
const logLevels: winston.config.AbstractConfigSetLevels = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVEL_VALUES: LogLevel[] = ['error', 'warn', 'info', 'debug'];
const envLevel = (process.env.LOG_LEVEL ?? '').toLowerCase();
const consoleLevel: LogLevel = LOG_LEVEL_VALUES.find((level) => level === envLevel) ?? 'debug';

const isTestRun = process.env.NODE_ENV === 'test';

const transports: winston.transport[] = isTestRun
  ? [new winston.transports.Console({ silent: true })]
  : [
      new winston.transports.Console({ level: consoleLevel }), // Log to console
      new winston.transports.File({ filename: 'error.log', level: 'error' }), // Log errors to a file
      new winston.transports.File({ filename: 'combined.log' }), // Log all levels to another file
    ];

const logger = winston.createLogger({
  levels: logLevels,
  level: consoleLevel,
  format: winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp(),
    winston.format.printf(({ timestamp, level, message }) => {
      return `${timestamp} ${level}: ${message}`;
    })
  ),
  transports,
});

export default logger;
