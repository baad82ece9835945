import winston from 'winston';

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

// All levels go to stderr so CLI output on stdout stays parseable.
const ALL_LEVELS = Object.keys(winston.config.npm.levels);

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'warn',
  format: logFormat,
  defaultMeta: { service: 'vizbot' },
  transports: [new winston.transports.Console({ stderrLevels: ALL_LEVELS })],
});

if (process.env.VIZBOT_LOG_FILE) {
  logger.add(
    new winston.transports.File({
      filename: process.env.VIZBOT_LOG_FILE,
      maxsize: 10 * 1024 * 1024,
      maxFiles: 3,
    }),
  );
}

export function setLogLevel(level: string): void {
  logger.level = level;
}

export const schemaLogger = logger.child({ component: 'schema' });
export const translateLogger = logger.child({ component: 'translate' });
export const executeLogger = logger.child({ component: 'execute' });
export const insightLogger = logger.child({ component: 'insight' });
export const sessionLogger = logger.child({ component: 'session' });
export const storeLogger = logger.child({ component: 'store' });
