import winston from 'winston';

// Level until the config file is read; index.ts then applies server.log_level,
// with LOG_LEVEL still taking precedence
const logLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();

const customFormat = winston.format.printf(({ level, message, timestamp, ...metadata }) => {
  let msg = `${timestamp} [${level}]: ${message}`;
  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }
  return msg;
});

export const logger = winston.createLogger({
  level: logLevel,
  silent: process.env.NODE_ENV === 'test',
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.colorize(),
        customFormat
      )
    })
  ]
});

/** Request lines from the HTTP layer, kept apart from application events */
export const accessLogger = logger.child({ target: 'access' });

logger.debug('Logger initialized', {
  level: logLevel,
  availableLevels: Object.keys(logger.levels)
});
