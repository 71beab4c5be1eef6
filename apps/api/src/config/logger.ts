import winston from 'winston';

const { combine, timestamp, errors, json, simple, colorize } = winston.format;

const nodeEnv = process.env.NODE_ENV || 'development';

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: nodeEnv === 'test' && process.env.LOG_IN_TESTS !== 'true',
  format: combine(timestamp(), errors({ stack: true }), json()),
  defaultMeta: {
    service: 'sms-gateway-api',
    environment: nodeEnv,
  },
  transports: [],
});

const logFile = process.env.LOG_FILE?.trim();
if (logFile) {
  logger.add(
    new winston.transports.File({
      filename: logFile,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
}

if (nodeEnv !== 'production') {
  logger.add(
    new winston.transports.Console({
      format: combine(colorize(), simple()),
    })
  );
} else {
  // JSON lines on stdout for the log collector
  logger.add(
    new winston.transports.Console({
      format: combine(timestamp(), json()),
    })
  );
}
