import winston from 'winston';
import path from 'path';
import { config } from './config';

const SERVICE_NAME = 'ontology-navigator';

const logFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({
    format: 'HH:mm:ss',
  }),
  winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
    const essentialMeta = Object.keys(meta).filter(key => key !== 'service');

    let output = `${timestamp} [${level}]: ${message}`;

    if (typeof component === 'string' && component !== SERVICE_NAME) {
      output += ` (${component})`;
    }

    if (essentialMeta.length > 0) {
      const essentialData: Record<string, unknown> = {};
      for (const key of essentialMeta) {
        essentialData[key] = meta[key];
      }

      // Only show if it's small and useful
      const serialized = JSON.stringify(essentialData);
      if (serialized.length < 200) {
        output += ` ${serialized}`;
      }
    }

    return output;
  })
);

export const logger = winston.createLogger({
  level: config.logging.level,
  format: logFormat,
  defaultMeta: { service: SERVICE_NAME },
});

if (config.logging.file) {
  const logDir = path.dirname(config.logging.file);

  logger.add(
    new winston.transports.File({
      filename: config.logging.file,
      maxsize: 5 * 1024 * 1024, // 5MB
      maxFiles: 5,
    })
  );
  logger.add(
    new winston.transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
      maxsize: 5 * 1024 * 1024,
      maxFiles: 5,
    })
  );
}

// Console output for development; tests keep a silent transport so winston has somewhere to write
if (config.nodeEnv === 'test') {
  logger.add(new winston.transports.Console({ silent: true }));
} else if (config.nodeEnv !== 'production') {
  logger.add(
    new winston.transports.Console({
      format: consoleFormat,
      stderrLevels: ['error', 'warn', 'info', 'debug'],
    })
  );
} else if (!config.logging.file) {
  logger.add(new winston.transports.Console({ level: 'warn' }));
}

export const createComponentLogger = (component: string): winston.Logger => {
  return logger.child({ component });
};
