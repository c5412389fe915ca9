import winston from 'winston';
import LokiTransport from 'winston-loki';

const logLevel = process.env.LOG_LEVEL || 'info';
const serviceName = process.env.SERVICE_NAME || 'replyguard';
const lokiUrl = process.env.LOKI_URL || 'http://localhost:3100';

// Create base logger with multiple transports
const transports: winston.transport[] = [
  // Console transport with high-density format
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.timestamp({ format: 'HH:mm:ss' }),
      winston.format.printf(({ timestamp, level, service, message, ...meta }) => {
        // Skip pid and nodeVersion
        const { pid: _pid, nodeVersion: _nodeVersion, ...cleanMeta } = meta;

        // Collapse message to single line
        const cleanMessage = String(message).replace(/\n/g, ' ').replace(/\s+/g, ' ').trim();

        // Only show meta if it has meaningful content
        const hasUsefulMeta =
          Object.keys(cleanMeta).length > 0 &&
          !Object.values(cleanMeta).every((v) => v === undefined || v === null);

        const metaStr = hasUsefulMeta ? ` ${JSON.stringify(cleanMeta)}` : '';

        // Short service names
        const shortService = String(service || 'unknown')
          .replace('@replyguard/', '')
          .substring(0, 8);

        return `${String(timestamp)} ${level} ${shortService}: ${cleanMessage}${metaStr}`;
      })
    ),
  }),
];

// Add Loki transport if URL is configured
if (process.env.LOKI_URL && process.env.LOKI_URL !== 'disabled') {
  transports.push(
    new LokiTransport({
      host: lokiUrl,
      labels: {
        service: serviceName,
        environment: process.env.NODE_ENV || 'development',
        host: process.env.HOSTNAME || 'localhost',
      },
      json: true,
      format: winston.format.json(),
      replaceTimestamp: true,
      onConnectionError: (err: unknown) => {
        console.error('Loki connection error:', err);
      },
    })
  );
}

// Add file transports in production
if (process.env.NODE_ENV === 'production') {
  transports.push(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      format: winston.format.json(),
    }),
    new winston.transports.File({
      filename: 'logs/combined.log',
      format: winston.format.json(),
    })
  );
}

export const logger = winston.createLogger({
  level: logLevel,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: {
    service: serviceName,
    pid: process.pid,
    nodeVersion: process.version,
  },
  transports,
});

export interface LogMetrics {
  path?: string;
  reason?: string;
  strategy?: string;
  model?: string;
  messageCount?: number;
  historyCount?: number;
}

export interface StructuredLogger {
  info(message: string, meta?: LogMetrics): void;
  error(message: string, error?: Error, meta?: LogMetrics): void;
  warn(message: string, meta?: LogMetrics): void;
  debug(message: string, meta?: LogMetrics): void;
}

export const structuredLogger: StructuredLogger = {
  info: (message: string, meta?: LogMetrics) => {
    logger.info(message, meta);
  },

  error: (message: string, error?: Error, meta?: LogMetrics) => {
    logger.error(message, {
      ...meta,
      error: error?.message,
      stack: error?.stack,
    });
  },

  warn: (message: string, meta?: LogMetrics) => {
    logger.warn(message, meta);
  },

  debug: (message: string, meta?: LogMetrics) => {
    logger.debug(message, meta);
  },
};

export default logger;
