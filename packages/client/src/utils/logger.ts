import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';

const nodeEnv = process.env.NODE_ENV || 'development';
const logsDir = process.env.KIOSKPAY_LOG_DIR;

// Define log format
const logFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

// Console format for development
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({
    format: 'HH:mm:ss',
  }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const safe = (input: unknown) => {
      try {
        return JSON.stringify(input, (_k, v: unknown) => {
          if (v instanceof Error) {
            return { name: v.name, message: v.message, stack: v.stack };
          }
          return v;
        });
      } catch {
        return '[unserializable]';
      }
    };
    let msg = `${String(timestamp)} [${level}]: ${String(message)}`;
    if (Object.keys(meta).length > 0) {
      msg += ` ${safe(meta)}`;
    }
    return msg;
  })
);

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: logFormat,
  defaultMeta: { service: 'kioskpay-client' },
  silent: nodeEnv === 'test',
  transports: [
    new winston.transports.Console({
      format: nodeEnv === 'production' ? logFormat : consoleFormat,
    }),
  ],
});

// Kiosks keep rotating files only when a log directory is configured
if (logsDir) {
  logger.add(
    new DailyRotateFile({
      filename: path.join(logsDir, 'kioskpay-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      zippedArchive: true,
      maxSize: '20m',
      maxFiles: '14d',
      level: 'info',
    })
  );

  logger.add(
    new DailyRotateFile({
      filename: path.join(logsDir, 'kioskpay-error-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      zippedArchive: true,
      maxSize: '20m',
      maxFiles: '30d',
      level: 'error',
    })
  );
}

export const gatewayLogger = logger.child({ component: 'gateway' });
export const sessionLogger = logger.child({ component: 'session' });
export const pollerLogger = logger.child({ component: 'poller' });
export const webhookLogger = logger.child({ component: 'webhook' });

const describeError = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  return String(error);
};

export const logGatewayCall = (
  endpoint: string,
  method: string,
  success: boolean = true,
  responseTime?: number,
  error?: unknown
) => {
  const logData = {
    endpoint,
    method,
    success,
    ...(responseTime !== undefined && { responseTime: `${responseTime}ms` }),
    ...(error !== undefined && { error: describeError(error) }),
  };

  if (success) {
    gatewayLogger.debug('Gateway call completed', logData);
  } else {
    gatewayLogger.warn('Gateway call failed', logData);
  }
};

export const logPaymentEvent = (
  paymentId: string,
  action: string,
  success: boolean = true,
  details?: Record<string, unknown>,
  error?: unknown
) => {
  const logData = {
    paymentId,
    action,
    success,
    ...details,
    ...(error !== undefined && { error: describeError(error) }),
  };

  if (success) {
    sessionLogger.info('Payment event', logData);
  } else {
    sessionLogger.error('Payment event failed', logData);
  }
};

export default logger;
