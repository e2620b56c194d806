import winston from 'winston';

// Console-only logger shared by every relayer component
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss'
    }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.json()
  ),
  defaultMeta: { service: 'bridge-relayer' },
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ level, message, timestamp, ...metadata }) => {
          const meta = Object.keys(metadata).length > 0
            ? JSON.stringify(metadata, jsonReplacer, 2)
            : '';

          return `${timestamp} [${level}]: ${message} ${meta}`;
        })
      )
    })
  ]
});

// Amounts and nonces are bigints, which JSON.stringify rejects
function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}
