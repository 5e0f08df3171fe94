import winston from 'winston';
import path from 'path';
import fs from 'fs';

const LOG_FOLDER = process.env.LOG_FOLDER || './logs';

// Ensure log directory exists
if (!fs.existsSync(LOG_FOLDER)) {
  fs.mkdirSync(LOG_FOLDER, { recursive: true });
}

// Sensitive data patterns to filter
export const SENSITIVE_PATTERNS = [
  /_?http_id[=:]\s*["']?[\w-]+["']?/gi,
  /token[=:]\s*["']?[\w-]+["']?/gi,
  /password[=:]\s*["']?[^"'\s]+["']?/gi,
  /secret[=:]\s*["']?[\w-]+["']?/gi,
  /authorization[=:]\s*basic\s+[\w+/=]+/gi,
];

/**
 * Mask credentials and session tokens in a log message
 */
export function redactSensitive(message: string): string {
  let filtered = message;
  for (const pattern of SENSITIVE_PATTERNS) {
    filtered = filtered.replace(pattern, (match) => {
      const [key] = match.split(/[=:]/);
      return `${key}=***REDACTED***`;
    });
  }
  return filtered;
}

const filterSensitiveData = winston.format((info) => {
  if (typeof info.message === 'string') {
    info.message = redactSensitive(info.message);
  }
  return info;
});

// Custom format for console output
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  filterSensitiveData(),
  winston.format.printf(({ timestamp, level, message, module, target }) => {
    const modulePrefix = module ? `[${module}]` : '';
    const targetPrefix = target ? `(${target})` : '';
    return `${timestamp} ${level} ${modulePrefix}${targetPrefix} ${message}`;
  })
);

// Custom format for file output
const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  filterSensitiveData(),
  winston.format.json()
);

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  transports: [
    new winston.transports.Console({
      format: consoleFormat,
    }),
    new winston.transports.File({
      filename: path.join(LOG_FOLDER, 'error.log'),
      level: 'error',
      format: fileFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
    new winston.transports.File({
      filename: path.join(LOG_FOLDER, 'combined.log'),
      format: fileFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
  ],
});

// Create a child logger with module context, and the router it works on
export function createLogger(moduleName: string, target?: string): winston.Logger {
  return logger.child(target ? { module: moduleName, target } : { module: moduleName });
}

export default logger;
