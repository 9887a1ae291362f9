import winston from 'winston';
import { env } from './environment';

const MAX_LOG_BYTES = 5 * 1024 * 1024;

// Console: `2024-03-01 10:00:00 [info] (sale-service): Sale committed {...}`
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, component, service: _service, ...meta }) => {
    const scope = typeof component === 'string' ? ` (${component})` : '';
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} [${level}]${scope}: ${String(message)}${extra}`;
  })
);

export const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  silent: env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.json()
  ),
  defaultMeta: { service: 'pos-ledger-api' },
  transports: [new winston.transports.Console({ format: consoleFormat })],
});

if (env.NODE_ENV === 'production') {
  const files = [{ filename: 'logs/error.log', level: 'error' }, { filename: 'logs/ledger.log' }];
  for (const file of files) {
    logger.add(new winston.transports.File({ ...file, maxsize: MAX_LOG_BYTES, maxFiles: 5 }));
  }
}

/**
 * Child logger tagged with the component that emits it,
 * e.g. `componentLogger('sale-service')`.
 */
export const componentLogger = (component: string): winston.Logger => logger.child({ component });

export default logger;
