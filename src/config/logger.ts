import winston from 'winston';
import { env } from './environment';

const baseFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat()
);

// Human-readable lines for local work
const prettyFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
    const scope = component ? ` (${String(component)})` : '';
    const metaStr = Object.keys(meta).length ? `\n${JSON.stringify(meta, null, 2)}` : '';
    return `${String(timestamp)} [${level}]${scope}: ${String(message)}${metaStr}`;
  })
);

// One JSON object per line for log shipping
const jsonFormat = winston.format.json();

export const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: baseFormat,
  defaultMeta: { service: 'venue-reservation-api' },
  transports: [
    new winston.transports.Console({
      format: env.NODE_ENV === 'production' ? jsonFormat : prettyFormat,
      silent: env.NODE_ENV === 'test',
    }),
  ],
});

/**
 * Logger tagged with the emitting component, e.g. `coordinator` or `store`
 */
export const componentLogger = (component: string): winston.Logger => logger.child({ component });
