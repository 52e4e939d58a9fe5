/**
 * Logging for the random walk simulator.
 *
 * Configures a winston root logger and hands out component-tagged child
 * loggers. The level comes from LOG_LEVEL; test runs are silent.
 */
import * as winston from 'winston';

const level = process.env.LOG_LEVEL || 'info';

export const logger = winston.createLogger({
  level,
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
      const tag = component ? ` [${String(component)}]` : '';
      const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
      return `${String(timestamp)} ${level.toUpperCase()}${tag}: ${String(message)}${extra}`;
    })
  ),
  transports: [
    // stdout is reserved for table output
    new winston.transports.Console({ stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug'] })
  ]
});

/**
 * Create a child logger tagged with a component name
 */
export function createComponentLogger(
  component: string,
  metadata: Record<string, unknown> = {}
): winston.Logger {
  return logger.child({ component, ...metadata });
}

export default logger;
