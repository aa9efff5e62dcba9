import logger, { type LogLevels } from 'npmlog';

import type { Context, LogConfiguration, LogParams } from '../interfaces';
import { ConfigurationError } from '../errors';

const LEVELS: LogLevels[] = ['silly', 'verbose', 'info', 'timing', 'http', 'notice', 'warn', 'error', 'silent'];

const isLogLevel = (level: string): level is LogLevels => LEVELS.some(l => l === level);

const format = (context: Context, message: string, params?: LogParams): string => {
  const parts: string[] = [];
  if (context.id !== undefined) {
    parts.push(`[${context.id}]`);
  }

  parts.push(message);

  if (params && Object.keys(params).length) {
    parts.push(JSON.stringify(params));
  }

  return parts.join(' ');
}

/**
 * Create npmlog based log methods
 * @param level npmlog level, `verbose` and below enables debug output
 * @param omitTimestamps
 * @throws ConfigurationError
 */
export const createLogger = (level: string, omitTimestamps = false): Required<LogConfiguration> => {
  if (!isLogLevel(level)) {
    throw new ConfigurationError(`Invalid log level "${level}", expected one of: ${LEVELS.join(', ')}`);
  }

  logger.level = level;
  const prefix = () => omitTimestamps ? '' : new Date().toISOString();

  return {
    debug: (context, message, params) => {
      logger.verbose(prefix(), format(context, message, params));
    },
    info: (context, message, params) => {
      logger.info(prefix(), format(context, message, params));
    },
    error: (context, message, error, params) => {
      if (error) {
        logger.error(prefix(), format(context, message, params), error);
      } else {
        logger.error(prefix(), format(context, message, params));
      }
    },
  };
}
