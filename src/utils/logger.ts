import winston from 'winston';
import { settings } from '../config';

/**
 * Console logger shared by every module. The label prefixes each line so
 * interleaved workflow runs stay readable.
 */
export const createLogger = (label: string): winston.Logger =>
  winston.createLogger({
    level: settings.app.log_level.toLowerCase(),
    silent: process.env.NODE_ENV === 'test',
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.printf(info => `${info.timestamp} |${info.level} | [${label}] ${info.message}`)
    ),
    transports: [
      new winston.transports.Console()
    ],
  });
