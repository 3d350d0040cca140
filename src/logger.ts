import path from 'node:path';
import winston from 'winston';

const consoleTransport = new winston.transports.Console({
  format: winston.format.combine(winston.format.colorize({ all: true }), winston.format.simple()),
});

export const logger = winston.createLogger({
  level: 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  transports: [consoleTransport],
});

let fileTransport: winston.transports.FileTransportInstance | undefined;

export interface LoggerOptions {
  readonly level: string;
  readonly errorLogFile?: string;
}

/**
 * Applies the configured level and attaches the error log file transport.
 */
export const initializeLogger = ({ level, errorLogFile }: LoggerOptions): void => {
  logger.level = level;
  consoleTransport.level = level;

  if (fileTransport) {
    logger.remove(fileTransport);
    fileTransport = undefined;
  }

  if (errorLogFile) {
    fileTransport = new winston.transports.File({
      filename: path.resolve(process.cwd(), errorLogFile),
      level: 'warn',
    });
    logger.add(fileTransport);
  }
};

/**
 * Silences console output while progress bars own the terminal; file logging continues.
 */
export const muteConsole = (): void => {
  consoleTransport.silent = true;
};

export const unmuteConsole = (): void => {
  consoleTransport.silent = false;
};
