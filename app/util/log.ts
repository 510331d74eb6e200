import * as winston from 'winston';
import env, { toWinstonLevel } from './env';

export { toWinstonLevel };

const applicationFormat = winston.format((info) => ({ ...info, application: 'stac-catalog-builder' }));

/**
 * Creates a logger that logs messages in JSON format.
 * @param transports - the transports to write to
 *
 * @returns The JSON Winston logger
 */
export function createJsonLogger(transports: winston.transport[]): winston.Logger {
  const jsonLogger = winston.createLogger({
    level: env.logLevel,
    format: winston.format.combine(
      winston.format.timestamp(),
      applicationFormat(),
      winston.format.json(),
    ),
    transports,
  });

  return jsonLogger;
}

/**
 * Helper method that formats a string as a log tag only if it is provided
 *
 * @param tag - The tag string to add
 * @returns The input string in tag format, or the empty string if tag does not exist
 */
function optionalTag(tag: unknown): string {
  return tag ? ` [${tag}]` : '';
}

const textformat = winston.format.printf(
  (info) => {
    let message = `${info.timestamp} [${info.level}]${optionalTag(info.component)}: ${info.message}`;
    if (info.stack) message += `\n${info.stack}`;
    return message;
  },
);

/**
 * Creates a logger that log messages as a text string. Useful when viewing logs via a
 * terminal.
 * @param transports - the transports to write to
 *
 * @returns The text string Winston logger
 */
export function createTextLogger(transports: winston.transport[]): winston.Logger {
  const textLogger = winston.createLogger({
    level: env.logLevel,
    defaultMeta: {},
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.colorize({ colors: { error: 'red', info: 'blue' } }),
      textformat,
    ),
    transports,
  });

  return textLogger;
}

const transport = new winston.transports.Console();
const logger = env.textLogger ? createTextLogger([transport]) : createJsonLogger([transport]);

/**
 * Sets the level of the given logger. An unknown level name is reported and the level
 * falls back to info.
 *
 * @param level - the level name
 * @param target - the logger to configure, the module logger by default
 * @returns the winston level that was set
 */
export function setLogLevel(level: string, target: winston.Logger = logger): string {
  const winstonLevel = toWinstonLevel(level);
  if (winstonLevel) {
    target.level = winstonLevel;
    return winstonLevel;
  }
  target.warn(`Unknown level name : ${level} - setting level to INFO`);
  target.level = 'info';
  return 'info';
}

/**
 * Configures logs so that they are written to the file with the given name, also suppressing
 * logging to stdout if the suppressStdOut option is set to true
 * @param filename - The name of the file to write logs to
 * @param suppressStdOut - true if logs should not be written to stdout
 */
export function configureLogToFile(filename: string, suppressStdOut = false): void {
  const fileTransport = new winston.transports.File({ filename });
  while (suppressStdOut && logger.transports.length > 0) {
    logger.remove(logger.transports[0]);
  }
  logger.add(fileTransport);
}

export default logger;
