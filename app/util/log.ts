import * as winston from 'winston';
import env from './env';
import redact from './log-redactor';

// Replaces credential values before an entry reaches any transport
const redactor = winston.format((info) => redact(info));

const tag = (value: unknown): string => (value ? ` [${value}]` : '');

// e.g. `2024-03-01T00:00:00.000Z [info] [edr-client] [https://edr.example.com]: GET /`
const textLine = winston.format.printf((info) => {
  const line = `${info.timestamp} [${info.level}]${tag(info.component)}${tag(info.serverUrl)}: ${info.message}`;
  return info.stack ? `${line}\n${info.stack}` : line;
});

function withRedaction(format: winston.Logform.Format, transports: winston.transport[]): winston.Logger {
  return winston.createLogger({
    format: winston.format.combine(winston.format.timestamp(), redactor(), format),
    transports,
  });
}

/**
 * Creates a logger writing one JSON object per entry
 *
 * @param transports - the transports to write to
 * @returns the logger
 */
export function createJsonLogger(transports: winston.transport[]): winston.Logger {
  return withRedaction(winston.format.json(), transports);
}

/**
 * Creates a logger writing colourised text lines, for reading logs in a terminal
 *
 * @param transports - the transports to write to
 * @returns the logger
 */
export function createTextLogger(transports: winston.transport[]): winston.Logger {
  const colours = winston.format.colorize({ colors: { error: 'red', info: 'blue' } });
  return withRedaction(winston.format.combine(colours, textLine), transports);
}

const stdout = new winston.transports.Console({ level: env.logLevel });

export default env.textLogger ? createTextLogger([stdout]) : createJsonLogger([stdout]);
