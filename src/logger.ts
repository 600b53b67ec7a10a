import { pino, type DestinationStream, type Logger, type LoggerOptions } from 'pino';
import { PinoPretty } from 'pino-pretty';
import { environment } from './environment';

const level = process.env.LOG_LEVEL || (environment.production ? 'info' : 'debug');

const options: LoggerOptions = {
  level,
  base: {
    env: environment.name,
    sha: environment.sha,
    branch: environment.branch,
  },
};

// JSON lines in production so that the output can be shipped as-is, pretty output for operators otherwise
const destination: DestinationStream | undefined = environment.production
  ? undefined
  : PinoPretty({
      colorize: true,
      ignore: 'pid,hostname,env,sha,branch',
      // https://github.com/pinojs/pino-pretty#usage-with-jest
      sync: environment.test,
    });

export const logger = pino(options, destination);

/** Options for creating a logger. */
type CreateOptions = {
  /**
   * The name of the component.
   * @example `orchestrator`
   */
  name: string;
};

/**
 * Creates a child logger for a component.
 * @param {CreateOptions} options - The options for creating the logger.
 * @returns {Logger} The created logger.
 */
export function create({ name }: CreateOptions): Logger {
  return logger.child({ component: name });
}

export type { Logger };
