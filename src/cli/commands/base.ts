import { type Command, type ErrorOptions } from 'commander';
import { type ZodType } from 'zod/v4';

import { create } from '../../logger';

const logger = create({ name: 'cli' });

export type HandlerErrorOptions = ErrorOptions & {
  /** The error message. */
  message: string;
};

export type HandlerOptions<T> = {
  /** The parsed options. */
  options: T;

  /** The command instance. */
  command: Command;

  /**
   * Log an error message and exit the process with the given exit code.
   * @param options - The error message or error options.
   */
  error: (options: string | HandlerErrorOptions) => void;
};

export type CreateHandlerOptions<T> = {
  schema: ZodType<T>;
  input: Record<string, unknown>;
  command: Command;
};

export async function handlerOptions<T>({
  schema,
  input,
  command,
}: CreateHandlerOptions<T>): Promise<HandlerOptions<T>> {
  const options = await schema.parseAsync(input);
  return {
    options,
    command,
    error: (options) => {
      const { message, code, exitCode } = typeof options === 'string' ? { message: options } : options;
      logger.error(message);
      command.error('', { code, exitCode });
    },
  };
}
