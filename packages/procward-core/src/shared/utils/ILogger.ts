/**
 * Logger port - implementations live in the runtime package
 */
export interface ILogger {
  error(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

const noop = (): void => undefined;

export const noopLogger: ILogger = {
  error: noop,
  warn: noop,
  info: noop,
  debug: noop,
};
