export type LogFields = Record<string, unknown>;

/** Structured logger shape shared by the domain packages; pino satisfies it. */
export interface Logger {
  info(data: LogFields, msg?: string): void;
  warn(data: LogFields, msg?: string): void;
  error(data: LogFields, msg?: string): void;
  debug(data: LogFields, msg?: string): void;
  child(fields: LogFields): Logger;
}

const noop = () => {};

export const noopLogger: Logger = {
  info: noop,
  warn: noop,
  error: noop,
  debug: noop,
  child: () => noopLogger,
};
