export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

export const consoleLogger: Logger = {
  // eslint-disable-next-line no-console
  debug: (message, ...details) => console.debug(message, ...details),
  // eslint-disable-next-line no-console
  info: (message, ...details) => console.info(message, ...details),
  // eslint-disable-next-line no-console
  warn: (message, ...details) => console.warn(message, ...details),
  // eslint-disable-next-line no-console
  error: (message, ...details) => console.error(message, ...details),
};
