export type Logger = Pick<Console, 'info' | 'warn' | 'error'>;

export const createPrefixedLogger = (prefix: string, target: Logger = console): Logger => ({
  info: (...args) => target.info(prefix, ...args),
  warn: (...args) => target.warn(prefix, ...args),
  error: (...args) => target.error(prefix, ...args),
});
