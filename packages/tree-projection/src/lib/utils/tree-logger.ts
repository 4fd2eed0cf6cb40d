export interface TreeLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const toStructuredLogArgs = (
  message: string,
  context?: Record<string, unknown>,
): [string, Record<string, unknown>] => {
  if (context && Object.keys(context).length > 0) {
    return [`[tree-projection] ${message}`, context];
  }
  return [`[tree-projection] ${message}`, {}];
};

export const createConsoleLogger = (): TreeLogger => {
  return {
    debug(message, context) {
      const [msg, ctx] = toStructuredLogArgs(message, context);
      console.debug(msg, ctx);
    },
    info(message, context) {
      const [msg, ctx] = toStructuredLogArgs(message, context);
      console.info(msg, ctx);
    },
    warn(message, context) {
      const [msg, ctx] = toStructuredLogArgs(message, context);
      console.warn(msg, ctx);
    },
    error(message, context) {
      const [msg, ctx] = toStructuredLogArgs(message, context);
      console.error(msg, ctx);
    },
  };
};

const noop = (): void => undefined;

export const createSilentLogger = (): TreeLogger => ({
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
});
