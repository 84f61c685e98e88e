// ---------------------------------------------------------------------------
// Logger: development only, silenced in production and under the test runner
// ---------------------------------------------------------------------------

const NODE_ENV = process.env.NODE_ENV ?? 'development';
export const IS_DEV   = NODE_ENV === 'development';

export interface Logger {
  log:   (...args: unknown[]) => void;
  warn:  (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export const logger: Logger = {
  log:   (...args: unknown[]): void => { if (IS_DEV) console.log(...args);   },
  warn:  (...args: unknown[]): void => { if (IS_DEV) console.warn(...args);  },
  error: (...args: unknown[]): void => { if (IS_DEV) console.error(...args); },
};

// Used where a component takes a logger and the caller wants none.
export const silentLogger: Logger = {
  log:   () => {},
  warn:  () => {},
  error: () => {},
};
