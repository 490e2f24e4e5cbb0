/**
 * Structured logging for the submission pipeline
 */

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

type LogLevel = keyof Logger;

interface LogLine {
  level: LogLevel;
  scope: string;
  timestamp: string;
  message: string;
  details?: unknown[];
}

/**
 * Logger that writes one JSON line per entry to the console.
 * Scope shows up as a `[scope]` prefix so lines stay greppable.
 */
export function createConsoleLogger(scope = "claims"): Logger {
  const write = (level: LogLevel, message: string, args: unknown[]): void => {
    const line: LogLine = {
      level,
      scope,
      timestamp: new Date().toISOString(),
      message,
      ...(args.length > 0 ? { details: args.map(serializeArg) } : {}),
    };
    console[level](`[${scope}]`, JSON.stringify(line));
  };

  return {
    debug: (msg, ...args) => write("debug", msg, args),
    info: (msg, ...args) => write("info", msg, args),
    warn: (msg, ...args) => write("warn", msg, args),
    error: (msg, ...args) => write("error", msg, args),
  };
}

export const noopLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

function serializeArg(arg: unknown): unknown {
  if (arg instanceof Error) {
    return { name: arg.name, message: arg.message };
  }
  return arg;
}
