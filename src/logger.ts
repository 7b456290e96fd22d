/**
 * Logging
 *
 * Modules take an injected logger; the CLI passes a console-backed one and
 * library callers get `silentLogger` unless they supply their own.
 */

export type BindingsLogger = {
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

// Theme helper for CLI output
export const theme = {
  error: (s: string) => `\x1b[31m${s}\x1b[0m`,
  success: (s: string) => `\x1b[32m${s}\x1b[0m`,
  warn: (s: string) => `\x1b[33m${s}\x1b[0m`,
  info: (s: string) => `\x1b[34m${s}\x1b[0m`,
  muted: (s: string) => `\x1b[90m${s}\x1b[0m`,
} as const;

const plain = {
  error: (s: string) => s,
  success: (s: string) => s,
  warn: (s: string) => s,
  info: (s: string) => s,
  muted: (s: string) => s,
} as const;

export type ConsoleLoggerOptions = {
  verbose?: boolean;
  /** Disable ANSI colours (defaults to colouring only when stderr is a TTY). */
  color?: boolean;
  stdout?: Pick<NodeJS.WriteStream, "write">;
  stderr?: Pick<NodeJS.WriteStream, "write">;
};

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): BindingsLogger {
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const t = (options.color ?? Boolean(process.stderr.isTTY)) ? theme : plain;
  const verbose = options.verbose ?? false;

  return {
    debug: (msg) => {
      if (verbose) stderr.write(`${t.muted(msg)}\n`);
    },
    info: (msg) => {
      stdout.write(`${msg}\n`);
    },
    warn: (msg) => {
      stderr.write(`${t.warn(msg)}\n`);
    },
    error: (msg) => {
      stderr.write(`${t.error(msg)}\n`);
    },
  };
}

export const silentLogger: BindingsLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
