/**
 * Stderr logger with verbosity control.
 * stdout is reserved for the MCP stdio channel and for command output,
 * so nothing here may write to it.
 */

let verbose = false;

export function setVerbose(v: boolean): void {
  verbose = v;
}

export function isVerbose(): boolean {
  return verbose;
}

export interface Logger {
  log(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

function tag(scope: string | undefined, level?: "WARN" | "ERROR"): string {
  const name = scope ? `toolrelay:${scope}` : "toolrelay";
  return level ? `[${name} ${level}]` : `[${name}]`;
}

/**
 * Logger whose lines carry a component tag, e.g. `[toolrelay:dispatch]`.
 */
export function createLogger(scope?: string): Logger {
  return {
    log(message, ...args) {
      if (verbose) {
        console.error(`${tag(scope)} ${message}`, ...args);
      }
    },
    warn(message, ...args) {
      console.error(`${tag(scope, "WARN")} ${message}`, ...args);
    },
    error(message, ...args) {
      console.error(`${tag(scope, "ERROR")} ${message}`, ...args);
    },
  };
}

const root = createLogger();

export const log = root.log;
export const warn = root.warn;
export const error = root.error;
