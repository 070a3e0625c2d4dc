// Namespaced console logging.
//
// Debug and info output is switched on by the DEBUG environment variable,
// using the same patterns as npm's debug package: "smpp:*", "*",
// "smpp:*,-smpp:frames". Warnings and errors are always printed.

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  /**
   * Pattern list to match against instead of process.env.DEBUG.
   * Mostly useful in tests.
   */
  debug?: string;
}

/**
 * Check if a namespace is enabled by a debug pattern list.
 * Supports wildcards (*) and exclusions (-prefix).
 */
export function isEnabled(namespace: string, debug: string | undefined): boolean {
  if (!debug) return false;

  const patterns = debug.split(/[\s,]+/).filter(Boolean);
  let enabled = false;

  for (const pattern of patterns) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

/**
 * Match a namespace against a pattern with wildcard support.
 */
function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/**
 * Create a logger for `namespace`.
 *
 * @example
 * ```typescript
 * // DEBUG=smpp:* node app.js
 * const log = createLogger("smpp:session");
 * log.debug("→ submit_sm #3", { sequence: 3 });
 * ```
 */
export function createLogger(namespace: string, options: LoggerOptions = {}): Logger {
  const enabled = () => isEnabled(namespace, options.debug ?? process.env.DEBUG);
  const prefix = `[${namespace}]`;

  const emit = (
    write: (...args: unknown[]) => void,
    message: string,
    data: Record<string, unknown> | undefined,
  ) => {
    if (data === undefined) write(`${prefix} ${message}`);
    else write(`${prefix} ${message}`, data);
  };

  return {
    debug(message, data) {
      if (enabled()) emit(console.log, message, data);
    },
    info(message, data) {
      if (enabled()) emit(console.log, message, data);
    },
    warn(message, data) {
      emit(console.warn, message, data);
    },
    error(message, data) {
      emit(console.error, message, data);
    },
  };
}
