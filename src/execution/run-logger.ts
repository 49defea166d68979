/**
 * Progress reporting hook for library code. The CLI passes its console
 * logger; library callers get silence unless they pass their own.
 */
export interface RunLogger {
  info(message: string): void;
  warn(message: string): void;
  debug(message: string): void;
}

export const silentLogger: RunLogger = {
  info: () => {},
  warn: () => {},
  debug: () => {},
};
