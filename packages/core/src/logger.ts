/**
 * Debug logging with a `[symcalc:<scope>]` prefix.
 *
 * Output is produced only when the logger is enabled, which the engine ties
 * to the `debug` setting.
 */

export interface Logger {
  readonly enabled: boolean;
  debug(message: string): void;
  warn(message: string): void;
}

export function createLogger(scope: string, enabled: boolean): Logger {
  const prefix = `[symcalc:${scope}]`;
  return {
    enabled,
    debug(message) {
      if (enabled) {
        console.log(`${prefix} ${message}`);
      }
    },
    warn(message) {
      if (enabled) {
        console.warn(`${prefix} ${message}`);
      }
    },
  };
}
