/**
 * Minimal logging sink. Components prefix their lines with a bracketed tag
 * (`[DRIVER]`, `[SCOREBOARD]`, ...); errors go to `error`.
 */
export interface Logger {
  info(message: string): void;
  error(message: string): void;
}

export const consoleLogger: Logger = {
  info(message) {
    // eslint-disable-next-line no-console
    console.log(message);
  },
  error(message) {
    // eslint-disable-next-line no-console
    console.error(message);
  },
};

