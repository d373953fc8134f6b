/**
 * Diagnostics go to the console, like the rest of the toolchain. Components
 * take a `Logger` so embedders can redirect or mute them.
 */
export type Logger = Pick<Console, "debug" | "info" | "warn">;

export const defaultLogger: Logger = console;

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
};
