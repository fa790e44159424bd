/**
 * Logger interface for extraction diagnostics.
 * Decouples the core from any particular output channel so the CLI can
 * route diagnostics to stderr while the graph document owns stdout.
 */
export interface Logger {
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

/**
 * Logger that discards everything. Default for library use.
 */
export const silentLogger: Logger = {
  info: () => {},
  warning: () => {},
  error: () => {},
  debug: () => {},
};
