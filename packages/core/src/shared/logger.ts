/**
 * Minimal logger surface shared by the build, the extensions and the Vite
 * plugin (which passes Vite's own logger through).
 */
export interface BuildLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const PREFIX = "[shaderweave]";

export const consoleLogger: BuildLogger = {
  info: (message) => console.log(`${PREFIX} ${message}`),
  warn: (message) => console.warn(`${PREFIX} ${message}`),
  error: (message) => console.error(`${PREFIX} ${message}`),
};

export const silentLogger: BuildLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
