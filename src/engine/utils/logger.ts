/**
 * Minimal logging seam for the engine.
 *
 * Modules never call `console` directly; they receive an EngineLogger so that
 * callers can redirect or silence diagnostics.  Log output never influences a
 * returned value.
 */

export interface EngineLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Console-backed logger writing `[Tag] message` lines. */
export function createConsoleLogger(tag = 'HydroModel'): EngineLogger {
  return {
    debug: (message) => console.debug(`[${tag}] ${message}`),
    info: (message) => console.info(`[${tag}] ${message}`),
    warn: (message) => console.warn(`[${tag}] ${message}`),
    error: (message) => console.error(`[${tag}] ${message}`),
  };
}

export const consoleLogger: EngineLogger = createConsoleLogger();

export const silentLogger: EngineLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
