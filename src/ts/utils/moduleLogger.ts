/**
 * @fileoverview Console logger tagged with the owning module id
 * @module utils/moduleLogger
 *
 * debug/info lines only print when enabled (the snapshot's debugMode);
 * warn/error always print so dropped events and navigation failures stay
 * visible in production consoles.
 */

export interface ModuleLogger {
  readonly moduleId: string;
  readonly enabled: boolean;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export interface ModuleLoggerOptions {
  enabled?: boolean;
}

export function createModuleLogger(
  moduleId: string,
  options: ModuleLoggerOptions = {}
): ModuleLogger {
  const enabled = options.enabled ?? false;
  const tag = `[${moduleId}]`;

  return {
    moduleId,
    enabled,
    debug(message, ...details) {
      if (enabled) console.debug(`🐛 ${tag} ${message}`, ...details);
    },
    info(message, ...details) {
      if (enabled) console.log(`ℹ️ ${tag} ${message}`, ...details);
    },
    warn(message, ...details) {
      console.warn(`⚠️ ${tag} ${message}`, ...details);
    },
    error(message, ...details) {
      console.error(`❌ ${tag} ${message}`, ...details);
    },
  };
}

/**
 * Logger used before any module has claimed the channel.
 */
export const bridgeLogger: ModuleLogger = createModuleLogger("module-bridge");
