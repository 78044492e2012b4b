// errorReporting.ts - Normalize thrown values and report them to the host

import type { HostChannel } from "./hostChannel.js";
import type { ModuleLogger } from "../utils/moduleLogger.js";

export interface NormalizedError {
  message: string;
  trace?: string;
}

/**
 * Turn any thrown value into a message and (when available) a stack trace.
 */
export function normalizeError(error: unknown): NormalizedError {
  if (error instanceof Error) {
    return { message: error.message || error.name, trace: error.stack };
  }
  if (typeof error === "string") {
    return { message: error };
  }
  try {
    return { message: JSON.stringify(error) ?? String(error) };
  } catch {
    return { message: String(error) };
  }
}

/**
 * Log an error and forward it to the host as an error.report event.
 *
 * @param context - Where it happened, e.g. "module_build"
 * @returns The normalized error, for callers that also display it
 */
export function reportModuleError(
  channel: HostChannel,
  logger: ModuleLogger,
  error: unknown,
  context: string
): NormalizedError {
  const normalized = normalizeError(error);

  logger.error(`Module error in ${context}: ${normalized.message}`);
  if (normalized.trace) {
    logger.debug("Stack trace:", normalized.trace);
  }

  channel.reportError(normalized.message, context, normalized.trace);
  return normalized;
}
