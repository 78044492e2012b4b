// coreTypes.ts - Shared core types and schemas

import { z } from "zod";

/**
 * Module identifier - identity key stamped on every event a module emits
 */
export const ModuleIdSchema = z.string().trim().min(1);

/**
 * Semantic version string (x.y.z with optional pre-release/build suffix)
 */
export const SemverSchema = z.string().regex(/^\d+\.\d+\.\d+(?:[-+].*)?$/, "Version must be semantic (x.y.z)");

/**
 * Open key/value bag used for metadata, event payloads and navigation data
 */
export const PayloadMapSchema = z.record(z.string(), z.unknown());

export type PayloadMap = z.infer<typeof PayloadMapSchema>;

/**
 * Outcome of a module's activation check.
 *
 * Consumed by the lifecycle controller to choose between building the
 * module content and rendering the fallback surface.
 */
export type ActivationResult =
  | { status: "ready" }
  | { status: "not_activatable"; reason: string };

export const ACTIVATION_READY: ActivationResult = Object.freeze({ status: "ready" });

export function notActivatable(reason: string): ActivationResult {
  return { status: "not_activatable", reason };
}

/**
 * Result of a module-level operation handed back to callers or the host.
 */
export type ModuleResult<T> =
  | { isSuccess: true; data: T; metadata: PayloadMap }
  | { isSuccess: false; error: string; metadata: PayloadMap };

export function moduleSuccess<T>(data: T, metadata: PayloadMap = {}): ModuleResult<T> {
  return { isSuccess: true, data, metadata };
}

export function moduleFailure<T = never>(error: string, metadata: PayloadMap = {}): ModuleResult<T> {
  return { isSuccess: false, error, metadata };
}

/**
 * Recursively freeze a plain value so snapshots cannot be mutated in place.
 * Freezing does not reach internal slots (a Date's time value, Map entries),
 * so frozen values should hold plain data only.
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Reflect.ownKeys(value)) {
      deepFreeze(Reflect.get(value, key));
    }
  }
  return value;
}
