/**
 * @fileoverview Immutable configuration snapshot handed from host to module
 * @module core/configSnapshot
 *
 * The host builds one snapshot per module activation and passes it to the
 * module root together with its event handler. The module owns the snapshot
 * for its mounted lifetime and discards it on unmount.
 *
 * Snapshots are deeply frozen copies: the host's metadata and user objects
 * are cloned first, so freezing never reaches values the host still holds.
 * "Updates" always go through withConfigUpdates(), which validates and
 * returns a new snapshot.
 *
 * The theme snapshot is host-owned and opaque: it is passed through by
 * reference, neither parsed nor frozen here.
 */

import { z } from "zod";
import { ModuleIdSchema, PayloadMapSchema, SemverSchema, deepFreeze } from "./coreTypes.js";
import { AuthConfigSchema, authConfigToJson } from "./authConfigSchema.js";
import { UserInfoSchema } from "./userInfoSchema.js";

/** Default session length granted by the host (2 hours) */
export const DEFAULT_SESSION_TIMEOUT_MS = 2 * 60 * 60 * 1000;

// ============================================================================
// SCHEMA
// ============================================================================

export const ConfigSnapshotSchema = z.object({
  moduleId: ModuleIdSchema,
  version: SemverSchema.default("1.0.0"),
  initialRoute: z.string().min(1).default("/"),
  user: UserInfoSchema.optional(),
  authConfig: AuthConfigSchema.optional(),
  themeSnapshot: z.unknown().optional(),
  metadata: PayloadMapSchema.default({}),
  debugMode: z.boolean().default(false),
  sessionTimeoutMs: z.number().int().positive().default(DEFAULT_SESSION_TIMEOUT_MS),
});

type ParsedConfigSnapshot = z.infer<typeof ConfigSnapshotSchema>;

export type ConfigSnapshot = Readonly<ParsedConfigSnapshot>;
export type ConfigSnapshotInput = z.input<typeof ConfigSnapshotSchema>;

// ============================================================================
// CONSTRUCTION
// ============================================================================

/**
 * Validate host input, apply defaults and freeze the result.
 *
 * Throws ZodError on invalid input - a malformed snapshot is a host bug,
 * not something a module can recover from.
 */
export function createConfigSnapshot(input: ConfigSnapshotInput): ConfigSnapshot {
  return freezeSnapshot(ConfigSnapshotSchema.parse(input));
}

/**
 * Build a snapshot from untyped JSON (e.g. a native host bridge message).
 * Token expiries are accepted as ISO-8601 strings.
 */
export function parseConfigSnapshot(json: unknown): ConfigSnapshot {
  return freezeSnapshot(ConfigSnapshotSchema.parse(json));
}

// zod reuses nested record values from its input, so clone before freezing
function freezeSnapshot(parsed: ParsedConfigSnapshot): ConfigSnapshot {
  const { themeSnapshot, ...owned } = parsed;
  const snapshot: ParsedConfigSnapshot = structuredClone(owned);
  for (const value of Object.values(snapshot)) {
    deepFreeze(value);
  }
  if (themeSnapshot !== undefined) {
    snapshot.themeSnapshot = themeSnapshot;
  }
  return Object.freeze(snapshot);
}

/**
 * Copy-on-write update. The source snapshot is left untouched.
 *
 * @example
 * const next = withConfigUpdates(snapshot, { debugMode: true });
 * // snapshot.debugMode is still false
 */
export function withConfigUpdates(
  snapshot: ConfigSnapshot,
  updates: Partial<ConfigSnapshotInput>
): ConfigSnapshot {
  return createConfigSnapshot({ ...snapshot, ...updates });
}

/**
 * JSON-safe representation. Token expiries stay ISO-8601 strings and absent
 * optional fields are omitted.
 */
export function configSnapshotToJson(snapshot: ConfigSnapshot): Record<string, unknown> {
  const json: Record<string, unknown> = {
    moduleId: snapshot.moduleId,
    version: snapshot.version,
    initialRoute: snapshot.initialRoute,
    metadata: snapshot.metadata,
    debugMode: snapshot.debugMode,
    sessionTimeoutMs: snapshot.sessionTimeoutMs,
  };
  if (snapshot.user) json.user = snapshot.user;
  if (snapshot.authConfig) json.authConfig = authConfigToJson(snapshot.authConfig);
  if (snapshot.themeSnapshot !== undefined) json.themeSnapshot = snapshot.themeSnapshot;
  return json;
}

// ============================================================================
// READ HELPERS
// ============================================================================

export function hasUser(snapshot: ConfigSnapshot): boolean {
  return snapshot.user !== undefined;
}

// Presence of a user is what marks an authenticated context
export function isAuthenticated(snapshot: ConfigSnapshot): boolean {
  return hasUser(snapshot);
}

export function getMetadataValue(snapshot: ConfigSnapshot, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(snapshot.metadata, key)
    ? snapshot.metadata[key]
    : undefined;
}
