/**
 * @fileoverview Host-provided authentication token bundle
 * @module core/authConfigSchema
 *
 * The host hands the module a token bundle as part of its config snapshot.
 * Expiry predicates are pure functions of the bundle and the clock: they are
 * evaluated on every call and never cached, so a long-lived module always
 * sees the current expiry state.
 */

import { z } from "zod";

// ============================================================================
// SCHEMA
// ============================================================================

/**
 * Expiry timestamps arrive either as Date objects (host code) or as ISO-8601
 * strings (JSON from a native host). Both are stored as a UTC ISO-8601
 * string; accessExpiryDate() and refreshExpiryDate() hand out fresh Dates.
 */
const ExpirySchema = z
  .union([z.date(), z.string().datetime({ offset: true })])
  .transform((value) => new Date(value).toISOString());

export const AuthConfigSchema = z.object({
  accessToken: z.string().optional(),
  accessExpiry: ExpirySchema.optional(),
  refreshToken: z.string().optional(),
  refreshExpiry: ExpirySchema.optional(),
  tokenType: z.string().min(1).default("Bearer"),
  idToken: z.string().optional(),
  sessionState: z.string().optional(),
  scope: z.string().optional(),
});

export type AuthConfig = z.infer<typeof AuthConfigSchema>;
export type AuthConfigInput = z.input<typeof AuthConfigSchema>;

// ============================================================================
// DERIVED PREDICATES
// ============================================================================

export function hasAccessToken(auth: AuthConfig): boolean {
  return auth.accessToken !== undefined && auth.accessToken.length > 0;
}

export function accessExpiryDate(auth: AuthConfig): Date | undefined {
  return auth.accessExpiry === undefined ? undefined : new Date(auth.accessExpiry);
}

export function refreshExpiryDate(auth: AuthConfig): Date | undefined {
  return auth.refreshExpiry === undefined ? undefined : new Date(auth.refreshExpiry);
}

// No expiry means the token never expires
export function isAccessExpired(auth: AuthConfig, now: Date = new Date()): boolean {
  if (auth.accessExpiry === undefined) return false;
  return now.getTime() > Date.parse(auth.accessExpiry);
}

export function isRefreshExpired(auth: AuthConfig, now: Date = new Date()): boolean {
  if (auth.refreshExpiry === undefined) return false;
  return now.getTime() > Date.parse(auth.refreshExpiry);
}

/**
 * True when the access token has lapsed but the refresh token can still
 * renew it. The host performs the refresh; the module only asks.
 */
export function needsRefresh(auth: AuthConfig, now: Date = new Date()): boolean {
  return hasAccessToken(auth) && isAccessExpired(auth, now) && !isRefreshExpired(auth, now);
}

/**
 * Value for an HTTP Authorization header, e.g. "Bearer abc".
 */
export function authorizationHeader(auth: AuthConfig): string | undefined {
  if (!hasAccessToken(auth)) return undefined;
  return `${auth.tokenType} ${auth.accessToken}`;
}

/**
 * JSON form used when a snapshot is handed across a serialization boundary.
 */
export function authConfigToJson(auth: AuthConfig): Record<string, string> {
  const json: Record<string, string> = { tokenType: auth.tokenType };
  if (auth.accessToken !== undefined) json.accessToken = auth.accessToken;
  if (auth.accessExpiry !== undefined) json.accessExpiry = auth.accessExpiry;
  if (auth.refreshToken !== undefined) json.refreshToken = auth.refreshToken;
  if (auth.refreshExpiry !== undefined) json.refreshExpiry = auth.refreshExpiry;
  if (auth.idToken !== undefined) json.idToken = auth.idToken;
  if (auth.sessionState !== undefined) json.sessionState = auth.sessionState;
  if (auth.scope !== undefined) json.scope = auth.scope;
  return json;
}
