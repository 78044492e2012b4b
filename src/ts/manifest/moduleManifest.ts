/**
 * @fileoverview Module manifest - YAML-authored module metadata
 * @module manifest/moduleManifest
 *
 * A manifest describes one module to its host: where it mounts
 * (modulePath), which sub-routes it offers, and which permissions it
 * declares. Permissions are declared only; enforcing them is the host's job.
 *
 * Parsing is strict. Malformed YAML throws ManifestParseError, a document
 * that does not match the schema throws ManifestValidationError. A broken
 * manifest is a packaging bug and is never silently defaulted.
 *
 * @example
 * moduleId: wallet
 * modulePath: /wallet
 * displayName: Wallet
 * availableRoutes:
 *   history: /wallet/history
 * requiredPermissions:
 *   - payments.read
 */

import { load } from "js-yaml";
import { z } from "zod";
import { ModuleIdSchema, PayloadMapSchema, SemverSchema } from "../core/coreTypes.js";
import type { HostNavigationService } from "../navigation/hostNavigationService.js";

// ============================================================================
// SCHEMA
// ============================================================================

const RoutePathSchema = z.string().startsWith("/", "Routes must start with '/'");

export const ModuleManifestSchema = z
  .object({
    moduleId: ModuleIdSchema,
    modulePath: RoutePathSchema,
    displayName: z.string().min(1).optional(),
    version: SemverSchema.default("1.0.0"),
    availableRoutes: z.record(z.string(), RoutePathSchema).default({}),
    requiredPermissions: z.array(z.string().min(1)).default([]),
    metadata: PayloadMapSchema.default({}),
  })
  .transform((manifest) => ({
    ...manifest,
    displayName: manifest.displayName ?? manifest.moduleId,
  }));

export type ModuleManifest = z.infer<typeof ModuleManifestSchema>;

// ============================================================================
// ERROR CLASSES
// ============================================================================

/**
 * Error thrown when the manifest is not valid YAML
 */
export class ManifestParseError extends Error {
  public readonly source: string;
  public readonly yamlError: Error;

  constructor(source: string, yamlError: Error) {
    super(`Failed to parse module manifest: ${source}\n${yamlError.message}`);
    this.name = "ManifestParseError";
    this.source = source;
    this.yamlError = yamlError;
  }
}

/**
 * Error thrown when the manifest does not match ModuleManifestSchema
 */
export class ManifestValidationError extends Error {
  public readonly source: string;
  public readonly issues: z.ZodIssue[];

  constructor(source: string, zodError: z.ZodError) {
    const summary = zodError.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    super(`Invalid module manifest ${source}: ${summary}`);
    this.name = "ManifestValidationError";
    this.source = source;
    this.issues = zodError.issues;
  }
}

// ============================================================================
// PARSING
// ============================================================================

/**
 * Parse and validate a YAML manifest.
 *
 * @param source - Label for error messages, usually the file name
 * @throws {ManifestParseError} If the YAML is malformed
 * @throws {ManifestValidationError} If the document fails validation
 */
export function parseModuleManifest(yamlText: string, source = "module.yaml"): ModuleManifest {
  let parsed: unknown;
  try {
    parsed = load(yamlText);
  } catch (error) {
    throw new ManifestParseError(source, error instanceof Error ? error : new Error(String(error)));
  }

  const result = ModuleManifestSchema.safeParse(parsed);
  if (!result.success) {
    throw new ManifestValidationError(source, result.error);
  }
  return result.data;
}

/**
 * Register the manifest's module path on a host navigation service.
 */
export function registerManifestRoutes(service: HostNavigationService, manifest: ModuleManifest): void {
  service.registerModuleRoute(manifest.moduleId, manifest.modulePath);
}

/**
 * Full path of a named sub-route, or undefined when the module does not
 * declare it.
 */
export function resolveManifestRoute(manifest: ModuleManifest, routeName: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(manifest.availableRoutes, routeName)
    ? manifest.availableRoutes[routeName]
    : undefined;
}
