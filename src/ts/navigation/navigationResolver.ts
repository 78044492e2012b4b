/**
 * @fileoverview Navigation Resolver - module-to-module navigation intents
 * @module navigation/navigationResolver
 *
 * Turns "open module X (route Y, data Z)" into a call on a host
 * NavigationCapability. Capability lookup order:
 *
 * 1. Capability injected into the resolver
 * 2. Capability provided on the origin element itself
 * 3. Bounded walk over parentElement ancestors (at most maxDepth hops),
 *    stopping at a navigation scope boundary
 *
 * Step 3 keeps older hosts working that only attach a provider somewhere
 * above the module root. It can pick an unintended ancestor, so new hosts
 * inject the capability.
 *
 * Nothing here throws past navigateToModule(). A missing capability and a
 * delegate that throws both end in the failure path: a logged diagnostic and
 * a user-visible notice with a "Show details" action.
 */

import type { PayloadMap } from "../core/coreTypes.js";
import { hostChannel, type HostChannel } from "../communication/hostChannel.js";
import { normalizeError } from "../communication/errorReporting.js";
import { showTransientNotice, showUserMessage } from "../ui/userMessage.js";
import { bridgeLogger, type ModuleLogger } from "../utils/moduleLogger.js";
import {
  getNavigationScopeId,
  getProvidedNavigation,
  isNavigationScope,
  type NavigationCapability,
} from "./navigationCapability.js";

// ============================================================================
// CONSTANTS & TYPES
// ============================================================================

export const MAX_ANCESTOR_DEPTH = 10;

/** Source tag stamped on every navigation request */
export const NAVIGATION_SOURCE = "mini_app_shortcut";

export interface NavigationRequest {
  moduleId: string;
  route?: string;
  extra?: PayloadMap;
  source: typeof NAVIGATION_SOURCE;
  timestamp: string;
}

export interface NavigationIntent {
  moduleId: string;
  route?: string;
  extra?: PayloadMap;
  /** Runs before resolution (analytics, state saves). A throw aborts. */
  preNavigate?: (request: NavigationRequest) => void;
}

export type CapabilitySource = "injected" | "origin" | "ancestor";

export type NavigationStopReason =
  | "no_origin"
  | "scope_boundary"
  | "max_depth"
  | "document_root"
  | "delegate_failed";

export interface NavigationReachability {
  injectedCapability: boolean;
  originProvider: boolean;
  scopeBoundary: boolean;
  /** A host handler is listening on the channel */
  hostChannel: boolean;
}

export interface NavigationDiagnostic {
  requestedModuleId: string;
  route: string | null;
  attemptedDepth: number;
  maxDepth: number;
  stopReason: NavigationStopReason;
  reachability: NavigationReachability;
  /** Label of the scope boundary that stopped the walk */
  scopeId?: string;
  error?: string;
  timestamp: string;
}

export type NavigationOutcome =
  | { status: "delegated"; via: CapabilitySource; depth: number }
  | { status: "failed"; diagnostic: NavigationDiagnostic }
  | { status: "aborted"; reason: string };

export type CapabilityResolution =
  | { found: true; capability: NavigationCapability; via: CapabilitySource; depth: number }
  | {
      found: false;
      depth: number;
      stopReason: Exclude<NavigationStopReason, "delegate_failed">;
      scopeBoundary: boolean;
      scopeId?: string;
    };

export interface NavigationFailureNotifier {
  notifyNavigationFailure(diagnostic: NavigationDiagnostic): void;
}

export interface NavigationResolverOptions {
  capability?: NavigationCapability;
  maxDepth?: number;
  notifier?: NavigationFailureNotifier;
  /** Used for reachability flags and pre-navigation error reports */
  channel?: HostChannel;
  logger?: ModuleLogger;
}

// ============================================================================
// FAILURE UX
// ============================================================================

/**
 * Multi-line rendering of a diagnostic for the details dialog.
 */
export function formatNavigationDiagnostic(diagnostic: NavigationDiagnostic): string {
  const { reachability } = diagnostic;
  const lines = [
    `Module: ${diagnostic.requestedModuleId}`,
    `Route: ${diagnostic.route ?? "(none)"}`,
    `Stopped: ${diagnostic.stopReason}`,
    `Depth: ${diagnostic.attemptedDepth}/${diagnostic.maxDepth}`,
    `Injected capability: ${reachability.injectedCapability ? "yes" : "no"}`,
    `Origin provider: ${reachability.originProvider ? "yes" : "no"}`,
    `Scope boundary reached: ${reachability.scopeBoundary ? "yes" : "no"}`,
  ];
  if (diagnostic.scopeId !== undefined) {
    lines.push(`Scope: ${diagnostic.scopeId}`);
  }
  lines.push(`Host channel: ${reachability.hostChannel ? "connected" : "standalone"}`);
  if (diagnostic.error) {
    lines.push(`Error: ${diagnostic.error}`);
  }
  lines.push(`Time: ${diagnostic.timestamp}`);
  return lines.join("\n");
}

export interface DomFailureNotifierOptions {
  durationMs?: number;
  logger?: ModuleLogger;
}

/**
 * Default notifier: a transient notice naming the target, whose
 * "Show details" action opens a blocking dialog with the diagnostic.
 */
export function createDomFailureNotifier(options: DomFailureNotifierOptions = {}): NavigationFailureNotifier {
  const logger = options.logger ?? bridgeLogger;

  return {
    notifyNavigationFailure(diagnostic) {
      showTransientNotice(`Could not open ${diagnostic.requestedModuleId}`, {
        actionLabel: "Show details",
        durationMs: options.durationMs,
        onAction: () => {
          showUserMessage("Navigation failed", formatNavigationDiagnostic(diagnostic), "Close").catch(
            (error: unknown) => logger.error("Failed to show navigation details:", error)
          );
        },
      });
    },
  };
}

// ============================================================================
// RESOLVER
// ============================================================================

export class NavigationResolver {
  readonly maxDepth: number;

  private readonly injected: NavigationCapability | undefined;
  private readonly notifier: NavigationFailureNotifier;
  private readonly channel: HostChannel;
  private readonly logger: ModuleLogger;

  constructor(options: NavigationResolverOptions = {}) {
    const maxDepth = options.maxDepth ?? MAX_ANCESTOR_DEPTH;
    if (!Number.isInteger(maxDepth) || maxDepth < 0) {
      throw new RangeError(`maxDepth must be a non-negative integer, got ${maxDepth}`);
    }

    this.maxDepth = maxDepth;
    this.injected = options.capability;
    this.logger = options.logger ?? bridgeLogger;
    this.notifier = options.notifier ?? createDomFailureNotifier({ logger: this.logger });
    this.channel = options.channel ?? hostChannel;
  }

  /**
   * Find a capability for an origin element. Examines at most maxDepth
   * ancestors and never looks past a scope boundary.
   */
  resolveCapability(origin: Element | null): CapabilityResolution {
    if (this.injected) {
      return { found: true, capability: this.injected, via: "injected", depth: 0 };
    }
    if (!origin) {
      return { found: false, depth: 0, stopReason: "no_origin", scopeBoundary: false };
    }

    const own = getProvidedNavigation(origin);
    if (own) {
      return { found: true, capability: own, via: "origin", depth: 0 };
    }
    if (isNavigationScope(origin)) {
      return scopeBoundaryResolution(origin, 0);
    }

    let current = origin.parentElement;
    let depth = 1;

    while (current && depth <= this.maxDepth) {
      const capability = getProvidedNavigation(current);
      if (capability) {
        return { found: true, capability, via: "ancestor", depth };
      }
      if (isNavigationScope(current)) {
        return scopeBoundaryResolution(current, depth);
      }
      current = current.parentElement;
      depth++;
    }

    return {
      found: false,
      depth: depth - 1,
      stopReason: current ? "max_depth" : "document_root",
      scopeBoundary: false,
    };
  }

  /**
   * Navigate to another module on behalf of a UI element.
   */
  navigateToModule(origin: Element | null, intent: NavigationIntent): NavigationOutcome {
    const request: NavigationRequest = {
      moduleId: intent.moduleId,
      route: intent.route,
      extra: intent.extra,
      source: NAVIGATION_SOURCE,
      timestamp: new Date().toISOString(),
    };

    if (intent.preNavigate) {
      try {
        intent.preNavigate(request);
      } catch (error) {
        return this.abort(request, error);
      }
    }

    const resolution = this.resolveCapability(origin);
    if (!resolution.found) {
      return this.fail(request, origin, {
        attemptedDepth: resolution.depth,
        stopReason: resolution.stopReason,
        scopeBoundary: resolution.scopeBoundary,
        scopeId: resolution.scopeId,
      });
    }

    try {
      resolution.capability.navigateToModule(request.moduleId, buildNavigationData(request));
    } catch (error) {
      return this.fail(request, origin, {
        attemptedDepth: resolution.depth,
        stopReason: "delegate_failed",
        scopeBoundary: false,
        error: normalizeError(error).message,
      });
    }

    this.logger.debug(`🧭 Navigated to ${request.moduleId} via ${resolution.via} capability (depth ${resolution.depth})`);
    return { status: "delegated", via: resolution.via, depth: resolution.depth };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private abort(request: NavigationRequest, error: unknown): NavigationOutcome {
    const { message } = normalizeError(error);
    this.logger.error(`Pre-navigation callback failed for ${request.moduleId}: ${message}`);

    if (!this.channel.isStandalone) {
      this.channel.reportError(message, "pre_navigation");
    }
    return { status: "aborted", reason: message };
  }

  private fail(
    request: NavigationRequest,
    origin: Element | null,
    details: {
      attemptedDepth: number;
      stopReason: NavigationStopReason;
      scopeBoundary: boolean;
      scopeId?: string;
      error?: string;
    }
  ): NavigationOutcome {
    const diagnostic: NavigationDiagnostic = {
      requestedModuleId: request.moduleId,
      route: request.route ?? null,
      attemptedDepth: details.attemptedDepth,
      maxDepth: this.maxDepth,
      stopReason: details.stopReason,
      reachability: {
        injectedCapability: this.injected !== undefined,
        originProvider: origin !== null && getProvidedNavigation(origin) !== undefined,
        scopeBoundary: details.scopeBoundary,
        hostChannel: !this.channel.isStandalone,
      },
      timestamp: request.timestamp,
    };
    if (details.scopeId !== undefined) {
      diagnostic.scopeId = details.scopeId;
    }
    if (details.error !== undefined) {
      diagnostic.error = details.error;
    }

    this.logger.warn(`Navigation to ${request.moduleId} failed (${diagnostic.stopReason})`, diagnostic);

    try {
      this.notifier.notifyNavigationFailure(diagnostic);
    } catch (error) {
      this.logger.error("Navigation failure notifier threw:", error);
    }

    return { status: "failed", diagnostic };
  }
}

function scopeBoundaryResolution(boundary: Element, depth: number): CapabilityResolution {
  const scopeId = getNavigationScopeId(boundary);
  const resolution = { found: false, depth, stopReason: "scope_boundary", scopeBoundary: true } as const;
  return scopeId === undefined ? resolution : { ...resolution, scopeId };
}

/**
 * Payload handed to the capability: identity and source first, then the
 * optional route, then caller-supplied extras.
 */
export function buildNavigationData(request: NavigationRequest): PayloadMap {
  const data: PayloadMap = {
    moduleId: request.moduleId,
    source: request.source,
    timestamp: request.timestamp,
  };
  if (request.route !== undefined) {
    data.route = request.route;
  }
  return { ...data, ...request.extra };
}
