// hostNavigationService.ts - Host-side navigation capability backed by a module route registry

import type { PayloadMap } from "../core/coreTypes.js";
import { createModuleLogger, type ModuleLogger } from "../utils/moduleLogger.js";
import type { NavigationCapability } from "./navigationCapability.js";

export type ModuleNavigationHandler = (moduleId: string, data: PayloadMap) => void;
export type RouteNavigator = (route: string, data: PayloadMap) => void;

export interface HostNavigationServiceOptions {
  /** Initial moduleId → route table */
  moduleRoutes?: Record<string, string>;
  /** Takes over every navigation when set; the route table is not consulted */
  customHandler?: ModuleNavigationHandler;
  /** Router hook called with the registered route */
  navigate?: RouteNavigator;
  debug?: boolean;
}

/**
 * Thrown when asked to open a module that has no registered route and no
 * custom handler is set.
 */
export class UnregisteredModuleError extends Error {
  readonly moduleId: string;

  constructor(moduleId: string) {
    super(`No route registered for module: ${moduleId}`);
    this.name = "UnregisteredModuleError";
    this.moduleId = moduleId;
  }
}

export class HostNavigationService implements NavigationCapability {
  private readonly moduleRoutes = new Map<string, string>();
  private readonly customHandler: ModuleNavigationHandler | undefined;
  private readonly navigate: RouteNavigator | undefined;
  private readonly logger: ModuleLogger;

  constructor(options: HostNavigationServiceOptions = {}) {
    this.customHandler = options.customHandler;
    this.navigate = options.navigate;
    this.logger = createModuleLogger("host-navigation", { enabled: options.debug ?? false });

    if (options.moduleRoutes) {
      this.registerModuleRoutes(options.moduleRoutes);
    }
  }

  navigateToModule(moduleId: string, data: PayloadMap): void {
    this.logger.debug(`🎯 Navigating to ${moduleId}`, data);

    if (this.customHandler) {
      this.customHandler(moduleId, data);
      return;
    }

    const route = this.moduleRoutes.get(moduleId);
    if (route === undefined) {
      throw new UnregisteredModuleError(moduleId);
    }

    if (!this.navigate) {
      this.logger.warn(`Route ${route} registered for ${moduleId} but no router hook is configured`);
      return;
    }

    this.logger.debug(`Using registered route: ${route}`);
    this.navigate(route, data);
  }

  registerModuleRoute(moduleId: string, route: string): void {
    this.moduleRoutes.set(moduleId, route);
    this.logger.debug(`📝 Registered route for ${moduleId}: ${route}`);
  }

  registerModuleRoutes(routes: Record<string, string>): void {
    for (const [moduleId, route] of Object.entries(routes)) {
      this.registerModuleRoute(moduleId, route);
    }
  }

  /** Copy of the route table */
  get registeredRoutes(): Readonly<Record<string, string>> {
    return Object.freeze(Object.fromEntries(this.moduleRoutes));
  }

  isModuleRegistered(moduleId: string): boolean {
    return this.moduleRoutes.has(moduleId);
  }
}
