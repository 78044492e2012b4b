/**
 * @fileoverview Module Lifecycle Controller - mount/unmount orchestration
 * @module lifecycle/moduleLifecycle
 *
 * Binds a host channel session to the mounted lifetime of a module's UI
 * root and gives module authors three hooks (onInit, onDependenciesChanged,
 * onDispose). Modules are composed from a plain ModuleDefinition object;
 * there is no base class to extend.
 *
 * State machine:
 *   uninitialized --mount()--> mounted --unmount()--> disposed (terminal)
 *
 * Ordering guarantees:
 * - mount: channel.initialize → module.ready (host mode only) → onInit → render
 * - unmount: onDispose → module.disposed (host mode only) → channel.dispose
 *   The disposed notification reaches the host before the handler is cleared.
 *
 * Failure policy:
 * - Activation refused → fallback surface with the reason.
 * - Content build throws → error.report with context "module_build" (host
 *   mode only) and the fallback surface.
 * - Hook throws → logged and reported; the transition still completes.
 * - Fallback surface throws → not caught (fatal).
 */

import { ACTIVATION_READY, type ActivationResult } from "../core/coreTypes.js";
import type { ConfigSnapshot } from "../core/configSnapshot.js";
import { MODULE_EVENT_TYPES, type HostEventHandler } from "../core/moduleEvents.js";
import { hostChannel, type HostChannel } from "../communication/hostChannel.js";
import { reportModuleError, normalizeError, type NormalizedError } from "../communication/errorReporting.js";
import { buildModuleErrorSurface } from "../ui/moduleErrorSurface.js";
import { createModuleLogger, type ModuleLogger } from "../utils/moduleLogger.js";

// ============================================================================
// TYPES
// ============================================================================

export type LifecycleState = "uninitialized" | "mounted" | "disposed";

/**
 * Everything a module implementation can reach while mounted.
 */
export interface ModuleContext {
  readonly config: ConfigSnapshot;
  readonly channel: HostChannel;
  readonly logger: ModuleLogger;
  readonly isStandalone: boolean;
  /** Container the module renders into */
  readonly root: HTMLElement;
}

export interface ModuleLifecycleHooks {
  onInit?(context: ModuleContext): void;
  onDependenciesChanged?(context: ModuleContext, previousConfig: ConfigSnapshot): void;
  onDispose?(context: ModuleContext): void;
}

export interface ModuleDefinition {
  /** Build the module's UI. May throw; the controller recovers. */
  buildContent(context: ModuleContext): HTMLElement;
  /** Defaults to ready */
  checkActivation?(config: ConfigSnapshot): ActivationResult;
  hooks?: ModuleLifecycleHooks;
  /** Declared only - enforcement belongs to the host */
  requiredPermissions?: readonly string[];
}

export interface ModuleLifecycleOptions {
  config: ConfigSnapshot;
  definition: ModuleDefinition;
  /** Omit to run the module standalone */
  onHostEvent?: HostEventHandler;
  /** Defaults to the process-wide hostChannel */
  channel?: HostChannel;
}

type HookName = keyof ModuleLifecycleHooks;

const HOOK_ERROR_CONTEXT: Record<HookName, string> = {
  onInit: "module_init",
  onDependenciesChanged: "module_dependencies",
  onDispose: "module_dispose",
};

// ============================================================================
// CONTROLLER
// ============================================================================

export class ModuleLifecycleController {
  private _state: LifecycleState = "uninitialized";
  private _config: ConfigSnapshot;
  private container: HTMLElement | null = null;

  private readonly definition: ModuleDefinition;
  private readonly onHostEvent: HostEventHandler | undefined;
  private readonly channel: HostChannel;
  private readonly logger: ModuleLogger;

  constructor(options: ModuleLifecycleOptions) {
    this._config = options.config;
    this.definition = options.definition;
    this.onHostEvent = options.onHostEvent;
    this.channel = options.channel ?? hostChannel;
    this.logger = createModuleLogger(options.config.moduleId, {
      enabled: options.config.debugMode,
    });
  }

  get state(): LifecycleState {
    return this._state;
  }

  get config(): ConfigSnapshot {
    return this._config;
  }

  get isStandalone(): boolean {
    return this.onHostEvent === undefined;
  }

  get requiredPermissions(): readonly string[] {
    return this.definition.requiredPermissions ?? [];
  }

  /**
   * Mount the module into a container and start its channel session.
   */
  mount(container: HTMLElement): void {
    if (this._state !== "uninitialized") {
      this.logger.warn(`mount() ignored: controller is ${this._state}`);
      return;
    }

    this.container = container;
    this.channel.initialize(this._config.moduleId, this.onHostEvent, {
      debug: this._config.debugMode,
    });
    this._state = "mounted";

    if (!this.isStandalone) {
      this.channel.send(MODULE_EVENT_TYPES.ready);
    }

    try {
      const context = this.createContext(container);
      this.runHook("onInit", context, (hooks) => hooks.onInit?.(context));
      this.renderInto(container);
    } catch (error) {
      // Not even the fallback surface could be built: the module never mounted
      this.channel.dispose();
      this.container = null;
      this._state = "uninitialized";
      this.logger.error("Module failed to mount:", error);
      throw error;
    }

    this.logger.info("✅ Module mounted");
  }

  /**
   * Host-driven context change (theme, locale, refreshed tokens...).
   *
   * The new snapshot replaces the current one; the module identity cannot
   * change. No channel interaction.
   */
  notifyDependenciesChanged(nextConfig?: ConfigSnapshot): void {
    if (this._state !== "mounted" || !this.container) {
      this.logger.warn(`notifyDependenciesChanged() ignored: controller is ${this._state}`);
      return;
    }

    if (nextConfig && nextConfig.moduleId !== this._config.moduleId) {
      this.logger.warn(
        `Ignoring dependency update for '${nextConfig.moduleId}': module identity is fixed while mounted`
      );
      return;
    }

    const previousConfig = this._config;
    if (nextConfig) {
      this._config = nextConfig;
    }

    const context = this.createContext(this.container);
    this.runHook("onDependenciesChanged", context, (hooks) =>
      hooks.onDependenciesChanged?.(context, previousConfig)
    );
  }

  /**
   * Rebuild the module content in place.
   */
  render(): void {
    if (this._state !== "mounted" || !this.container) {
      this.logger.warn(`render() ignored: controller is ${this._state}`);
      return;
    }
    this.renderInto(this.container);
  }

  /**
   * Unmount the module and end its channel session. Idempotent.
   */
  unmount(): void {
    if (this._state === "disposed") {
      this.logger.debug("unmount() ignored: already disposed");
      return;
    }
    if (this._state === "uninitialized" || !this.container) {
      this.logger.warn("unmount() ignored: module was never mounted");
      return;
    }

    const container = this.container;
    const context = this.createContext(container);
    this.runHook("onDispose", context, (hooks) => hooks.onDispose?.(context));

    if (!this.isStandalone) {
      this.channel.send(MODULE_EVENT_TYPES.disposed);
    }
    this.channel.dispose();

    container.replaceChildren();
    this.container = null;
    this._state = "disposed";

    this.logger.info("👋 Module disposed");
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private createContext(root: HTMLElement): ModuleContext {
    return {
      config: this._config,
      channel: this.channel,
      logger: this.logger,
      isStandalone: this.isStandalone,
      root,
    };
  }

  private renderInto(container: HTMLElement): void {
    const surface = this.buildSurface(this.createContext(container));
    container.replaceChildren(surface);
  }

  /**
   * Module content, or the fallback surface when activation is refused or
   * the build throws. The fallback is built outside the try block so that
   * its own failure propagates.
   */
  private buildSurface(context: ModuleContext): HTMLElement {
    let failureMessage: string;

    try {
      const activation = this.definition.checkActivation?.(this._config) ?? ACTIVATION_READY;
      if (activation.status === "ready") {
        return this.definition.buildContent(context);
      }
      failureMessage = `Module cannot activate: ${activation.reason}`;
      this.logger.warn(failureMessage);
    } catch (error) {
      const normalized = this.handleModuleError(error, "module_build");
      failureMessage = `Error building module: ${normalized.message}`;
    }

    return buildModuleErrorSurface({
      moduleId: this._config.moduleId,
      message: failureMessage,
      onGoBack: this.isStandalone ? undefined : () => this.channel.requestClose(),
    });
  }

  private runHook(
    name: HookName,
    context: ModuleContext,
    call: (hooks: ModuleLifecycleHooks) => void
  ): void {
    const hooks = this.definition.hooks;
    if (!hooks || !hooks[name]) return;

    try {
      call(hooks);
    } catch (error) {
      this.handleModuleError(error, HOOK_ERROR_CONTEXT[name]);
    }
  }

  // Standalone modules have no host to report to
  private handleModuleError(error: unknown, errorContext: string): NormalizedError {
    if (this.isStandalone) {
      const normalized = normalizeError(error);
      this.logger.error(`Module error in ${errorContext}: ${normalized.message}`);
      return normalized;
    }
    return reportModuleError(this.channel, this.logger, error, errorContext);
  }
}
