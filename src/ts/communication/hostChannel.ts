/**
 * @fileoverview Host Channel - module → host event delivery
 * @module communication/hostChannel
 *
 * A channel session connects exactly one module instance to one
 * host-supplied handler. Delivery is synchronous, best-effort and
 * at-most-once: send() invokes the handler in the caller's stack, with no
 * queueing, retry or acknowledgement.
 *
 * Session policy:
 * - initialize() always replaces the current session ("last initialize
 *   wins"). A second module mounted on the same channel silently takes
 *   over the first module's communication. Hosts that mount several modules
 *   at once give each its own HostChannel instance.
 * - A session without a handler is standalone: every send is dropped.
 * - Dropped sends never throw. They are logged and counted.
 *
 * The module-level `hostChannel` instance is the process-wide default used by
 * modules that are not handed a channel explicitly.
 */

import { MODULE_EVENT_TYPES, DEFAULT_REQUEST_REASON, type HostEventHandler } from "../core/moduleEvents.js";
import type { PayloadMap } from "../core/coreTypes.js";
import { bridgeLogger, createModuleLogger, type ModuleLogger } from "../utils/moduleLogger.js";

interface ChannelSession {
  moduleId: string;
  handler: HostEventHandler | null;
  logger: ModuleLogger;
}

export interface ChannelInitializeOptions {
  /** Print debug-level delivery logs for this session */
  debug?: boolean;
}

export class HostChannel {
  private session: ChannelSession | null = null;

  // Last stamped time (ms) - keeps timestamps non-decreasing within a session
  private lastTimestampMs = 0;

  private droppedEvents = 0;

  /**
   * Start a session for a module. Replaces any session already active.
   *
   * @param moduleId - Identity stamped on every event of this session
   * @param handler - Host handler; omit to run the module standalone
   */
  initialize(moduleId: string, handler?: HostEventHandler, options: ChannelInitializeOptions = {}): void {
    const logger = createModuleLogger(moduleId, { enabled: options.debug ?? false });

    if (this.session) {
      logger.debug(`Replacing active channel session of ${this.session.moduleId}`);
    }

    this.session = { moduleId, handler: handler ?? null, logger };
    this.lastTimestampMs = 0;

    logger.debug(handler ? "🔌 Channel initialized" : "🔌 Channel initialized in standalone mode");
  }

  /**
   * Deliver an event to the host handler.
   *
   * Dropped (logged, counted, no exception) when the channel is not
   * initialized or runs standalone. The payload is the caller's data plus
   * moduleId and timestamp, which always take precedence over same-named
   * data keys. A handler that throws is logged; the error stays on this side
   * of the boundary.
   */
  send(eventType: string, data: PayloadMap = {}): void {
    const session = this.session;
    if (!session || !session.handler) {
      this.droppedEvents++;
      const logger = session?.logger ?? bridgeLogger;
      logger.warn(
        session
          ? `Dropped '${eventType}': module is running standalone`
          : `Dropped '${eventType}': host channel not initialized`
      );
      return;
    }

    const payload: PayloadMap = {
      ...data,
      moduleId: session.moduleId,
      timestamp: this.nextTimestamp(),
    };

    session.logger.debug(`📤 Sending ${eventType}`);

    try {
      session.handler(eventType, payload);
    } catch (error) {
      session.logger.error(`Host handler failed while handling '${eventType}':`, error);
    }
  }

  // ==========================================================================
  // Convenience emitters
  // ==========================================================================

  requestNavigation(route: string, params: PayloadMap = {}): void {
    this.send(MODULE_EVENT_TYPES.navigationRequest, { route, params });
  }

  requestClose(reason: string = DEFAULT_REQUEST_REASON): void {
    this.send(MODULE_EVENT_TYPES.closeRequest, { reason });
  }

  requestLogout(reason: string = DEFAULT_REQUEST_REASON): void {
    this.send(MODULE_EVENT_TYPES.logoutRequest, { reason });
  }

  reportError(message: string, context?: string, trace?: string): void {
    const data: PayloadMap = { error: message };
    if (context !== undefined) data.context = context;
    if (trace !== undefined) data.stackTrace = trace;
    this.send(MODULE_EVENT_TYPES.errorReport, data);
  }

  requestData(dataType: string, params: PayloadMap = {}): void {
    this.send(MODULE_EVENT_TYPES.dataRequest, { dataType, params });
  }

  notifyStateChange(state: PayloadMap): void {
    this.send(MODULE_EVENT_TYPES.stateChanged, state);
  }

  sendCustom(eventType: string, data: PayloadMap): void {
    this.send(eventType, data);
  }

  // ==========================================================================
  // Teardown and observers
  // ==========================================================================

  /**
   * End the session. Safe to call any number of times.
   */
  dispose(): void {
    if (this.session) {
      this.session.logger.debug("🔌 Channel disposed");
    }
    this.session = null;
    this.lastTimestampMs = 0;
  }

  get isInitialized(): boolean {
    return this.session !== null;
  }

  /** True when sends cannot reach a host (no session, or no handler) */
  get isStandalone(): boolean {
    return this.session?.handler == null;
  }

  get moduleId(): string | null {
    return this.session?.moduleId ?? null;
  }

  /** Number of sends dropped since this channel was created */
  get droppedEventCount(): number {
    return this.droppedEvents;
  }

  private nextTimestamp(): string {
    const now = Math.max(Date.now(), this.lastTimestampMs);
    this.lastTimestampMs = now;
    return new Date(now).toISOString();
  }
}

/**
 * Process-wide default channel.
 *
 * Created on first import and shared across the page. Subject to the
 * last-initialize-wins policy described above.
 */
export const hostChannel = new HostChannel();
