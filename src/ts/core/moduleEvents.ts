/**
 * @fileoverview Module → host event vocabulary and typed event model
 * @module core/moduleEvents
 *
 * On the wire an event is a bare (eventType, payload) pair handed to the
 * host's handler. The type strings below are a stable contract across
 * versions; modules may also emit arbitrary custom type strings.
 *
 * Every delivered payload carries the emitting module's id and an ISO-8601
 * timestamp next to the type-specific fields.
 *
 * Host code that prefers typed events can lift a raw delivery into the
 * ModuleEvent union with toModuleEvent(), or route deliveries per type with
 * createHostEventRouter().
 */

import { z } from "zod";
import { PayloadMapSchema, type PayloadMap } from "./coreTypes.js";

// ============================================================================
// EVENT TYPES
// ============================================================================

export const MODULE_EVENT_TYPES = {
  navigationRequest: "navigation.request",
  closeRequest: "module.close_request",
  logoutRequest: "auth.logout_request",
  errorReport: "error.report",
  dataRequest: "data.request",
  stateChanged: "state.changed",
  ready: "module.ready",
  disposed: "module.disposed",
} as const;

export type KnownEventName = keyof typeof MODULE_EVENT_TYPES;
export type KnownEventType = (typeof MODULE_EVENT_TYPES)[KnownEventName];

const KNOWN_EVENT_TYPES: ReadonlySet<string> = new Set(Object.values(MODULE_EVENT_TYPES));

export function isKnownEventType(type: string): type is KnownEventType {
  return KNOWN_EVENT_TYPES.has(type);
}

/**
 * Raw handler supplied by the host at module construction.
 */
export type HostEventHandler = (eventType: string, payload: PayloadMap) => void;

/** Default reason for close/logout requests raised without one */
export const DEFAULT_REQUEST_REASON = "user_action";

// ============================================================================
// PAYLOAD SCHEMAS
// ============================================================================

export const NavigationRequestPayloadSchema = z
  .object({ route: z.string(), params: PayloadMapSchema.default({}) })
  .passthrough();

export const CloseRequestPayloadSchema = z
  .object({ reason: z.string().default(DEFAULT_REQUEST_REASON) })
  .passthrough();

export const LogoutRequestPayloadSchema = CloseRequestPayloadSchema;

export const ErrorReportPayloadSchema = z
  .object({
    error: z.string(),
    context: z.string().nullish(),
    stackTrace: z.string().nullish(),
  })
  .passthrough();

export const DataRequestPayloadSchema = z
  .object({ dataType: z.string(), params: PayloadMapSchema.default({}) })
  .passthrough();

// State changes and the framework notifications carry free-form fields
export const OpenPayloadSchema = z.object({}).passthrough();

export type NavigationRequestPayload = z.infer<typeof NavigationRequestPayloadSchema>;
export type CloseRequestPayload = z.infer<typeof CloseRequestPayloadSchema>;
export type LogoutRequestPayload = z.infer<typeof LogoutRequestPayloadSchema>;
export type ErrorReportPayload = z.infer<typeof ErrorReportPayloadSchema>;
export type DataRequestPayload = z.infer<typeof DataRequestPayloadSchema>;
export type OpenPayload = z.infer<typeof OpenPayloadSchema>;

// ============================================================================
// TYPED EVENT MODEL
// ============================================================================

interface ModuleEventEnvelope<K extends string, P> {
  /** Discriminator: the known type, or "custom" */
  kind: K;
  /** Raw type string as delivered */
  type: string;
  moduleId: string;
  timestamp: string;
  payload: P;
}

export type NavigationRequestEvent = ModuleEventEnvelope<"navigation.request", NavigationRequestPayload>;
export type CloseRequestEvent = ModuleEventEnvelope<"module.close_request", CloseRequestPayload>;
export type LogoutRequestEvent = ModuleEventEnvelope<"auth.logout_request", LogoutRequestPayload>;
export type ErrorReportEvent = ModuleEventEnvelope<"error.report", ErrorReportPayload>;
export type DataRequestEvent = ModuleEventEnvelope<"data.request", DataRequestPayload>;
export type StateChangedEvent = ModuleEventEnvelope<"state.changed", OpenPayload>;
export type ReadyEvent = ModuleEventEnvelope<"module.ready", OpenPayload>;
export type DisposedEvent = ModuleEventEnvelope<"module.disposed", OpenPayload>;
export type CustomModuleEvent = ModuleEventEnvelope<"custom", PayloadMap>;

export type ModuleEvent =
  | NavigationRequestEvent
  | CloseRequestEvent
  | LogoutRequestEvent
  | ErrorReportEvent
  | DataRequestEvent
  | StateChangedEvent
  | ReadyEvent
  | DisposedEvent
  | CustomModuleEvent;

/**
 * Lift a raw (eventType, payload) delivery into the typed union.
 *
 * A known type whose payload does not match its schema is returned as a
 * custom event rather than rejected - the host still sees everything the
 * module sent.
 */
export function toModuleEvent(type: string, payload: PayloadMap): ModuleEvent {
  const moduleId = typeof payload.moduleId === "string" ? payload.moduleId : "";
  const timestamp = typeof payload.timestamp === "string" ? payload.timestamp : "";
  const envelope = { type, moduleId, timestamp };

  switch (type) {
    case MODULE_EVENT_TYPES.navigationRequest: {
      const parsed = NavigationRequestPayloadSchema.safeParse(payload);
      if (parsed.success) return { ...envelope, kind: "navigation.request", payload: parsed.data };
      break;
    }
    case MODULE_EVENT_TYPES.closeRequest: {
      const parsed = CloseRequestPayloadSchema.safeParse(payload);
      if (parsed.success) return { ...envelope, kind: "module.close_request", payload: parsed.data };
      break;
    }
    case MODULE_EVENT_TYPES.logoutRequest: {
      const parsed = LogoutRequestPayloadSchema.safeParse(payload);
      if (parsed.success) return { ...envelope, kind: "auth.logout_request", payload: parsed.data };
      break;
    }
    case MODULE_EVENT_TYPES.errorReport: {
      const parsed = ErrorReportPayloadSchema.safeParse(payload);
      if (parsed.success) return { ...envelope, kind: "error.report", payload: parsed.data };
      break;
    }
    case MODULE_EVENT_TYPES.dataRequest: {
      const parsed = DataRequestPayloadSchema.safeParse(payload);
      if (parsed.success) return { ...envelope, kind: "data.request", payload: parsed.data };
      break;
    }
    case MODULE_EVENT_TYPES.stateChanged:
      return { ...envelope, kind: "state.changed", payload: OpenPayloadSchema.parse(payload) };
    case MODULE_EVENT_TYPES.ready:
      return { ...envelope, kind: "module.ready", payload: OpenPayloadSchema.parse(payload) };
    case MODULE_EVENT_TYPES.disposed:
      return { ...envelope, kind: "module.disposed", payload: OpenPayloadSchema.parse(payload) };
  }

  return { ...envelope, kind: "custom", payload };
}

// ============================================================================
// HOST-SIDE ROUTING
// ============================================================================

export interface HostEventHandlers {
  navigationRequest?: (event: NavigationRequestEvent) => void;
  closeRequest?: (event: CloseRequestEvent) => void;
  logoutRequest?: (event: LogoutRequestEvent) => void;
  errorReport?: (event: ErrorReportEvent) => void;
  dataRequest?: (event: DataRequestEvent) => void;
  stateChanged?: (event: StateChangedEvent) => void;
  ready?: (event: ReadyEvent) => void;
  disposed?: (event: DisposedEvent) => void;
  custom?: (event: CustomModuleEvent) => void;
  /** Receives any event without a dedicated handler above */
  unhandled?: (event: ModuleEvent) => void;
}

function invoke<E extends ModuleEvent>(handler: ((event: E) => void) | undefined, event: E): boolean {
  if (!handler) return false;
  handler(event);
  return true;
}

/**
 * Build a raw HostEventHandler that dispatches typed events.
 *
 * @example
 * const onHostEvent = createHostEventRouter({
 *   closeRequest: (event) => shell.closeModule(event.moduleId),
 *   errorReport: (event) => telemetry.capture(event.payload.error),
 * });
 */
export function createHostEventRouter(handlers: HostEventHandlers): HostEventHandler {
  return (eventType, payload) => {
    const event = toModuleEvent(eventType, payload);
    let handled = false;

    switch (event.kind) {
      case "navigation.request":
        handled = invoke(handlers.navigationRequest, event);
        break;
      case "module.close_request":
        handled = invoke(handlers.closeRequest, event);
        break;
      case "auth.logout_request":
        handled = invoke(handlers.logoutRequest, event);
        break;
      case "error.report":
        handled = invoke(handlers.errorReport, event);
        break;
      case "data.request":
        handled = invoke(handlers.dataRequest, event);
        break;
      case "state.changed":
        handled = invoke(handlers.stateChanged, event);
        break;
      case "module.ready":
        handled = invoke(handlers.ready, event);
        break;
      case "module.disposed":
        handled = invoke(handlers.disposed, event);
        break;
      case "custom":
        handled = invoke(handlers.custom, event);
        break;
    }

    if (!handled) {
      handlers.unhandled?.(event);
    }
  };
}
