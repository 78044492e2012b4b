// index.ts - Public entry point of the module host bridge

export * from "./core/coreTypes.js";
export * from "./core/authConfigSchema.js";
export * from "./core/userInfoSchema.js";
export * from "./core/configSnapshot.js";
export * from "./core/moduleEvents.js";

export * from "./communication/hostChannel.js";
export * from "./communication/errorReporting.js";

export * from "./lifecycle/moduleLifecycle.js";

export * from "./navigation/navigationCapability.js";
export * from "./navigation/navigationResolver.js";
export * from "./navigation/hostNavigationService.js";
export * from "./navigation/shortcutAction.js";

export * from "./manifest/moduleManifest.js";

export * from "./ui/userMessage.js";
export * from "./ui/moduleErrorSurface.js";

export * from "./utils/moduleLogger.js";
