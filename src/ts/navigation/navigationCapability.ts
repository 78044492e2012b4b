// navigationCapability.ts - Host navigation capability and its DOM-scoped registry

import type { PayloadMap } from "../core/coreTypes.js";

/**
 * What a host exposes so modules can switch to another module.
 */
export interface NavigationCapability {
  navigateToModule(moduleId: string, data: PayloadMap): void;
}

/** Marks an element whose provider region the ancestor walk never leaves */
export const NAVIGATION_SCOPE_ATTRIBUTE = "data-navigation-scope";

// Keyed by element so providers disappear with the DOM nodes that hold them
const providers = new WeakMap<Element, NavigationCapability>();

/**
 * Attach a capability to an element. Descendants reach it through the
 * resolver's ancestor walk.
 */
export function provideNavigation(element: Element, capability: NavigationCapability): void {
  providers.set(element, capability);
}

export function getProvidedNavigation(element: Element): NavigationCapability | undefined {
  return providers.get(element);
}

export function removeNavigation(element: Element): boolean {
  return providers.delete(element);
}

/**
 * Declare an element as a navigation scope boundary.
 *
 * @param scopeId - Optional label shown in failure diagnostics
 */
export function markNavigationScope(element: HTMLElement, scopeId = "scope"): void {
  element.setAttribute(NAVIGATION_SCOPE_ATTRIBUTE, scopeId);
}

export function isNavigationScope(element: Element): boolean {
  return element.hasAttribute(NAVIGATION_SCOPE_ATTRIBUTE);
}

// An empty attribute marks a boundary without a label
export function getNavigationScopeId(element: Element): string | undefined {
  const scopeId = element.getAttribute(NAVIGATION_SCOPE_ATTRIBUTE);
  return scopeId ? scopeId : undefined;
}
