// shortcutAction.ts - Wire a clickable element to a module navigation intent

import type { PayloadMap } from "../core/coreTypes.js";
import type { NavigationOutcome, NavigationResolver } from "./navigationResolver.js";

export interface ShortcutAction {
  moduleId: string;
  route?: string;
  extra?: PayloadMap;
  /** Runs before navigation; a throw aborts it */
  onPressed?: () => void;
  /** Called with the result of every activation */
  onOutcome?: (outcome: NavigationOutcome) => void;
}

/**
 * Navigate to action.moduleId whenever the element is clicked. The element
 * is the origin of the capability lookup.
 *
 * @returns Function that removes the listener
 */
export function bindShortcut(
  element: HTMLElement,
  action: ShortcutAction,
  resolver: NavigationResolver
): () => void {
  const onPressed = action.onPressed;

  const listener = (event: Event) => {
    event.preventDefault();

    const outcome = resolver.navigateToModule(element, {
      moduleId: action.moduleId,
      route: action.route,
      extra: action.extra,
      preNavigate: onPressed ? () => onPressed() : undefined,
    });
    action.onOutcome?.(outcome);
  };

  element.addEventListener("click", listener);
  element.dataset.shortcutModule = action.moduleId;

  return () => {
    element.removeEventListener("click", listener);
    delete element.dataset.shortcutModule;
  };
}
