/**
 * @fileoverview Notices and blocking dialogs shown on behalf of a module
 * @module ui/userMessage
 *
 * Used by the navigation failure path: a transient notice names the failed
 * target and can open a blocking dialog with debug details.
 */

/** Default time a transient notice stays on screen */
export const DEFAULT_NOTICE_DURATION_MS = 4000;

export const NOTICE_CONTAINER_ID = "module-notice-stack";
export const USER_MESSAGE_OVERLAY_ID = "user-message-overlay";

export interface TransientNoticeOptions {
  /** Label of the optional secondary action, e.g. "Show details" */
  actionLabel?: string;
  onAction?: () => void;
  durationMs?: number;
}

export interface TransientNoticeHandle {
  element: HTMLElement;
  dismiss(): void;
}

/**
 * Display a message with one or two buttons and wait for the user.
 *
 * Creates a full-page overlay with a centered card and removes it after
 * the user picks a button.
 *
 * @returns 'primary' or 'secondary' depending on the button clicked
 *
 * @example
 * const choice = await showUserMessage("Navigation failed", details, "Close");
 */
export async function showUserMessage(
  title: string,
  message: string,
  primaryLabel: string,
  secondaryLabel?: string
): Promise<'primary' | 'secondary'> {
  return new Promise((resolve) => {
    const overlay = document.createElement('div');
    overlay.className = 'fixed inset-0 bg-black/60 flex items-center justify-center z-50';
    overlay.id = USER_MESSAGE_OVERLAY_ID;
    overlay.setAttribute('role', 'dialog');
    overlay.setAttribute('aria-modal', 'true');

    const card = document.createElement('div');
    card.className = 'bg-white rounded-lg shadow-2xl p-6 max-w-md mx-4 space-y-4';

    const titleEl = document.createElement('h2');
    titleEl.className = 'text-xl font-semibold text-gray-900';
    titleEl.textContent = title;

    // Preserve line breaks - debug details are multi-line
    const messageEl = document.createElement('pre');
    messageEl.className = 'text-sm text-gray-700 whitespace-pre-wrap';
    messageEl.textContent = message;

    const buttonContainer = document.createElement('div');
    buttonContainer.className = 'flex gap-3 justify-end pt-2';

    const primaryBtn = document.createElement('button');
    primaryBtn.className = 'px-4 py-2 bg-blue-600 hover:bg-blue-700 text-white font-medium rounded';
    primaryBtn.dataset.action = 'primary';
    primaryBtn.textContent = primaryLabel;
    primaryBtn.onclick = () => {
      overlay.remove();
      resolve('primary');
    };

    if (secondaryLabel) {
      const secondaryBtn = document.createElement('button');
      secondaryBtn.className = 'px-4 py-2 bg-gray-200 hover:bg-gray-300 text-gray-800 font-medium rounded';
      secondaryBtn.dataset.action = 'secondary';
      secondaryBtn.textContent = secondaryLabel;
      secondaryBtn.onclick = () => {
        overlay.remove();
        resolve('secondary');
      };
      buttonContainer.appendChild(secondaryBtn);
    }

    buttonContainer.appendChild(primaryBtn);

    card.appendChild(titleEl);
    card.appendChild(messageEl);
    card.appendChild(buttonContainer);
    overlay.appendChild(card);
    document.body.appendChild(overlay);

    // Keyboard users land on the primary action
    primaryBtn.focus();
  });
}

/**
 * Show a non-blocking notice that dismisses itself.
 *
 * Returns immediately. Notices stack in a fixed container at the bottom of
 * the page; the optional action button dismisses the notice before running
 * its callback.
 */
export function showTransientNotice(
  message: string,
  options: TransientNoticeOptions = {}
): TransientNoticeHandle {
  const durationMs = options.durationMs ?? DEFAULT_NOTICE_DURATION_MS;

  let stack = document.getElementById(NOTICE_CONTAINER_ID);
  if (!stack) {
    stack = document.createElement('div');
    stack.id = NOTICE_CONTAINER_ID;
    stack.className = 'fixed bottom-4 left-1/2 -translate-x-1/2 z-50 space-y-2';
    document.body.appendChild(stack);
  }

  const notice = document.createElement('div');
  notice.className = 'module-notice bg-gray-900 text-white rounded-lg shadow-lg px-4 py-3 flex items-center gap-4';
  notice.setAttribute('role', 'status');

  const text = document.createElement('span');
  text.textContent = message;
  notice.appendChild(text);

  let timer: ReturnType<typeof setTimeout> | null = null;
  const dismiss = () => {
    if (timer !== null) {
      clearTimeout(timer);
      timer = null;
    }
    notice.remove();
  };

  if (options.actionLabel && options.onAction) {
    const onAction = options.onAction;
    const actionBtn = document.createElement('button');
    actionBtn.className = 'text-sm font-medium text-blue-300 hover:text-blue-200';
    actionBtn.textContent = options.actionLabel;
    actionBtn.onclick = () => {
      dismiss();
      onAction();
    };
    notice.appendChild(actionBtn);
  }

  stack.appendChild(notice);
  timer = setTimeout(dismiss, durationMs);

  return { element: notice, dismiss };
}
