// moduleErrorSurface.ts - Fallback surface rendered in place of module content

export interface ModuleErrorSurfaceOptions {
  moduleId: string;
  message: string;
  /** Omitted in standalone mode: there is no host to go back to */
  onGoBack?: () => void;
}

/**
 * Build the fallback error surface shown when a module cannot activate or
 * its content fails to build.
 *
 * Runs no module code. A throw from here is the fatal double failure and
 * propagates to the caller.
 */
export function buildModuleErrorSurface(options: ModuleErrorSurfaceOptions): HTMLElement {
  const { moduleId, message, onGoBack } = options;

  const surface = document.createElement('section');
  surface.className = 'module-error-surface flex flex-col items-center justify-center p-6 text-center';
  surface.dataset.moduleId = moduleId;
  surface.setAttribute('role', 'alert');

  const header = document.createElement('header');
  header.className = 'flex items-center gap-2 w-full mb-6';

  if (onGoBack) {
    const backBtn = document.createElement('button');
    backBtn.className = 'module-error-back text-gray-600 hover:text-gray-900';
    backBtn.setAttribute('aria-label', 'Go back');
    backBtn.textContent = '←';
    backBtn.onclick = onGoBack;
    header.appendChild(backBtn);
  }

  const title = document.createElement('h2');
  title.className = 'module-error-title text-lg font-semibold text-red-800';
  title.textContent = `Error - ${moduleId}`;
  header.appendChild(title);

  const body = document.createElement('p');
  body.className = 'module-error-message text-red-700 mb-4';
  body.textContent = message;

  surface.appendChild(header);
  surface.appendChild(body);

  if (onGoBack) {
    const goBackBtn = document.createElement('button');
    goBackBtn.className = 'module-error-go-back px-4 py-2 bg-red-600 hover:bg-red-700 text-white rounded';
    goBackBtn.textContent = 'Go Back';
    goBackBtn.onclick = onGoBack;
    surface.appendChild(goBackBtn);
  }

  return surface;
}
