import type { Page } from 'playwright';

import * as log from '../utils/logger.js';

/**
 * Attach diagnostic listeners to a Playwright page.
 * Call once at page creation — listeners persist for the session.
 * Output only: nothing here changes how a run behaves.
 */
export function attachDiagnostics(page: Page): void {
  page.on('console', (msg) => {
    log.debug(`Browser console [${msg.type()}]: ${msg.text()}`);
  });

  page.on('request', (request) => {
    log.debug(`Request: ${request.method()} ${request.url()}`);
  });

  page.on('response', (response) => {
    log.debug(`Response: ${String(response.status())} ${response.url()}`);
  });

  page.on('pageerror', (error) => {
    log.debug(`Page error: ${error.message}`);
  });
}
