import { mkdir } from 'node:fs/promises';

import { chromium } from 'playwright';

import { MOBILE_DEVICE } from '../config/defaults.js';
import { attachDiagnostics } from './capture.js';
import { createPlaywrightDriver } from './driver.js';
import type { PageDriver } from './driver.js';

// ── Public types ─────────────────────────────────────────────

export interface SessionConfig {
  headless: boolean;
  screenshotDir: string;
}

/** One browser context + page, owned by a single run. */
export interface BrowserSession {
  readonly driver: PageDriver;
  close(): Promise<void>;
}

export type SessionLauncher = () => Promise<BrowserSession>;

// ── Session launcher ─────────────────────────────────────────

export async function launchSession(
  config: SessionConfig,
): Promise<BrowserSession> {
  await mkdir(config.screenshotDir, { recursive: true });

  const browser = await chromium.launch({ headless: config.headless });

  try {
    const context = await browser.newContext({
      viewport: { ...MOBILE_DEVICE.viewport },
      userAgent: MOBILE_DEVICE.userAgent,
    });
    const page = await context.newPage();
    attachDiagnostics(page);

    return {
      driver: createPlaywrightDriver(page),

      async close(): Promise<void> {
        try {
          await context.close();
        } finally {
          await browser.close();
        }
      },
    };
  } catch (err) {
    await browser.close();
    throw err;
  }
}

export function createSessionLauncher(config: SessionConfig): SessionLauncher {
  return () => launchSession(config);
}
