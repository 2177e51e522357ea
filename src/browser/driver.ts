import type { Page } from 'playwright';

// ── Public types ─────────────────────────────────────────────

export type WaitCondition = 'networkidle' | 'domcontentloaded' | 'load';

export interface GotoOptions {
  waitUntil: WaitCondition;
  timeout: number;
}

/**
 * The slice of a browser page the executor and navigation need.
 * Every timed wait goes through `wait` so runs stay sequential.
 */
export interface PageDriver {
  goto(url: string, options: GotoOptions): Promise<void>;
  exists(selector: string): Promise<boolean>;
  /** Force an element visible (display / visibility / opacity). */
  reveal(selector: string): Promise<void>;
  click(selector: string, timeout: number): Promise<void>;
  fill(selector: string, value: string, timeout: number): Promise<void>;
  content(): Promise<string>;
  url(): string;
  title(): Promise<string>;
  screenshot(filePath: string): Promise<void>;
  wait(ms: number): Promise<void>;
}

// ── Playwright adapter ───────────────────────────────────────

export function createPlaywrightDriver(page: Page): PageDriver {
  return {
    async goto(url: string, options: GotoOptions): Promise<void> {
      await page.goto(url, {
        waitUntil: options.waitUntil,
        timeout: options.timeout,
      });
    },

    async exists(selector: string): Promise<boolean> {
      const handle = await page.$(selector);
      if (!handle) return false;
      await handle.dispose();
      return true;
    },

    async reveal(selector: string): Promise<void> {
      // Runs inside the page: no outer-scope references.
      await page.$eval(selector, (el) => {
        if (!(el instanceof HTMLElement)) return;
        el.style.display = 'block';
        el.style.visibility = 'visible';
        el.style.opacity = '1';
      });
    },

    async click(selector: string, timeout: number): Promise<void> {
      await page.click(selector, { timeout });
    },

    async fill(selector: string, value: string, timeout: number): Promise<void> {
      await page.fill(selector, value, { timeout });
    },

    content(): Promise<string> {
      return page.content();
    },

    url(): string {
      return page.url();
    },

    title(): Promise<string> {
      return page.title();
    },

    async screenshot(filePath: string): Promise<void> {
      await page.screenshot({ path: filePath });
    },

    wait(ms: number): Promise<void> {
      return page.waitForTimeout(ms);
    },
  };
}
