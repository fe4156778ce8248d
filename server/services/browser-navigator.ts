import { chromium, type Browser, type Page } from 'playwright-core';
import { errorMessage, FetchError, withTimeout } from '../errors';

export type PageFetch =
  | { kind: 'markup'; html: string }
  | { kind: 'no_results' };

/**
 * One browser session per run: open() once, fetchPage() per date, close() on every exit path.
 * fetchPage() throws FetchError on navigation failure or timeout.
 */
export interface BrowserNavigator {
  open(): Promise<void>;
  fetchPage(date: string): Promise<PageFetch>;
  close(): Promise<void>;
}

export interface ClassifiedsNavigatorOptions {
  sourceUrl: string;
  chromiumPath?: string;
  timeoutMs: number;
}

const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const DATE_DROPDOWN = 'button.btn-default.dropdown-toggle';
const NO_RESULTS = 'No results found';

/** Label of a date in the section's dropdown, e.g. "2025-12-13, Sat". */
export function dropdownLabel(isoDate: string): string {
  const day = new Date(`${isoDate}T00:00:00Z`).getUTCDay();
  return `${isoDate}, ${WEEKDAYS[day]}`;
}

export class ClassifiedsNavigator implements BrowserNavigator {
  private browser: Browser | null = null;
  private page: Page | null = null;

  constructor(private options: ClassifiedsNavigatorOptions) {}

  async open(): Promise<void> {
    if (this.browser) return;

    this.browser = await chromium.launch({
      headless: true,
      executablePath: this.options.chromiumPath,
    });
    const context = await this.browser.newContext();
    this.page = await context.newPage();
    console.log('[NAVIGATOR] 🌐 Browser session opened');
  }

  async fetchPage(date: string): Promise<PageFetch> {
    const page = this.page;
    if (!page) {
      throw new FetchError(date, 'navigator is not open');
    }

    try {
      return await withTimeout(this.selectDate(page, date), this.options.timeoutMs, `navigation for ${date}`);
    } catch (error) {
      throw new FetchError(date, errorMessage(error), { cause: error });
    }
  }

  private async selectDate(page: Page, date: string): Promise<PageFetch> {
    const label = dropdownLabel(date);
    console.log(`[NAVIGATOR] 📅 Selecting ${label}`);

    await page.goto(this.options.sourceUrl, { waitUntil: 'networkidle', timeout: this.options.timeoutMs });

    const dropdown = page.locator(DATE_DROPDOWN).first();
    await dropdown.waitFor({ state: 'visible', timeout: 5000 });
    await dropdown.click();

    const option = page.locator('a', { hasText: label }).first();
    if (await option.count() === 0) {
      console.log(`[NAVIGATOR] Date option not found: ${label}`);
      return { kind: 'no_results' };
    }

    await option.click();
    await page.waitForLoadState('networkidle', { timeout: this.options.timeoutMs });

    const html = await page.content();
    if (html.includes(NO_RESULTS)) {
      return { kind: 'no_results' };
    }
    return { kind: 'markup', html };
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.page = null;
    if (browser) {
      await browser.close();
      console.log('[NAVIGATOR] Browser session closed');
    }
  }
}
