import fs from 'node:fs';
import path from 'node:path';
import { chromium, errors } from 'playwright-core';
import type { Browser, BrowserContext, Locator, Page } from 'playwright-core';
import type { BrowserConfig, PageButton, RawControl } from '../types/index.js';
import { BrowserTimeout, FieldDetectionFailure, UploadFailure } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { matchOption } from './page-inspector.js';
import {
  humanClick,
  humanDelay,
  humanFillInput,
  humanScrollToElement,
  humanSelectOption,
  humanUploadFile,
  randomBetween,
} from '../utils/human.js';

/** Everything an attempt needs from a browser page. */
export interface BrowserCapability {
  navigate(url: string): Promise<void>;
  findFields(): Promise<RawControl[]>;
  findButtons(): Promise<PageButton[]>;
  type(selector: string, value: string): Promise<void>;
  select(selector: string, value: string): Promise<void>;
  click(selector: string, options?: ClickOptions): Promise<void>;
  upload(selector: string, filePath: string): Promise<void>;
  currentUrl(): Promise<string>;
  pageText(): Promise<string>;
  /** Screenshot plus page HTML; returns the written file paths. */
  captureArtifacts(dir: string, name: string): Promise<string[]>;
}

export interface ClickOptions {
  /** The click may load another page: wait briefly for the URL to change. */
  expectNavigation?: boolean;
}

const MARKER = 'data-apply-agent-id';

// How long a navigating click waits for the URL to change
const NAVIGATION_GRACE_MS = 5000;

// Playwright reports these when the page navigates mid-call
const NAVIGATION_RACE = /Execution context was destroyed|Element is not attached to the DOM|Frame was detached|Cannot find context with specified id/i;

/**
 * Playwright timeouts and navigation races become `BrowserTimeout`, which the
 * engine retries; anything else is returned unchanged.
 */
export function toBrowserError(action: string, error: unknown): unknown {
  if (error instanceof errors.TimeoutError) {
    return new BrowserTimeout(`${action} timed out: ${error.message.split('\n')[0]}`);
  }
  if (error instanceof Error && NAVIGATION_RACE.test(error.message)) {
    return new BrowserTimeout(`${action} was interrupted by a navigation: ${error.message.split('\n')[0]}`);
  }
  return error;
}

export class PlaywrightBrowser implements BrowserCapability {
  private constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly config: BrowserConfig
  ) {}

  static async launch(config: BrowserConfig): Promise<PlaywrightBrowser> {
    logger.action('Launching browser...');

    // Randomize viewport slightly for fingerprint variation
    const viewportWidth = randomBetween(1280, 1400);
    const viewportHeight = randomBetween(800, 900);

    const browser = await chromium.launch({
      headless: config.headless,
      slowMo: config.slowMo,
      executablePath: config.executablePath,
      args: [
        '--disable-blink-features=AutomationControlled',
        `--window-size=${viewportWidth},${viewportHeight}`,
        '--no-sandbox',
        '--disable-dev-shm-usage',
      ],
    });

    const context = await browser.newContext({
      viewport: { width: viewportWidth, height: viewportHeight },
      locale: 'en-US',
    });

    await context.addInitScript(() => {
      Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
    });

    const page = await context.newPage();
    page.setDefaultTimeout(config.implicitWait * 1000);
    page.setDefaultNavigationTimeout(config.pageLoadTimeout * 1000);

    logger.success(`Browser launched (${viewportWidth}x${viewportHeight})`);
    return new PlaywrightBrowser(browser, context, page, config);
  }

  async navigate(url: string): Promise<void> {
    logger.action(`Navigating to ${url}`);
    await this.guard(`Loading ${url}`, async () => {
      await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.config.pageLoadTimeout * 1000 });
    });
    await humanDelay();
  }

  async findFields(): Promise<RawControl[]> {
    const prefix = `f${Date.now().toString(36)}`;
    return this.guard('Reading form fields', () =>
      this.page.evaluate(
        ({ marker, prefix }) => {
          const controls: RawControl[] = [];
          const elements = Array.from(document.querySelectorAll('input, textarea, select'));

          elements.forEach((element, index) => {
            if (
              !(element instanceof HTMLInputElement) &&
              !(element instanceof HTMLTextAreaElement) &&
              !(element instanceof HTMLSelectElement)
            ) {
              return;
            }

            let id = element.getAttribute(marker);
            if (!id) {
              id = `${prefix}-${index}`;
              element.setAttribute(marker, id);
            }

            const style = window.getComputedStyle(element);
            const visible =
              element.getClientRects().length > 0 && style.visibility !== 'hidden' && style.display !== 'none';

            let labelText: string | undefined;
            if (element.id) {
              const forLabel = document.querySelector(`label[for="${CSS.escape(element.id)}"]`);
              labelText = forLabel?.textContent ?? undefined;
            }
            if (!labelText) {
              labelText = element.closest('label')?.textContent ?? undefined;
            }
            if (!labelText) {
              const labelledBy = element.getAttribute('aria-labelledby');
              if (labelledBy) {
                labelText = labelledBy
                  .split(/\s+/)
                  .map((ref) => document.getElementById(ref)?.textContent ?? '')
                  .join(' ');
              }
            }

            const control: RawControl = {
              selector: `[${marker}="${id}"]`,
              tag: element.tagName.toLowerCase(),
              name: element.name || undefined,
              id: element.id || undefined,
              labelText: labelText?.trim() || undefined,
              ariaLabel: element.getAttribute('aria-label') ?? undefined,
              required: element.required || element.getAttribute('aria-required') === 'true',
              value: element.value,
              visible,
              disabled: element.disabled,
            };

            if (element instanceof HTMLInputElement) {
              control.type = element.type;
              control.placeholder = element.placeholder || undefined;
              control.checked = element.checked;
            } else if (element instanceof HTMLTextAreaElement) {
              control.placeholder = element.placeholder || undefined;
            } else {
              control.options = Array.from(element.options)
                .map((option) => option.text.trim())
                .filter((text) => text.length > 0);
            }

            controls.push(control);
          });

          return controls;
        },
        { marker: MARKER, prefix }
      )
    );
  }

  async findButtons(): Promise<PageButton[]> {
    const prefix = `b${Date.now().toString(36)}`;
    return this.guard('Reading page buttons', () =>
      this.page.evaluate(
        ({ marker, prefix }) => {
          const buttons: PageButton[] = [];
          const elements = Array.from(
            document.querySelectorAll('button, input[type="submit"], input[type="button"], [role="button"], a')
          );

          elements.forEach((element, index) => {
            if (!(element instanceof HTMLElement)) return;

            let id = element.getAttribute(marker);
            if (!id) {
              id = `${prefix}-${index}`;
              element.setAttribute(marker, id);
            }

            const text =
              element instanceof HTMLInputElement
                ? element.value
                : element.innerText || element.getAttribute('aria-label') || '';
            const style = window.getComputedStyle(element);

            buttons.push({
              selector: `[${marker}="${id}"]`,
              text: text.replace(/\s+/g, ' ').trim(),
              type:
                element instanceof HTMLButtonElement || element instanceof HTMLInputElement ? element.type : undefined,
              visible: element.getClientRects().length > 0 && style.visibility !== 'hidden',
            });
          });

          return buttons;
        },
        { marker: MARKER, prefix }
      )
    );
  }

  async type(selector: string, value: string): Promise<void> {
    await this.guard(`Typing into ${selector}`, () => humanFillInput(this.page, this.locate(selector), value));
  }

  async select(selector: string, value: string): Promise<void> {
    const locator = this.locate(selector);
    await this.guard(`Selecting in ${selector}`, async () => {
      const options = await locator.evaluate((element) =>
        element instanceof HTMLSelectElement
          ? Array.from(element.options).map((option) => ({ value: option.value, label: option.text }))
          : []
      );
      const choice = matchOption(options, value);
      if (choice === undefined) {
        throw new FieldDetectionFailure(`No option of ${selector} matches "${value}"`);
      }
      await humanSelectOption(this.page, locator, choice);
    });
  }

  async click(selector: string, options: ClickOptions = {}): Promise<void> {
    const locator = this.locate(selector);
    logger.action(`Clicking ${selector}`);
    const before = this.page.url();
    await this.guard(`Clicking ${selector}`, async () => {
      await humanScrollToElement(this.page, locator);
      await humanClick(this.page, locator);
    });
    if (!options.expectNavigation) return;

    try {
      await this.page.waitForURL((url) => url.href !== before, {
        timeout: NAVIGATION_GRACE_MS,
        waitUntil: 'domcontentloaded',
      });
    } catch (error) {
      if (!(error instanceof errors.TimeoutError)) throw toBrowserError(`Waiting after clicking ${selector}`, error);
      logger.debug(`No navigation within ${NAVIGATION_GRACE_MS}ms of clicking ${selector}`);
    }
  }

  async upload(selector: string, filePath: string): Promise<void> {
    if (!fs.existsSync(filePath)) {
      throw new UploadFailure(`File not found: ${filePath}`);
    }
    logger.action(`Uploading ${path.basename(filePath)}`);
    await this.guard(`Uploading to ${selector}`, () => humanUploadFile(this.locate(selector), filePath));
  }

  async currentUrl(): Promise<string> {
    return this.page.url();
  }

  async pageText(): Promise<string> {
    return this.guard('Reading page text', () => this.page.innerText('body'));
  }

  async captureArtifacts(dir: string, name: string): Promise<string[]> {
    fs.mkdirSync(dir, { recursive: true });
    const base = path.join(dir, `${name.replace(/[^\w.-]+/g, '_')}-${Date.now()}`);
    const screenshotPath = `${base}.png`;
    const htmlPath = `${base}.html`;

    await this.page.screenshot({ path: screenshotPath, fullPage: true });
    fs.writeFileSync(htmlPath, await this.page.content(), 'utf8');
    logger.debug(`Artifacts saved: ${screenshotPath}, ${htmlPath}`);
    return [screenshotPath, htmlPath];
  }

  async close(): Promise<void> {
    logger.action('Closing browser...');
    await this.page.close();
    await this.context.close();
    await this.browser.close();
    logger.success('Browser closed');
  }

  private locate(selector: string): Locator {
    return this.page.locator(selector).first();
  }

  private async guard<T>(action: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      throw toBrowserError(action, error);
    }
  }
}
