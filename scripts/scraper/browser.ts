import { chromium, errors, Browser, BrowserContext, LaunchOptions, Page } from 'playwright';
import { logger } from './logger';
import { SessionCreationError, errorMessage } from './errors';
import { StoredCookie } from './types';

export const DESKTOP_UA =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 ' +
  '(KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36';

export const WINDOW_SIZE = { width: 1920, height: 1080 };

const LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  `--window-size=${WINDOW_SIZE.width},${WINDOW_SIZE.height}`,
  '--lang=en-US',
  '--disable-extensions',
  '--disable-infobars',
  '--disable-notifications',
  '--disable-blink-features=AutomationControlled',
];

const MASK_WEBDRIVER =
  "Object.defineProperty(navigator, 'webdriver', { get: () => undefined });";

export interface BrowserSession {
  readonly id: number;
  goto(url: string, timeoutMs: number): Promise<void>;
  /** Resolves false when the selector did not appear in time. */
  waitForSelector(selector: string, timeoutMs: number): Promise<boolean>;
  scrollToBottom(): Promise<void>;
  scrollBy(px: number): Promise<void>;
  scrollToTop(): Promise<void>;
  content(): Promise<string>;
  cookies(): Promise<StoredCookie[]>;
  isAlive(): boolean;
  close(): Promise<void>;
}

export type SessionFactory = (headless: boolean) => Promise<BrowserSession>;
export type BrowserLauncher = (options: LaunchOptions) => Promise<Browser>;

let nextSessionId = 1;

export class PlaywrightSession implements BrowserSession {
  readonly id = nextSessionId++;
  private closed = false;

  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page
  ) {}

  async goto(url: string, timeoutMs: number): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
  }

  async waitForSelector(selector: string, timeoutMs: number): Promise<boolean> {
    try {
      await this.page.waitForSelector(selector, { state: 'attached', timeout: timeoutMs });
      return true;
    } catch (err) {
      if (err instanceof errors.TimeoutError) return false;
      throw err;
    }
  }

  async scrollToBottom(): Promise<void> {
    await this.page.evaluate('window.scrollTo(0, document.body.scrollHeight)');
  }

  async scrollBy(px: number): Promise<void> {
    await this.page.mouse.wheel(0, px);
  }

  async scrollToTop(): Promise<void> {
    await this.page.evaluate('window.scrollTo(0, 0)');
  }

  async content(): Promise<string> {
    return this.page.content();
  }

  async cookies(): Promise<StoredCookie[]> {
    const cookies = await this.context.cookies();
    return cookies.map((c) => ({ ...c }));
  }

  isAlive(): boolean {
    return !this.closed && this.browser.isConnected() && !this.page.isClosed();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.browser.close();
  }
}

export function launchOptions(headless: boolean): LaunchOptions {
  return {
    headless,
    args: LAUNCH_ARGS,
    ignoreDefaultArgs: ['--enable-automation'],
  };
}

export const launchChromium: BrowserLauncher = (options) => chromium.launch(options);

let stealthReady: Promise<BrowserLauncher> | undefined;

/** playwright-extra with the stealth plugin, loaded only when the primary launch fails. */
export const launchStealthChromium: BrowserLauncher = async (options) => {
  if (!stealthReady) {
    stealthReady = (async () => {
      const { chromium: extraChromium } = await import('playwright-extra');
      const { default: StealthPlugin } = await import('puppeteer-extra-plugin-stealth');
      extraChromium.use(StealthPlugin());
      return (o: LaunchOptions) => extraChromium.launch(o);
    })();
  }
  const launch = await stealthReady;
  return launch(options);
};

export async function createBrowserSession(
  headless: boolean,
  launchers: readonly [BrowserLauncher, BrowserLauncher] = [launchChromium, launchStealthChromium]
): Promise<BrowserSession> {
  const [primary, fallback] = launchers;
  let browser: Browser;
  try {
    browser = await primary(launchOptions(headless));
  } catch (primaryError) {
    logger.warn('Primary browser launch failed, trying stealth fallback', {
      error: errorMessage(primaryError),
    });
    try {
      browser = await fallback(launchOptions(headless));
    } catch (fallbackError) {
      throw new SessionCreationError(
        `Failed to launch a browser. Ensure Chromium is installed (npx playwright install chromium). ` +
          `Error: ${errorMessage(primaryError)}`,
        { cause: fallbackError }
      );
    }
  }

  try {
    const context = await browser.newContext({
      userAgent: DESKTOP_UA,
      viewport: WINDOW_SIZE,
      locale: 'en-US',
    });
    await context.addInitScript({ content: MASK_WEBDRIVER });
    const page = await context.newPage();
    return new PlaywrightSession(browser, context, page);
  } catch (err) {
    await browser.close();
    throw new SessionCreationError(`Failed to open a browser context: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

/**
 * Tracks every session it hands out so a run can force-close leaked ones.
 * Membership changes are synchronous, so concurrent workers never interleave them.
 */
export class SessionPool {
  private readonly active = new Set<BrowserSession>();

  constructor(private readonly factory: SessionFactory = createBrowserSession) {}

  get size(): number {
    return this.active.size;
  }

  async create(headless: boolean): Promise<BrowserSession> {
    const session = await this.factory(headless);
    this.active.add(session);
    logger.debug('Browser session opened', { id: session.id, active: this.active.size });
    return session;
  }

  async release(session: BrowserSession): Promise<void> {
    this.active.delete(session);
    try {
      await session.close();
    } catch (err) {
      logger.warn('Failed to close browser session', { id: session.id, error: errorMessage(err) });
    }
  }

  async closeAll(): Promise<void> {
    const sessions = [...this.active];
    this.active.clear();
    const results = await Promise.allSettled(sessions.map((s) => s.close()));
    results.forEach((r, i) => {
      if (r.status === 'rejected') {
        logger.warn('Failed to close browser session', {
          id: sessions[i].id,
          error: errorMessage(r.reason),
        });
      }
    });
  }
}
