import { BrowserSession, SessionPool } from './browser';
import { CONFIG } from './config';
import { CookieStore, hasAuthCookies } from './cookies';
import { LoginTimeoutError, errorMessage } from './errors';
import { HttpSession, HttpSessionFactory, axiosHttpSession } from './httpSession';
import { logger } from './logger';
import { mergeContact } from './merge';
import { isRecord } from './structuredData';
import { ContactPayload, DelayRange, ListingRecord, ProgressFn, StoredCookie } from './types';
import { Progress, RandomSource, Sleep, createProgress, jitter, randomInt, sleep as realSleep } from './utils';

export type ContactOptions = {
  siteUrl: string;
  loginTimeoutMs: number;
  attempts: number;
  backoffMs: number;
  rateLimitPauseMs: number;
  timeoutMs: number;
  requestDelay: DelayRange;
  longPause: DelayRange;
  longPauseEvery: number;
  excludedFields: readonly string[];
  sleep?: Sleep;
  random?: RandomSource;
  now?: () => number;
};

export const defaultContactOptions = (): ContactOptions => ({
  siteUrl: CONFIG.siteUrl,
  loginTimeoutMs: CONFIG.loginTimeoutMs,
  attempts: CONFIG.contactAttempts,
  backoffMs: CONFIG.contactBackoffMs,
  rateLimitPauseMs: CONFIG.rateLimitPauseMs,
  timeoutMs: CONFIG.contactTimeoutMs,
  requestDelay: CONFIG.requestDelay,
  longPause: CONFIG.longPause,
  longPauseEvery: CONFIG.longPauseEvery,
  excludedFields: CONFIG.excludedFields,
});

const AD_ID_IN_LINK = /iid-(\d+)/;
const LOGIN_REPORT_EVERY_MS = 30000;

export function resolveAdId(record: Pick<ListingRecord, 'adId' | 'link'>): string | undefined {
  if (record.adId) return record.adId;
  return record.link.match(AD_ID_IN_LINK)?.[1];
}

export type ContactResult =
  | { ok: true; payload?: ContactPayload }
  | { ok: false; status?: number; error: string };

type AuthSession = {
  http: HttpSession;
  /** Present only when the session came from an interactive login. */
  browser?: BrowserSession;
};

export type EnrichStats = { successes: number; failures: number };

export class ContactEnrichmentClient {
  private readonly options: ContactOptions;
  private readonly httpSession: HttpSessionFactory;
  lastRun: EnrichStats = { successes: 0, failures: 0 };

  constructor(
    private readonly store: CookieStore,
    private readonly pool: SessionPool,
    options: Partial<ContactOptions> = {},
    httpSession?: HttpSessionFactory
  ) {
    this.options = { ...defaultContactOptions(), ...options };
    this.httpSession = httpSession ?? axiosHttpSession(this.options.siteUrl);
  }

  private get homeUrl(): string {
    return `${this.options.siteUrl.replace(/\/+$/, '')}/`;
  }

  contactUrl(adId: string): string {
    return `${this.homeUrl}api/listing/${adId}/contactInfo/`;
  }

  /**
   * Adds seller contact fields to the records in place and returns them.
   * Throws LoginTimeoutError when no session could be established.
   */
  async enrich(listings: ListingRecord[], progressFn?: ProgressFn): Promise<ListingRecord[]> {
    const progress = createProgress(progressFn);
    const byId = new Map<string, ListingRecord[]>();
    for (const record of listings) {
      const adId = resolveAdId(record);
      if (!adId) continue;
      const group = byId.get(adId);
      if (group) group.push(record);
      else byId.set(adId, [record]);
    }

    if (!byId.size) {
      progress('No Ad IDs found in listings.');
      return listings;
    }
    progress(`Found ${byId.size} ads to fetch contacts for...`);

    const auth = await this.acquireSession(progress);
    const stats: EnrichStats = { successes: 0, failures: 0 };
    let nextBrowseAt = randomInt(8, 12, this.options.random);

    try {
      let i = 0;
      for (const [adId, records] of byId) {
        i++;
        const result = await this.fetchWithRetry(auth, adId, records[0].link, i, progress);
        if (result.ok) {
          stats.successes++;
          if (result.payload) {
            for (const record of records) mergeContact(record, result.payload, this.options.excludedFields);
          }
        } else {
          stats.failures++;
          progress(`Failed to fetch contact for ${adId}: ${result.error}`);
        }

        await this.pace(i);
        if (i % 10 === 0) {
          progress(
            `Fetched contacts: ${i}/${byId.size} (${stats.successes} success, ${stats.failures} failed)`
          );
        }
        if (auth.browser && i >= nextBrowseAt) {
          await this.lightBrowsing(auth.browser);
          nextBrowseAt = i + randomInt(8, 12, this.options.random);
        }
      }
    } finally {
      if (auth.browser) await this.pool.release(auth.browser);
    }

    this.lastRun = stats;
    progress(`Contact fetching complete. Success: ${stats.successes}, Failed: ${stats.failures}`);
    return listings;
  }

  /**
   * Runs `enrich` as an optional phase: any failure is reported and the
   * records are returned as they stand. Resolves false when the phase aborted.
   */
  async tryEnrich(listings: ListingRecord[], progressFn?: ProgressFn): Promise<boolean> {
    const progress = createProgress(progressFn);
    try {
      await this.enrich(listings, progressFn);
      return true;
    } catch (err) {
      logger.error('Contact enrichment aborted', { error: errorMessage(err) });
      progress(`Skipping contacts: ${errorMessage(err)}`);
      return false;
    }
  }

  async fetchContact(http: HttpSession, adId: string, referer: string): Promise<ContactResult> {
    try {
      const res = await http.get(this.contactUrl(adId), { Referer: referer }, this.options.timeoutMs);
      if (res.status === 304) return { ok: true };
      if (res.status === 200) {
        return isRecord(res.data)
          ? { ok: true, payload: res.data }
          : { ok: false, status: 200, error: 'Response body is not a JSON object' };
      }
      return { ok: false, status: res.status, error: `HTTP ${res.status}` };
    } catch (err) {
      return { ok: false, error: errorMessage(err) };
    }
  }

  private async fetchWithRetry(
    auth: AuthSession,
    adId: string,
    link: string,
    position: number,
    progress: Progress
  ): Promise<ContactResult> {
    const referer = link || `${this.homeUrl}item/iid-${adId}`;
    let last: ContactResult = { ok: false, error: 'not attempted' };

    for (let attempt = 1; attempt <= this.options.attempts; attempt++) {
      last = await this.fetchContact(auth.http, adId, referer);
      if (last.ok) return last;

      if (last.status === 401 || last.status === 403) {
        if (auth.browser) {
          logger.info('Auth rejected, refreshing cookies from browser', { adId, status: last.status });
          await this.refreshFromBrowser(auth, auth.browser, progress);
        } else {
          progress(`Saved session rejected (HTTP ${last.status}); a fresh login will be needed next run.`);
          await this.store.delete();
        }
      } else if (last.status === 429) {
        progress(`Rate limited at ad ${position}. Pausing...`);
        await this.wait(this.options.rateLimitPauseMs);
      }

      if (attempt < this.options.attempts) await this.wait(this.options.backoffMs * attempt);
    }
    return last;
  }

  private async acquireSession(progress: Progress): Promise<AuthSession> {
    const saved = await this.store.load();
    if (saved && hasAuthCookies(saved.cookies)) {
      const http = this.httpSession(saved.cookies);
      if (await this.checkSession(http, progress)) {
        progress('✅ Using saved login session (no login needed!)');
        return { http };
      }
    }

    progress('Opening browser for login...');
    let browser: BrowserSession;
    try {
      browser = await this.pool.create(false);
    } catch (err) {
      progress(`Browser session could not be created: ${errorMessage(err)}`);
      throw err;
    }
    try {
      progress('Please log in in the browser window...');
      const cookies = await this.waitForLogin(browser, progress);
      progress('Preparing API session...');
      const http = this.httpSession(cookies);
      await this.lightBrowsing(browser);
      return { http, browser };
    } catch (err) {
      await this.pool.release(browser);
      if (err instanceof LoginTimeoutError) progress(err.message);
      throw err;
    }
  }

  /** One cheap authenticated call to see whether saved cookies still work. */
  async checkSession(http: HttpSession, progress: Progress): Promise<boolean> {
    try {
      const res = await http.get(`${this.homeUrl}api/user/`, {}, 10000);
      if (res.status === 200 || res.status === 304) return true;
      if (res.status === 401 || res.status === 403) {
        progress('Saved session expired, need fresh login...');
      }
      return false;
    } catch (err) {
      logger.warn('Session check failed', { error: errorMessage(err) });
      return false;
    }
  }

  private async waitForLogin(browser: BrowserSession, progress: Progress): Promise<StoredCookie[]> {
    const now = this.options.now ?? Date.now;
    const start = now();
    let lastReport = start;

    try {
      await browser.goto(this.homeUrl, 60000);
    } catch (err) {
      logger.warn('Could not open home page for login', { error: errorMessage(err) });
    }
    await this.wait(jitter({ min: 800, max: 1500 }, this.options.random));

    while (now() - start < this.options.loginTimeoutMs) {
      const cookies = await this.readCookies(browser);
      if (hasAuthCookies(cookies)) {
        progress('Login detected! Saving cookies for next time...');
        await this.store.save(cookies);
        return cookies;
      }

      await this.lightBrowsing(browser);
      await this.wait(jitter({ min: 800, max: 1500 }, this.options.random));

      if (now() - lastReport >= LOGIN_REPORT_EVERY_MS) {
        lastReport = now();
        const remaining = Math.max(0, Math.round((this.options.loginTimeoutMs - (lastReport - start)) / 1000));
        progress(`Waiting for login... ${remaining}s remaining`);
      }
    }
    throw new LoginTimeoutError(this.options.loginTimeoutMs);
  }

  /** Keeps the current HTTP session when the browser can no longer hand over cookies. */
  private async refreshFromBrowser(auth: AuthSession, browser: BrowserSession, progress: Progress) {
    try {
      auth.http = this.httpSession(await browser.cookies());
    } catch (err) {
      logger.warn('Could not read cookies from login browser', { error: errorMessage(err) });
      progress(`Could not refresh session from browser: ${errorMessage(err)}`);
    }
  }

  /** A browser that fails to answer counts as not logged in yet. */
  private async readCookies(browser: BrowserSession): Promise<StoredCookie[]> {
    try {
      return await browser.cookies();
    } catch (err) {
      logger.debug('Cookie read failed while waiting for login', { error: errorMessage(err) });
      return [];
    }
  }

  /** A visit to the home page with a scroll or two, so the browser looks used. */
  private async lightBrowsing(browser: BrowserSession): Promise<void> {
    const random = this.options.random;
    try {
      await browser.goto(this.homeUrl, 30000);
      await this.wait(jitter({ min: 800, max: 1500 }, random));
      const scrolls = randomInt(1, 2, random);
      for (let s = 0; s < scrolls; s++) {
        await browser.scrollBy(randomInt(100, 400, random));
        await this.wait(jitter({ min: 400, max: 800 }, random));
      }
      await browser.scrollToTop();
      await this.wait(jitter({ min: 300, max: 600 }, random));
    } catch (err) {
      logger.debug('Light browsing interrupted', { error: errorMessage(err) });
    }
  }

  private pace(position: number): Promise<void> {
    const every = this.options.longPauseEvery;
    const rest = every > 0 && position % every === 0;
    return this.wait(jitter(rest ? this.options.longPause : this.options.requestDelay, this.options.random));
  }

  private wait(ms: number): Promise<void> {
    return (this.options.sleep ?? realSleep)(ms);
  }
}
