import { load } from 'cheerio';
import { BrowserSession } from './browser';
import { CONFIG } from './config';
import { errorMessage } from './errors';
import { logger } from './logger';
import { gotoWithRetry, scrollPage } from './navigation';
import { CARD_LOCATION, CARD_PRICE, CARD_TITLE, CardContext, findCard, firstMatch } from './selectors';
import { ListingBasic, ProgressFn, Result } from './types';
import { Sleep, createProgress, sleep as realSleep } from './utils';

export const ITEM_LINK_SELECTOR = 'a[href*="/item/"][href*="iid-"]';

export type DiscoverOptions = {
  navTimeoutMs: number;
  pageWaitMs: number;
  navAttempts: number;
  navRetryDelayMs: number;
  scrollSteps: number;
  scrollPauseMs: number;
  sleep?: Sleep;
};

export const defaultDiscoverOptions = (): DiscoverOptions => ({
  navTimeoutMs: CONFIG.navTimeoutMs,
  pageWaitMs: CONFIG.pageWaitMs,
  navAttempts: CONFIG.navAttempts,
  navRetryDelayMs: CONFIG.navRetryDelayMs,
  scrollSteps: CONFIG.scrollSteps,
  scrollPauseMs: CONFIG.scrollPauseMs,
});

const isItemLink = (href: string) => href.includes('/item/') && href.includes('iid-');

function resolveHref(href: string, pageUrl: string): string | undefined {
  try {
    return new URL(href, pageUrl).href;
  } catch {
    logger.debug('Skipping unparseable href', { href });
    return undefined;
  }
}

export type ParsedCards = {
  /** Unique item links on the page before the cap. */
  total: number;
  listings: ListingBasic[];
};

export function parseListingCards(html: string, pageUrl: string, maxItems?: number): ParsedCards {
  const $ = load(html);
  const seen = new Set<string>();
  const anchors: { ctx: CardContext; link: string }[] = [];

  $(ITEM_LINK_SELECTOR).each((_, el) => {
    const raw = $(el).attr('href');
    if (!raw) return;
    const link = resolveHref(raw, pageUrl);
    if (!link || !isItemLink(link) || seen.has(link)) return;
    seen.add(link);
    anchors.push({ ctx: { anchor: $(el) }, link });
  });

  const take = maxItems === undefined ? anchors : anchors.slice(0, maxItems);
  const listings = take.map(({ ctx, link }): ListingBasic => {
    const withCard: CardContext = { ...ctx, card: findCard(ctx.anchor) };
    return {
      kind: 'basic',
      title: firstMatch(CARD_TITLE, withCard),
      link,
      price: firstMatch(CARD_PRICE, withCard),
      location: firstMatch(CARD_LOCATION, withCard),
    };
  });
  return { total: anchors.length, listings };
}

/**
 * Loads one results page. An empty list means the page had no listings
 * (end of pagination); an error result means the page could not be read.
 */
export async function discover(
  session: BrowserSession,
  url: string,
  maxItems: number,
  opts: DiscoverOptions = defaultDiscoverOptions(),
  progressFn?: ProgressFn
): Promise<Result<ListingBasic[]>> {
  const progress = createProgress(progressFn);
  const wait = opts.sleep ?? realSleep;
  progress(`Loading: ${url}`);
  try {
    await gotoWithRetry(session, url, {
      attempts: opts.navAttempts,
      delayMs: opts.navRetryDelayMs,
      navTimeoutMs: opts.navTimeoutMs,
      sleep: wait,
      progress,
    });

    const ready = await session.waitForSelector(ITEM_LINK_SELECTOR, opts.pageWaitMs);
    if (!ready) {
      progress('No listings found on page (timeout)');
      return { ok: true, value: [] };
    }

    await scrollPage(session, opts.scrollSteps, opts.scrollPauseMs, wait);
    const { total, listings } = parseListingCards(await session.content(), url, maxItems);
    progress(`Found ${total} listings`);
    return { ok: true, value: listings };
  } catch (err) {
    logger.warn('List page failed', { url, error: errorMessage(err) });
    return { ok: false, error: err instanceof Error ? err : new Error(errorMessage(err)) };
  }
}
