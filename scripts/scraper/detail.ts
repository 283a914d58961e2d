import { load } from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { BrowserSession } from './browser';
import { CONFIG } from './config';
import { logger } from './logger';
import { gotoWithRetry, scrollPage } from './navigation';
import {
  DESCRIPTION_SELECTORS,
  DETAIL_AD_ID,
  DETAIL_DESCRIPTION,
  DETAIL_LOCATION,
  DETAIL_PRICE,
  DETAIL_SELLER_NAME,
  DETAIL_SELLER_SINCE,
  DETAIL_TITLE,
  firstMatch,
  nodeText,
  sellerProfile,
} from './selectors';
import { parseStructuredData } from './structuredData';
import { ListingDetail, ProgressFn } from './types';
import { Sleep, cleanText, createProgress, jitter, sleep as realSleep } from './utils';

export type DetailOptions = {
  siteUrl: string;
  navTimeoutMs: number;
  detailWaitMs: number;
  navAttempts: number;
  navRetryDelayMs: number;
  scrollPauseMs: number;
  excludedFields: readonly string[];
  sleep?: Sleep;
};

export const defaultDetailOptions = (): DetailOptions => ({
  siteUrl: CONFIG.siteUrl,
  navTimeoutMs: CONFIG.navTimeoutMs,
  detailWaitMs: CONFIG.detailWaitMs,
  navAttempts: CONFIG.navAttempts,
  navRetryDelayMs: CONFIG.navRetryDelayMs,
  scrollPauseMs: CONFIG.scrollPauseMs,
  excludedFields: CONFIG.excludedFields,
});

/** Fixed record fields, normalised the same way attribute labels are. */
const FIXED_FIELD_KEYS = new Set([
  'ad_id',
  'title',
  'price',
  'location',
  'description',
  'link',
  'images',
  'seller_name',
  'seller_since',
  'seller_profile',
]);

export function specKey(label: string): string {
  return label
    .trim()
    .toLowerCase()
    .replace(/[^\p{L}\p{M}\p{N}]+/gu, '_')
    .replace(/^_+|_+$/g, '');
}

function addSpec(specs: Record<string, string>, fragments: string[], blocked: ReadonlySet<string>) {
  if (fragments.length < 2) return;
  const key = specKey(fragments[0]);
  const value = cleanText(fragments.slice(1).join(' '));
  if (!key || !value || blocked.has(key) || Object.hasOwn(specs, key)) return;
  specs[key] = value;
}

export function extractSpecAttributes(
  $: CheerioAPI,
  excludedFields: readonly string[] = []
): Record<string, string> {
  const blocked = new Set([...FIXED_FIELD_KEYS, ...excludedFields.map(specKey)]);
  const specs: Record<string, string> = {};

  $('ul li, .ad-attributes li').each((_, li) => {
    const fragments = $(li)
      .find('span, div')
      .toArray()
      .map((el) => nodeText($(el)))
      .filter(Boolean);
    addSpec(specs, fragments, blocked);
  });

  $('dl').each((_, dl) => {
    const dts = $(dl).find('dt').toArray();
    const dds = $(dl).find('dd').toArray();
    dts.slice(0, dds.length).forEach((dt, i) => {
      addSpec(specs, [nodeText($(dt)), nodeText($(dds[i]))].filter(Boolean), blocked);
    });
  });

  return specs;
}

const absoluteUrl = (u: string) => /^https?:\/\//i.test(u);

function srcsetUrls(srcset: string | undefined): string[] {
  if (!srcset) return [];
  return srcset
    .split(',')
    .map((entry) => entry.trim().split(/\s+/)[0])
    .filter(Boolean);
}

export function extractImages($: CheerioAPI): string[] {
  const urls = new Set<string>();
  const add = (u: string | undefined) => {
    const trimmed = (u ?? '').trim();
    if (absoluteUrl(trimmed)) urls.add(trimmed);
  };

  $('img').each((_, img) => {
    const el = $(img);
    add(el.attr('src'));
    add(el.attr('data-src'));
    srcsetUrls(el.attr('srcset')).forEach(add);
  });
  $('source').each((_, source) => {
    srcsetUrls($(source).attr('srcset')).forEach(add);
  });

  return [...urls].sort();
}

function descriptionFromChildren($: CheerioAPI): string {
  const node = $(DESCRIPTION_SELECTORS.join(', ')).first();
  if (!node.length) return '';
  const parts = node
    .find('p, span, div')
    .toArray()
    .map((el) => nodeText($(el)))
    .filter(Boolean);
  return parts.length ? parts.join(' ') : nodeText(node);
}

export function parseDetailHtml(
  html: string,
  url: string,
  opts: Pick<DetailOptions, 'siteUrl' | 'excludedFields'>
): ListingDetail {
  const $ = load(html);
  const sd = parseStructuredData($);

  const images = sd.images.length ? sd.images : extractImages($);

  return {
    kind: 'detail',
    link: cleanText(url),
    adId: firstMatch(DETAIL_AD_ID, $),
    title: cleanText(sd.title) || firstMatch(DETAIL_TITLE, $),
    price: cleanText(sd.price) || firstMatch(DETAIL_PRICE, $),
    location: firstMatch(DETAIL_LOCATION, $),
    description:
      cleanText(sd.description) || firstMatch(DETAIL_DESCRIPTION, $) || cleanText(descriptionFromChildren($)),
    images: images.map(cleanText).filter(Boolean),
    sellerName: cleanText(sd.sellerName) || firstMatch(DETAIL_SELLER_NAME, $),
    sellerSince: firstMatch(DETAIL_SELLER_SINCE, $),
    sellerProfileUrl: firstMatch(sellerProfile(opts.siteUrl), $),
    specAttributes: extractSpecAttributes($, opts.excludedFields),
  };
}

/**
 * Loads a listing page and extracts its attributes. A page that never
 * becomes ready yields just the link; navigation failures propagate.
 */
export async function extractDetail(
  session: BrowserSession,
  url: string,
  opts: DetailOptions = defaultDetailOptions(),
  progressFn?: ProgressFn
): Promise<ListingDetail> {
  const wait = opts.sleep ?? realSleep;
  await gotoWithRetry(session, url, {
    attempts: opts.navAttempts,
    delayMs: opts.navRetryDelayMs,
    navTimeoutMs: opts.navTimeoutMs,
    sleep: wait,
    progress: createProgress(progressFn),
  });

  if (!(await session.waitForSelector('body', opts.detailWaitMs))) {
    logger.info('Detail page not ready, keeping link only', { url });
    return { kind: 'detail', link: url };
  }

  await wait(jitter({ min: 300, max: 600 }));
  await scrollPage(session, 2, opts.scrollPauseMs, wait);
  return parseDetailHtml(await session.content(), url, opts);
}
