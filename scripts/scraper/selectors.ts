import type { Cheerio, CheerioAPI } from 'cheerio';
import { AnyNode, Element, hasChildren, isTag, isText } from 'domhandler';
import { cleanText } from './utils';

/**
 * One way of reading a field. The site's markup shifts often, so every field
 * is an ordered list of these and the first non-empty answer wins.
 */
export type Strategy<C> = (ctx: C) => string | undefined;

export function firstMatch<C>(strategies: readonly Strategy<C>[], ctx: C): string {
  for (const strategy of strategies) {
    const value = cleanText(strategy(ctx));
    if (value) return value;
  }
  return '';
}

const SKIP_TAGS = new Set(['script', 'style', 'noscript']);

function collectText(nodes: readonly AnyNode[], out: string[]): void {
  for (const node of nodes) {
    if (isText(node)) {
      const t = node.data.replace(/\s+/g, ' ').trim();
      if (t) out.push(t);
    } else if (isTag(node) && SKIP_TAGS.has(node.name)) {
      continue;
    } else if (hasChildren(node)) {
      collectText(node.children, out);
    }
  }
}

/** Rendered-ish text: every text node trimmed, joined by single spaces. */
export function nodeText<T extends AnyNode>(node: Cheerio<T>): string {
  const out: string[] = [];
  collectText(node.toArray(), out);
  return out.join(' ');
}

// ---------- document-level strategies ----------

export const selectText =
  (selector: string): Strategy<CheerioAPI> =>
  ($) => {
    const el = $(selector).first();
    return el.length ? nodeText(el) : undefined;
  };

export const selectAttr =
  (selector: string, attr: string): Strategy<CheerioAPI> =>
  ($) =>
    $(selector).first().attr(attr);

export const matchInBody =
  (pattern: RegExp): Strategy<CheerioAPI> =>
  ($) =>
    nodeText($('body')).match(pattern)?.[1];

// ---------- list-card strategies ----------

export type CardContext = {
  anchor: Cheerio<Element>;
  card?: Cheerio<AnyNode>;
};

export const CARD_SELECTORS = [
  'div[aria-label="Ad"]',
  'div[data-cy="l-card"]',
  'div[class*="_70cdfb32"]',
  'div[class*="_63a946ba"]',
  'article',
];

export function findCard(anchor: Cheerio<Element>): Cheerio<AnyNode> | undefined {
  for (const selector of CARD_SELECTORS) {
    const card = anchor.closest(selector);
    if (card.length) return card.first();
  }
  return undefined;
}

export const anchorAttr =
  (attr: string): Strategy<CardContext> =>
  ({ anchor }) =>
    anchor.attr(attr);

export const cardText =
  (selector: string): Strategy<CardContext> =>
  ({ card }) => {
    const el = card?.find(selector).first();
    return el && el.length ? nodeText(el) : undefined;
  };

export const CARD_TITLE: readonly Strategy<CardContext>[] = [
  anchorAttr('title'),
  cardText('[aria-label="Title"] h1, [aria-label="Title"] h2, [aria-label="Title"] span, [aria-label="Title"] div'),
  cardText('[class*="_34bc0d5f"] h1, [class*="_34bc0d5f"] h2, [class*="_34bc0d5f"] span, [class*="_34bc0d5f"] div'),
  cardText('[class*="_562a2db2"]'),
];

export const CARD_PRICE: readonly Strategy<CardContext>[] = [
  cardText('[aria-label="Price"] span, [aria-label="Price"] div'),
  cardText('span[class*="ddc1b288"]'),
];

export const CARD_LOCATION: readonly Strategy<CardContext>[] = [
  cardText('[aria-label="Location"] span, [aria-label="Location"] div'),
  cardText('div[class*="f7d5e47e"]'),
];

// ---------- detail-page strategies ----------

export const DESCRIPTION_SELECTORS = [
  '[data-aut-id="itemDescriptionContent"]',
  '[data-testid="ad-description"]',
  '#description',
  '.description',
  '[itemprop="description"]',
];

export const DETAIL_TITLE = [
  selectText('h1'),
  selectText('[data-testid="ad-title"]'),
  selectText('h1._562a2db2'),
  selectText('h1[itemprop="name"]'),
];

export const DETAIL_PRICE = [
  selectText('[aria-label="Price"] span'),
  selectText('[data-testid="ad-price"]'),
  selectText('span.ddc1b288'),
  selectText('.price'),
  selectText('[itemprop="price"]'),
];

export const DETAIL_DESCRIPTION = DESCRIPTION_SELECTORS.map(selectText);

export const DETAIL_LOCATION = [
  selectText('[data-aut-id="item-location"]'),
  selectText('.seller-location'),
  selectText('[aria-label="Location"]'),
  selectText('div.f7d5e47e'),
];

export const DETAIL_SELLER_NAME = [
  selectText('[data-testid="seller-name"]'),
  selectText('[data-aut-id="profileCard"] h4'),
];

export const DETAIL_SELLER_SINCE = [selectText('.seller-since'), selectText('[data-aut-id="sellerSince"]')];

export const DETAIL_AD_ID: readonly Strategy<CheerioAPI>[] = [
  ($) => {
    const raw = selectText('[data-aut-id="adId"]')($);
    return raw?.replace(/Ad\s*ID/i, '').replace(/:/g, '');
  },
  matchInBody(/Ad\s*ID\s*:\s*(\w+)/i),
];

export const sellerProfile = (siteUrl: string): readonly Strategy<CheerioAPI>[] => [
  ($) => {
    const href = selectAttr('a[href*="/profile/"]', 'href')($);
    return href ? new URL(href, siteUrl).href : undefined;
  },
];
