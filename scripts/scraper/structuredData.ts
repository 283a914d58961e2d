import type { CheerioAPI } from 'cheerio';
import { logger } from './logger';
import { errorMessage } from './errors';

export type StructuredFields = {
  title?: string;
  description?: string;
  price?: string;
  images: string[];
  sellerName?: string;
};

const LISTING_TYPES = new Set(['Product', 'Offer', 'Vehicle', 'Car', 'WebPage', 'Organization']);

export const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === 'object' && v !== null && !Array.isArray(v);

const scalar = (v: unknown): string | undefined => {
  if (typeof v === 'string') return v.trim() || undefined;
  if (typeof v === 'number' && Number.isFinite(v)) return String(v);
  return undefined;
};

function typesOf(obj: Record<string, unknown>): string[] {
  const t = obj['@type'];
  if (Array.isArray(t)) return t.filter((x): x is string => typeof x === 'string');
  return typeof t === 'string' ? [t] : [];
}

function offerPrice(offers: unknown): string | undefined {
  const offer = Array.isArray(offers) ? offers.find(isRecord) : offers;
  if (!isRecord(offer)) return undefined;
  const price = scalar(offer.price);
  if (!price) return undefined;
  return `${scalar(offer.priceCurrency) ?? ''} ${price}`.trim();
}

/** Reads JSON-LD blocks; the first block to supply a field wins it. */
export function parseStructuredData($: CheerioAPI): StructuredFields {
  const out: StructuredFields = { images: [] };

  $('script[type="application/ld+json"]').each((_, el) => {
    const raw = $(el).text();
    if (!raw.trim()) return;
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      logger.debug('Skipping invalid JSON-LD block', { error: errorMessage(err) });
      return;
    }

    const objects = (Array.isArray(parsed) ? parsed : [parsed]).filter(isRecord);
    for (const obj of objects) {
      if (!typesOf(obj).some((t) => LISTING_TYPES.has(t))) continue;

      out.title = out.title || scalar(obj.name) || scalar(obj.headline);
      out.description = out.description || scalar(obj.description);
      out.price = out.price || offerPrice(obj.offers);
      if (isRecord(obj.seller)) out.sellerName = out.sellerName || scalar(obj.seller.name);

      const img = obj.image;
      if (Array.isArray(img)) {
        out.images.push(...img.filter((i): i is string => typeof i === 'string'));
      } else if (typeof img === 'string') {
        out.images.push(img);
      }
    }
  });

  out.images = [...new Set(out.images)].sort();
  return out;
}
