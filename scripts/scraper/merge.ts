import { isRecord } from './structuredData';
import {
  ContactPayload,
  FlatRecord,
  FlatValue,
  ListingBasic,
  ListingDetail,
  ListingRecord,
  LocationConfig,
} from './types';
import { cleanText } from './utils';

export const FIELD_LABELS = {
  adId: 'Ad ID',
  title: 'Title',
  price: 'Price',
  location: 'Location',
  description: 'Description',
  link: 'Link',
  images: 'Images',
  sellerName: 'Seller Name',
  sellerSince: 'Seller Since',
  sellerProfileUrl: 'seller_profile',
  locationKey: 'Location Key',
  locationName: 'Location Name',
} as const;

const pick = (detail: string | undefined, basic: string | undefined): string =>
  cleanText(detail) || cleanText(basic);

/** Detail values win; basic card values fill whatever the detail page left empty. */
export function mergeListing(
  basic: ListingBasic,
  detail: ListingDetail,
  location: Pick<LocationConfig, 'key' | 'displayName'>
): ListingRecord {
  const record: ListingRecord = {
    kind: 'record',
    link: pick(detail.link, basic.link),
    title: pick(detail.title, basic.title),
    price: pick(detail.price, basic.price),
    location: pick(detail.location, basic.location),
    adId: cleanText(detail.adId),
    description: cleanText(detail.description),
    images: [...(detail.images ?? [])],
    sellerName: cleanText(detail.sellerName),
    sellerSince: cleanText(detail.sellerSince),
    sellerProfileUrl: cleanText(detail.sellerProfileUrl),
    specAttributes: { ...(detail.specAttributes ?? {}) },
    locationKey: location.key,
    locationName: location.displayName,
    contact: {},
  };
  if (detail.error) record.error = detail.error;
  return record;
}

/** Output shape for export collaborators. Earlier sources keep their keys. */
export function toFlatRecord(record: ListingRecord): FlatRecord {
  const flat: FlatRecord = {
    [FIELD_LABELS.adId]: record.adId,
    [FIELD_LABELS.title]: record.title,
    [FIELD_LABELS.price]: record.price,
    [FIELD_LABELS.location]: record.location,
    [FIELD_LABELS.description]: record.description,
    [FIELD_LABELS.link]: record.link,
    [FIELD_LABELS.images]: [...record.images],
    [FIELD_LABELS.sellerName]: record.sellerName,
    [FIELD_LABELS.sellerSince]: record.sellerSince,
    [FIELD_LABELS.sellerProfileUrl]: record.sellerProfileUrl,
    [FIELD_LABELS.locationKey]: record.locationKey,
    [FIELD_LABELS.locationName]: record.locationName,
  };
  for (const [k, v] of Object.entries(record.specAttributes)) {
    if (!Object.hasOwn(flat, k)) flat[k] = v;
  }
  for (const [k, v] of Object.entries(record.contact)) {
    if (!Object.hasOwn(flat, k)) flat[k] = Array.isArray(v) ? [...v] : v;
  }
  return flat;
}

function flatValue(v: unknown): FlatValue {
  if (v === null || v === undefined) return '';
  if (Array.isArray(v)) return v.map((x) => (typeof x === 'string' ? x : JSON.stringify(x)));
  if (isRecord(v)) return JSON.stringify(v);
  return String(v);
}

/**
 * Copies contact keys into the record. A key is skipped when the record
 * already has it or it is excluded; scraped values are never replaced.
 */
export function mergeContact(
  record: ListingRecord,
  payload: ContactPayload,
  excludedFields: readonly string[]
): string[] {
  const present = toFlatRecord(record);
  const excluded = new Set(excludedFields);
  const merged: string[] = [];
  for (const [k, v] of Object.entries(payload)) {
    if (excluded.has(k) || Object.hasOwn(present, k)) continue;
    record.contact[k] = flatValue(v);
    merged.push(k);
  }
  return merged;
}
