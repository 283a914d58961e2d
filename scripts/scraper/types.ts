// scripts/scraper/types.ts

export type ProgressFn = (message: string) => void;

export type ProgressEvent = {
  message: string;
  timestamp: string;
};

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export type ListingBasic = {
  readonly kind: 'basic';
  readonly title: string;
  readonly link: string;
  readonly price: string;
  readonly location: string;
};

export type ListingDetail = {
  kind: 'detail';
  link: string;
  title?: string;
  price?: string;
  location?: string;
  adId?: string;
  description?: string;
  images?: string[];
  sellerName?: string;
  sellerSince?: string;
  sellerProfileUrl?: string;
  specAttributes?: Record<string, string>;
  error?: string;
};

export type FlatValue = string | string[];
export type FlatRecord = Record<string, FlatValue>;

/** A detail merged with its basic card, tagged with the location it came from. */
export type ListingRecord = {
  kind: 'record';
  link: string;
  title: string;
  price: string;
  location: string;
  adId: string;
  description: string;
  images: string[];
  sellerName: string;
  sellerSince: string;
  sellerProfileUrl: string;
  specAttributes: Record<string, string>;
  locationKey: string;
  locationName: string;
  contact: Record<string, FlatValue>;
  error?: string;
};

export type LocationConfig = {
  key: string;
  displayName: string;
  seedUrl: string;
  enabled: boolean;
};

export type StoredCookie = {
  name: string;
  value: string;
  domain: string;
  path: string;
  [extra: string]: unknown;
};

export type CookieSession = {
  cookies: StoredCookie[];
  savedAt: Date;
};

export type ContactPayload = Record<string, unknown>;

export type DelayRange = { min: number; max: number };

export type ScraperConfig = {
  siteUrl: string;
  locationsFile: string;
  selectedLocations: string[];
  maxPages: number;
  maxListings: number;
  pageItemLimit: number;
  navTimeoutMs: number;
  pageWaitMs: number;
  detailWaitMs: number;
  navAttempts: number;
  navRetryDelayMs: number;
  scrollSteps: number;
  scrollPauseMs: number;
  requestDelay: DelayRange;
  longPause: DelayRange;
  longPauseEvery: number;
  workers: number;
  headless: boolean;
  loginTimeoutMs: number;
  cookieFile: string;
  cookieTtlMs: number;
  fetchContacts: boolean;
  contactAttempts: number;
  contactBackoffMs: number;
  rateLimitPauseMs: number;
  contactTimeoutMs: number;
  excludedFields: string[];
  outputDir: string;
  outputJson: string;
  outputZip: string;
};
