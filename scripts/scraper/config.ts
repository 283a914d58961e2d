import * as path from 'path';
import { ScraperConfig } from './types';

export const envInt = (v: string | undefined, fallback: number): number => {
  if (v === undefined || v === null || v === '') return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? Math.trunc(n) : fallback;
};

export const envFloat = (v: string | undefined, fallback: number): number => {
  if (v === undefined || v === '') return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? n : fallback;
};

export const envBool = (v: string | undefined, fallback: boolean): boolean => {
  if (v === undefined || v === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(v.trim().toLowerCase());
};

export const envList = (v: string | undefined, fallback: string[] = []): string[] => {
  if (v === undefined || v.trim() === '') return fallback;
  return v
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
};

export const COOKIE_TTL_MS = 7 * 24 * 60 * 60 * 1000;

export const DEFAULT_EXCLUDED_FIELDS = [
  'Breadcrumb Path',
  'Posted',
  'chat_available',
  'call_available',
  'Thumbnail Image',
  'proxyMobile',
  'roles',
];

export const CONFIG: ScraperConfig = {
  siteUrl: process.env.SCRAPER_SITE_URL || 'https://www.olx.com.pk',
  locationsFile:
    process.env.SCRAPER_LOCATIONS_FILE || path.resolve(process.cwd(), 'config', 'locations.json'),
  selectedLocations: envList(process.env.SCRAPER_LOCATIONS),
  maxPages: envInt(process.env.SCRAPER_PAGE_LIMIT, 5),
  maxListings: envInt(process.env.SCRAPER_LIMIT, 50),
  pageItemLimit: envInt(process.env.SCRAPER_PAGE_ITEMS, 24),
  navTimeoutMs: envInt(process.env.NAV_TIMEOUT_MS, 30000),
  pageWaitMs: envInt(process.env.PAGE_WAIT_MS, 10000),
  detailWaitMs: envInt(process.env.DETAIL_WAIT_MS, 8000),
  navAttempts: envInt(process.env.NAV_ATTEMPTS, 3),
  navRetryDelayMs: envInt(process.env.NAV_RETRY_DELAY_MS, 5000),
  scrollSteps: envInt(process.env.SCROLL_STEPS, 3),
  scrollPauseMs: envInt(process.env.SCROLL_PAUSE_MS, 300),
  requestDelay: {
    min: envFloat(process.env.REQUEST_DELAY_MIN_MS, 300),
    max: envFloat(process.env.REQUEST_DELAY_MAX_MS, 800),
  },
  longPause: {
    min: envFloat(process.env.LONG_PAUSE_MIN_MS, 1500),
    max: envFloat(process.env.LONG_PAUSE_MAX_MS, 2500),
  },
  longPauseEvery: envInt(process.env.LONG_PAUSE_EVERY, 10),
  workers: envInt(process.env.SCRAPER_CONCURRENCY, 3),
  headless: envBool(process.env.HEADLESS, true),
  loginTimeoutMs: envInt(process.env.LOGIN_TIMEOUT_MS, 240000),
  cookieFile: process.env.COOKIE_FILE || path.resolve(process.cwd(), 'olx_cookies.json'),
  cookieTtlMs: COOKIE_TTL_MS,
  fetchContacts: envBool(process.env.FETCH_CONTACTS, false),
  contactAttempts: envInt(process.env.CONTACT_ATTEMPTS, 3),
  contactBackoffMs: envInt(process.env.CONTACT_BACKOFF_MS, 1200),
  rateLimitPauseMs: envInt(process.env.RATE_LIMIT_PAUSE_MS, 5000),
  contactTimeoutMs: envInt(process.env.CONTACT_TIMEOUT_MS, 20000),
  excludedFields: envList(process.env.EXCLUDED_FIELDS, DEFAULT_EXCLUDED_FIELDS),
  outputDir: process.env.OUTPUT_DIR || path.resolve(process.cwd(), 'output'),
  outputJson: 'results.json',
  outputZip: 'results.zip',
};
