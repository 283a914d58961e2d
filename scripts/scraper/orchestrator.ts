import { BrowserSession, SessionPool } from './browser';
import { processWithConcurrency } from './concurrency';
import { CONFIG } from './config';
import { DetailOptions, defaultDetailOptions, extractDetail } from './detail';
import { SessionCreationError, errorMessage } from './errors';
import { DiscoverOptions, defaultDiscoverOptions, discover } from './listPage';
import { logger } from './logger';
import { mergeListing } from './merge';
import {
  DelayRange,
  ListingBasic,
  ListingDetail,
  ListingRecord,
  LocationConfig,
  ProgressFn,
} from './types';
import { Progress, RandomSource, Sleep, createProgress, jitter, sleep as realSleep } from './utils';

export type CrawlOptions = {
  headless: boolean;
  workers: number;
  pageItemLimit: number;
  requestDelay: DelayRange;
  longPause: DelayRange;
  longPauseEvery: number;
  discover: DiscoverOptions;
  detail: DetailOptions;
  sleep?: Sleep;
  random?: RandomSource;
};

export const defaultCrawlOptions = (): CrawlOptions => ({
  headless: CONFIG.headless,
  workers: CONFIG.workers,
  pageItemLimit: CONFIG.pageItemLimit,
  requestDelay: CONFIG.requestDelay,
  longPause: CONFIG.longPause,
  longPauseEvery: CONFIG.longPauseEvery,
  discover: defaultDiscoverOptions(),
  detail: defaultDetailOptions(),
});

/** The page-level operations the orchestrator drives; swapped out in tests. */
export type CrawlSteps = {
  discover: typeof discover;
  extract: typeof extractDetail;
};

/**
 * A pool lane's browser. Opened on first use, reused for every later item
 * the lane takes, and replaced only if it died.
 */
export class WorkerSession {
  private session: BrowserSession | undefined;

  constructor(
    private readonly pool: SessionPool,
    private readonly headless: boolean
  ) {}

  async get(): Promise<BrowserSession> {
    if (this.session && this.session.isAlive()) return this.session;
    if (this.session) {
      logger.warn('Worker session died, opening a new one', { id: this.session.id });
      await this.pool.release(this.session);
    }
    this.session = await this.pool.create(this.headless);
    return this.session;
  }

  async dispose(): Promise<void> {
    const session = this.session;
    this.session = undefined;
    if (session) await this.pool.release(session);
  }
}

export function pageUrl(seedUrl: string, page: number): string {
  if (page <= 1) return seedUrl;
  const url = new URL(seedUrl);
  url.searchParams.set('page', String(page));
  return url.href;
}

export class CrawlOrchestrator {
  private readonly steps: CrawlSteps;

  constructor(
    private readonly pool: SessionPool,
    private readonly options: CrawlOptions = defaultCrawlOptions(),
    steps: Partial<CrawlSteps> = {}
  ) {
    this.steps = { discover, extract: extractDetail, ...steps };
  }

  /**
   * Crawls each enabled location in turn: list pages first on one session,
   * then details on the worker pool. Records keep location grouping; within
   * a location they arrive in completion order.
   */
  async run(
    locations: readonly LocationConfig[],
    maxPagesPerLocation: number,
    maxListingsPerLocation: number,
    progressFn?: ProgressFn
  ): Promise<ListingRecord[]> {
    const progress = createProgress(progressFn);
    const targets = locations.filter((l) => l.enabled);
    if (!targets.length) {
      progress('No enabled locations to scrape.');
      return [];
    }

    const all: ListingRecord[] = [];
    for (const [n, location] of targets.entries()) {
      progress(`📍 ${location.displayName} (${n + 1}/${targets.length})`);
      const basics = await this.collectBasics(location, maxPagesPerLocation, maxListingsPerLocation, progress);
      if (!basics.length) {
        progress(`No listings found for ${location.displayName}.`);
        continue;
      }
      progress(`Collected ${basics.length} listings for ${location.displayName}. Fetching details...`);
      all.push(...(await this.extractAll(basics, location, progress)));
    }

    progress(`Completed! ${all.length} listings scraped across ${targets.length} location(s).`);
    return all;
  }

  private async collectBasics(
    location: LocationConfig,
    maxPages: number,
    maxListings: number,
    progress: Progress
  ): Promise<ListingBasic[]> {
    let session: BrowserSession;
    try {
      session = await this.pool.create(this.options.headless);
    } catch (err) {
      progress(`Browser session could not be created: ${errorMessage(err)}`);
      throw err;
    }
    const basics: ListingBasic[] = [];
    const seen = new Set<string>();
    try {
      for (let page = 1; page <= maxPages; page++) {
        if (page > 1) await this.delay(this.options.requestDelay);
        progress(`Scraping page ${page}/${maxPages}...`);

        const result = await this.steps.discover(
          session,
          pageUrl(location.seedUrl, page),
          this.options.pageItemLimit,
          this.options.discover,
          progress
        );
        if (!result.ok) {
          progress(`Failed to load page ${page}: ${result.error.message}. Stopping ${location.displayName}.`);
          break;
        }
        if (!result.value.length) {
          progress(`No items on page ${page}, stopping.`);
          break;
        }

        for (const basic of result.value) {
          if (seen.has(basic.link)) continue;
          seen.add(basic.link);
          basics.push(basic);
        }
        if (basics.length >= maxListings) {
          basics.splice(maxListings);
          break;
        }
      }
    } finally {
      await this.pool.release(session);
    }
    return basics;
  }

  private async extractAll(
    basics: ListingBasic[],
    location: LocationConfig,
    progress: Progress
  ): Promise<ListingRecord[]> {
    let done = 0;
    let failures = 0;

    const task = async (basic: ListingBasic, _idx: number, lane: WorkerSession) => {
      let detail: ListingDetail;
      try {
        const session = await lane.get();
        detail = await this.steps.extract(session, basic.link, this.options.detail, progress);
      } catch (err) {
        if (err instanceof SessionCreationError) throw err;
        failures++;
        progress(`Error processing listing ${basic.link}: ${errorMessage(err)}`);
        detail = { kind: 'detail', link: basic.link, error: errorMessage(err) };
      }
      done++;
      if (done % 5 === 0) progress(`Processed ${done}/${basics.length} listings...`);
      return mergeListing(basic, detail, location);
    };

    let records: ListingRecord[];
    try {
      records = await processWithConcurrency(basics, task, this.options.workers, {
        createLane: () => new WorkerSession(this.pool, this.options.headless),
        disposeLane: (lane) => lane.dispose(),
        isFatal: (err) => err instanceof SessionCreationError,
        pause: (idx) => this.itemPause(idx),
      });
    } catch (err) {
      progress(`Browser session could not be created: ${errorMessage(err)}`);
      throw err;
    }

    progress(`Completed ${location.displayName}: ${records.length} listings (${failures} failed).`);
    return records;
  }

  private itemPause(idx: number): Promise<void> {
    const every = this.options.longPauseEvery;
    const rest = every > 0 && (idx + 1) % every === 0;
    return this.delay(rest ? this.options.longPause : this.options.requestDelay);
  }

  private delay(range: DelayRange): Promise<void> {
    const wait = this.options.sleep ?? realSleep;
    return wait(jitter(range, this.options.random));
  }
}
