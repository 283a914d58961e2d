import { SessionPool } from './browser';
import { CONFIG } from './config';
import { ContactEnrichmentClient } from './contacts';
import { CookieStore } from './cookies';
import { errorMessage } from './errors';
import { loadLocations, selectLocations } from './locations';
import { log } from './logger';
import { toFlatRecord } from './merge';
import { CrawlOrchestrator } from './orchestrator';
import { saveResults, zipFile } from './storage';

void (async function main() {
  log('Starting scraper with config:', CONFIG);
  const pool = new SessionPool();
  try {
    const locations = selectLocations(await loadLocations(CONFIG.locationsFile), CONFIG.selectedLocations);
    log(`Locations: ${locations.map((l) => l.key).join(', ') || '(none)'}`);

    const orchestrator = new CrawlOrchestrator(pool);
    const listings = await orchestrator.run(locations, CONFIG.maxPages, CONFIG.maxListings, log);

    if (listings.length > 0 && CONFIG.fetchContacts) {
      const client = new ContactEnrichmentClient(new CookieStore(), pool);
      await client.tryEnrich(listings, log);
    }

    if (listings.length > 0) {
      const jsonPath = await saveResults(listings.map(toFlatRecord), CONFIG.outputDir, CONFIG.outputJson);
      const zipPath = await zipFile(jsonPath, CONFIG.outputDir, CONFIG.outputZip);
      log(`Wrote ${listings.length} listings.`);
      log(`JSON: ${jsonPath}`);
      log(`ZIP:  ${zipPath}`);
    } else {
      log('⚠️ No listings collected, nothing written.');
    }
  } catch (err) {
    console.error('Scraper failed:', errorMessage(err));
    process.exitCode = 1;
  } finally {
    await pool.closeAll();
    log('Browsers closed.');
  }
})();
