import { describe, expect, it } from 'vitest';
import { load } from 'cheerio';
import { DEFAULT_EXCLUDED_FIELDS } from '../scripts/scraper/config';
import {
  DetailOptions,
  extractDetail,
  extractImages,
  extractSpecAttributes,
  parseDetailHtml,
  specKey,
} from '../scripts/scraper/detail';
import { FakeSession, noSleep } from './helpers/fakeSession';

const SITE = 'https://www.olx.com.pk';
const URL_1 = 'https://www.olx.com.pk/item/suzuki-mehran-vxr-iid-1087654321';

const DETAIL_HTML = `
<html><head>
<script type="application/ld+json">
{"@type":"Product","name":"Suzuki Mehran VXR",
 "offers":{"@type":"Offer","price":"500000","priceCurrency":"PKR"},
 "image":["https://images.olx.com.pk/b.jpg","https://images.olx.com.pk/a.jpg"],
 "seller":{"name":"Ali Motors"}}
</script>
<script type="application/ld+json">{ broken</script>
</head><body>
  <h1>Mehran for sale</h1>
  <div aria-label="Price"><span>Rs 4,75,000</span></div>
  <div data-aut-id="item-location">Model Town, Lahore</div>
  <div data-aut-id="itemDescriptionContent"><p>Genuine condition.</p><p>First owner.</p></div>
  <div data-aut-id="adId">Ad ID: 1087654321</div>
  <div class="seller-since">Member since Jan 2020</div>
  <a href="/profile/abc123">View profile</a>
  <ul>
    <li><span>Make</span><span>Suzuki</span></li>
    <li><span>Fuel</span><span>Petrol</span></li>
    <li><span>Posted</span><span>2 days ago</span></li>
    <li><span>Price</span><span>500000</span></li>
    <li><span>Condition</span><span>N/A</span></li>
  </ul>
  <dl><dt>Registered In</dt><dd>Lahore</dd><dt>Make</dt><dd>Other</dd></dl>
</body></html>`;

const opts: DetailOptions = {
  siteUrl: SITE,
  navTimeoutMs: 1000,
  detailWaitMs: 1000,
  navAttempts: 3,
  navRetryDelayMs: 0,
  scrollPauseMs: 0,
  excludedFields: DEFAULT_EXCLUDED_FIELDS,
  sleep: noSleep,
};

describe('specKey', () => {
  it('lower-cases and joins words with underscores', () => {
    expect(specKey('Registered In')).toBe('registered_in');
    expect(specKey('  Engine Capacity (cc) ')).toBe('engine_capacity_cc');
  });

  it('keeps non-Latin labels', () => {
    expect(specKey('رنگ')).toBe('رنگ');
    expect(specKey('ماڈل سال')).toBe('ماڈل_سال');
  });
});

describe('parseDetailHtml', () => {
  const detail = parseDetailHtml(DETAIL_HTML, URL_1, opts);

  it('prefers structured data over selector fallbacks', () => {
    expect(detail.price).toBe('PKR 500000');
    expect(detail.title).toBe('Suzuki Mehran VXR');
    expect(detail.sellerName).toBe('Ali Motors');
    expect(detail.images).toEqual(['https://images.olx.com.pk/a.jpg', 'https://images.olx.com.pk/b.jpg']);
  });

  it('reads the remaining fields from the page', () => {
    expect(detail.link).toBe(URL_1);
    expect(detail.adId).toBe('1087654321');
    expect(detail.location).toBe('Model Town, Lahore');
    expect(detail.description).toBe('Genuine condition. First owner.');
    expect(detail.sellerSince).toBe('Member since Jan 2020');
    expect(detail.sellerProfileUrl).toBe('https://www.olx.com.pk/profile/abc123');
  });

  it('keeps the first value of each attribute and drops excluded or fixed ones', () => {
    expect(detail.specAttributes).toEqual({ make: 'Suzuki', fuel: 'Petrol', registered_in: 'Lahore' });
  });

  it('falls back to selectors and skips N/A values', () => {
    const html = `<html><body>
      <h1>n/a</h1><div data-testid="ad-title">Civic Oriel</div>
      <div aria-label="Price"><span>Rs 4,100,000</span></div>
      <div class="ad-body">Ad ID : 42abc</div>
    </body></html>`;
    const d = parseDetailHtml(html, URL_1, opts);
    expect(d.title).toBe('Civic Oriel');
    expect(d.price).toBe('Rs 4,100,000');
    expect(d.adId).toBe('42abc');
    expect(d.description).toBe('');
    expect(d.specAttributes).toEqual({});
  });
});

describe('extractImages', () => {
  it('collects absolute URLs from img and source tags, sorted and unique', () => {
    const $ = load(`
      <img src="https://x.test/2.jpg" data-src="https://x.test/1.jpg" srcset="https://x.test/3.jpg 1x, https://x.test/4.jpg 2x">
      <img src="/relative.jpg">
      <img src="https://x.test/2.jpg">
      <picture><source srcset="https://x.test/5.webp"></picture>`);
    expect(extractImages($)).toEqual([
      'https://x.test/1.jpg',
      'https://x.test/2.jpg',
      'https://x.test/3.jpg',
      'https://x.test/4.jpg',
      'https://x.test/5.webp',
    ]);
  });
});

describe('extractSpecAttributes', () => {
  it('honours a configured exclusion list', () => {
    const $ = load('<ul><li><span>Color</span><span>White</span></li><li><span>Year</span><span>2015</span></li></ul>');
    expect(extractSpecAttributes($, ['Color'])).toEqual({ year: '2015' });
  });

  it('keeps labels that share a name with object built-ins', () => {
    const $ = load(
      '<ul><li><span>Constructor</span><span>Yes</span></li><li><span>رنگ</span><span>سفید</span></li></ul>'
    );
    expect(extractSpecAttributes($)).toEqual({ constructor: 'Yes', 'رنگ': 'سفید' });
  });
});

describe('extractDetail', () => {
  it('returns just the link when the page never becomes ready', async () => {
    const session = new FakeSession({ ready: false });
    expect(await extractDetail(session, URL_1, opts)).toEqual({ kind: 'detail', link: URL_1 });
  });

  it('parses the loaded page', async () => {
    const session = new FakeSession({ pages: { [URL_1]: DETAIL_HTML } });
    const detail = await extractDetail(session, URL_1, opts);
    expect(detail.price).toBe('PKR 500000');
    expect(session.scrolls).toBe(2);
  });

  it('propagates navigation failures', async () => {
    const session = new FakeSession({ gotoErrors: [new Error('Timeout 1000ms exceeded')] });
    await expect(extractDetail(session, URL_1, opts)).rejects.toThrow('Timeout 1000ms exceeded');
  });
});
