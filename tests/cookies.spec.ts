import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CookieStore, hasAuthCookies } from '../scripts/scraper/cookies';
import { cookie } from './helpers/fakeSession';

const DAY = 24 * 60 * 60 * 1000;
const TTL = 7 * DAY;
const SAVED = new Date('2026-03-01T10:00:00.000Z');

describe('CookieStore', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cookies-'));
    file = path.join(dir, 'cookies.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const storeAt = (at: Date) => new CookieStore(file, TTL, () => at);

  it('returns null when nothing was saved', async () => {
    expect(await storeAt(SAVED).load()).toBeNull();
  });

  it('writes savedAt and cookies, then reads them back', async () => {
    await storeAt(SAVED).save([cookie('kc_access_token', 'test-token')]);
    const body = JSON.parse(await fs.readFile(file, 'utf8'));
    expect(body.savedAt).toBe('2026-03-01T10:00:00.000Z');
    expect(body.cookies[0].name).toBe('kc_access_token');

    const loaded = await storeAt(new Date(SAVED.getTime() + DAY)).load();
    expect(loaded?.cookies).toEqual([cookie('kc_access_token', 'test-token')]);
    expect(loaded?.savedAt.toISOString()).toBe('2026-03-01T10:00:00.000Z');
  });

  it('keeps a session saved one second short of the TTL', async () => {
    await storeAt(SAVED).save([cookie('kc_access_token')]);
    const loaded = await storeAt(new Date(SAVED.getTime() + TTL - 1000)).load();
    expect(loaded).not.toBeNull();
  });

  it('expires and deletes a session one second past the TTL', async () => {
    await storeAt(SAVED).save([cookie('kc_access_token')]);
    expect(await storeAt(new Date(SAVED.getTime() + TTL + 1000)).load()).toBeNull();
    await expect(fs.access(file)).rejects.toThrow();
  });

  it('discards a corrupt file', async () => {
    await fs.writeFile(file, '{ not json', 'utf8');
    expect(await storeAt(SAVED).load()).toBeNull();
    await expect(fs.access(file)).rejects.toThrow();
  });

  it('discards a file without a timestamp', async () => {
    await fs.writeFile(file, JSON.stringify({ cookies: [cookie('a')] }), 'utf8');
    expect(await storeAt(SAVED).load()).toBeNull();
    await expect(fs.access(file)).rejects.toThrow();
  });

  it('treats an empty cookie list as no session', async () => {
    await storeAt(SAVED).save([]);
    expect(await storeAt(SAVED).load()).toBeNull();
  });

  it('keeps browser-specific cookie fields', async () => {
    await storeAt(SAVED).save([{ ...cookie('kc_id_token'), httpOnly: true, expires: 1800000000 }]);
    const loaded = await storeAt(SAVED).load();
    expect(loaded?.cookies[0]).toMatchObject({ name: 'kc_id_token', httpOnly: true, expires: 1800000000 });
  });

  it('delete is a no-op when the file is gone', async () => {
    const store = storeAt(SAVED);
    await store.delete();
    await store.save([cookie('x')]);
    await store.delete();
    await expect(fs.access(file)).rejects.toThrow();
  });
});

describe('hasAuthCookies', () => {
  it('needs a known auth cookie with a value', () => {
    expect(hasAuthCookies([cookie('hb-session-id')])).toBe(true);
    expect(hasAuthCookies([cookie('kc_refresh_token', '')])).toBe(false);
    expect(hasAuthCookies([cookie('_ga')])).toBe(false);
  });
});
