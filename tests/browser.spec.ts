import { describe, expect, it, vi } from 'vitest';
import { SessionPool, createBrowserSession, launchOptions } from '../scripts/scraper/browser';
import { SessionCreationError } from '../scripts/scraper/errors';
import { FakeSession } from './helpers/fakeSession';

class StuckSession extends FakeSession {
  async close(): Promise<void> {
    throw new Error('already gone');
  }
}

describe('SessionPool', () => {
  it('tracks sessions until they are released', async () => {
    const pool = new SessionPool(async () => new FakeSession());
    const a = await pool.create(true);
    const b = await pool.create(true);
    expect(pool.size).toBe(2);

    await pool.release(a);
    expect(pool.size).toBe(1);
    expect(a.isAlive()).toBe(false);
    expect(b.isAlive()).toBe(true);
  });

  it('closes every open session, even when one fails to close', async () => {
    const sessions = [new FakeSession(), new StuckSession(), new FakeSession()];
    let n = 0;
    const pool = new SessionPool(async () => sessions[n++]);
    for (let i = 0; i < sessions.length; i++) await pool.create(true);

    await pool.closeAll();

    expect(pool.size).toBe(0);
    expect(sessions[0].closed).toBe(true);
    expect(sessions[2].closed).toBe(true);
  });

  it('keeps independent pools apart', async () => {
    const one = new SessionPool(async () => new FakeSession());
    const two = new SessionPool(async () => new FakeSession());
    const kept = await two.create(true);
    await one.create(true);
    await one.closeAll();
    expect(two.size).toBe(1);
    expect(kept.isAlive()).toBe(true);
  });

  it('passes the headless flag to the factory', async () => {
    const factory = vi.fn(async (_headless: boolean) => new FakeSession());
    await new SessionPool(factory).create(false);
    expect(factory).toHaveBeenCalledWith(false);
  });
});

describe('createBrowserSession', () => {
  it('tries the fallback launcher and reports both failing', async () => {
    const primary = vi.fn(async () => {
      throw new Error('Executable does not exist');
    });
    const fallbackError = new Error('stealth launch failed');
    const fallback = vi.fn(async () => {
      throw fallbackError;
    });

    const err = await createBrowserSession(true, [primary, fallback]).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(SessionCreationError);
    expect(err instanceof Error && err.message).toContain('Executable does not exist');
    expect(err instanceof Error && err.cause).toBe(fallbackError);
    expect(fallback).toHaveBeenCalledWith(launchOptions(true));
  });
});

describe('launchOptions', () => {
  it('hides the automation switch', () => {
    const opts = launchOptions(false);
    expect(opts.headless).toBe(false);
    expect(opts.ignoreDefaultArgs).toEqual(['--enable-automation']);
    expect(opts.args).toContain('--disable-blink-features=AutomationControlled');
  });
});
