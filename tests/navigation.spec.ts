import { describe, expect, it, vi } from 'vitest';
import { NavigationError } from '../scripts/scraper/errors';
import { gotoWithRetry, isTransientNetworkError } from '../scripts/scraper/navigation';
import { createProgress } from '../scripts/scraper/utils';
import { FakeSession } from './helpers/fakeSession';

const dnsError = () => new Error('page.goto: net::ERR_NAME_NOT_RESOLVED at https://www.olx.com.pk/');

describe('isTransientNetworkError', () => {
  it('recognises DNS and connection failures only', () => {
    expect(isTransientNetworkError(dnsError())).toBe(true);
    expect(isTransientNetworkError(new Error('net::ERR_CONNECTION_RESET'))).toBe(true);
    expect(isTransientNetworkError(new Error('net::ERR_INTERNET_DISCONNECTED'))).toBe(true);
    expect(isTransientNetworkError(new Error('Timeout 30000ms exceeded'))).toBe(false);
  });
});

describe('gotoWithRetry', () => {
  const opts = (messages: string[], sleep = vi.fn(async (_ms: number) => {})) => ({
    attempts: 3,
    delayMs: 5000,
    navTimeoutMs: 1000,
    sleep,
    progress: createProgress((m) => messages.push(m)),
  });

  it('recovers from a transient failure', async () => {
    const session = new FakeSession({ gotoErrors: [dnsError()] });
    const messages: string[] = [];
    const sleep = vi.fn(async (_ms: number) => {});
    await gotoWithRetry(session, 'https://example.test/a', opts(messages, sleep));
    expect(session.visited).toHaveLength(2);
    expect(sleep).toHaveBeenCalledWith(5000);
    expect(messages).toEqual(['Network error (attempt 1/3): Retrying in 5s...']);
  });

  it('gives up after exactly three attempts', async () => {
    const session = new FakeSession({ gotoErrors: [dnsError(), dnsError(), dnsError(), dnsError()] });
    const messages: string[] = [];
    const sleep = vi.fn(async (_ms: number) => {});
    await expect(gotoWithRetry(session, 'https://example.test/a', opts(messages, sleep))).rejects.toBeInstanceOf(
      NavigationError
    );
    expect(session.visited).toHaveLength(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(messages[2]).toBe(
      'Failed to connect after 3 attempts: page.goto: net::ERR_NAME_NOT_RESOLVED at https://www.olx.com.pk/'
    );
  });

  it('rethrows other failures without retrying', async () => {
    const timeout = new Error('Timeout 1000ms exceeded');
    const session = new FakeSession({ gotoErrors: [timeout] });
    await expect(gotoWithRetry(session, 'https://example.test/a', opts([]))).rejects.toBe(timeout);
    expect(session.visited).toHaveLength(1);
  });
});
