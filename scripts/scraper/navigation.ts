import { BrowserSession } from './browser';
import { NavigationError, errorMessage } from './errors';
import { Progress, Sleep, sleep as realSleep } from './utils';

const TRANSIENT_MARKERS = ['ERR_NAME_NOT_RESOLVED', 'ERR_INTERNET_DISCONNECTED', 'ERR_CONNECTION'];

export function isTransientNetworkError(err: unknown): boolean {
  const msg = errorMessage(err);
  return TRANSIENT_MARKERS.some((m) => msg.includes(m));
}

export type RetryOptions = {
  attempts: number;
  delayMs: number;
  navTimeoutMs: number;
  sleep?: Sleep;
  progress?: Progress;
};

/**
 * Navigates, retrying only DNS/connection failures with a fixed pause.
 * Anything else is rethrown on the spot; exhausting the attempts throws NavigationError.
 */
export async function gotoWithRetry(session: BrowserSession, url: string, opts: RetryOptions): Promise<void> {
  const wait = opts.sleep ?? realSleep;
  for (let attempt = 1; ; attempt++) {
    try {
      await session.goto(url, opts.navTimeoutMs);
      return;
    } catch (err) {
      if (!isTransientNetworkError(err)) throw err;
      if (attempt >= opts.attempts) {
        opts.progress?.(`Failed to connect after ${opts.attempts} attempts: ${errorMessage(err)}`);
        throw new NavigationError(url, opts.attempts, { cause: err });
      }
      opts.progress?.(
        `Network error (attempt ${attempt}/${opts.attempts}): Retrying in ${Math.round(opts.delayMs / 1000)}s...`
      );
      await wait(opts.delayMs);
    }
  }
}

export async function scrollPage(
  session: BrowserSession,
  steps: number,
  pauseMs: number,
  wait: Sleep = realSleep
): Promise<void> {
  for (let i = 0; i < steps; i++) {
    await session.scrollToBottom();
    await wait(pauseMs);
  }
}
