import * as fs from 'fs/promises';
import { z } from 'zod';
import { CONFIG } from './config';
import { logger } from './logger';
import { errorMessage } from './errors';
import { CookieSession, StoredCookie } from './types';

export const AUTH_COOKIE_NAMES = ['kc_access_token', 'kc_refresh_token', 'kc_id_token', 'hb-session-id'];

const cookieSchema = z
  .object({
    name: z.string(),
    value: z.string(),
    domain: z.string().default(''),
    path: z.string().default('/'),
  })
  .passthrough();

const cookieFileSchema = z.object({
  savedAt: z.string().refine((s) => !Number.isNaN(Date.parse(s)), 'invalid timestamp'),
  cookies: z.array(cookieSchema),
});

export function hasAuthCookies(cookies: readonly StoredCookie[]): boolean {
  return cookies.some((c) => AUTH_COOKIE_NAMES.includes(c.name) && Boolean(c.value));
}

const isMissing = (err: unknown) =>
  err instanceof Error && 'code' in err && err.code === 'ENOENT';

/**
 * Authentication cookies persisted between enrichment runs.
 * Expired or unreadable files count as absent and are removed.
 */
export class CookieStore {
  constructor(
    readonly filePath: string = CONFIG.cookieFile,
    private readonly ttlMs: number = CONFIG.cookieTtlMs,
    private readonly now: () => Date = () => new Date()
  ) {}

  async save(cookies: readonly StoredCookie[]): Promise<CookieSession> {
    const session: CookieSession = { cookies: [...cookies], savedAt: this.now() };
    const body = { savedAt: session.savedAt.toISOString(), cookies: session.cookies };
    await fs.writeFile(this.filePath, JSON.stringify(body, null, 2), 'utf8');
    logger.debug('Saved cookies', { file: this.filePath, count: cookies.length });
    return session;
  }

  async load(): Promise<CookieSession | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (err) {
      if (isMissing(err)) return null;
      logger.warn('Cookie file unreadable, discarding', { file: this.filePath, error: errorMessage(err) });
      await this.delete();
      return null;
    }

    let parsed: z.infer<typeof cookieFileSchema>;
    try {
      parsed = cookieFileSchema.parse(JSON.parse(raw));
    } catch (err) {
      logger.warn('Cookie file corrupt, discarding', { file: this.filePath, error: errorMessage(err) });
      await this.delete();
      return null;
    }

    const savedAt = new Date(parsed.savedAt);
    if (this.now().getTime() - savedAt.getTime() > this.ttlMs) {
      logger.info('Saved cookies expired, removing', { savedAt: parsed.savedAt });
      await this.delete();
      return null;
    }
    if (parsed.cookies.length === 0) return null;
    return { cookies: parsed.cookies, savedAt };
  }

  async delete(): Promise<void> {
    await fs.rm(this.filePath, { force: true });
  }
}
