import axios, { AxiosInstance } from 'axios';
import { DESKTOP_UA } from './browser';
import { StoredCookie } from './types';

export type HttpResponse = {
  status: number;
  data: unknown;
};

/** A lightweight client that carries an authenticated cookie set. */
export interface HttpSession {
  get(url: string, headers?: Record<string, string>, timeoutMs?: number): Promise<HttpResponse>;
}

export type HttpSessionFactory = (cookies: readonly StoredCookie[]) => HttpSession;

function domainMatches(host: string, domain: string): boolean {
  const d = domain.replace(/^\./, '').toLowerCase();
  if (!d) return true;
  return host === d || host.endsWith(`.${d}`);
}

/** Cookie header for `url`, honouring each cookie's domain and path. */
export function cookieHeader(cookies: readonly StoredCookie[], url: string): string {
  const { hostname, pathname } = new URL(url);
  return cookies
    .filter((c) => c.name && domainMatches(hostname.toLowerCase(), c.domain))
    .filter((c) => pathname.startsWith(c.path || '/'))
    .map((c) => `${c.name}=${c.value}`)
    .join('; ');
}

export class AxiosHttpSession implements HttpSession {
  private readonly client: AxiosInstance;

  constructor(
    private readonly cookies: readonly StoredCookie[],
    siteUrl: string
  ) {
    this.client = axios.create({
      headers: {
        'User-Agent': DESKTOP_UA,
        Accept: 'application/json',
        'Accept-Language': 'en,en-US;q=0.9',
        'X-Requested-With': 'XMLHttpRequest',
        Referer: siteUrl.endsWith('/') ? siteUrl : `${siteUrl}/`,
      },
      // every status is handled by the caller
      validateStatus: () => true,
    });
  }

  async get(url: string, headers: Record<string, string> = {}, timeoutMs = 20000): Promise<HttpResponse> {
    const cookie = cookieHeader(this.cookies, url);
    const res = await this.client.get<unknown>(url, {
      headers: cookie ? { ...headers, Cookie: cookie } : headers,
      timeout: timeoutMs,
    });
    return { status: res.status, data: res.data };
  }
}

export const axiosHttpSession =
  (siteUrl: string): HttpSessionFactory =>
  (cookies) =>
    new AxiosHttpSession(cookies, siteUrl);
