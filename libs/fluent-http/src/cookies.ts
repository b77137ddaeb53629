import { Cookie, CookieJar } from 'tough-cookie';

export { Cookie, CookieJar };

export interface CookieInit {
  name: string;
  value: string;
  domain?: string;
  path?: string;
  expires?: Date;
  secure?: boolean;
  httpOnly?: boolean;
}

export function createCookie(init: CookieInit): Cookie {
  return new Cookie({
    key: init.name,
    value: init.value,
    domain: init.domain ?? null,
    path: init.path ?? null,
    expires: init.expires ?? 'Infinity',
    secure: init.secure ?? false,
    httpOnly: init.httpOnly ?? false,
  });
}

/** Parses Set-Cookie values, dropping the ones that are malformed. */
export function parseSetCookies(values: readonly string[]): Cookie[] {
  const cookies: Cookie[] = [];
  for (const value of values) {
    const cookie = Cookie.parse(value);
    if (cookie) {
      cookies.push(cookie);
    }
  }
  return cookies;
}

/** `name=value` pairs joined the way a Cookie request header expects. */
export function serializeCookies(cookies: readonly Cookie[]): string {
  return cookies.map((cookie) => cookie.cookieString()).join('; ');
}

export async function storeResponseCookies(jar: CookieJar, url: URL, setCookies: readonly string[]): Promise<void> {
  for (const value of setCookies) {
    await jar.setCookie(value, url.toString(), { ignoreError: true });
  }
}

export async function jarCookieHeader(jar: CookieJar, url: URL): Promise<string> {
  return jar.getCookieString(url.toString());
}
