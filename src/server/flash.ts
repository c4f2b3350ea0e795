import type { Context } from 'hono';
import { deleteCookie, getCookie, setCookie } from 'hono/cookie';

const FLASH_COOKIE = 'flash_notice';

/**
 * Store a notice shown on the next page rendered for this browser
 */
export function setFlash(c: Context, notice: string): void {
  setCookie(c, FLASH_COOKIE, notice, { path: '/', httpOnly: true, sameSite: 'Lax' });
}

/**
 * Read the pending notice and clear it
 */
export function takeFlash(c: Context): string | undefined {
  const notice = getCookie(c, FLASH_COOKIE);
  if (notice !== undefined) {
    deleteCookie(c, FLASH_COOKIE, { path: '/' });
  }
  return notice;
}
