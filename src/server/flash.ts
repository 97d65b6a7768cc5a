/**
 * One-time flash messages carried in a signed cookie
 */

import crypto from 'crypto';
import { Request, Response } from 'express';

export type FlashCategory = 'success' | 'error';

export interface FlashMessage {
  category: FlashCategory;
  message: string;
}

export const FLASH_COOKIE = 'vb_flash';
const FLASH_MAX_AGE_MS = 5 * 60 * 1000;

function signature(payload: string, secret: string): string {
  return crypto.createHmac('sha256', secret).update(payload).digest('base64url');
}

export function signFlash(flash: FlashMessage, secret: string): string {
  const payload = Buffer.from(JSON.stringify(flash), 'utf-8').toString('base64url');
  return `${payload}.${signature(payload, secret)}`;
}

function isFlashMessage(value: unknown): value is FlashMessage {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const category: unknown = Reflect.get(value, 'category');
  const message: unknown = Reflect.get(value, 'message');
  return (category === 'success' || category === 'error') && typeof message === 'string';
}

/**
 * The flash in a cookie value, or null when it is malformed or was signed with another key
 */
export function verifyFlash(value: string, secret: string): FlashMessage | null {
  const dot = value.lastIndexOf('.');
  if (dot <= 0) {
    return null;
  }

  const payload = value.slice(0, dot);
  const given = Buffer.from(value.slice(dot + 1));
  const expected = Buffer.from(signature(payload, secret));
  if (given.length !== expected.length || !crypto.timingSafeEqual(given, expected)) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(Buffer.from(payload, 'base64url').toString('utf-8'));
    return isFlashMessage(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function readCookie(header: string | undefined, name: string): string | undefined {
  if (!header) {
    return undefined;
  }
  for (const part of header.split(';')) {
    const eq = part.indexOf('=');
    if (eq < 0) {
      continue;
    }
    if (part.slice(0, eq).trim() === name) {
      const raw = part.slice(eq + 1).trim();
      try {
        return decodeURIComponent(raw);
      } catch {
        return raw;
      }
    }
  }
  return undefined;
}

export function setFlash(res: Response, secret: string, flash: FlashMessage, secure: boolean): void {
  res.cookie(FLASH_COOKIE, signFlash(flash, secret), {
    httpOnly: true,
    sameSite: 'lax',
    secure,
    path: '/',
    maxAge: FLASH_MAX_AGE_MS
  });
}

/**
 * Read the pending flash and clear it
 */
export function consumeFlash(req: Request, res: Response, secret: string): FlashMessage | null {
  const value = readCookie(req.headers.cookie, FLASH_COOKIE);
  if (value === undefined) {
    return null;
  }
  res.clearCookie(FLASH_COOKIE, { path: '/' });
  return verifyFlash(value, secret);
}
