// src/core/video/instagram/session-resolver.ts
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { DEFAULT_TIMEOUT, DEFAULT_USER_AGENT } from '../../config/constants.js';
import { fetchWithTimeout } from '../../utils/http.js';
import type { FallbackResolver, MediaRef } from '../types.js';
import { InstagramSessionError } from './errors.js';
import { InstagramPageParser } from './parser.js';

const sessionSchema = z.object({
  cookies: z.record(z.string()).refine(cookies => Boolean(cookies.sessionid), {
    message: 'cookies.sessionid is required',
  }),
  userAgent: z.string().min(1).optional(),
});

export type InstagramSession = z.infer<typeof sessionSchema>;

export interface SessionResolverOptions {
  sessionFile: string;
  timeoutMs?: number;
  verbose?: boolean;
}

/**
 * Re-reads a post page with a saved login session to get a fresh CDN link.
 * The session file holds the cookies of a browser login:
 * `{ "cookies": { "sessionid": "...", "csrftoken": "..." }, "userAgent": "..." }`
 */
export class InstagramSessionResolver implements FallbackResolver {
  readonly name = 'instagram-session';
  private session?: Promise<InstagramSession>;
  private readonly parser = new InstagramPageParser();

  constructor(private readonly options: SessionResolverOptions) {}

  async resolveMediaUrl(ref: MediaRef): Promise<string> {
    const pageUrl = postPageUrl(ref);
    const session = await this.loadSession();

    if (this.options.verbose) {
      console.log(`[Resolve] Fetching ${pageUrl} with saved session`);
    }

    const response = await fetchWithTimeout(
      pageUrl,
      {
        method: 'GET',
        headers: {
          Cookie: toCookieHeader(session.cookies),
          'User-Agent': session.userAgent ?? DEFAULT_USER_AGENT,
          'Accept-Language': 'en-US,en;q=0.9',
        },
        redirect: 'follow',
      },
      this.options.timeoutMs ?? DEFAULT_TIMEOUT
    );
    const html = await response.text();

    return this.parser.parse(html, { status: response.status, finalUrl: response.url || pageUrl });
  }

  /** Read once; every later lookup shares the same session (or the same failure) */
  private loadSession(): Promise<InstagramSession> {
    if (!this.session) {
      this.session = readSessionFile(this.options.sessionFile);
    }
    return this.session;
  }
}

export async function readSessionFile(filePath: string): Promise<InstagramSession> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new InstagramSessionError(
      `No saved Instagram session at ${filePath}`,
      'LOGIN_REQUIRED',
      error instanceof Error ? error : undefined
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new InstagramSessionError(
      `Instagram session file ${filePath} is not valid JSON`,
      'LOGIN_REQUIRED',
      error instanceof Error ? error : undefined
    );
  }

  const parsed = sessionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InstagramSessionError(
      `Instagram session file ${filePath} is invalid: ${parsed.error.issues.map(issue => issue.message).join(', ')}`,
      'LOGIN_REQUIRED'
    );
  }
  return parsed.data;
}

/** Post URLs from another site are refused rather than rewritten onto instagram.com */
export function postPageUrl(ref: MediaRef): string {
  const url = ref.postUrl && URL.canParse(ref.postUrl) ? new URL(ref.postUrl) : undefined;
  if (!url) {
    return `https://www.instagram.com/reel/${encodeURIComponent(ref.postId)}/`;
  }
  if (url.hostname !== 'instagram.com' && !url.hostname.endsWith('.instagram.com')) {
    throw new InstagramSessionError(`${ref.postUrl} is not an Instagram post`, 'MEDIA_NOT_FOUND');
  }
  return `https://www.instagram.com${url.pathname}`;
}

function toCookieHeader(cookies: Readonly<Record<string, string>>): string {
  return Object.entries(cookies)
    .map(([name, value]) => `${name}=${value}`)
    .join('; ');
}
