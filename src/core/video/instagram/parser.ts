import * as cheerio from 'cheerio';
import { InstagramSessionError } from './errors.js';

export interface PageContext {
  status: number;
  /** URL after redirects */
  finalUrl: string;
}

const RATE_LIMIT_MARKERS = ['Please wait a few minutes before you try again', 'rate limited'];
const NOT_FOUND_MARKERS = ["Sorry, this page isn't available", 'Page not found'];

const VIDEO_URL_PATTERN = /"video_url"\s*:\s*"((?:[^"\\]|\\.)*)"/;
const VIDEO_VERSIONS_PATTERN = /"video_versions"\s*:\s*\[\s*\{[^\]]*?"url"\s*:\s*"((?:[^"\\]|\\.)*)"/;

export class InstagramPageParser {
  /**
   * Pulls the current video URL out of a post page fetched with a session.
   * Checks the blocking cases first so a login wall is never read as "no video".
   */
  parse(html: string, context: PageContext): string {
    if (context.status === 429 || RATE_LIMIT_MARKERS.some(marker => html.includes(marker))) {
      throw new InstagramSessionError('Instagram is rate limiting this session', 'RATE_LIMITED');
    }
    if (context.status === 404 || NOT_FOUND_MARKERS.some(marker => html.includes(marker))) {
      throw new InstagramSessionError('Post is deleted or private', 'MEDIA_NOT_FOUND');
    }

    const $ = cheerio.load(html);

    if (this.isLoginWall($, context.finalUrl)) {
      throw new InstagramSessionError(
        'Instagram asked for a login; the saved session is missing or expired',
        'LOGIN_REQUIRED'
      );
    }

    const fromMeta =
      $('meta[property="og:video:secure_url"]').attr('content') ?? $('meta[property="og:video"]').attr('content');
    if (fromMeta) {
      return fromMeta;
    }

    const fromScripts = this.findInScripts($);
    if (fromScripts) {
      return fromScripts;
    }

    throw new InstagramSessionError('No video URL found on the post page', 'PARSE_FAILED');
  }

  private isLoginWall($: cheerio.CheerioAPI, finalUrl: string): boolean {
    if (finalUrl.includes('/accounts/login')) {
      return true;
    }
    return $('input[name="username"]').length > 0 && $('input[name="password"]').length > 0;
  }

  private findInScripts($: cheerio.CheerioAPI): string | undefined {
    let found: string | undefined;

    $('script').each((_, script) => {
      const text = $(script).text();
      const match = text.match(VIDEO_URL_PATTERN) ?? text.match(VIDEO_VERSIONS_PATTERN);
      if (match) {
        found = unescapeJsonString(match[1]);
        return false;
      }
      return undefined;
    });

    return found;
  }
}

function unescapeJsonString(escaped: string): string {
  try {
    const value: unknown = JSON.parse(`"${escaped}"`);
    return typeof value === 'string' ? value : escaped;
  } catch (error) {
    throw new InstagramSessionError(
      'Video URL on the post page is not a valid JSON string',
      'PARSE_FAILED',
      error instanceof Error ? error : undefined
    );
  }
}
