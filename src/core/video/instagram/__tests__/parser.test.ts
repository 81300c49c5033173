import { describe, it, expect } from '@jest/globals';
import { InstagramPageParser } from '../parser.js';
import { InstagramSessionError } from '../errors.js';

const ok = { status: 200, finalUrl: 'https://www.instagram.com/reel/ABC/' };

function codeOf(fn: () => unknown): string {
  try {
    fn();
  } catch (error) {
    if (error instanceof InstagramSessionError) {
      return error.code;
    }
    throw error;
  }
  return 'none';
}

describe('InstagramPageParser', () => {
  const parser = new InstagramPageParser();

  it('prefers the secure og:video url', () => {
    const html = `<html><head>
      <meta property="og:video" content="http://cdn.example.com/plain.mp4">
      <meta property="og:video:secure_url" content="https://cdn.example.com/secure.mp4">
    </head></html>`;

    expect(parser.parse(html, ok)).toBe('https://cdn.example.com/secure.mp4');
  });

  it('falls back to og:video', () => {
    const html = '<meta property="og:video" content="https://cdn.example.com/v.mp4?a=1&amp;b=2">';

    expect(parser.parse(html, ok)).toBe('https://cdn.example.com/v.mp4?a=1&b=2');
  });

  it('reads video_url from embedded page data and unescapes it', () => {
    const html =
      '<script type="application/json">{"items":[{"video_url":"https:\\/\\/cdn.example.com\\/v.mp4?x=1\\u0026y=2"}]}</script>';

    expect(parser.parse(html, ok)).toBe('https://cdn.example.com/v.mp4?x=1&y=2');
  });

  it('reads the first video_versions entry', () => {
    const html =
      '<script>{"video_versions":[{"type":101,"url":"https:\\/\\/cdn.example.com\\/hd.mp4"},{"url":"https:\\/\\/cdn.example.com\\/sd.mp4"}]}</script>';

    expect(parser.parse(html, ok)).toBe('https://cdn.example.com/hd.mp4');
  });

  it('recognizes a redirect to the login page', () => {
    const html = '<meta property="og:video" content="https://cdn.example.com/v.mp4">';

    expect(codeOf(() => parser.parse(html, { status: 200, finalUrl: 'https://www.instagram.com/accounts/login/?next=%2Freel%2FABC%2F' }))).toBe(
      'LOGIN_REQUIRED'
    );
  });

  it('recognizes an inline login form', () => {
    const html = '<form><input name="username"><input name="password" type="password"></form>';

    expect(codeOf(() => parser.parse(html, ok))).toBe('LOGIN_REQUIRED');
  });

  it('reports rate limits and missing posts', () => {
    expect(codeOf(() => parser.parse('', { ...ok, status: 429 }))).toBe('RATE_LIMITED');
    expect(codeOf(() => parser.parse('<p>Please wait a few minutes before you try again.</p>', ok))).toBe('RATE_LIMITED');
    expect(codeOf(() => parser.parse('', { ...ok, status: 404 }))).toBe('MEDIA_NOT_FOUND');
    expect(codeOf(() => parser.parse("<h2>Sorry, this page isn't available.</h2>", ok))).toBe('MEDIA_NOT_FOUND');
  });

  it('reports a page without any video', () => {
    expect(codeOf(() => parser.parse('<html><body>photo post</body></html>', ok))).toBe('PARSE_FAILED');
  });
});

describe('InstagramSessionError', () => {
  it('is retryable only for rate limits', () => {
    expect(new InstagramSessionError('x', 'RATE_LIMITED').retryable).toBe(true);
    expect(new InstagramSessionError('x', 'LOGIN_REQUIRED').retryable).toBe(false);
  });
});
