import { describe, it, expect } from '@jest/globals';
import { asText, extractPostId, getPostId } from '../post-id.js';

describe('extractPostId', () => {
  it.each([
    ['https://www.instagram.com/reel/C8mtEPSp4b8/', 'C8mtEPSp4b8'],
    ['https://www.instagram.com/p/C8mtEPSp4b8/?igsh=abc', 'C8mtEPSp4b8'],
    ['https://www.instagram.com/catmom/reels/DAbc123/', 'DAbc123'],
    ['https://www.tiktok.com/@catmom/video/7301234567890', '7301234567890'],
    ['https://example.com/watch/xyz', 'xyz'],
  ])('extracts the id from %s', (url, expected) => {
    expect(extractPostId(url)).toBe(expected);
  });

  it('returns undefined for invalid or empty urls', () => {
    expect(extractPostId('not a url')).toBeUndefined();
    expect(extractPostId('https://www.instagram.com/')).toBeUndefined();
  });
});

describe('getPostId', () => {
  it('prefers the post_id field', () => {
    expect(getPostId({ post_id: 'ABC', post_url: 'https://www.instagram.com/p/XYZ/' })).toBe('ABC');
  });

  it('falls back to the post url', () => {
    expect(getPostId({ post_id: '  ', post_url: 'https://www.instagram.com/p/XYZ/' })).toBe('XYZ');
  });

  it('returns undefined when neither is usable', () => {
    expect(getPostId({ caption: 'x' })).toBeUndefined();
  });
});

describe('asText', () => {
  it('trims strings and stringifies finite numbers', () => {
    expect(asText(' a ')).toBe('a');
    expect(asText(7301)).toBe('7301');
    expect(asText('')).toBeUndefined();
    expect(asText(Number.NaN)).toBeUndefined();
    expect(asText(null)).toBeUndefined();
  });
});
