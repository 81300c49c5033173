// src/core/transform/post-id.ts
import type { NormalizedRecord } from '../types/index.js';

const POST_PATH_MARKERS = new Set(['p', 'reel', 'reels', 'tv', 'video']);

/**
 * Extracts a post shortcode from a post URL.
 * https://www.instagram.com/reel/C8mtEPSp4b8/ -> C8mtEPSp4b8
 * https://www.tiktok.com/@user/video/7301 -> 7301
 */
export function extractPostId(postUrl: string): string | undefined {
  let segments: string[];
  try {
    segments = new URL(postUrl).pathname.split('/').filter(segment => segment.length > 0);
  } catch {
    return undefined;
  }

  const markerIndex = segments.findIndex(segment => POST_PATH_MARKERS.has(segment));
  if (markerIndex >= 0 && markerIndex + 1 < segments.length) {
    return segments[markerIndex + 1];
  }

  return segments.length > 0 ? segments[segments.length - 1] : undefined;
}

export function getPostId(record: NormalizedRecord): string | undefined {
  const postId = asText(record.post_id);
  if (postId) {
    return postId;
  }

  const postUrl = asText(record.post_url);
  return postUrl ? extractPostId(postUrl) : undefined;
}

export function asText(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}
