// src/core/video/types.ts

export interface MediaRef {
  postId: string;
  postUrl?: string;
  username?: string;
}

/** Looks up a fresh media URL when the scraped one no longer works */
export interface FallbackResolver {
  readonly name: string;
  resolveMediaUrl(ref: MediaRef): Promise<string>;
}
