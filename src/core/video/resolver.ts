// src/core/video/resolver.ts
import { createHash } from 'node:crypto';
import { DEFAULT_RETRY } from '../config/constants.js';
import { asText, getPostId } from '../transform/post-id.js';
import { withRetry } from '../utils/retry.js';
import type { NormalizedRecord, Platform, RetryPolicy } from '../types/index.js';
import type { VideoFetcher } from './direct-fetcher.js';
import type { FallbackResolver } from './types.js';
import { InstagramSessionError } from './instagram/errors.js';
import { isTerminal, transition, type ResolverEvent, type ResolverState, type TerminalState } from './state.js';

type ActiveState = Exclude<ResolverState, TerminalState>;

export interface VideoResolverOptions {
  fetcher: VideoFetcher;
  /** Fallback lookups by platform; a platform without one fails after the direct attempt */
  fallbacks?: Partial<Record<Platform, FallbackResolver>>;
  retry?: RetryPolicy;
  verbose?: boolean;
}

/**
 * Drives one record through the resolution states. Expected failures end in
 * the `failed` state; nothing a download does is thrown out of `resolve`.
 */
export class VideoResolver {
  private readonly retry: RetryPolicy;

  constructor(private readonly options: VideoResolverOptions) {
    this.retry = options.retry ?? DEFAULT_RETRY;
  }

  async resolve(record: NormalizedRecord, platform: Platform = 'unknown'): Promise<TerminalState> {
    const postId = getPostId(record);
    const mediaUrl = asText(record.media_url);

    let state: ResolverState = { kind: 'start', postId: postId ?? mediaKey(mediaUrl) };
    while (!isTerminal(state)) {
      const event = await this.step(state, record, platform, postId !== undefined);
      state = transition(state, event);
    }

    this.log(state);
    return state;
  }

  private async step(
    state: ActiveState,
    record: NormalizedRecord,
    platform: Platform,
    hasPostId: boolean
  ): Promise<ResolverEvent> {
    const postId = state.postId;

    if (state.kind === 'start') {
      const mediaUrl = asText(record.media_url);
      if (!mediaUrl) {
        return { type: 'direct_failed', reason: 'record has no media_url' };
      }
      try {
        const asset = await this.attempt(() => this.options.fetcher.download(mediaUrl, postId, 'direct'));
        return { type: 'direct_succeeded', asset };
      } catch (error) {
        return { type: 'direct_failed', reason: describe(error) };
      }
    }

    const fallback = this.options.fallbacks?.[platform];
    if (!fallback) {
      return { type: 'fallback_failed', reason: `no fallback resolver for ${platform}` };
    }
    if (!hasPostId) {
      return { type: 'fallback_failed', reason: 'no post identifier' };
    }
    try {
      const freshUrl = await this.attempt(() =>
        fallback.resolveMediaUrl({
          postId,
          postUrl: asText(record.post_url),
          username: asText(record.username),
        })
      );
      const asset = await this.attempt(() => this.options.fetcher.download(freshUrl, postId, 'fallback'));
      return { type: 'fallback_succeeded', asset };
    } catch (error) {
      return { type: 'fallback_failed', reason: `${fallback.name}: ${describe(error)}` };
    }
  }

  private attempt<T>(call: () => Promise<T>): Promise<T> {
    return withRetry(call, this.retry, {
      onRetry: (error, attempt, delayMs) => {
        if (this.options.verbose) {
          console.log(`[Resolve] attempt ${attempt} failed (${describe(error)}), retrying in ${delayMs}ms`);
        }
      },
    });
  }

  private log(state: TerminalState): void {
    if (!this.options.verbose) {
      return;
    }
    if (state.kind === 'resolved') {
      console.log(`[Resolve] ${state.asset.postId} via ${state.asset.method} (${state.asset.bytes.length} bytes)`);
    } else {
      console.log(`[Resolve] ${state.postId || '(no id)'} unresolved: ${state.reason}`);
    }
  }
}

/** Stands in for the post id when a record only carries its media URL */
export function mediaKey(mediaUrl: string | undefined): string {
  if (!mediaUrl) {
    return '';
  }
  return `media-${createHash('sha1').update(mediaUrl).digest('hex').slice(0, 16)}`;
}

function describe(error: unknown): string {
  if (error instanceof InstagramSessionError) {
    return `${error.code}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
