// src/core/video/state.ts
import type { VideoAsset, VideoOutcome } from '../types/index.js';

export type ResolverState =
  | { kind: 'start'; postId: string }
  | { kind: 'fallback_attempt'; postId: string; directError: string }
  | { kind: 'resolved'; asset: VideoAsset }
  | { kind: 'failed'; postId: string; reason: string; attempts: number };

export type TerminalState = Extract<ResolverState, { kind: 'resolved' | 'failed' }>;

export type ResolverEvent =
  | { type: 'direct_succeeded'; asset: VideoAsset }
  | { type: 'direct_failed'; reason: string }
  | { type: 'fallback_succeeded'; asset: VideoAsset }
  | { type: 'fallback_failed'; reason: string };

export class IllegalTransitionError extends Error {
  constructor(state: ResolverState, event: ResolverEvent) {
    super(`No transition from "${state.kind}" on "${event.type}"`);
    this.name = 'IllegalTransitionError';
  }
}

/**
 * start -> resolved | fallback_attempt
 * fallback_attempt -> resolved | failed
 * There is exactly one path through the fallback; terminal states accept nothing.
 */
export function transition(state: ResolverState, event: ResolverEvent): ResolverState {
  switch (state.kind) {
    case 'start':
      if (event.type === 'direct_succeeded') {
        return { kind: 'resolved', asset: event.asset };
      }
      if (event.type === 'direct_failed') {
        return { kind: 'fallback_attempt', postId: state.postId, directError: event.reason };
      }
      break;
    case 'fallback_attempt':
      if (event.type === 'fallback_succeeded') {
        return { kind: 'resolved', asset: event.asset };
      }
      if (event.type === 'fallback_failed') {
        return {
          kind: 'failed',
          postId: state.postId,
          reason: `direct: ${state.directError}; fallback: ${event.reason}`,
          attempts: 2,
        };
      }
      break;
    case 'resolved':
    case 'failed':
      break;
  }
  throw new IllegalTransitionError(state, event);
}

export function isTerminal(state: ResolverState): state is TerminalState {
  return state.kind === 'resolved' || state.kind === 'failed';
}

export function toVideoOutcome(state: TerminalState): VideoOutcome {
  if (state.kind === 'failed') {
    return { status: 'unresolved', reason: state.reason, attempts: state.attempts };
  }
  const { asset } = state;
  return {
    status: 'resolved',
    method: asset.method,
    sourceUrl: asset.sourceUrl,
    contentType: asset.contentType,
    byteLength: asset.bytes.length,
    ...(asset.storageKey ? { storageKey: asset.storageKey } : {}),
  };
}
