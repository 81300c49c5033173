// src/core/video/__tests__/state.test.ts
import { describe, it, expect } from '@jest/globals';
import { IllegalTransitionError, toVideoOutcome, transition, type ResolverState } from '../state.js';
import type { VideoAsset } from '../../types/index.js';

const asset = (method: VideoAsset['method']): VideoAsset => ({
  postId: 'C8mtEPSp4b8',
  bytes: Buffer.from('video-bytes'),
  contentType: 'video/mp4',
  sourceUrl: 'https://cdn.example.com/v.mp4',
  method,
});

describe('transition', () => {
  const start: ResolverState = { kind: 'start', postId: 'C8mtEPSp4b8' };

  it('resolves directly on a direct success', () => {
    const next = transition(start, { type: 'direct_succeeded', asset: asset('direct') });

    expect(next.kind).toBe('resolved');
  });

  it('moves to the fallback on a direct failure', () => {
    expect(transition(start, { type: 'direct_failed', reason: 'HTTP 403' })).toEqual({
      kind: 'fallback_attempt',
      postId: 'C8mtEPSp4b8',
      directError: 'HTTP 403',
    });
  });

  it('fails with both reasons when the fallback fails', () => {
    const fallback = transition(start, { type: 'direct_failed', reason: 'HTTP 403' });

    expect(transition(fallback, { type: 'fallback_failed', reason: 'LOGIN_REQUIRED' })).toEqual({
      kind: 'failed',
      postId: 'C8mtEPSp4b8',
      reason: 'direct: HTTP 403; fallback: LOGIN_REQUIRED',
      attempts: 2,
    });
  });

  it('rejects events that do not belong to the state', () => {
    const fallback = transition(start, { type: 'direct_failed', reason: 'x' });

    expect(() => transition(start, { type: 'fallback_succeeded', asset: asset('fallback') })).toThrow(
      IllegalTransitionError
    );
    expect(() => transition(fallback, { type: 'direct_failed', reason: 'again' })).toThrow(
      'No transition from "fallback_attempt" on "direct_failed"'
    );
  });

  it('accepts nothing in a terminal state', () => {
    const failed: ResolverState = { kind: 'failed', postId: 'x', reason: 'r', attempts: 2 };

    expect(() => transition(failed, { type: 'fallback_failed', reason: 'r' })).toThrow(IllegalTransitionError);
  });
});

describe('toVideoOutcome', () => {
  it('summarizes a resolved asset without its bytes', () => {
    expect(toVideoOutcome({ kind: 'resolved', asset: { ...asset('fallback'), storageKey: 'videos/C8mtEPSp4b8.mp4' } })).toEqual({
      status: 'resolved',
      method: 'fallback',
      sourceUrl: 'https://cdn.example.com/v.mp4',
      contentType: 'video/mp4',
      byteLength: 11,
      storageKey: 'videos/C8mtEPSp4b8.mp4',
    });
  });

  it('keeps the failure reason', () => {
    expect(toVideoOutcome({ kind: 'failed', postId: 'x', reason: 'gone', attempts: 2 })).toEqual({
      status: 'unresolved',
      reason: 'gone',
      attempts: 2,
    });
  });
});
