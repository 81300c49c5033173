// src/core/export/__tests__/fixtures.ts
import type { PipelineRecord } from '../../types/index.js';

export const analyzedReel: PipelineRecord = {
  source: {
    configName: 'cat_reels',
    platform: 'instagram',
    contentType: 'content',
    datasetId: 'ds-reels',
    ingestedAt: '2024-05-01T10:03:04.000Z',
  },
  fields: {
    post_id: 'C8mtEPSp4b8',
    post_url: 'https://www.instagram.com/reel/C8mtEPSp4b8/',
    media_url: 'https://cdn.example.com/v.mp4',
    caption: 'cats, "loud" ones\nsecond line',
    likes: 1200,
    views: 90000,
    comments: 30,
  },
  label: { viral: true, score: { views: 90000, likes: 1200 } },
  video: {
    status: 'resolved',
    method: 'direct',
    sourceUrl: 'https://cdn.example.com/v.mp4',
    contentType: 'video/mp4',
    byteLength: 2048,
    storageKey: 'videos/C8mtEPSp4b8.mp4',
  },
  analysis: { status: 'analyzed', result: { model: 'gemini-2.0-flash', videoAnalysis: 'hook in 1s' } },
};

export const adRecord: PipelineRecord = {
  source: {
    configName: 'brand_ads',
    platform: 'facebook',
    contentType: 'ad',
    datasetId: 'ds-ads',
    ingestedAt: '2024-05-01T10:03:04.000Z',
  },
  fields: { post_id: 'ad-1', likes: 'n/a', username: 'brand' },
  label: { viral: false, score: {} },
};
