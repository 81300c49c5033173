// src/core/config/mappings.ts
import type { MappingTable } from '../transform/mapper.js';

/**
 * Column mappings for the actors the pipeline is usually pointed at.
 * Config files refer to these by name or declare their own under `mappings`.
 */
export const BUILTIN_MAPPINGS: Readonly<Record<string, MappingTable>> = {
  instagram_reels: {
    shortCode: 'post_id',
    url: 'post_url',
    videoUrl: 'media_url',
    ownerUsername: 'username',
    caption: 'caption',
    likesCount: 'likes',
    videoPlayCount: 'views',
    commentsCount: 'comments',
    videoDuration: 'duration',
    timestamp: 'posted_at',
  },
  instagram_ads: {
    adArchiveID: 'post_id',
    'snapshot.linkUrl': 'post_url',
    'snapshot.videos.0.videoHdUrl': 'media_url',
    pageName: 'username',
    'snapshot.body.text': 'caption',
    startDateFormatted: 'posted_at',
  },
  tiktok_videos: {
    id: 'post_id',
    webVideoUrl: 'post_url',
    'videoMeta.downloadAddr': 'media_url',
    'authorMeta.name': 'username',
    text: 'caption',
    diggCount: 'likes',
    playCount: 'views',
    commentCount: 'comments',
    shareCount: 'shares',
    'videoMeta.duration': 'duration',
    createTimeISO: 'posted_at',
  },
};
