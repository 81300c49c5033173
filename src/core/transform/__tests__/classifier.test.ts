import { describe, it, expect } from '@jest/globals';
import { classify, computeScore, createThresholds, labelRecord } from '../classifier.js';
import { createColumnMapping, normalize } from '../mapper.js';
import { ErrorCode, PipelineError } from '../../errors.js';
import type { NormalizedRecord } from '../../types/index.js';

describe('createThresholds', () => {
  it('accepts known metrics', () => {
    const thresholds = createThresholds({ views: 5000, engagement_rate: 0.05 });

    expect(thresholds).toEqual({ views: 5000, engagement_rate: 0.05 });
    expect(Object.isFrozen(thresholds)).toBe(true);
  });

  it('rejects unknown metrics and negative values together', () => {
    expect.assertions(3);
    try {
      createThresholds({ saves: 10, likes: -1 });
    } catch (err) {
      expect((err as PipelineError).code).toBe(ErrorCode.CONFIGURATION_ERROR);
      expect((err as PipelineError).message).toContain('unknown metric "saves"');
      expect((err as PipelineError).message).toContain('threshold for "likes" must be a non-negative number');
    }
  });

  it('rejects an empty table', () => {
    expect(() => createThresholds({})).toThrow(PipelineError);
  });
});

describe('computeScore', () => {
  it('derives engagement and engagement rate', () => {
    expect(computeScore({ likes: 80, comments: 15, shares: 5, views: 1000 })).toEqual({
      likes: 80,
      comments: 15,
      shares: 5,
      views: 1000,
      engagement: 100,
      engagement_rate: 0.1,
    });
  });

  it('parses numeric strings and ignores everything else', () => {
    expect(computeScore({ likes: '1200', views: 'n/a', comments: null, shares: true })).toEqual({
      likes: 1200,
      engagement: 1200,
    });
  });

  it('omits engagement rate when views are zero', () => {
    expect(computeScore({ likes: 4, views: 0 })).toEqual({ likes: 4, views: 0, engagement: 4 });
  });
});

describe('labelRecord', () => {
  const thresholds = createThresholds({ views: 5000 });

  it('is viral when the metric meets the threshold', () => {
    expect(labelRecord({ views: 5000 }, thresholds).viral).toBe(true);
    expect(labelRecord({ views: 4999 }, thresholds).viral).toBe(false);
  });

  it('requires every configured metric', () => {
    const both = createThresholds({ views: 100, likes: 10 });

    expect(labelRecord({ views: 200, likes: 10 }, both).viral).toBe(true);
    expect(labelRecord({ views: 200, likes: 9 }, both).viral).toBe(false);
    expect(labelRecord({ views: 200 }, both).viral).toBe(false);
  });

  it('classifies a record missing all engagement fields as not viral without throwing', () => {
    const label = labelRecord({ caption: 'no numbers here' }, createThresholds({ engagement: 1 }));

    expect(label).toEqual({ viral: false, score: {} });
  });

  it('records the compared score', () => {
    expect(labelRecord({ likes: 120, views: 10000 }, thresholds)).toEqual({
      viral: true,
      score: { likes: 120, views: 10000, engagement: 120, engagement_rate: 0.012 },
    });
  });
});

describe('classify', () => {
  const thresholds = createThresholds({ views: 5000, engagement_rate: 0.01 });

  const target: NormalizedRecord = { post_id: 'A', likes: 120, views: 10000 };
  const others: NormalizedRecord[] = [
    { post_id: 'B', likes: 1_000_000, views: 9_000_000 },
    { post_id: 'C' },
    { post_id: 'D', likes: 0, views: 1 },
    { post_id: 'E', likes: 'garbage', views: null },
  ];

  it('labels a record the same regardless of its batch and position', () => {
    const alone = classify([target], thresholds)[0].label;
    const first = classify([target, ...others], thresholds)[0].label;
    const last = classify([...others, target], thresholds)[others.length].label;
    const reversed = classify([...others].reverse().concat(target), thresholds)[others.length].label;

    expect(alone.viral).toBe(true);
    expect(first).toEqual(alone);
    expect(last).toEqual(alone);
    expect(reversed).toEqual(alone);
  });

  it('returns one label per record in input order', () => {
    const labels = classify(others, thresholds).map(({ record, label }) => [record.post_id, label.viral]);

    expect(labels).toEqual([
      ['B', true],
      ['C', false],
      ['D', false],
      ['E', false],
    ]);
  });

  it('labels the documented end-to-end example as viral', () => {
    const mapping = createColumnMapping('example', {
      videoUrl: 'media_url',
      likeCount: 'likes',
      viewCount: 'views',
    });
    const normalized = normalize(
      [{ videoUrl: 'http://x/v.mp4', likeCount: 120, viewCount: 10000, caption: 'cats' }],
      mapping
    );

    const [result] = classify(normalized, createThresholds({ views: 5000 }));

    expect(result.record).toEqual({ media_url: 'http://x/v.mp4', likes: 120, views: 10000 });
    expect(result.label.viral).toBe(true);
  });
});
