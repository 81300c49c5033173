// src/core/pipeline/__tests__/factory.test.ts
import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { parsePipelineConfig } from '../../config/schema.js';
import { ErrorCode, PipelineError } from '../../errors.js';
import { createPipeline, resolveStages, selectConfigs } from '../factory.js';
import { PipelineOrchestrator } from '../orchestrator.js';

const settings = parsePipelineConfig({
  configs: [
    { name: 'cat_reels', actorId: 'apify/instagram-reel-scraper', contentType: 'content', mapping: 'instagram_reels' },
    { name: 'brand_ads', actorId: 'apify/facebook-ads-scraper', contentType: 'ad', mapping: 'instagram_ads' },
  ],
  thresholds: { views: 5000 },
  outputs: [
    { type: 'json', path: 'out/{timestamp}.json' },
    { type: 's3', bucket: 'exports', key: 'runs/{timestamp}.csv', format: 'csv' },
  ],
});

function thrown(fn: () => unknown): PipelineError {
  try {
    fn();
  } catch (error) {
    if (error instanceof PipelineError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a PipelineError');
}

describe('resolveStages', () => {
  it('applies command line overrides on top of the file', () => {
    expect(resolveStages(settings.stages, { skipAnalysis: true })).toEqual({
      download: true,
      analysis: false,
      archiveVideos: false,
      write: true,
    });
    expect(
      resolveStages({ download: true, analysis: true, archiveVideos: true, write: true }, { skipDownload: true, noWrite: true })
    ).toEqual({ download: false, analysis: true, archiveVideos: false, write: false });
  });
});

describe('selectConfigs', () => {
  it('keeps file order', () => {
    expect(selectConfigs(settings, ['brand_ads', 'cat_reels']).map(config => config.name)).toEqual([
      'cat_reels',
      'brand_ads',
    ]);
    expect(selectConfigs(settings)).toHaveLength(2);
  });

  it('rejects unknown names', () => {
    const error = thrown(() => selectConfigs(settings, ['dog_reels']));

    expect(error.code).toBe(ErrorCode.CONFIGURATION_ERROR);
    expect(error.context?.issues).toEqual(['dog_reels (known: cat_reels, brand_ads)']);
  });
});

describe('createPipeline', () => {
  const originalFetch = global.fetch;
  let fetchMock: ReturnType<typeof jest.fn<typeof fetch>>;

  beforeEach(() => {
    fetchMock = jest.fn<typeof fetch>();
    global.fetch = fetchMock;
  });

  afterEach(() => {
    global.fetch = originalFetch;
  });

  it('lists every missing credential before any request', () => {
    const error = thrown(() => createPipeline(settings, {}, settings.stages));

    expect(error.code).toBe(ErrorCode.MISSING_CREDENTIALS);
    expect(error.context?.missing).toEqual([
      'APIFY_API_TOKEN (scraping)',
      'GEMINI_API_KEY (analysis stage)',
      'S3_REGION (object storage)',
    ]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('needs fewer credentials when stages are switched off', () => {
    const stages = resolveStages(settings.stages, { skipDownload: true, noWrite: true });

    expect(createPipeline(settings, { apifyToken: 'test-token' }, stages, { quiet: true })).toBeInstanceOf(
      PipelineOrchestrator
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('builds the full pipeline when everything is configured', () => {
    const pipeline = createPipeline(
      settings,
      { apifyToken: 'test-token', geminiApiKey: 'test-key', s3: { region: 'us-east-1' } },
      settings.stages
    );

    expect(pipeline).toBeInstanceOf(PipelineOrchestrator);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
