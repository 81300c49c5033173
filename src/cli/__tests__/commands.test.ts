// src/cli/__tests__/commands.test.ts
import { describe, it, expect, jest } from '@jest/globals';
import { Command, InvalidArgumentError } from 'commander';
import { datasetConfig, registerFetchDatasetCommand } from '../commands/fetch-dataset.js';
import { registerRunCommand } from '../commands/run.js';
import { parsePositiveInt, reportError } from '../commands/shared.js';
import { describeSettings, registerValidateCommand } from '../commands/validate.js';
import { parsePipelineConfig } from '../../core/config/schema.js';
import { ErrorCode, PipelineError } from '../../core/errors.js';

const settings = parsePipelineConfig({
  configs: [
    {
      name: 'cat_reels',
      actorId: 'apify/instagram-reel-scraper',
      platform: 'instagram',
      contentType: 'content',
      mapping: { videoUrl: 'media_url', videoPlayCount: 'views' },
    },
  ],
  mappings: { short: { id: 'post_id' } },
  thresholds: { views: 5000, likes: 100 },
  stages: { analysis: false },
  outputs: [{ type: 'csv', path: 'out.csv' }],
});

describe('CLI Commands - run', () => {
  it('should register run with its options', () => {
    const program = new Command();
    registerRunCommand(program);

    const command = program.commands.find(cmd => cmd.name() === 'run');
    const flags = command?.options.map(option => option.long);
    expect(flags).toEqual([
      '--config',
      '--env',
      '--only',
      '--skip-download',
      '--skip-analysis',
      '--no-write',
      '--concurrency',
      '--verbose',
      '--json',
    ]);
  });
});

describe('CLI Commands - validate', () => {
  it('should register validate command', () => {
    const program = new Command();
    registerValidateCommand(program);

    expect(program.commands.find(cmd => cmd.name() === 'validate')?.description()).toBe(
      'Check a pipeline configuration without calling any service'
    );
  });

  it('describes configs, mappings, thresholds, stages and outputs', () => {
    expect(describeSettings(settings, ['APIFY_API_TOKEN (scraping)'])).toEqual([
      '✓ 1 config(s)',
      '  cat_reels [instagram/content] actor apify/instagram-reel-scraper, mapping cat_reels_inline',
      '    videoUrl -> media_url',
      '    videoPlayCount -> views',
      'Viral when: views >= 5000 and likes >= 100',
      'Stages: download, write',
      'Outputs: csv',
      'Missing credentials:',
      '  - APIFY_API_TOKEN (scraping)',
    ]);
  });
});

describe('CLI Commands - fetch-dataset', () => {
  it('should register fetch-dataset with a dataset argument', () => {
    const program = new Command();
    registerFetchDatasetCommand(program);

    const command = program.commands.find(cmd => cmd.name() === 'fetch-dataset');
    expect(command?.registeredArguments.map(argument => argument.name())).toEqual(['datasetId']);
  });

  it('builds a stand-alone config when no config name is given', () => {
    const config = datasetConfig(settings, 'ds-9', { mapping: 'short' });

    expect(config).toMatchObject({
      name: 'dataset_ds-9',
      platform: 'unknown',
      contentType: 'content',
      datasetId: 'ds-9',
    });
    expect(config.mapping.name).toBe('short');
  });

  it('borrows platform and content type from a named config', () => {
    const config = datasetConfig(settings, 'ds-9', { mapping: 'instagram_reels', configName: 'cat_reels' });

    expect(config).toMatchObject({ name: 'cat_reels', platform: 'instagram', datasetId: 'ds-9' });
    expect(config.mapping.name).toBe('instagram_reels');
  });

  it('rejects unknown config and mapping names', () => {
    expect(() => datasetConfig(settings, 'ds-9', { mapping: 'short', configName: 'dog_reels' })).toThrow(
      'Unknown config name "dog_reels"'
    );
    expect(() => datasetConfig(settings, 'ds-9', { mapping: 'nope' })).toThrow(/unknown mapping "nope"/);
  });
});

describe('shared helpers', () => {
  it('parses positive integers only', () => {
    expect(parsePositiveInt('4')).toBe(4);
    expect(() => parsePositiveInt('0')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('2.5')).toThrow('Must be a positive integer.');
  });

  it('prints the suggestion after the message', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    reportError(new PipelineError(ErrorCode.MISSING_CREDENTIALS, 'Missing credentials', false, 'Set them in .env'));

    expect(errorSpy.mock.calls).toEqual([['Error:', 'Missing credentials'], ['Hint: Set them in .env']]);
    errorSpy.mockRestore();
  });
});
