// src/cli/commands/run.ts
import { Command } from 'commander';
import { loadEnvFile, readCredentials } from '../../core/config/env.js';
import { loadPipelineConfig } from '../../core/config/schema.js';
import { createPipeline, resolveStages, selectConfigs } from '../../core/pipeline/factory.js';
import { allDestinationsFailed, printSummary } from '../../core/pipeline/summary.js';
import { parsePositiveInt, reportError } from './shared.js';

export interface RunCommandOptions {
  config: string;
  env?: string;
  only?: string[];
  skipDownload: boolean;
  skipAnalysis: boolean;
  write: boolean;
  concurrency?: number;
  verbose: boolean;
  json: boolean;
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Scrape, label, fetch and analyze videos, then write the configured outputs')
    .requiredOption('-c, --config <file>', 'Pipeline configuration file')
    .option('--env <file>', 'Read credentials from this file instead of ./.env')
    .option('--only <name...>', 'Run only the named configs')
    .option('--skip-download', 'Do not fetch videos (also skips analysis)', false)
    .option('--skip-analysis', 'Fetch videos but do not analyze them', false)
    .option('--no-write', 'Do not write any output')
    .option('--concurrency <n>', 'Parallel video downloads and analyses', parsePositiveInt)
    .option('--verbose', 'Verbose output', false)
    .option('--json', 'Print the run summary as JSON', false)
    .action(async (options: RunCommandOptions) => {
      try {
        loadEnvFile(options.env);
        const settings = await loadPipelineConfig(options.config);
        const configs = selectConfigs(settings, options.only);
        const stages = resolveStages(settings.stages, {
          skipDownload: options.skipDownload,
          skipAnalysis: options.skipAnalysis,
          noWrite: !options.write,
        });

        const pipeline = createPipeline({ ...settings, configs }, readCredentials(), stages, {
          verbose: options.verbose,
          quiet: options.json,
          concurrency: options.concurrency,
        });
        const summary = await pipeline.run(configs, stages);

        if (options.json) {
          console.log(JSON.stringify(summary, null, 2));
        } else {
          printSummary(summary);
        }

        if (allDestinationsFailed(summary)) {
          process.exit(1);
        }
      } catch (error) {
        reportError(error);
        process.exit(1);
      }
    });
}
