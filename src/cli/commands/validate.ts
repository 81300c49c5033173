// src/cli/commands/validate.ts
import { Command } from 'commander';
import { loadEnvFile, missingCredentials, readCredentials } from '../../core/config/env.js';
import { loadPipelineConfig, type PipelineSettings } from '../../core/config/schema.js';
import { reportError } from './shared.js';

export interface ValidateCommandOptions {
  config: string;
  env?: string;
  json: boolean;
}

export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Check a pipeline configuration without calling any service')
    .requiredOption('-c, --config <file>', 'Pipeline configuration file')
    .option('--env <file>', 'Read credentials from this file instead of ./.env')
    .option('--json', 'Print the resolved configuration as JSON', false)
    .action(async (options: ValidateCommandOptions) => {
      try {
        loadEnvFile(options.env);
        const settings = await loadPipelineConfig(options.config);
        const missing = missingCredentials(settings, readCredentials());

        if (options.json) {
          console.log(JSON.stringify({ ...settings, missingCredentials: missing }, null, 2));
        } else {
          describeSettings(settings, missing).forEach(line => console.log(line));
        }
      } catch (error) {
        reportError(error);
        process.exit(1);
      }
    });
}

export function describeSettings(settings: PipelineSettings, missing: readonly string[]): string[] {
  const lines = [`✓ ${settings.configs.length} config(s)`];

  for (const config of settings.configs) {
    const source = config.datasetId ? `dataset ${config.datasetId}` : `actor ${config.actorId}`;
    lines.push(`  ${config.name} [${config.platform}/${config.contentType}] ${source}, mapping ${config.mapping.name}`);
    config.mapping.entries.forEach(([rawKey, field]) => lines.push(`    ${rawKey} -> ${field}`));
  }

  const thresholds = Object.entries(settings.thresholds).map(([metric, value]) => `${metric} >= ${value}`);
  lines.push(`Viral when: ${thresholds.join(' and ')}`);

  const stages = Object.entries(settings.stages)
    .filter(([, enabled]) => enabled)
    .map(([stage]) => stage);
  lines.push(`Stages: ${stages.length > 0 ? stages.join(', ') : 'none'}`);

  lines.push(
    `Outputs: ${settings.outputs.length > 0 ? settings.outputs.map(output => output.type).join(', ') : 'none'}`
  );

  if (missing.length > 0) {
    lines.push('Missing credentials:', ...missing.map(item => `  - ${item}`));
  }
  return lines;
}
