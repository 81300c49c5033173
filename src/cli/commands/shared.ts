// src/cli/commands/shared.ts
import { InvalidArgumentError } from 'commander';
import { PipelineError } from '../../core/errors.js';

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/** Prints an error and its suggestion to stderr */
export function reportError(error: unknown): void {
  console.error('Error:', error instanceof Error ? error.message : String(error));
  if (error instanceof PipelineError && error.suggestion) {
    console.error(`Hint: ${error.suggestion}`);
  }
}
