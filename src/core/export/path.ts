// src/core/export/path.ts
import * as path from 'node:path';
import * as fs from 'node:fs/promises';
import type { SinkContext } from './types.js';

/** 2024-05-01T10:03:04Z -> 20240501_100304 (UTC) */
export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/** Fills `{timestamp}` and `{config}` in an output path or object key */
export function expandTemplate(template: string, context: SinkContext): string {
  return template
    .replace(/\{timestamp\}/g, formatTimestamp(context.runStartedAt))
    .replace(/\{config\}/g, slugify(context.configName));
}

function slugify(name: string): string {
  const cleaned = name
    .toLowerCase()
    .replace(/[^\w-]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .substring(0, 80);
  return cleaned.length > 0 ? cleaned : 'run';
}

/**
 * Writes to a temp sibling and renames it into place, so readers see the old
 * file or the complete new one.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
  try {
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
