// src/core/export/csv.ts
import type { PipelineRecord } from '../types/index.js';
import { expandTemplate, writeFileAtomic } from './path.js';
import { OUTPUT_COLUMNS, toOutputRow } from './rows.js';
import type { OutputValue, Sink, SinkContext } from './types.js';

const NEEDS_QUOTES = /[",\r\n]/;

export function escapeCsvCell(value: OutputValue): string {
  if (value === null) {
    return '';
  }
  const text = String(value);
  return NEEDS_QUOTES.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** Header line plus one line per record, CRLF separated */
export function formatCsv(records: readonly PipelineRecord[]): string {
  const names = OUTPUT_COLUMNS.map(([name]) => name);
  const lines = [names.join(',')];

  for (const record of records) {
    const row = toOutputRow(record);
    lines.push(names.map(name => escapeCsvCell(row[name] ?? null)).join(','));
  }

  return `${lines.join('\r\n')}\r\n`;
}

export class CsvFileSink implements Sink {
  readonly type = 'csv';
  readonly label: string;

  constructor(private readonly pathTemplate: string) {
    this.label = `csv:${pathTemplate}`;
  }

  async write(records: readonly PipelineRecord[], context: SinkContext): Promise<string> {
    const filePath = expandTemplate(this.pathTemplate, context);
    await writeFileAtomic(filePath, formatCsv(records));
    return filePath;
  }
}
