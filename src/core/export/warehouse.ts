// src/core/export/warehouse.ts
import { z } from 'zod';
import { ErrorCode, PipelineError } from '../errors.js';
import { DEFAULT_TIMEOUT } from '../config/constants.js';
import type { WarehouseCredentials } from '../config/env.js';
import { fetchWithTimeout, releaseAndFail } from '../utils/http.js';
import type { PipelineRecord } from '../types/index.js';
import { OUTPUT_COLUMNS, toOutputRow, type ColumnKind } from './rows.js';
import type { OutputValue, Sink, SinkContext } from './types.js';

export type WriteMode = 'append' | 'overwrite';

/** Longest the SQL API may hold a statement request open (its maximum is 50 s) */
export const STATEMENT_WAIT_SECS = 50;

export interface StatementParameter {
  name: string;
  type: 'STRING' | 'DOUBLE' | 'BOOLEAN';
  /** Omitted for NULL */
  value?: string;
}

export interface Statement {
  statement: string;
  parameters: StatementParameter[];
}

export interface WarehouseSinkOptions extends WarehouseCredentials {
  requestTimeoutMs?: number;
  verbose?: boolean;
}

const SQL_TYPES: Record<ColumnKind, StatementParameter['type']> = {
  string: 'STRING',
  number: 'DOUBLE',
  boolean: 'BOOLEAN',
};

const statementResponseSchema = z.object({
  statement_id: z.string().optional(),
  status: z.object({
    state: z.string(),
    error: z.object({ message: z.string().optional(), error_code: z.string().optional() }).optional(),
  }),
});

export function quoteIdentifier(name: string): string {
  return `\`${name.replace(/`/g, '``')}\``;
}

export function createTableStatement(table: string): string {
  const columns = OUTPUT_COLUMNS.map(([name, kind]) => `${quoteIdentifier(name)} ${SQL_TYPES[kind]}`);
  return `CREATE TABLE IF NOT EXISTS ${table} (${columns.join(', ')}) USING DELTA`;
}

/**
 * Builds one INSERT for the whole batch. Values travel as named parameters
 * (`:r{row}_c{column}`), never spliced into the SQL text.
 */
export function buildInsertStatement(table: string, records: readonly PipelineRecord[], mode: WriteMode): Statement {
  const parameters: StatementParameter[] = [];
  const columnList = OUTPUT_COLUMNS.map(([name]) => quoteIdentifier(name)).join(', ');

  const tuples = records.map((record, rowIndex) => {
    const row = toOutputRow(record);
    const markers = OUTPUT_COLUMNS.map(([name, kind], columnIndex) => {
      const parameter: StatementParameter = { name: `r${rowIndex}_c${columnIndex}`, type: SQL_TYPES[kind] };
      const value = toParameterValue(row[name] ?? null);
      if (value !== undefined) {
        parameter.value = value;
      }
      parameters.push(parameter);
      return `:${parameter.name}`;
    });
    return `(${markers.join(', ')})`;
  });

  const verb = mode === 'overwrite' ? 'INSERT OVERWRITE' : 'INSERT INTO';
  return {
    statement: `${verb} ${table} (${columnList}) VALUES ${tuples.join(', ')}`,
    parameters,
  };
}

function toParameterValue(value: OutputValue): string | undefined {
  return value === null ? undefined : String(value);
}

/** Databricks SQL Statement Execution API */
export class DatabricksWarehouseSink implements Sink {
  readonly type = 'warehouse';
  readonly label: string;
  private readonly qualifiedTable: string;
  private readonly endpoint: string;

  constructor(
    private readonly options: WarehouseSinkOptions,
    table: string,
    private readonly mode: WriteMode
  ) {
    this.qualifiedTable = [options.catalog, options.schema, table].map(quoteIdentifier).join('.');
    this.label = `warehouse:${options.catalog}.${options.schema}.${table}`;
    const host = options.host.replace(/\/+$/, '');
    this.endpoint = `${/^https?:\/\//.test(host) ? host : `https://${host}`}/api/2.0/sql/statements`;
  }

  async write(records: readonly PipelineRecord[], _context: SinkContext): Promise<string> {
    await this.execute({ statement: createTableStatement(this.qualifiedTable), parameters: [] });

    if (records.length > 0) {
      await this.execute(buildInsertStatement(this.qualifiedTable, records, this.mode));
    } else if (this.mode === 'overwrite') {
      await this.execute({ statement: `TRUNCATE TABLE ${this.qualifiedTable}`, parameters: [] });
    }

    return this.label.slice('warehouse:'.length);
  }

  private async execute(statement: Statement): Promise<void> {
    const response = await fetchWithTimeout(
      this.endpoint,
      {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.options.token}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          warehouse_id: this.options.warehouseId,
          statement: statement.statement,
          parameters: statement.parameters,
          wait_timeout: `${STATEMENT_WAIT_SECS}s`,
          on_wait_timeout: 'CANCEL',
        }),
      },
      // outlive the server-side wait so CANCEL fires there, never a client abort
      (this.options.requestTimeoutMs ?? DEFAULT_TIMEOUT) + STATEMENT_WAIT_SECS * 1000
    );

    if (!response.ok) {
      throw await releaseAndFail(response, 'Databricks SQL API');
    }

    const parsed = statementResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new PipelineError(ErrorCode.SINK_WRITE_FAILED, 'Databricks SQL API returned an unexpected response');
    }

    const { state, error } = parsed.data.status;
    if (state !== 'SUCCEEDED') {
      throw new PipelineError(
        ErrorCode.SINK_WRITE_FAILED,
        `Statement ${state.toLowerCase()}: ${error?.message ?? 'no error message'}`,
        false,
        undefined,
        { statementId: parsed.data.statement_id, errorCode: error?.error_code }
      );
    }

    if (this.options.verbose) {
      console.log(`[Sink] ${this.label}: ${statement.statement.split(' (')[0]} ok`);
    }
  }
}
