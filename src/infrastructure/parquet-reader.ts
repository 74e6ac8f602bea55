// Parquet decoding backed by an in-process DuckDB instance.
// The native module is loaded on first use so pure pipeline code and its
// tests never pay for it. Rows are streamed one DuckDB chunk at a time, so a
// month is never held in memory as a whole.
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { DuckDBConnection, DuckDBInstance } from '@duckdb/node-api';
import type { Cell, Row, Table } from '@domain/types';
import { ParquetDecodeError, ParquetEngineError } from '@domain/errors';

/**
 * Decodes one Parquet payload into a sequence of row chunks. Every chunk of
 * a payload has the same columns; nothing is read until iteration starts.
 */
export type ParquetDecoder = (payload: Uint8Array) => AsyncIterable<Table>;

let instancePromise: Promise<DuckDBInstance> | null = null;

function getInstance(): Promise<DuckDBInstance> {
  if (!instancePromise) {
    instancePromise = import('@duckdb/node-api').then(({ DuckDBInstance }) =>
      DuckDBInstance.create(':memory:')
    );
  }
  return instancePromise;
}

// A streaming result is invalidated by the next query on its connection, so
// each payload gets a connection of its own.
async function openConnection(): Promise<DuckDBConnection> {
  try {
    const instance = await getInstance();
    return await instance.connect();
  } catch (error) {
    instancePromise = null;
    throw new ParquetEngineError(error);
  }
}

/**
 * Maps a DuckDB JS value onto a table cell. 64-bit integers become numbers
 * when they fit, strings otherwise.
 */
export function toCell(value: unknown): Cell {
  if (value === null || value === undefined) return null;
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value;
  }
  if (typeof value === 'bigint') {
    const asNumber = Number(value);
    return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
  }
  if (value instanceof Date) return value;
  return String(value);
}

function toRow(columns: readonly string[], values: readonly unknown[]): Row {
  const row: Record<string, Cell> = {};
  columns.forEach((column, index) => {
    row[column] = toCell(values[index]);
  });
  return row;
}

function sqlString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export const readParquet: ParquetDecoder = async function* (payload) {
  const connection = await openConnection();
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'trips-parquet-'));
  const file = path.join(dir, 'month.parquet');

  const decodeStep = async <T>(step: () => T | Promise<T>): Promise<T> => {
    try {
      return await step();
    } catch (error) {
      throw new ParquetDecodeError(
        `Failed to decode Parquet payload (${payload.byteLength} bytes)`,
        error
      );
    }
  };

  try {
    const result = await decodeStep(() => {
      fs.writeFileSync(file, payload);
      return connection.stream(
        `SELECT * FROM read_parquet(${sqlString(file)})`
      );
    });
    const columns = result.columnNames();
    const { JSDuckDBValueConverter } = await import('@duckdb/node-api');
    for (;;) {
      const chunk = await decodeStep(() => result.fetchChunk());
      if (!chunk || chunk.rowCount === 0) return;
      const values = await decodeStep(() => chunk.convertRows(JSDuckDBValueConverter));
      yield { columns, rows: values.map((row) => toRow(columns, row)) };
    }
  } finally {
    connection.closeSync();
    fs.rmSync(dir, { recursive: true, force: true });
  }
};
