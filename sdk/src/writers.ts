import { promises as fs } from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { logger } from '@attendance-monitor/utils';
import { rowSchema, toCsv } from './table-format.js';
import { Cell, Row } from './types.js';

type SqliteValue = string | number | null;

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function unionColumns(rows: readonly Row[]): string[] {
  const seen = new Set<string>();
  for (const row of rows) {
    for (const column of Object.keys(row)) seen.add(column);
  }
  return [...seen];
}

function columnType(rows: readonly Row[], column: string): 'INTEGER' | 'REAL' | 'TEXT' {
  for (const row of rows) {
    const value = row[column];
    if (value === null || value === undefined) continue;
    if (typeof value === 'boolean') return 'INTEGER';
    if (typeof value === 'number') return Number.isInteger(value) ? 'INTEGER' : 'REAL';
    return 'TEXT';
  }
  return 'TEXT';
}

function toSqlite(value: Cell | undefined): SqliteValue {
  if (value === undefined) return null;
  if (typeof value === 'boolean') return value ? 1 : 0;
  return value;
}

/**
 * Snapshot tables in a SQLite file. Each write replaces the table.
 */
export class SqliteTableWriter {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
  }

  /** Replaces `table` with `rows` and returns the first `previewRows` rows read back. */
  writeTable(rows: readonly Row[], table: string, previewRows: number = 10): Row[] {
    const columns = unionColumns(rows);
    const target = quoteIdentifier(table);

    const replace = this.db.transaction(() => {
      this.db.exec(`DROP TABLE IF EXISTS ${target}`);
      if (columns.length === 0) return;

      const definitions = columns.map((column) => `${quoteIdentifier(column)} ${columnType(rows, column)}`);
      this.db.exec(`CREATE TABLE ${target} (${definitions.join(', ')})`);

      const insert = this.db.prepare(
        `INSERT INTO ${target} (${columns.map(quoteIdentifier).join(', ')}) VALUES (${columns.map(() => '?').join(', ')})`
      );
      for (const row of rows) {
        insert.run(columns.map((column) => toSqlite(row[column])));
      }
    });
    replace();

    if (columns.length === 0) {
      logger.warn(`No rows to write, ${table} dropped`);
      return [];
    }

    const preview = this.db.prepare(`SELECT * FROM ${target} LIMIT ?`).all(previewRows);
    return z.array(rowSchema).parse(preview);
  }

  close(): void {
    this.db.close();
  }
}

export async function writeCsv(rows: readonly Row[], filePath: string): Promise<void> {
  await fs.writeFile(filePath, toCsv(rows, unionColumns(rows)));
}

/**
 * Writes `{outputDir}/{tableName}.csv` and replaces `tableName` in
 * `{outputDir}/{dbFileName}.sqlite`. Returns the SQLite preview rows.
 */
export async function writeTableToDisk(
  rows: readonly Row[],
  outputDir: string,
  tableName: string,
  dbFileName: string
): Promise<Row[]> {
  await fs.mkdir(outputDir, { recursive: true });
  await writeCsv(rows, path.join(outputDir, `${tableName}.csv`));

  const writer = new SqliteTableWriter(path.join(outputDir, `${dbFileName}.sqlite`));
  try {
    return writer.writeTable(rows, tableName);
  } finally {
    writer.close();
  }
}
