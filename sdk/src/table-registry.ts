import { promises as fs } from 'fs';
import { z } from 'zod';
import { MonitorError } from '@attendance-monitor/utils';
import { DriveClient } from './drive-client.js';
import { describeIssues } from './schemas.js';
import { DataSource, Row } from './types.js';

const registrySchema = z.record(z.record(z.string().min(1)));

export type TableIds = z.infer<typeof registrySchema>;

/**
 * Drive file ids of the exported source tables, keyed by source database
 * and table name.
 */
export class TableRegistry {
  constructor(private readonly tables: TableIds) {}

  static async load(filePath: string): Promise<TableRegistry> {
    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf-8');
    } catch {
      throw new MonitorError('FILE_NOT_FOUND', `Drive table registry ${filePath} not found`, { path: filePath });
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new MonitorError('CONFIG_INVALID', `Drive table registry ${filePath} is not valid JSON`, { path: filePath });
    }

    const result = registrySchema.safeParse(json);
    if (!result.success) {
      throw new MonitorError('CONFIG_INVALID', `Drive table registry ${filePath} is invalid: ${describeIssues(result.error)}`);
    }
    return new TableRegistry(result.data);
  }

  fileId(source: DataSource, table: string): string {
    const id = this.tables[source]?.[table];
    if (!id) {
      throw new MonitorError('UNKNOWN_TABLE', `No Drive file registered for ${source}.${table}`, { source, table });
    }
    return id;
  }

  tableNames(source: DataSource): string[] {
    return Object.keys(this.tables[source] ?? {});
  }

  async pullTable(drive: DriveClient, source: DataSource, table: string): Promise<Row[]> {
    return drive.readTable(this.fileId(source, table), 'csv');
  }
}
