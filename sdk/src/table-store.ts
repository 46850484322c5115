import { promises as fs } from 'fs';
import path from 'path';
import { MonitorError } from '@attendance-monitor/utils';
import { DriveClient } from './drive-client.js';
import { TableRegistry } from './table-registry.js';
import { parseCsvTable } from './table-format.js';
import { DataSource, DataStore, Row } from './types.js';

export const DATA_STORES: readonly DataStore[] = ['local', 'drive', 'drive_colab'];

export function parseDataStore(value: string): DataStore {
  const store = DATA_STORES.find((candidate) => candidate === value);
  if (!store) {
    throw new MonitorError('UNSUPPORTED_STORE', `Unknown data store "${value}", expected one of: ${DATA_STORES.join(', ')}`);
  }
  return store;
}

export interface TableSource {
  getTable(source: DataSource, table: string): Promise<Row[]>;
}

export interface TableStoreOptions {
  store: DataStore;
  /** Root of the exported tables for the local store: `{dir}/{source}/{table}.csv`. */
  dir: string;
  drive?: { client: DriveClient; registry: TableRegistry };
}

/**
 * Reads the exported source-database tables from local CSV exports or from
 * Google Drive.
 */
export class TableStore implements TableSource {
  constructor(private readonly options: TableStoreOptions) {}

  async getTable(source: DataSource, table: string): Promise<Row[]> {
    switch (this.options.store) {
      case 'local':
        return this.readLocal(source, table);
      case 'drive': {
        const drive = this.options.drive;
        if (!drive) {
          throw new MonitorError('UNSUPPORTED_STORE', 'The drive store needs a Drive client and table registry');
        }
        return drive.registry.pullTable(drive.client, source, table);
      }
      case 'drive_colab':
        throw new MonitorError('UNSUPPORTED_STORE', 'The drive_colab store is not supported');
    }
  }

  private async readLocal(source: DataSource, table: string): Promise<Row[]> {
    const filePath = path.join(this.options.dir, source, `${table}.csv`);
    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf-8');
    } catch {
      throw new MonitorError('FILE_NOT_FOUND', `Table export ${filePath} not found`, { source, table, path: filePath });
    }
    return parseCsvTable(text);
  }
}
