import { promises as fs } from 'fs';
import path from 'path';
import { logger, MonitorError } from '@attendance-monitor/utils';
import { parseTable, parseWorkbook } from './table-format.js';
import { DriveApi, Row, SharePermissionRole, TableFormat } from './types.js';

export const SHARE_ROLES: readonly SharePermissionRole[] = [
  'reader',
  'writer',
  'commenter',
  'fileOrganizer',
  'organizer',
  'owner',
];

export function isShareRole(role: string): role is SharePermissionRole {
  return SHARE_ROLES.some((candidate) => candidate === role);
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Drive names may contain path separators. They are replaced so the file
 * always lands directly inside `dir`.
 */
export function localPathFor(dir: string, driveName: string): string {
  const name = driveName.replace(/[\\/]/g, '_');
  const root = path.resolve(dir);
  const target = path.resolve(root, name);
  if (name === '' || path.dirname(target) !== root) {
    throw new MonitorError('INVALID_RESPONSE', `Drive file name "${driveName}" cannot be used as a local file name`, {
      name: driveName,
    });
  }
  return target;
}

async function assertLocalFile(filePath: string): Promise<void> {
  if (!(await pathExists(filePath))) {
    throw new MonitorError('FILE_NOT_FOUND', `Local file ${filePath} not found`, { path: filePath });
  }
}

export class DriveClient {
  constructor(private readonly api: DriveApi) {}

  /**
   * Maps file id to file name for the files visible to the service account.
   * Entries missing an id or a name are skipped.
   */
  async listFiles(pageSize: number = 10): Promise<Record<string, string>> {
    const files = await this.api.listFiles({ pageSize, fields: 'nextPageToken, files(id, name)' });

    const byId: Record<string, string> = {};
    for (const file of files) {
      if (!file.id || !file.name) {
        logger.warn('Skipping Drive entry without id or name', { id: file.id ?? null, name: file.name ?? null });
        continue;
      }
      byId[file.id] = file.name;
    }
    return byId;
  }

  async getFileBytes(fileId: string): Promise<Buffer> {
    const bytes = await this.api.downloadMedia(fileId);
    logger.debug(`Downloaded ${bytes.length} bytes`, { fileId });
    return bytes;
  }

  async getFileName(fileId: string): Promise<string> {
    const files = await this.listFiles();
    const name = files[fileId];
    if (name === undefined) {
      throw new MonitorError(
        'FILE_NOT_FOUND',
        `ID: ${fileId} not found on Google Drive, check it's been shared with the service account`,
        { fileId }
      );
    }
    return name;
  }

  /**
   * Saves the file under `dir` using its Drive name. Returns null when the
   * download is empty.
   */
  async downloadFile(dir: string, fileId: string): Promise<string | null> {
    const stat = await fs.stat(dir).catch((error: NodeJS.ErrnoException) => {
      if (error.code === 'ENOENT') return null;
      throw error;
    });
    if (stat && !stat.isDirectory()) {
      throw new MonitorError('NOT_A_DIRECTORY', 'Must provide a directory path to write file', { path: dir });
    }
    await fs.mkdir(dir, { recursive: true });

    const filePath = localPathFor(dir, await this.getFileName(fileId));
    const bytes = await this.getFileBytes(fileId);
    if (bytes.length === 0) {
      logger.warn('Drive returned an empty file, nothing written', { fileId });
      return null;
    }

    await fs.writeFile(filePath, bytes);
    return filePath;
  }

  async readTable(fileId: string, format: TableFormat = 'csv'): Promise<Row[]> {
    const bytes = await this.getFileBytes(fileId);
    return parseTable(bytes.toString('utf-8'), format);
  }

  /** Every sheet of an .xlsx file, keyed by sheet name. */
  async readExcel(fileId: string): Promise<Record<string, Row[]>> {
    return parseWorkbook(await this.getFileBytes(fileId));
  }

  /** Replaces the content of an existing Drive file. */
  async uploadFile(filePath: string, fileId: string): Promise<void> {
    await assertLocalFile(filePath);
    await this.api.updateMedia(fileId, filePath);
    logger.success('Uploaded new file version', { fileId, path: filePath });
  }

  /**
   * Creates a Drive file and returns its id. Files the service account
   * creates outside a shared folder cannot be shared on, so pass
   * `parentFolderId` for anything people need to see.
   */
  async createFile(filePath: string, options?: { name?: string; parentFolderId?: string }): Promise<string> {
    await assertLocalFile(filePath);

    const metadata = {
      name: options?.name || path.basename(filePath),
      ...(options?.parentFolderId ? { parents: [options.parentFolderId] } : {}),
    };
    const id = await this.api.createFile(metadata, filePath);
    if (!id) {
      throw new MonitorError('INVALID_RESPONSE', 'Drive did not return an id for the created file', {
        name: metadata.name,
      });
    }
    return id;
  }

  async shareFile(fileId: string, email: string, role: string = 'writer'): Promise<void> {
    if (!isShareRole(role)) {
      throw new MonitorError('INVALID_ROLE', `Role must be one of: ${SHARE_ROLES.join(', ')}`, { role });
    }

    await this.api.createPermission(
      fileId,
      { type: 'user', role, emailAddress: email },
      { sendNotificationEmail: true }
    );
    logger.success(`Shared ${fileId} with ${email}`, { role });
  }
}
