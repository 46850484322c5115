export type Cell = string | number | boolean | null;

export type Row = Record<string, Cell>;

export type DataStore = 'local' | 'drive' | 'drive_colab';

export type DataSource = 'postgres' | 'sql_server';

export type TableFormat = 'csv' | 'json';

export type SharePermissionRole =
  | 'reader'
  | 'writer'
  | 'commenter'
  | 'fileOrganizer'
  | 'organizer'
  | 'owner';

export interface DriveFile {
  id?: string | null;
  name?: string | null;
}

export interface DriveFileMetadata {
  name: string;
  parents?: string[];
}

export interface DrivePermission {
  type: 'user';
  role: SharePermissionRole;
  emailAddress: string;
}

/**
 * The slice of Drive v3 the client relies on. Production code gets one from
 * `createGoogleDriveApi`; anything with the same shape can stand in for it.
 */
export interface DriveApi {
  listFiles(params: { pageSize: number; fields: string }): Promise<DriveFile[]>;
  downloadMedia(fileId: string): Promise<Buffer>;
  updateMedia(fileId: string, localPath: string): Promise<void>;
  createFile(metadata: DriveFileMetadata, localPath: string): Promise<string | null>;
  createPermission(
    fileId: string,
    permission: DrivePermission,
    options: { sendNotificationEmail: boolean }
  ): Promise<void>;
}

export interface ServiceAccountCredentials {
  type: 'service_account';
  project_id?: string;
  private_key_id?: string;
  private_key: string;
  client_email: string;
  client_id?: string;
  token_uri?: string;
}
