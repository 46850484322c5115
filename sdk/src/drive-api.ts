import { createReadStream, promises as fs } from 'fs';
import { google } from 'googleapis';
import { z } from 'zod';
import { MonitorError } from '@attendance-monitor/utils';
import { describeIssues } from './schemas.js';
import { DriveApi, ServiceAccountCredentials } from './types.js';

const serviceAccountSchema = z
  .object({
    type: z.literal('service_account'),
    project_id: z.string().optional(),
    private_key_id: z.string().optional(),
    private_key: z.string().min(1),
    client_email: z.string().email(),
    client_id: z.string().optional(),
    token_uri: z.string().url().optional(),
  })
  .passthrough();

export async function loadServiceAccount(filePath: string): Promise<ServiceAccountCredentials> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new MonitorError('FILE_NOT_FOUND', `Service account key file ${filePath} could not be read`, {
      path: filePath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new MonitorError('CREDENTIALS_INVALID', `Service account key file ${filePath} is not valid JSON`, {
      path: filePath,
    });
  }

  const result = serviceAccountSchema.safeParse(json);
  if (!result.success) {
    throw new MonitorError(
      'CREDENTIALS_INVALID',
      `Service account key file ${filePath} is invalid: ${describeIssues(result.error)}`,
      { path: filePath }
    );
  }
  return result.data;
}

function toBuffer(body: unknown): Buffer {
  if (Buffer.isBuffer(body)) return body;
  if (body instanceof ArrayBuffer) return Buffer.from(body);
  if (body instanceof Uint8Array) return Buffer.from(body);
  if (typeof body === 'string') return Buffer.from(body);
  throw new MonitorError('INVALID_RESPONSE', 'Drive returned an unexpected media body');
}

/**
 * Drive v3 through googleapis, authenticated as the service account.
 */
export function createGoogleDriveApi(credentials: ServiceAccountCredentials, scopes: string[]): DriveApi {
  const auth = new google.auth.GoogleAuth({
    credentials: {
      client_email: credentials.client_email,
      private_key: credentials.private_key,
    },
    projectId: credentials.project_id,
    scopes,
  });
  const drive = google.drive({ version: 'v3', auth });

  return {
    async listFiles({ pageSize, fields }) {
      const res = await drive.files.list({ pageSize, fields });
      return res.data.files ?? [];
    },

    async downloadMedia(fileId) {
      const res = await drive.files.get(
        { fileId, alt: 'media', supportsAllDrives: true },
        { responseType: 'arraybuffer' }
      );
      return toBuffer(res.data);
    },

    async updateMedia(fileId, localPath) {
      await drive.files.update({
        fileId,
        supportsAllDrives: true,
        media: { body: createReadStream(localPath) },
      });
    },

    async createFile(metadata, localPath) {
      const res = await drive.files.create({
        requestBody: metadata,
        media: { body: createReadStream(localPath) },
        fields: 'id',
        supportsAllDrives: true,
      });
      return res.data.id ?? null;
    },

    async createPermission(fileId, permission, { sendNotificationEmail }) {
      await drive.permissions.create({
        fileId,
        requestBody: permission,
        sendNotificationEmail,
        supportsAllDrives: true,
      });
    },
  };
}
