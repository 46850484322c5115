import os from 'os';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { MonitorError } from './error-handler.js';

const DEFAULT_SERVICE_ACCOUNT_FILE = '~/.local/keys/google_drive_oauth2_key.json';
const DEFAULT_DRIVE_SCOPE = 'https://www.googleapis.com/auth/drive';

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  SEQTA_API_URL: optionalText.pipe(z.string().url().optional()),
  SEQTA_USERNAME: optionalText,
  SEQTA_PASSWORD: z.string().optional().transform((value) => (value ? value : undefined)),
  SEQTA_TIMEOUT_MS: optionalText.pipe(z.coerce.number().int().positive().optional()),
  GOOGLE_SERVICE_ACCOUNT_FILE: optionalText,
  GOOGLE_DRIVE_SCOPES: optionalText,
  DRIVE_TABLES_FILE: optionalText,
  ATTENDANCE_TABLE_DIR: optionalText,
  XDG_CACHE_HOME: optionalText,
  LOG_LEVEL: optionalText.pipe(z.enum(['error', 'warn', 'info', 'debug']).optional()),
});

export interface SeqtaConfig {
  apiUrl?: string;
  username: string;
  password?: string;
  timeoutMs: number;
}

export interface DriveConfig {
  serviceAccountFile: string;
  scopes: string[];
  tablesFile: string;
}

export interface MonitorConfig {
  seqta: SeqtaConfig;
  drive: DriveConfig;
  tableDir: string;
  cacheHome: string;
  logLevel: 'error' | 'warn' | 'info' | 'debug';
}

export interface SeqtaCredentials {
  apiUrl: string;
  username: string;
  password: string;
}

export function expandHome(filePath: string, home: string = os.homedir()): string {
  if (filePath === '~') return home;
  if (filePath.startsWith('~/')) return path.join(home, filePath.slice(2));
  return filePath;
}

export const ConfigManager = {
  /**
   * Builds the runtime configuration. Reading from `process.env` first
   * loads the dotenv file (`.env` in the working directory by default).
   */
  load(options?: { env?: NodeJS.ProcessEnv; envFile?: string; home?: string }): MonitorConfig {
    let env = options?.env;
    if (!env) {
      dotenv.config({ path: options?.envFile });
      env = process.env;
    }

    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new MonitorError('CONFIG_INVALID', `Invalid configuration: ${issues.join('; ')}`, { issues });
    }

    const vars = parsed.data;
    const home = options?.home ?? os.homedir();
    const scopes = (vars.GOOGLE_DRIVE_SCOPES ?? DEFAULT_DRIVE_SCOPE)
      .split(',')
      .map((scope) => scope.trim())
      .filter((scope) => scope.length > 0);

    return Object.freeze({
      seqta: {
        apiUrl: vars.SEQTA_API_URL,
        username: vars.SEQTA_USERNAME ?? 'mgm',
        password: vars.SEQTA_PASSWORD,
        timeoutMs: vars.SEQTA_TIMEOUT_MS ?? 60_000,
      },
      drive: {
        serviceAccountFile: expandHome(vars.GOOGLE_SERVICE_ACCOUNT_FILE ?? DEFAULT_SERVICE_ACCOUNT_FILE, home),
        scopes,
        tablesFile: expandHome(vars.DRIVE_TABLES_FILE ?? 'config/drive-tables.json', home),
      },
      tableDir: expandHome(vars.ATTENDANCE_TABLE_DIR ?? 'data/extracted', home),
      cacheHome: expandHome(vars.XDG_CACHE_HOME ?? '~/.cache', home),
      logLevel: vars.LOG_LEVEL ?? 'info',
    });
  },
};

export function requireSeqtaCredentials(config: MonitorConfig): SeqtaCredentials {
  const { apiUrl, username, password } = config.seqta;
  if (!apiUrl) {
    throw new MonitorError('CONFIG_MISSING', 'The environment variable SEQTA_API_URL is not set.', {
      variable: 'SEQTA_API_URL',
    });
  }
  if (!password) {
    throw new MonitorError('CONFIG_MISSING', 'The environment variable SEQTA_PASSWORD is not set.', {
      variable: 'SEQTA_PASSWORD',
    });
  }
  return { apiUrl, username, password };
}
