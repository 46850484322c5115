import { InvalidArgumentError } from 'commander';
import {
  AttendanceSource,
  DriveApi,
  SeqtaClient,
  createGoogleDriveApi,
  isIsoDate,
  loadServiceAccount,
} from '@attendance-monitor/sdk';
import { ConfigManager, MonitorConfig, SeqtaCredentials, logger } from '@attendance-monitor/utils';

export interface GlobalOptions {
  verbose?: boolean;
  env?: string;
}

/**
 * Everything a command touches outside its own process. Tests swap these
 * for in-memory stand-ins.
 */
export interface CliDependencies {
  loadConfig(envFile?: string): MonitorConfig;
  createDriveApi(config: MonitorConfig): Promise<DriveApi>;
  createAttendanceSource(credentials: SeqtaCredentials, timeoutMs: number): AttendanceSource;
  write(text: string): void;
  writeError(text: string): void;
  today(): Date;
}

export const defaultDependencies: CliDependencies = {
  loadConfig: (envFile) => ConfigManager.load({ envFile }),
  createDriveApi: async (config) =>
    createGoogleDriveApi(await loadServiceAccount(config.drive.serviceAccountFile), config.drive.scopes),
  createAttendanceSource: (credentials, timeoutMs) => new SeqtaClient({ ...credentials, timeoutMs }),
  write: (text) => {
    process.stdout.write(`${text}\n`);
  },
  writeError: (text) => {
    process.stderr.write(`${text}\n`);
  },
  today: () => new Date(),
};

export interface CommandContext {
  config: MonitorConfig;
  deps: CliDependencies;
}

export function createContext(deps: CliDependencies, globals: GlobalOptions): CommandContext {
  const config = deps.loadConfig(globals.env);
  if (!globals.verbose) {
    logger.setLevel(config.logLevel);
  }
  return { config, deps };
}

export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function parseIsoDate(value: string): string {
  if (!isIsoDate(value)) {
    throw new InvalidArgumentError('Expected a date as YYYY-MM-DD.');
  }
  return value;
}
