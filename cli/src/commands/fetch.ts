import { promises as fs } from 'fs';
import ora from 'ora';
import chalk from 'chalk';
import { attendanceUrl, toIsoDate, writeTableToDisk } from '@attendance-monitor/sdk';
import { logger, renderMarkdownTable, requireSeqtaCredentials } from '@attendance-monitor/utils';
import { CommandContext } from '../context.js';

export interface FetchOptions {
  apiUrl?: string;
  startDate?: string;
  username?: string;
  cacheJson?: string | boolean;
  outputDir: string;
}

export const DEFAULT_CACHE_JSON = 'attendance_data.json';

/**
 * Downloads one day's attendance from SEQTA and snapshots it as
 * `attendance_records.csv` and `attendance_records.sqlite`.
 */
export async function fetchCommand(options: FetchOptions, { config, deps }: CommandContext): Promise<void> {
  const credentials = requireSeqtaCredentials({
    ...config,
    seqta: {
      ...config.seqta,
      apiUrl: options.apiUrl ?? config.seqta.apiUrl,
      username: options.username ?? config.seqta.username,
    },
  });
  const startDate = options.startDate ?? toIsoDate(deps.today());
  const cacheJsonPath =
    typeof options.cacheJson === 'string' ? options.cacheJson : options.cacheJson ? DEFAULT_CACHE_JSON : undefined;

  await fs.mkdir(options.outputDir, { recursive: true });

  const spinner = ora();
  try {
    spinner.start(`Making request to ${attendanceUrl(credentials.apiUrl, startDate)}`);
    const source = deps.createAttendanceSource(credentials, config.seqta.timeoutMs);
    const records = await source.getAttendance(startDate, { cacheJsonPath });
    spinner.succeed(`Received ${records.length} attendance records`);

    spinner.start('Writing to disk');
    const preview = await writeTableToDisk(records, options.outputDir, 'attendance_records', 'attendance_records');
    spinner.succeed(`Wrote attendance_records to ${options.outputDir}`);

    if (preview.length > 0) {
      deps.write(renderMarkdownTable(preview));
    } else {
      deps.write(chalk.yellow(`No attendance records for ${startDate}.`));
    }
  } catch (error) {
    spinner.fail(chalk.red('Attendance download failed'));
    logger.error('Fetch error:', error);
    throw error;
  }
}
