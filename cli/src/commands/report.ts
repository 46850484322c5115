import ora from 'ora';
import chalk from 'chalk';
import {
  AttendanceRepository,
  DriveClient,
  TableRegistry,
  TableStore,
  head,
  joinAttendance,
  parseDataStore,
  sortRows,
} from '@attendance-monitor/sdk';
import { logger, renderMarkdownTable, requireSeqtaCredentials } from '@attendance-monitor/utils';
import { CommandContext } from '../context.js';

export interface ReportOptions {
  store: string;
  rows: number;
}

export async function reportCommand(options: ReportOptions, { config, deps }: CommandContext): Promise<void> {
  const store = parseDataStore(options.store);
  const spinner = ora();

  try {
    const tables = new TableStore({
      store,
      dir: config.tableDir,
      drive:
        store === 'drive'
          ? {
              client: new DriveClient(await deps.createDriveApi(config)),
              registry: await TableRegistry.load(config.drive.tablesFile),
            }
          : undefined,
    });

    // Credentials are only needed when the cache misses
    const attendance = new AttendanceRepository({
      cacheHome: config.cacheHome,
      fetch: (date) =>
        deps.createAttendanceSource(requireSeqtaCredentials(config), config.seqta.timeoutMs).getAttendance(date),
    });

    spinner.start(`Building absence report from the ${store} store`);
    const rows = await joinAttendance({ attendance, tables, today: deps.today() });
    const sorted = sortRows(rows, ['absence_date', 'period_code']);
    spinner.succeed(`Absence report built: ${sorted.length} rows`);

    if (sorted.length === 0) {
      deps.write(chalk.yellow('No unresolved absences matched the timetable.'));
      return;
    }

    deps.write(renderMarkdownTable(head(sorted, options.rows)));
    deps.write(`${Math.min(options.rows, sorted.length)} of ${sorted.length} rows`);
  } catch (error) {
    spinner.fail(chalk.red('Absence report failed'));
    logger.error('Report error:', error);
    throw error;
  }
}
