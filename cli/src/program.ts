import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { ErrorHandler, logger } from '@attendance-monitor/utils';
import { CliDependencies, GlobalOptions, createContext, defaultDependencies, parseIsoDate, parsePositiveInteger } from './context.js';
import { fetchCommand, FetchOptions } from './commands/fetch.js';
import { reportCommand, ReportOptions } from './commands/report.js';
import {
  driveCreateCommand,
  driveDownloadCommand,
  driveListCommand,
  driveShareCommand,
  driveUploadCommand,
} from './commands/drive.js';
import { VERSION } from './version.js';

export function createProgram(deps: CliDependencies = defaultDependencies): Command {
  const program = new Command();

  // Set before any subcommand is added so they inherit it
  program.exitOverride();
  program.configureOutput({
    writeOut: (text) => deps.write(text.trimEnd()),
    writeErr: (text) => deps.writeError(text.trimEnd()),
  });

  const context = () => createContext(deps, program.opts<GlobalOptions>());

  program
    .name('attendance-monitor')
    .description('Attendance monitoring: SEQTA attendance, Google Drive tables and absence reports')
    .version(VERSION)
    .option('-v, --verbose', 'Enable verbose logging')
    .option('--env <file>', 'Load environment variables from this dotenv file')
    .hook('preAction', (thisCommand) => {
      if (thisCommand.opts<GlobalOptions>().verbose) {
        logger.setLevel('debug');
      }
    });

  // What the `gui` entry point runs
  program
    .command('report', { isDefault: true })
    .description('Print unresolved absences joined with class times and student details')
    .option('-s, --store <store>', 'Table store (local|drive)', 'local')
    .option('-r, --rows <n>', 'Rows to print', parsePositiveInteger, 6)
    .action(async (options: ReportOptions) => {
      await reportCommand(options, context());
    });

  program
    .command('fetch')
    .description('Download attendance from SEQTA and write CSV and SQLite snapshots')
    .option('--api-url <url>', 'SEQTA attendance endpoint (default: SEQTA_API_URL)')
    .option('--start-date <date>', 'Attendance date as YYYY-MM-DD (default: today)', parseIsoDate)
    .option('--username <name>', 'SEQTA username (default: SEQTA_USERNAME)')
    .option('--cache-json [path]', 'Also save the parsed response as JSON')
    .option('-o, --output-dir <dir>', 'Output directory', 'data/raw')
    .action(async (options: FetchOptions) => {
      await fetchCommand(options, context());
    });

  const drive = program
    .command('drive')
    .description('Google Drive operations as the service account');

  drive
    .command('list')
    .description('List files shared with the service account')
    .option('-n, --page-size <n>', 'Number of files', parsePositiveInteger, 10)
    .action(async (options: { pageSize: number }) => {
      await driveListCommand(options, context());
    });

  drive
    .command('download <fileId> [dir]')
    .description('Download a file into a directory')
    .action(async (fileId: string, dir: string | undefined) => {
      await driveDownloadCommand(fileId, dir ?? '.', context());
    });

  drive
    .command('upload <path> <fileId>')
    .description('Replace the content of an existing Drive file')
    .action(async (filePath: string, fileId: string) => {
      await driveUploadCommand(filePath, fileId, context());
    });

  drive
    .command('create <path>')
    .description('Create a Drive file and print its id')
    .option('--name <name>', 'Name on Drive (default: local file name)')
    .option('--parent <folderId>', 'Shared folder to create the file in')
    .action(async (filePath: string, options: { name?: string; parent?: string }) => {
      await driveCreateCommand(filePath, options, context());
    });

  drive
    .command('share <fileId> <email>')
    .description('Share a file with a user')
    .option('--role <role>', 'reader|writer|commenter|fileOrganizer|organizer|owner', 'writer')
    .action(async (fileId: string, email: string, options: { role: string }) => {
      await driveShareCommand(fileId, email, options, context());
    });

  return program;
}

/** Parses and runs `argv`, resolving to the process exit code. */
export async function run(argv: string[], deps: CliDependencies = defaultDependencies): Promise<number> {
  const program = createProgram(deps);

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // help and version land here too, with exit code 0
      return error.exitCode;
    }
    deps.writeError(chalk.red(ErrorHandler.format(error)));
    return ErrorHandler.exitCode(error);
  }
}
