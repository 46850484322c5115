import path from 'path';
import chalk from 'chalk';
import { DriveClient } from '@attendance-monitor/sdk';
import { renderMarkdownTable } from '@attendance-monitor/utils';
import { CommandContext } from '../context.js';

async function driveClient({ config, deps }: CommandContext): Promise<DriveClient> {
  return new DriveClient(await deps.createDriveApi(config));
}

export async function driveListCommand(options: { pageSize: number }, context: CommandContext): Promise<void> {
  const files = await (await driveClient(context)).listFiles(options.pageSize);
  const rows = Object.entries(files).map(([id, name]) => ({ id, name }));

  if (rows.length === 0) {
    context.deps.write(chalk.yellow('No files are shared with the service account.'));
    return;
  }
  context.deps.write(renderMarkdownTable(rows));
}

export async function driveDownloadCommand(fileId: string, dir: string, context: CommandContext): Promise<void> {
  const saved = await (await driveClient(context)).downloadFile(path.resolve(dir), fileId);
  context.deps.write(saved ? chalk.green(`Saved ${saved}`) : chalk.yellow(`File ${fileId} is empty, nothing saved.`));
}

export async function driveUploadCommand(filePath: string, fileId: string, context: CommandContext): Promise<void> {
  await (await driveClient(context)).uploadFile(filePath, fileId);
  context.deps.write(chalk.green(`Uploaded ${filePath} to ${fileId}`));
}

export async function driveCreateCommand(
  filePath: string,
  options: { name?: string; parent?: string },
  context: CommandContext
): Promise<void> {
  const id = await (await driveClient(context)).createFile(filePath, {
    name: options.name,
    parentFolderId: options.parent,
  });
  context.deps.write(id);
}

export async function driveShareCommand(
  fileId: string,
  email: string,
  options: { role: string },
  context: CommandContext
): Promise<void> {
  await (await driveClient(context)).shareFile(fileId, email, options.role);
  context.deps.write(chalk.green(`Shared ${fileId} with ${email} as ${options.role}`));
}
