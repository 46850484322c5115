import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { AttendanceRecord, toCsv } from '@attendance-monitor/sdk';
import { ConfigManager } from '@attendance-monitor/utils';
import { run } from '../cli/src/program.js';
import { CliDependencies } from '../cli/src/context.js';
import { FakeDriveApi, RECORDS, TABLES, record } from './fixtures/attendance.js';

const ANSI = /\x1b\[[0-9;]*m/g;

interface Harness {
  deps: CliDependencies;
  out: string[];
  err: string[];
  drive: FakeDriveApi;
  fetches: Array<{ date: string; cacheJsonPath?: string }>;
  credentials: Array<{ apiUrl: string; username: string }>;
}

describe('attendance-monitor CLI', () => {
  let root: string;
  let records: AttendanceRecord[];

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'attendance-cli-'));
    records = RECORDS;
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  function harness(env: NodeJS.ProcessEnv = {}): Harness {
    const h: Harness = {
      out: [],
      err: [],
      drive: new FakeDriveApi(),
      fetches: [],
      credentials: [],
      deps: {
        loadConfig: () =>
          ConfigManager.load({
            home: '/home/test',
            env: {
              LOG_LEVEL: 'error',
              XDG_CACHE_HOME: join(root, 'cache'),
              ATTENDANCE_TABLE_DIR: join(root, 'tables'),
              ...env,
            },
          }),
        createDriveApi: async () => h.drive,
        createAttendanceSource: (credentials) => {
          h.credentials.push({ apiUrl: credentials.apiUrl, username: credentials.username });
          return {
            getAttendance: async (date, options) => {
              h.fetches.push({ date, cacheJsonPath: options?.cacheJsonPath });
              return records;
            },
          };
        },
        write: (text) => {
          h.out.push(text.replace(ANSI, ''));
        },
        writeError: (text) => {
          h.err.push(text.replace(ANSI, ''));
        },
        today: () => new Date(2025, 2, 14),
      },
    };
    return h;
  }

  const SEQTA_ENV = { SEQTA_API_URL: 'https://seqta.example.edu/mgm/attendance', SEQTA_PASSWORD: 'test-secret' };

  function writeLocalTables(): void {
    const dir = join(root, 'tables', 'postgres');
    mkdirSync(dir, { recursive: true });
    for (const [table, rows] of Object.entries(TABLES)) {
      writeFileSync(join(dir, `${table}.csv`), toCsv(rows));
    }
  }

  describe('report', () => {
    it('prints the first rows of the absence report', async () => {
      writeLocalTables();
      const h = harness(SEQTA_ENV);

      const code = await run(['node', 'attendance-monitor', 'report'], h.deps);

      expect(code).toBe(0);
      expect(h.err).toEqual([]);
      expect(h.fetches).toEqual([{ date: '2024-11-08', cacheJsonPath: undefined }]);
      expect(h.out).toHaveLength(2);

      const lines = h.out[0].split('\n');
      expect(lines).toHaveLength(4);
      expect(lines[0].startsWith('| student_code | absence_date | period_code | attendance_code |')).toBe(true);
      expect(lines[2].startsWith(`| S1${' '.repeat(10)} | 2024-11-08${' '.repeat(2)} | 1${' '.repeat(10)} |`)).toBe(true);
      expect(lines[3]).toContain('| Parent called |');
      expect(h.out[1]).toBe('2 of 2 rows');
    });

    it('is the default command', async () => {
      writeLocalTables();
      const h = harness(SEQTA_ENV);

      expect(await run(['node', 'gui', '--rows', '1'], h.deps)).toBe(0);
      expect(h.out[0].split('\n')).toHaveLength(3);
      expect(h.out[1]).toBe('1 of 2 rows');
    });

    it('serves a second run from the attendance cache without credentials', async () => {
      writeLocalTables();
      await run(['node', 'attendance-monitor'], harness(SEQTA_ENV).deps);
      const h = harness();

      expect(await run(['node', 'attendance-monitor'], h.deps)).toBe(0);
      expect(h.credentials).toEqual([]);
      expect(h.out[1]).toBe('2 of 2 rows');
    });

    it('says so when nothing is outstanding', async () => {
      writeLocalTables();
      records = [record({ resolved: true })];
      const h = harness(SEQTA_ENV);

      expect(await run(['node', 'attendance-monitor', 'report'], h.deps)).toBe(0);
      expect(h.out).toEqual(['No unresolved absences matched the timetable.']);
    });

    it('reads tables from Drive with the drive store', async () => {
      const registry = join(root, 'drive-tables.json');
      writeFileSync(registry, JSON.stringify({ postgres: { classinstance: 'c', period: 'p', vw_student_details: 's' } }));
      const h = harness({ ...SEQTA_ENV, DRIVE_TABLES_FILE: registry });
      h.drive.media.set('c', Buffer.from(toCsv(TABLES.classinstance)));
      h.drive.media.set('p', Buffer.from(toCsv(TABLES.period)));
      h.drive.media.set('s', Buffer.from(toCsv(TABLES.vw_student_details)));

      expect(await run(['node', 'attendance-monitor', 'report', '--store', 'drive'], h.deps)).toBe(0);
      expect(h.out[1]).toBe('2 of 2 rows');
    });

    it('exits with 2 when SEQTA is not configured', async () => {
      writeLocalTables();
      const h = harness();

      expect(await run(['node', 'attendance-monitor', 'report'], h.deps)).toBe(2);
      expect(h.err).toEqual(['[CONFIG_MISSING] The environment variable SEQTA_API_URL is not set.']);
    });

    it('rejects an unknown store', async () => {
      const h = harness(SEQTA_ENV);

      expect(await run(['node', 'attendance-monitor', 'report', '-s', 's3'], h.deps)).toBe(1);
      expect(h.err).toEqual([
        '[UNSUPPORTED_STORE] Unknown data store "s3", expected one of: local, drive, drive_colab',
      ]);
    });

    it('rejects a row count that is not positive', async () => {
      const h = harness(SEQTA_ENV);

      expect(await run(['node', 'attendance-monitor', 'report', '-r', '0'], h.deps)).toBe(1);
      expect(h.err).toEqual(["error: option '-r, --rows <n>' argument '0' is invalid. Expected a positive integer."]);
    });
  });

  describe('fetch', () => {
    it('writes CSV and SQLite snapshots for the given date', async () => {
      records = [record()];
      const outputDir = join(root, 'raw');
      const h = harness(SEQTA_ENV);

      const code = await run(
        ['node', 'attendance-monitor', 'fetch', '--start-date', '2024-11-08', '--username', 'reporter', '-o', outputDir],
        h.deps
      );

      expect(code).toBe(0);
      expect(h.credentials).toEqual([{ apiUrl: 'https://seqta.example.edu/mgm/attendance', username: 'reporter' }]);
      expect(h.fetches).toEqual([{ date: '2024-11-08', cacheJsonPath: undefined }]);
      expect(readFileSync(join(outputDir, 'attendance_records.csv'), 'utf-8')).toBe(
        'student_code,absence_date,period_code,attendance_code,trigger_absentee_sms,considered_late,resolved,on_campus,authorised,start_time,end_time,comments\r\n' +
          'S1,2024-11-08,1,unexplained,true,false,false,false,false,08:50:00,09:40:00,'
      );
      expect(existsSync(join(outputDir, 'attendance_records.sqlite'))).toBe(true);
      expect(h.out).toHaveLength(1);
      expect(h.out[0].split('\n')[2].startsWith(`| S1${' '.repeat(10)} | 2024-11-08${' '.repeat(2)} | 1 `)).toBe(true);
    });

    it('defaults to today and honours --api-url and --cache-json', async () => {
      const h = harness(SEQTA_ENV);

      await run(
        [
          'node',
          'attendance-monitor',
          'fetch',
          '--api-url',
          'https://other.example.edu/attendance',
          '--cache-json',
          '-o',
          join(root, 'raw'),
        ],
        h.deps
      );

      expect(h.credentials).toEqual([{ apiUrl: 'https://other.example.edu/attendance', username: 'mgm' }]);
      expect(h.fetches).toEqual([{ date: '2025-03-14', cacheJsonPath: 'attendance_data.json' }]);
    });

    it('reports an empty day', async () => {
      records = [];
      const h = harness(SEQTA_ENV);

      expect(await run(['node', 'attendance-monitor', 'fetch', '--start-date', '2024-11-09', '-o', join(root, 'raw')], h.deps)).toBe(0);
      expect(h.out).toEqual(['No attendance records for 2024-11-09.']);
    });

    it('rejects a malformed date', async () => {
      const h = harness(SEQTA_ENV);

      expect(await run(['node', 'attendance-monitor', 'fetch', '--start-date', '11/08/2024'], h.deps)).toBe(1);
      expect(h.err).toEqual([
        "error: option '--start-date <date>' argument '11/08/2024' is invalid. Expected a date as YYYY-MM-DD.",
      ]);
      expect(h.fetches).toEqual([]);
    });
  });

  describe('drive', () => {
    it('lists shared files as a table', async () => {
      const h = harness();
      h.drive.files = [{ id: 'f1', name: 'period.csv' }];

      expect(await run(['node', 'attendance-monitor', 'drive', 'list'], h.deps)).toBe(0);
      expect(h.out).toEqual(['| id  | name       |\n| --- | ---------- |\n| f1  | period.csv |']);
      expect(h.drive.listCalls[0].pageSize).toBe(10);
    });

    it('says when nothing is shared', async () => {
      const h = harness();

      await run(['node', 'attendance-monitor', 'drive', 'list', '-n', '3'], h.deps);

      expect(h.out).toEqual(['No files are shared with the service account.']);
      expect(h.drive.listCalls[0].pageSize).toBe(3);
    });

    it('downloads into a directory', async () => {
      const h = harness();
      h.drive.files = [{ id: 'f1', name: 'period.csv' }];
      h.drive.media.set('f1', Buffer.from('id\n11\n'));
      const dir = join(root, 'downloads');

      expect(await run(['node', 'attendance-monitor', 'drive', 'download', 'f1', dir], h.deps)).toBe(0);
      expect(h.out).toEqual([`Saved ${join(dir, 'period.csv')}`]);
    });

    it('creates a file and prints its id', async () => {
      const file = join(root, 'report.csv');
      writeFileSync(file, 'a\n1\n');
      const h = harness();

      await run(['node', 'attendance-monitor', 'drive', 'create', file, '--parent', 'folder-1'], h.deps);

      expect(h.out).toEqual(['new-file-id']);
      expect(h.drive.created[0].metadata).toEqual({ name: 'report.csv', parents: ['folder-1'] });
    });

    it('uploads a new version', async () => {
      const file = join(root, 'report.csv');
      writeFileSync(file, 'a\n1\n');
      const h = harness();

      await run(['node', 'attendance-monitor', 'drive', 'upload', file, 'f1'], h.deps);

      expect(h.drive.updates).toEqual([{ fileId: 'f1', localPath: file }]);
      expect(h.out).toEqual([`Uploaded ${file} to f1`]);
    });

    it('shares with the requested role', async () => {
      const h = harness();

      await run(['node', 'attendance-monitor', 'drive', 'share', 'f1', 'staff@example.edu', '--role', 'reader'], h.deps);

      expect(h.drive.permissions[0].permission).toEqual({
        type: 'user',
        role: 'reader',
        emailAddress: 'staff@example.edu',
      });
      expect(h.out).toEqual(['Shared f1 with staff@example.edu as reader']);
    });

    it('exits non-zero for an invalid role', async () => {
      const h = harness();

      expect(await run(['node', 'attendance-monitor', 'drive', 'share', 'f1', 'staff@example.edu', '--role', 'admin'], h.deps)).toBe(1);
      expect(h.err).toEqual([
        '[INVALID_ROLE] Role must be one of: reader, writer, commenter, fileOrganizer, organizer, owner',
      ]);
    });
  });

  it('prints its version', async () => {
    const h = harness();

    expect(await run(['node', 'attendance-monitor', '--version'], h.deps)).toBe(0);
    expect(h.out).toEqual(['0.1.0']);
  });
});
