import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { logger } from '@attendance-monitor/utils';
import { castInteger, innerJoin, renameColumns, selectColumns } from './frame.js';
import { AttendanceRecord, attendanceRecordSchema } from './schemas.js';
import { TableSource } from './table-store.js';
import { Cell, Row } from './types.js';

/** 18 weeks of attendance feed the report. */
export const REPORT_WINDOW_DAYS = 7 * 18;

export const STUDENT_COLUMNS = [
  'Student Code',
  'Student First Name',
  'Student Surname',
  'Student Preferred Name',
  'Student DOB',
  'Student Gender',
  'Roll Group',
  'Campus Code',
  'Student Email',
] as const;

export const ABSENCE_COLUMNS = [
  'student_code',
  'absence_date',
  'period_code',
  'attendance_code',
  'start_time',
  'end_time',
  'comments',
  'period_id',
  'code',
  'class_start_time',
  'class_end_time',
] as const;

export type AttendanceFetcher = (date: string) => Promise<AttendanceRecord[]>;

export interface AttendanceProvider {
  getAttendance(date: string): Promise<AttendanceRecord[]>;
}

export function toIsoDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

export function reportStartDate(today: Date): string {
  return toIsoDate(new Date(today.getFullYear(), today.getMonth(), today.getDate() - REPORT_WINDOW_DAYS));
}

export function cacheFilePath(cacheHome: string, date: string): string {
  return path.join(cacheHome, 'attendance-monitor', 'attendance_data', `attendance_data-${date}.json`);
}

const cachedRecordsSchema = z.array(attendanceRecordSchema);

/**
 * Attendance for a start date, served from the per-date cache file when
 * present and fetched from SEQTA otherwise. Cache files hold student data
 * and are written owner-only.
 */
export class AttendanceRepository implements AttendanceProvider {
  constructor(
    private readonly options: {
      cacheHome: string;
      fetch: AttendanceFetcher;
      writeCache?: boolean;
    }
  ) {}

  async getAttendance(date: string): Promise<AttendanceRecord[]> {
    const cacheFile = cacheFilePath(this.options.cacheHome, date);
    await fs.mkdir(path.dirname(cacheFile), { recursive: true });

    const cached = await this.readCache(cacheFile);
    if (cached) {
      logger.debug('Using cached attendance', { path: cacheFile, records: cached.length });
      return cached;
    }

    const records = await this.options.fetch(date);
    if (this.options.writeCache !== false) {
      await fs.writeFile(cacheFile, JSON.stringify(records), { mode: 0o600 });
    }
    return records;
  }

  private async readCache(cacheFile: string): Promise<AttendanceRecord[] | null> {
    const text = await fs.readFile(cacheFile, 'utf-8').catch((error: NodeJS.ErrnoException) => {
      if (error.code === 'ENOENT') return null;
      throw error;
    });
    if (text === null) return null;

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      logger.warn('Ignoring unreadable attendance cache', { path: cacheFile });
      return null;
    }

    const result = cachedRecordsSchema.safeParse(json);
    if (!result.success) {
      logger.warn('Ignoring attendance cache with unexpected contents', { path: cacheFile });
      return null;
    }
    return result.data;
  }
}

/** Keeps absences that are neither approved nor resolved. */
export function filterUnresolvedAbsences(records: readonly AttendanceRecord[]): AttendanceRecord[] {
  return records.filter((record) => !record.attendance_code.includes('absenceapproved') && !record.resolved);
}

function isoDatePrefix(value: Cell): Cell {
  if (typeof value !== 'string') return value;
  const match = /^(\d{4}-\d{2}-\d{2})(?:[T ].*)?$/.exec(value);
  return match ? match[1] : value;
}

/**
 * Scheduled classes with their integer period number, from the
 * `classinstance` and `period` exports.
 */
export function buildClassTimes(classInstances: readonly Row[], periods: readonly Row[]): Row[] {
  const classes = selectColumns(
    renameColumns(classInstances, {
      period: 'period_id',
      date: 'class_date',
      start: 'class_start_time',
      end: 'class_end_time',
    }),
    ['period_id', 'code', 'class_date', 'class_start_time', 'class_end_time']
  );
  const periodCodes = selectColumns(renameColumns(periods, { code: 'period' }), ['id', 'period']);

  return innerJoin(classes, periodCodes, 'period_id', 'id').map((row) => ({
    ...row,
    class_date: isoDatePrefix(row.class_date),
    period: castInteger(row.period),
  }));
}

export async function joinAttendance(options: {
  attendance: AttendanceProvider;
  tables: TableSource;
  today?: Date;
}): Promise<Row[]> {
  const startDate = reportStartDate(options.today ?? new Date());
  const records = await options.attendance.getAttendance(startDate);
  const absences = filterUnresolvedAbsences(records);
  logger.info(`${absences.length} of ${records.length} attendance records are unresolved absences`, { startDate });

  const [classInstances, periods, students] = await Promise.all([
    options.tables.getTable('postgres', 'classinstance'),
    options.tables.getTable('postgres', 'period'),
    options.tables.getTable('postgres', 'vw_student_details'),
  ]);

  const studentDetails = selectColumns(students, STUDENT_COLUMNS);
  const classTimes = buildClassTimes(classInstances, periods);

  const absenceClasses = selectColumns(
    innerJoin(absences, classTimes, ['absence_date', 'period_code'], ['class_date', 'period']),
    ABSENCE_COLUMNS
  );

  return innerJoin(absenceClasses, studentDetails, 'student_code', 'Student Code');
}
