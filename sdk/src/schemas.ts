import { z } from 'zod';

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on', 't', 'y']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off', 'f', 'n']);

const TIME_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?$/;

export function isIsoDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false;
  const [year, month, day] = value.split('-').map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

export function normalizeTime(value: string): string | null {
  const match = TIME_PATTERN.exec(value.trim());
  if (!match) return null;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = match[3] === undefined ? 0 : Number(match[3]);
  if (hours > 23 || minutes > 59 || seconds > 59) return null;
  return [hours, minutes, seconds].map((part) => String(part).padStart(2, '0')).join(':');
}

const flag = z.preprocess((value) => {
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) return true;
    if (FALSE_VALUES.has(normalized)) return false;
  }
  if (value === 1) return true;
  if (value === 0) return false;
  return value;
}, z.boolean());

const isoDate = z
  .string()
  .trim()
  .refine(isIsoDate, { message: 'Expected a YYYY-MM-DD date' });

const clockTime = z.string().transform((value, ctx) => {
  const time = normalizeTime(value);
  if (time === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a HH:MM[:SS] time' });
    return z.NEVER;
  }
  return time;
});

const integer = z.preprocess(
  (value) => (typeof value === 'string' && /^-?\d+$/.test(value.trim()) ? Number(value.trim()) : value),
  z.number().int()
);

const optionalComment = z.preprocess(
  (value) => (value === undefined || value === '' ? null : value),
  z.string().nullable()
);

export const attendanceRecordSchema = z.object({
  student_code: z.string().trim().min(1),
  absence_date: isoDate,
  period_code: integer,
  attendance_code: z.string().trim(),
  trigger_absentee_sms: flag,
  considered_late: flag,
  resolved: flag,
  on_campus: flag,
  authorised: flag,
  start_time: clockTime,
  end_time: clockTime,
  comments: optionalComment,
});

export const attendanceResponseSchema = z.object({
  timestamp: z.string(),
  data: z.array(attendanceRecordSchema).default([]),
});

export type AttendanceRecord = z.infer<typeof attendanceRecordSchema>;
export type AttendanceResponse = z.infer<typeof attendanceResponseSchema>;

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 5)
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}
