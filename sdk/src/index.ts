export {
  SeqtaClient,
  attendanceUrl,
  parseAttendanceXml,
  readAttendanceXml,
  validateAttendanceDocument,
} from './seqta-client.js';
export type { AttendanceSource, SeqtaClientOptions, ParsedAttendance } from './seqta-client.js';
export { DriveClient, SHARE_ROLES, isShareRole, localPathFor } from './drive-client.js';
export { createGoogleDriveApi, loadServiceAccount } from './drive-api.js';
export { TableRegistry } from './table-registry.js';
export type { TableIds } from './table-registry.js';
export { TableStore, DATA_STORES, parseDataStore } from './table-store.js';
export type { TableSource, TableStoreOptions } from './table-store.js';
export {
  AttendanceRepository,
  ABSENCE_COLUMNS,
  REPORT_WINDOW_DAYS,
  STUDENT_COLUMNS,
  buildClassTimes,
  cacheFilePath,
  filterUnresolvedAbsences,
  joinAttendance,
  reportStartDate,
  toIsoDate,
} from './attendance.js';
export type { AttendanceFetcher, AttendanceProvider } from './attendance.js';
export { castInteger, head, innerJoin, renameColumns, selectColumns, sortRows } from './frame.js';
export { parseCsvTable, parseJsonTable, parseTable, parseWorkbook, toCsv } from './table-format.js';
export { SqliteTableWriter, writeCsv, writeTableToDisk } from './writers.js';
export { attendanceRecordSchema, attendanceResponseSchema, isIsoDate, normalizeTime } from './schemas.js';
export type { AttendanceRecord, AttendanceResponse } from './schemas.js';
export * from './types.js';
