import { MonitorError } from '@attendance-monitor/utils';
import { Cell, Row } from './types.js';

export function selectColumns(rows: readonly Row[], columns: readonly string[]): Row[] {
  return rows.map((row, index) => {
    const selected: Row = {};
    for (const column of columns) {
      if (!(column in row)) {
        throw new MonitorError('UNKNOWN_COLUMN', `Column "${column}" not found`, {
          column,
          row: index,
          available: Object.keys(row),
        });
      }
      selected[column] = row[column];
    }
    return selected;
  });
}

export function renameColumns(rows: readonly Row[], mapping: Readonly<Record<string, string>>): Row[] {
  return rows.map((row) => {
    const renamed: Row = {};
    for (const [column, value] of Object.entries(row)) {
      renamed[mapping[column] ?? column] = value;
    }
    return renamed;
  });
}

// Type-tagged so that "3" and 3 are different keys
function keyOf(row: Row, columns: readonly string[]): string | null {
  const parts: string[] = [];
  for (const column of columns) {
    const value = row[column];
    if (value === null || value === undefined) return null;
    parts.push(`${typeof value}:${String(value)}`);
  }
  return JSON.stringify(parts);
}

/**
 * Inner join on equal key tuples. Rows keep the left order; right-side key
 * columns are dropped and colliding right columns get a `_right` suffix.
 */
export function innerJoin(
  left: readonly Row[],
  right: readonly Row[],
  leftOn: string | readonly string[],
  rightOn: string | readonly string[]
): Row[] {
  const leftKeys = typeof leftOn === 'string' ? [leftOn] : leftOn;
  const rightKeys = typeof rightOn === 'string' ? [rightOn] : rightOn;
  if (leftKeys.length !== rightKeys.length) {
    throw new Error(`Join key count mismatch: ${leftKeys.length} vs ${rightKeys.length}`);
  }

  const index = new Map<string, Row[]>();
  for (const row of right) {
    const key = keyOf(row, rightKeys);
    if (key === null) continue;
    const bucket = index.get(key);
    if (bucket) bucket.push(row);
    else index.set(key, [row]);
  }

  const joined: Row[] = [];
  for (const row of left) {
    const key = keyOf(row, leftKeys);
    if (key === null) continue;
    for (const match of index.get(key) ?? []) {
      const out: Row = { ...row };
      for (const [column, value] of Object.entries(match)) {
        if (rightKeys.includes(column)) continue;
        out[column in row ? `${column}_right` : column] = value;
      }
      joined.push(out);
    }
  }
  return joined;
}

function compareCells(a: Cell | undefined, b: Cell | undefined): number {
  const aMissing = a === null || a === undefined;
  const bMissing = b === null || b === undefined;
  if (aMissing || bMissing) return aMissing === bMissing ? 0 : aMissing ? -1 : 1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

/** Stable ascending sort, nulls first. */
export function sortRows(rows: readonly Row[], keys: readonly string[]): Row[] {
  return [...rows].sort((a, b) => {
    for (const key of keys) {
      const order = compareCells(a[key], b[key]);
      if (order !== 0) return order;
    }
    return 0;
  });
}

export function castInteger(value: Cell | undefined): number | null {
  if (typeof value === 'number') return Number.isInteger(value) ? value : null;
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) return Number(value.trim());
  return null;
}

export function head(rows: readonly Row[], n: number): Row[] {
  return rows.slice(0, Math.max(0, n));
}
