type TableRow = Readonly<Record<string, unknown>>;

function formatCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  return String(value).replace(/\r?\n/g, ' ').replace(/\|/g, '\\|');
}

/**
 * Renders rows as a GitHub pipe table. Columns default to the keys of the
 * first row, in insertion order.
 */
export function renderMarkdownTable(rows: readonly TableRow[], columns?: readonly string[]): string {
  const headers = columns ?? (rows.length > 0 ? Object.keys(rows[0]) : []);
  if (headers.length === 0) return '';

  const body = rows.map((row) => headers.map((column) => formatCell(row[column])));
  const widths = headers.map((header, i) =>
    Math.max(3, formatCell(header).length, ...body.map((cells) => cells[i].length))
  );

  const line = (cells: string[]) => `| ${cells.map((cell, i) => cell.padEnd(widths[i])).join(' | ')} |`;

  return [
    line(headers.map(formatCell)),
    line(widths.map((width) => '-'.repeat(width))),
    ...body.map(line),
  ].join('\n');
}
