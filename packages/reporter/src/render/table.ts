export type ColumnAlign = 'left' | 'right';

export interface TableColumn {
  title: string;
  align?: ColumnAlign;
}

/**
 * Fixed-width plain-text table: header, dashed rule, rows. Numeric columns
 * are usually right-aligned by the caller.
 */
export function renderTable(
  columns: readonly TableColumn[],
  rows: readonly (readonly string[])[]
): string {
  const widths = columns.map((column, index) =>
    Math.max(
      column.title.length,
      ...rows.map((row) => (row[index] ?? '').length)
    )
  );

  const renderRow = (cells: readonly string[]): string =>
    columns
      .map((column, index) => {
        const cell = cells[index] ?? '';
        const width = widths[index] ?? cell.length;
        return column.align === 'right'
          ? cell.padStart(width)
          : cell.padEnd(width);
      })
      .join('  ')
      .trimEnd();

  const rule = widths.map((width) => '-'.repeat(width)).join('  ');
  return [
    renderRow(columns.map((column) => column.title)),
    rule,
    ...rows.map(renderRow),
  ].join('\n');
}
