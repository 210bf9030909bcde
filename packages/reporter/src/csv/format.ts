export type CsvValue = string | number | boolean | undefined;

const NEEDS_QUOTING = /[",\r\n]/;

/**
 * RFC 4180 field escaping: fields holding a comma, quote or line break are
 * quoted, with embedded quotes doubled. undefined renders as an empty field.
 */
export function escapeCsvField(value: CsvValue): string {
  if (value === undefined) {
    return '';
  }
  const text = String(value);
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function renderCsv(
  header: readonly string[],
  rows: readonly (readonly CsvValue[])[]
): string {
  const lines = [header, ...rows].map((row) =>
    row.map((value) => escapeCsvField(value)).join(',')
  );
  return `${lines.join('\n')}\n`;
}

export function formatFixed(value: number, digits: number): string {
  return Number.isFinite(value) ? value.toFixed(digits) : '';
}
