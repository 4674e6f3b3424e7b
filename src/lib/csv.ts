/**
 * CSV Utilities
 *
 * Minimal RFC 4180 reader and writer: quoted fields, doubled quotes,
 * embedded separators and line breaks, LF or CRLF row endings.
 */

/**
 * Split CSV text into rows of raw field strings.
 * A trailing line break does not produce an empty final row.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let i = 0;

  // Strip a UTF-8 byte order mark
  if (text.charCodeAt(0) === 0xfeff) {
    i = 1;
  }

  for (; i < text.length; i++) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      row.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') {
        i++;
      }
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += ch;
    }
  }

  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows;
}

/**
 * Parse CSV text with a header row into one record per data row.
 * Missing trailing fields read as empty strings.
 */
export function parseCsvRecords(text: string): { header: string[]; records: Record<string, string>[] } {
  const [header = [], ...body] = parseCsv(text);
  const records = body
    .filter((cells) => !(cells.length === 1 && cells[0] === ''))
    .map((cells) => {
      const record: Record<string, string> = {};
      header.forEach((column, index) => {
        record[column] = cells[index] ?? '';
      });
      return record;
    });
  return { header, records };
}

/**
 * Quote a field when it contains a separator, quote or line break
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Format one CSV row, terminated by CRLF as RFC 4180 specifies
 */
export function formatCsvRow(fields: readonly string[]): string {
  return `${fields.map(escapeCsvField).join(',')}\r\n`;
}
