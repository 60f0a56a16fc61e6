/**
 * Minimal RFC 4180 codec for the employee store.
 * Writes `\n` line endings; reads both `\n` and `\r\n`.
 */

/**
 * Escapes a CSV field according to RFC 4180.
 * @param field - The field value to escape
 * @returns The field, quoted when it contains a separator, quote or line break
 */
export function escapeCsvField(field: string): string {
  if (/[",\r\n]/.test(field)) {
    return `"${field.replace(/"/g, '""')}"`;
  }
  return field;
}

export function stringifyCsvRow(fields: readonly string[]): string {
  return fields.map(escapeCsvField).join(',');
}

/**
 * Splits CSV text into rows of raw field values.
 * Blank lines are dropped; an unterminated quote runs to the end of input.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let rowHasContent = false;

  const endField = () => {
    row.push(field);
    field = '';
  };

  const endRow = () => {
    endField();
    if (rowHasContent) {
      rows.push(row);
    }
    row = [];
    rowHasContent = false;
  };

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"' && text[i + 1] === '"') {
        field += '"';
        i++;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        field += char;
      }
      continue;
    }

    switch (char) {
      case '"':
        inQuotes = true;
        rowHasContent = true;
        break;
      case ',':
        endField();
        rowHasContent = true;
        break;
      case '\r':
        if (text[i + 1] === '\n') {
          i++;
        }
        endRow();
        break;
      case '\n':
        endRow();
        break;
      default:
        field += char;
        rowHasContent = true;
    }
  }

  if (field !== '' || row.length > 0 || rowHasContent) {
    endRow();
  }

  return rows;
}

/**
 * Parses CSV text whose first row is a header into objects keyed by column name.
 * Missing trailing cells come back as empty strings; extra cells are ignored.
 */
export function parseCsvRecords(text: string): { header: string[]; records: Record<string, string>[] } {
  const [header = [], ...rows] = parseCsv(text);

  const records = rows.map((cells) => {
    const record: Record<string, string> = {};
    header.forEach((column, index) => {
      record[column] = cells[index] ?? '';
    });
    return record;
  });

  return { header, records };
}
