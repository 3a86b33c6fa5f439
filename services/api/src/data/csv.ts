// ---------------------------------------------------------------------------
// CSV reading
//
// Source files are small exports from the listings back office. Rows are kept
// even when they are short or malformed: missing cells become null.
// ---------------------------------------------------------------------------

export type Cell = string | null;

export type Row = Record<string, Cell>;

export interface Table {
  columns: string[];
  rows: Row[];
}

/**
 * Split CSV text into raw records. Handles quoted fields with embedded commas,
 * line breaks and doubled quotes, CRLF line endings and a leading BOM.
 */
export function parseCsvRecords(text: string): string[][] {
  const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;

  for (let i = 0; i < input.length; i++) {
    const char = input[i];

    if (inQuotes) {
      if (char === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      record.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && input[i + 1] === '\n') i++;
      record.push(field);
      records.push(record);
      record = [];
      field = '';
    } else {
      field += char;
    }
  }

  if (field !== '' || record.length > 0) {
    record.push(field);
    records.push(record);
  }

  // Blank lines
  return records.filter((r) => !(r.length === 1 && r[0].trim() === ''));
}

/**
 * Trim header names and de-duplicate repeats as "name.1", "name.2", ...
 */
function normalizeHeader(raw: string[]): string[] {
  const seen = new Map<string, number>();
  return raw.map((name) => {
    const trimmed = name.trim();
    const count = seen.get(trimmed) ?? 0;
    seen.set(trimmed, count + 1);
    return count === 0 ? trimmed : `${trimmed}.${count}`;
  });
}

function toCell(value: string | undefined): Cell {
  if (value === undefined) return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

/**
 * Parse CSV text with a header row into a table. Cells beyond the header
 * width are ignored; missing cells are null.
 */
export function parseCsv(text: string): Table {
  const [header, ...body] = parseCsvRecords(text);
  if (!header) {
    return { columns: [], rows: [] };
  }

  const columns = normalizeHeader(header);
  const rows = body.map((values) => {
    const row: Row = {};
    columns.forEach((column, idx) => {
      row[column] = toCell(values[idx]);
    });
    return row;
  });

  return { columns, rows };
}
