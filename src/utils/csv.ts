/**
 * csv.ts
 * RFC 4180 CSV parsing for catalog files
 */

export type CsvRow = Record<string, string>;

/**
 * Split CSV text into rows of raw cells.
 * Handles quoted cells, doubled quotes, embedded newlines and CRLF line endings.
 * A quote only opens a quoted cell at the start of the cell; elsewhere it is kept as text.
 * Lines that contain nothing are dropped.
 */
export const parseCsvRows = (text: string, delimiter: string = ','): string[][] => {
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = '';
  let cellStarted = false;
  let inQuotes = false;
  let rowHasContent = false;

  const endCell = () => {
    row.push(cell);
    cell = '';
    cellStarted = false;
  };

  const endRow = () => {
    endCell();
    if (rowHasContent) {
      rows.push(row);
    }
    row = [];
    rowHasContent = false;
  };

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          cell += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        cell += char;
      }
      continue;
    }

    if (char === '"' && !cellStarted) {
      inQuotes = true;
      cellStarted = true;
      rowHasContent = true;
    } else if (char === delimiter) {
      endCell();
      rowHasContent = true;
    } else if (char === '\n') {
      endRow();
    } else if (char === '\r') {
      if (text[i + 1] === '\n') {
        i++;
      }
      endRow();
    } else {
      cell += char;
      cellStarted = true;
      rowHasContent = true;
    }
  }

  if (cell.length > 0 || row.length > 0 || rowHasContent) {
    endRow();
  }

  return rows;
};

/**
 * Parse CSV text whose first row is a header into keyed records.
 * Header names are trimmed; short rows yield empty strings for the missing cells.
 */
export const parseCsv = (
  text: string,
  delimiter: string = ','
): { headers: string[]; records: CsvRow[] } => {
  const [headerRow, ...dataRows] = parseCsvRows(text, delimiter);
  if (!headerRow) {
    return { headers: [], records: [] };
  }

  const headers = headerRow.map((header) => header.trim());
  const records = dataRows.map((cells) => {
    const record: CsvRow = {};
    headers.forEach((header, index) => {
      record[header] = cells[index] ?? '';
    });
    return record;
  });

  return { headers, records };
};
