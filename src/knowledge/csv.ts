/**
 * Minimal CSV reader for the ticket corpus.
 *
 * Handles quoted fields, doubled quotes inside quotes, and CRLF line endings.
 * The first record is the header; each following record becomes an object
 * keyed by header name. Blank lines are skipped.
 */

export function parseCsvRecords(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;

  const source = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  const endRecord = (): void => {
    record.push(field);
    field = '';
    if (record.length > 1 || record[0] !== '') {
      records.push(record);
    }
    record = [];
  };

  for (let i = 0; i < source.length; i++) {
    const char = source[i];

    if (inQuotes) {
      if (char === '"') {
        if (source[i + 1] === '"') {
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
    } else if (char === '\n') {
      endRecord();
    } else if (char !== '\r') {
      field += char;
    }
  }

  if (field !== '' || record.length > 0) {
    endRecord();
  }

  return records;
}

export function parseCsv(text: string): Array<Record<string, string>> {
  const [header, ...rows] = parseCsvRecords(text);
  if (!header) {
    return [];
  }
  const columns = header.map(name => name.trim());
  return rows.map(row => {
    const entry: Record<string, string> = {};
    columns.forEach((column, index) => {
      entry[column] = row[index] ?? '';
    });
    return entry;
  });
}
