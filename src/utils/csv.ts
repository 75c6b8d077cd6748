/**
 * CSV读写
 * 首行为表头，字段按RFC 4180规则加引号
 */

export type CsvValue = string | number | null | undefined;

const NEEDS_QUOTING = /[",\r\n]|^\s|\s$/;

function encodeField(value: CsvValue): string {
  if (value === null || value === undefined) {
    return '';
  }
  const text = typeof value === 'number' ? String(value) : value;
  if (NEEDS_QUOTING.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * 将记录序列化为CSV文本，列顺序由header决定
 */
export function stringifyCsv(header: readonly string[], rows: ReadonlyArray<Readonly<Record<string, CsvValue>>>): string {
  const lines = [header.map(encodeField).join(',')];
  for (const row of rows) {
    lines.push(header.map(column => encodeField(row[column])).join(','));
  }
  return `${lines.join('\n')}\n`;
}

/**
 * 解析CSV文本为二维数组
 */
export function parseCsvRows(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let fieldStarted = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
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

    if (char === '"' && field === '') {
      inQuotes = true;
      fieldStarted = true;
    } else if (char === ',') {
      row.push(field);
      field = '';
      fieldStarted = true;
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[i + 1] === '\n') {
        i++;
      }
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
      fieldStarted = false;
    } else {
      field += char;
      fieldStarted = true;
    }
  }

  if (inQuotes) {
    throw new Error('Unterminated quoted field in CSV input');
  }

  if (fieldStarted || field !== '') {
    row.push(field);
    rows.push(row);
  }

  return rows;
}

/**
 * 解析带表头的CSV文本为记录数组
 */
export function parseCsv(text: string): { header: string[]; records: Array<Record<string, string>> } {
  const rows = parseCsvRows(text).filter(row => !(row.length === 1 && row[0] === ''));
  if (rows.length === 0) {
    return { header: [], records: [] };
  }

  const [header, ...body] = rows;
  const records = body.map((row, index) => {
    if (row.length !== header.length) {
      throw new Error(`CSV row ${index + 2} has ${row.length} fields, expected ${header.length}`);
    }
    const record: Record<string, string> = {};
    header.forEach((column, columnIndex) => {
      record[column] = row[columnIndex];
    });
    return record;
  });

  return { header, records };
}
