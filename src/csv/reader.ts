import { readTextFile } from '../utils/files.js';
import { HEADER, type VerdictRow } from './writer.js';

/** RFC 4180 style: quoted fields may hold commas, doubled quotes and line breaks. */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;

  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];
    if (inQuotes) {
      if (char === '"') {
        if (text[index + 1] === '"') {
          field += '"';
          index += 1;
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
      row.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[index + 1] === '\n') {
        index += 1;
      }
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += char;
    }
  }

  if (field.length > 0 || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows;
}

export function parseVerdictCsv(text: string): VerdictRow[] {
  const [headerRow, ...dataRows] = parseCsv(text);
  if (!headerRow) {
    return [];
  }

  const columns = HEADER.map((name) => {
    const position = headerRow.indexOf(name);
    if (position === -1) {
      throw new Error(`Verdict CSV is missing the "${name}" column.`);
    }
    return [name, position] as const;
  });

  return dataRows
    .filter((cells) => !(cells.length === 1 && cells[0] === ''))
    .map((cells) => {
      const row: VerdictRow = { post_id: '', title: '', verdict: '', ground_truth_label: '' };
      for (const [name, position] of columns) {
        row[name] = cells[position] ?? '';
      }
      return row;
    });
}

export async function readVerdictCsv(filePath: string): Promise<VerdictRow[]> {
  return parseVerdictCsv(await readTextFile(filePath, 'Verdict CSV'));
}
