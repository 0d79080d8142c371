import path from 'path';
import Papa from 'papaparse';
import * as XLSX from 'xlsx';

import { SchemaError } from '@src/common/util/pipeline-errors';

export const SUPPORTED_EXTENSIONS = ['.csv', '.xls', '.xlsx'] as const;

/**
 * Read an uploaded spreadsheet into rows of string cells.
 * Only the first sheet of a workbook is used. Fully empty rows are dropped.
 */
export function parseSpreadsheet(buffer: Buffer, filename: string): string[][] {
  const extension = path.extname(filename).toLowerCase();

  let rows: string[][];
  if (extension === '.csv') {
    rows = parseCsv(buffer.toString('utf-8'));
  } else if (extension === '.xls' || extension === '.xlsx') {
    rows = parseWorkbook(buffer);
  } else {
    throw new SchemaError(
      `Unsupported file type "${extension || filename}". Upload one of: ${SUPPORTED_EXTENSIONS.join(', ')}`,
    );
  }

  const filled = rows.filter((row) => row.some((cell) => cell.trim() !== ''));
  if (filled.length === 0) {
    throw new SchemaError('Upload contains no rows');
  }
  return filled;
}

export function parseCsv(text: string): string[][] {
  const result = Papa.parse<string[]>(text.replace(/^\uFEFF/, ''), {
    skipEmptyLines: 'greedy',
  });

  const fatal = result.errors.find((error) => error.type === 'Quotes');
  if (fatal) {
    throw new SchemaError(`CSV could not be read at row ${(fatal.row ?? 0) + 1}: ${fatal.message}`);
  }
  return result.data;
}

function parseWorkbook(buffer: Buffer): string[][] {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(buffer, { type: 'buffer' });
  } catch (error) {
    throw new SchemaError(`Workbook could not be read: ${error instanceof Error ? error.message : String(error)}`);
  }

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    throw new SchemaError('Workbook has no sheets');
  }

  const table = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: false,
    defval: '',
    blankrows: false,
  });
  return table.map((row) => row.map((cell) => (cell === null || cell === undefined ? '' : String(cell))));
}
