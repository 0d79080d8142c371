import {
  MAX_FIELD_LENGTH,
  SKIP,
  type CanonicalField,
} from '@src/common/constants/CanonicalSchema';
import { ValidationError } from '@src/common/util/pipeline-errors';
import type { AddressParts, CanonicalRecord, ColumnMapping } from '@src/types/pipeline';
import { cleanPhone } from '@src/utils/phone';
import { collapseWhitespace, titleCase } from '@src/utils/text';

export interface NormalizeOptions {
  hasHeaderRow: boolean;
  mapping: readonly ColumnMapping[];
}

export type NormalizedRow =
  | { ok: true; record: CanonicalRecord }
  | { ok: false; error: ValidationError };

type ColumnsByField = Map<CanonicalField, number[]>;

const ZIP_PATTERN = /^(\d{5})(?:-?(\d{4}))?$/;
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;


/******************************************************************************
                                 Functions
******************************************************************************/

/**
 * Walk the data rows of an upload and yield one canonical record or one
 * validation error per row. Row numbers count data rows from 1.
 *
 * The generator holds no state beyond its position, so starting over is just
 * calling it again on the same rows.
 */
export function* normalizeRows(
  rows: readonly (readonly string[])[],
  options: NormalizeOptions,
): Generator<NormalizedRow, void, undefined> {
  const columns = columnsByField(options.mapping);
  const first = options.hasHeaderRow ? 1 : 0;

  for (let index = first; index < rows.length; index++) {
    const rowNumber = index - first + 1;
    let item: NormalizedRow;
    try {
      item = { ok: true, record: normalizeRow(rows[index], rowNumber, options.mapping, columns) };
    } catch (error) {
      if (!(error instanceof ValidationError)) {
        throw error;
      }
      item = { ok: false, error };
    }
    yield item;
  }
}

/**
 * Number of data rows `normalizeRows` will yield for these rows.
 */
export function countDataRows(rows: readonly (readonly string[])[], hasHeaderRow: boolean): number {
  return Math.max(0, rows.length - (hasHeaderRow ? 1 : 0));
}

export function normalizeRow(
  row: readonly string[],
  rowNumber: number,
  mapping: readonly ColumnMapping[],
  columns: ColumnsByField = columnsByField(mapping),
): CanonicalRecord {
  const fail = (field: string, detail: string, columnIndex?: number): ValidationError => (
    new ValidationError({
      row: rowNumber,
      field,
      column: columnIndex !== undefined ? columnIndex + 1 : undefined,
      detail,
    })
  );

  // Length ceiling applies to every mapped raw value before anything is built
  for (const column of mapping) {
    if (column.field === SKIP) {
      continue;
    }
    const raw = row[column.columnIndex] ?? '';
    if (raw.length > MAX_FIELD_LENGTH) {
      throw fail(column.field, `value is ${raw.length} characters (max ${MAX_FIELD_LENGTH})`, column.columnIndex);
    }
  }

  const cell = (field: CanonicalField): string => {
    const index = columns.get(field)?.[0];
    return index === undefined ? '' : (row[index] ?? '').trim();
  };
  const columnOf = (field: CanonicalField): number | undefined => columns.get(field)?.[0];

  const zipcode = (field: 'property_zipcode' | 'mailing_zipcode'): string => {
    const value = cell(field);
    if (value === '') {
      return '';
    }
    const normalized = normalizeZip(value);
    if (!normalized) {
      throw fail(field, `"${value}" is not a 5 digit zip code`, columnOf(field));
    }
    return normalized;
  };

  const address = (prefix: 'property' | 'mailing'): AddressParts => ({
    street: titleCase(cell(`${prefix}_street`)),
    city: titleCase(cell(`${prefix}_city`)),
    state: collapseWhitespace(cell(`${prefix}_state`)).toUpperCase(),
    zipcode: zipcode(`${prefix}_zipcode`),
  });

  const names = splitNames(cell('fullname'), cell('first_name'), cell('last_name'));
  const property = address('property');
  const mailing = address('mailing');

  if (property.street === '') {
    throw fail('property_street', 'property street is required', columnOf('property_street'));
  }
  if (property.zipcode === '' && (property.city === '' || property.state === '')) {
    throw fail(
      'property_zipcode',
      'property address needs a zip code or both city and state',
      columnOf('property_zipcode'),
    );
  }

  const phones: string[] = [];
  for (const index of columns.get('phone') ?? []) {
    const raw = (row[index] ?? '').trim();
    if (raw === '') {
      continue;
    }
    const phone = cleanPhone(raw);
    if (!phone) {
      throw fail('phone', `"${raw}" is not a 10 digit phone number`, index);
    }
    if (!phones.includes(phone)) {
      phones.push(phone);
    }
  }

  const email = cell('email').toLowerCase();
  if (email !== '' && !EMAIL_PATTERN.test(email)) {
    throw fail('email', `"${email}" is not an email address`, columnOf('email'));
  }

  return {
    rowNumber,
    ...names,
    property,
    mailing,
    phones,
    email,
    custom1: cell('custom_1'),
    custom2: cell('custom_2'),
    custom3: cell('custom_3'),
  };
}

/**
 * Full name and first/last are kept consistent: a full name is split on its
 * first space when first/last are missing, and built from them otherwise.
 */
export function splitNames(
  fullname: string,
  firstName: string,
  lastName: string,
): Pick<CanonicalRecord, 'fullname' | 'firstName' | 'lastName'> {
  let first = titleCase(firstName);
  let last = titleCase(lastName);
  let full = titleCase(fullname);

  if (full && !first && !last) {
    const [head, ...rest] = full.split(' ');
    first = head;
    last = rest.join(' ');
  } else if (!full) {
    full = [first, last].filter(Boolean).join(' ');
  }

  return { fullname: full, firstName: first, lastName: last };
}

/**
 * "62701", "62701-1234", "627011234" → 5 or 5+4 form. Excel drops leading
 * zeros from numeric zips, so 3 and 4 digit values are padded.
 */
export function normalizeZip(value: string): string | null {
  let compact = value.replace(/\s/g, '');
  if (/^\d{3,4}$/.test(compact)) {
    compact = compact.padStart(5, '0');
  }
  const match = ZIP_PATTERN.exec(compact);
  if (!match) {
    return null;
  }
  return match[2] ? `${match[1]}-${match[2]}` : match[1];
}

function columnsByField(mapping: readonly ColumnMapping[]): ColumnsByField {
  const columns: ColumnsByField = new Map();
  const ordered = [...mapping].sort((a, b) => a.columnIndex - b.columnIndex);
  for (const column of ordered) {
    if (column.field === SKIP) {
      continue;
    }
    const list = columns.get(column.field) ?? [];
    list.push(column.columnIndex);
    columns.set(column.field, list);
  }
  return columns;
}
