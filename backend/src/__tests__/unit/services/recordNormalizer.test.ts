import { describe, it, expect } from 'vitest';

import { ValidationError } from '@src/common/util/pipeline-errors';
import { loadFieldAliases } from '@src/config/fieldAliases';
import {
  normalizeRows,
  normalizeZip,
  splitNames,
  type NormalizedRow,
} from '@src/services/recordNormalizer';
import { SchemaMapper } from '@src/services/schemaMapper';

const HEADERS = ['Full Name', 'Property Address', 'City', 'State', 'Zip', 'Phone 1', 'Phone 2', 'Email'];
const mapping = new SchemaMapper(loadFieldAliases()).proposeMapping(HEADERS, []);

function row(overrides: Partial<Record<'name' | 'street' | 'city' | 'state' | 'zip' | 'phone1' | 'phone2' | 'email', string>> = {}): string[] {
  const values = {
    name: 'Jane Doe',
    street: '12 Main St',
    city: 'Springfield',
    state: 'IL',
    zip: '62701',
    phone1: '5551234567',
    phone2: '',
    email: '',
    ...overrides,
  };
  return [values.name, values.street, values.city, values.state, values.zip, values.phone1, values.phone2, values.email];
}

function normalize(...dataRows: string[][]): NormalizedRow[] {
  return [...normalizeRows([HEADERS, ...dataRows], { hasHeaderRow: true, mapping })];
}

function errorOf(item: NormalizedRow): ValidationError {
  if (item.ok) {
    throw new Error(`expected row ${item.record.rowNumber} to fail`);
  }
  return item.error;
}

describe('normalizeRows', () => {
  it('rejects only the row whose value is longer than 255 characters', () => {
    const results = normalize(
      row({ street: '1 First St' }),
      row({ street: `2 ${'x'.repeat(254)}` }),
      row({ street: '3 Third St' }),
    );

    expect(results.filter((item) => item.ok)).toHaveLength(2);
    const error = errorOf(results[1]);
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ row: 2, column: 2, field: 'property_street' });
  });

  it('accepts a value of exactly 255 characters', () => {
    const [result] = normalize(row({ street: `9 ${'x'.repeat(253)}` }));

    expect(result.ok).toBe(true);
  });

  it('cleans names, addresses, phones and email', () => {
    const [result] = normalize(row({
      name: ' jane   DOE ',
      street: '12  main  street',
      city: 'springfield',
      state: 'il',
      zip: '62701-1234',
      phone1: '5551234567.0',
      phone2: '(555) 987-6543',
      email: 'Jane@Example.COM',
    }));

    expect(result).toEqual({
      ok: true,
      record: {
        rowNumber: 1,
        fullname: 'Jane Doe',
        firstName: 'Jane',
        lastName: 'Doe',
        property: { street: '12 Main Street', city: 'Springfield', state: 'IL', zipcode: '62701-1234' },
        mailing: { street: '', city: '', state: '', zipcode: '' },
        phones: ['5551234567', '5559876543'],
        email: 'jane@example.com',
        custom1: '',
        custom2: '',
        custom3: '',
      },
    });
  });

  it('lists a repeated phone number once', () => {
    const [result] = normalize(row({ phone1: '555-123-4567', phone2: '5551234567' }));

    expect(result.ok && result.record.phones).toEqual(['5551234567']);
  });

  it('reports the column of a phone that is not 10 digits', () => {
    const error = errorOf(normalize(row({ phone2: '555-1234' }))[0]);

    expect(error).toMatchObject({ row: 1, column: 7, field: 'phone' });
  });

  it('rejects a malformed email', () => {
    expect(errorOf(normalize(row({ email: 'jane.example.com' }))[0])).toMatchObject({ field: 'email', column: 8 });
  });

  it('rejects a zip without five digits', () => {
    expect(errorOf(normalize(row({ zip: 'ABCDE' }))[0])).toMatchObject({ field: 'property_zipcode', column: 5 });
  });

  it('requires a property street', () => {
    expect(errorOf(normalize(row({ street: '  ' }))[0])).toMatchObject({ field: 'property_street', column: 2 });
  });

  it('accepts city and state in place of a zip', () => {
    expect(normalize(row({ zip: '' }))[0].ok).toBe(true);
    expect(errorOf(normalize(row({ zip: '', state: '' }))[0])).toMatchObject({ field: 'property_zipcode' });
  });

  it('numbers rows from the first row when there is no header', () => {
    const results = [...normalizeRows([row(), row({ street: '' })], { hasHeaderRow: false, mapping })];

    expect(results[0].ok && results[0].record.rowNumber).toBe(1);
    expect(errorOf(results[1]).row).toBe(2);
  });

  it('yields the same results when started again', () => {
    const rows = [HEADERS, row(), row({ email: 'bad' })];
    const first = [...normalizeRows(rows, { hasHeaderRow: true, mapping })];
    const second = [...normalizeRows(rows, { hasHeaderRow: true, mapping })];

    expect(second.map((item) => item.ok)).toEqual(first.map((item) => item.ok));
    expect(second.map((item) => item.ok)).toEqual([true, false]);
  });
});

describe('splitNames', () => {
  it('builds the full name from first and last', () => {
    expect(splitNames('', 'mary', 'SMITH')).toEqual({ fullname: 'Mary Smith', firstName: 'Mary', lastName: 'Smith' });
  });

  it('splits a full name on the first space', () => {
    expect(splitNames('john van buren', '', '')).toEqual({ fullname: 'John Van Buren', firstName: 'John', lastName: 'Van Buren' });
  });
});

describe('normalizeZip', () => {
  it('normalizes 5 and 9 digit zips', () => {
    expect(normalizeZip('62701')).toBe('62701');
    expect(normalizeZip('627011234')).toBe('62701-1234');
    expect(normalizeZip('62701-1234')).toBe('62701-1234');
  });

  it('restores leading zeros dropped by spreadsheets', () => {
    expect(normalizeZip('2134')).toBe('02134');
  });

  it('rejects anything else', () => {
    expect(normalizeZip('abc')).toBeNull();
    expect(normalizeZip('62701-')).toBeNull();
  });
});
