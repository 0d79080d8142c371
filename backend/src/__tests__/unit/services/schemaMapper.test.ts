import { describe, it, expect } from 'vitest';

import { MAX_PHONE_COLUMNS, SKIP } from '@src/common/constants/CanonicalSchema';
import { FieldConflictError, SchemaError } from '@src/common/util/pipeline-errors';
import { loadFieldAliases, parseFieldAliases } from '@src/config/fieldAliases';
import { SchemaMapper, columnLetters } from '@src/services/schemaMapper';
import type { ColumnMapping } from '@src/types/pipeline';

const mapper = new SchemaMapper(loadFieldAliases());

function fields(mapping: ColumnMapping[]): string[] {
  return mapping.map((column) => column.field);
}

describe('SchemaMapper.proposeMapping', () => {
  it('matches headers by key or label regardless of case and separators', () => {
    const mapping = mapper.proposeMapping(['FIRST_NAME', 'last-name', 'Property Street', 'email'], []);

    expect(fields(mapping)).toEqual(['first_name', 'last_name', 'property_street', 'email']);
    expect(mapping.every((column) => column.match === 'exact' && !column.needsReview)).toBe(true);
  });

  it('uses alternate spellings from the alias table', () => {
    const mapping = mapper.proposeMapping(['Owner First Name', 'Address', 'Zip Code'], []);

    expect(fields(mapping)).toEqual(['first_name', 'property_street', 'property_zipcode']);
    expect(mapping.map((column) => column.match)).toEqual(['alternate', 'alternate', 'alternate']);
  });

  it('prefers an exact match over an earlier alternate spelling', () => {
    const mapping = mapper.proposeMapping(['Address', 'Property Street'], []);

    expect(mapping[1]).toMatchObject({ field: 'property_street', match: 'exact', needsReview: false });
    expect(mapping[0]).toMatchObject({ field: SKIP, needsReview: true, conflictsWith: 1 });
  });

  it('keeps the first column in file order when two headers tie', () => {
    const mapping = mapper.proposeMapping(['Email', 'Email Address', 'email'], []);

    expect(fields(mapping)).toEqual(['email', SKIP, SKIP]);
    expect(mapping[1]).toMatchObject({ needsReview: true, conflictsWith: 0 });
    expect(mapping[2]).toMatchObject({ needsReview: true, conflictsWith: 0 });
  });

  it('fills at most seven phone columns', () => {
    const headers = ['Phone', 'Phone 1', 'Phone 2', 'Phone 3', 'Phone 4', 'Phone 5', 'Phone 6', 'Phone 7'];
    const mapping = mapper.proposeMapping(headers, []);

    expect(mapping.filter((column) => column.field === 'phone')).toHaveLength(MAX_PHONE_COLUMNS);
    expect(mapping[7]).toMatchObject({ field: SKIP, needsReview: true, conflictsWith: 0 });
  });

  it('leaves unknown headers skipped and flagged for review', () => {
    const [column] = mapper.proposeMapping(['Notes about owner'], []);

    expect(column).toMatchObject({ field: SKIP, match: 'none', needsReview: true });
    expect(column.conflictsWith).toBeUndefined();
  });

  it('shows up to three trimmed sample values per column', () => {
    const rows = [[' a ', '1'], ['b'], ['c', '3'], ['d', '4']];
    const mapping = mapper.proposeMapping(['Custom 1', 'Custom 2'], rows);

    expect(mapping[0].samples).toEqual(['a', 'b', 'c']);
    expect(mapping[1].samples).toEqual(['1', '', '3']);
  });

  it('rejects sample rows with more filled cells than there are headers', () => {
    expect(() => mapper.proposeMapping(['A', 'B'], [['1', '2', '3']])).toThrow(SchemaError);
    expect(() => mapper.proposeMapping(['A', 'B'], [['1', '2', '  ']])).not.toThrow();
  });

  it('rejects an empty header row', () => {
    expect(() => mapper.proposeMapping([], [])).toThrow(SchemaError);
  });

  it('honours a custom alias table', () => {
    const custom = new SchemaMapper(parseFieldAliases({ property_street: ['situs'], unknown_field: ['x'] }));

    expect(fields(custom.proposeMapping(['Situs', 'Address'], []))).toEqual(['property_street', SKIP]);
  });
});

describe('SchemaMapper.assignField', () => {
  const base = mapper.proposeMapping(['Email', 'Secondary', 'Other'], []);

  it('returns a new mapping with the column assigned', () => {
    const next = mapper.assignField(base, 1, 'custom_1');

    expect(fields(next)).toEqual(['email', 'custom_1', SKIP]);
    expect(fields(base)).toEqual(['email', SKIP, SKIP]);
  });

  it('rejects a non-phone field already used by another column', () => {
    expect(() => mapper.assignField(base, 1, 'email')).toThrow(FieldConflictError);
  });

  it('allows reassigning the column that already holds the field', () => {
    expect(fields(mapper.assignField(base, 0, 'email'))).toEqual(['email', SKIP, SKIP]);
  });

  it('allows moving a field after the old column is skipped', () => {
    const freed = mapper.assignField(base, 0, SKIP);
    expect(fields(mapper.assignField(freed, 1, 'email'))).toEqual([SKIP, 'email', SKIP]);
  });

  it('rejects an eighth phone column', () => {
    const headers = Array.from({ length: 8 }, (_, i) => `Col ${i + 1}`);
    let mapping = mapper.proposeMapping(headers, []);
    for (let i = 0; i < MAX_PHONE_COLUMNS; i++) {
      mapping = mapper.assignField(mapping, i, 'phone');
    }

    expect(() => mapper.assignField(mapping, 7, 'phone')).toThrow(FieldConflictError);
  });

  it('rejects an unknown column', () => {
    expect(() => mapper.assignField(base, 9, 'email')).toThrow(SchemaError);
  });
});

describe('SchemaMapper.validateMapping', () => {
  it('rejects a field mapped to two columns', () => {
    const mapping = mapper.proposeMapping(['Email', 'Other'], []).map((column) => ({ ...column, field: 'email' as const }));

    expect(() => mapper.validateMapping(mapping)).toThrow(FieldConflictError);
  });

  it('accepts a proposal', () => {
    expect(() => mapper.validateMapping(mapper.proposeMapping(['Email', 'Phone', 'Phone 2'], []))).not.toThrow();
  });
});

describe('SchemaMapper.fieldOptions', () => {
  it('disables a field for other columns once it is used', () => {
    const mapping = mapper.proposeMapping(['Email', 'Other'], []);

    const forOther = mapper.fieldOptions(mapping, 1).find((option) => option.field === 'email');
    const forOwner = mapper.fieldOptions(mapping, 0).find((option) => option.field === 'email');

    expect(forOther).toEqual({ field: 'email', label: 'Email', disabled: true });
    expect(forOwner?.disabled).toBe(false);
  });

  it('disables phone once seven columns use it', () => {
    const headers = Array.from({ length: 8 }, (_, i) => `Phone ${i === 0 ? '' : i}`.trim());
    const mapping = mapper.proposeMapping(headers, []);

    const phone = mapper.fieldOptions(mapping, 7).find((option) => option.field === 'phone');
    expect(phone?.disabled).toBe(true);
  });
});

describe('SchemaMapper.detectHeaderRow', () => {
  it('recognizes a row of field names', () => {
    expect(mapper.detectHeaderRow([['First Name', 'Property Address', 'Phone 1'], ['Jane', '12 Main St', '5551234567']])).toBe(true);
  });

  it('treats a row with a phone number or zip as data', () => {
    expect(mapper.detectHeaderRow([['Name', '5551234567']])).toBe(false);
    expect(mapper.detectHeaderRow([['Address', '62701']])).toBe(false);
  });

  it('treats a row with no known names as data', () => {
    expect(mapper.detectHeaderRow([['Jane', 'Doe']])).toBe(false);
  });
});

describe('columnLetters', () => {
  it('names columns like a spreadsheet', () => {
    const letters = columnLetters(28);
    expect(letters.slice(0, 3)).toEqual(['A', 'B', 'C']);
    expect(letters.slice(25)).toEqual(['Z', 'AA', 'AB']);
  });
});
