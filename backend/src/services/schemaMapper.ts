import {
  CANONICAL_FIELDS,
  FIELD_LABELS,
  MAX_SAMPLE_VALUES,
  SKIP,
  columnLimit,
  type CanonicalField,
  type MappingTarget,
} from '@src/common/constants/CanonicalSchema';
import { FieldConflictError, SchemaError } from '@src/common/util/pipeline-errors';
import type { FieldAliases } from '@src/config/fieldAliases';
import type { ColumnMapping, FieldOption, HeaderMatch } from '@src/types/pipeline';
import { normalizeHeader, isBlank } from '@src/utils/text';
import { looksLikePhone } from '@src/utils/phone';

interface HeaderGuess {
  field: CanonicalField;
  match: Exclude<HeaderMatch, 'none'>;
}

const ZIP_PATTERN = /^\d{5}(-?\d{4})?$/;

/**
 * Schema Mapper
 *
 * Turns an arbitrary header row into a column → canonical field table and
 * keeps that table within the cardinality rules: every non-phone field on at
 * most one column, phone on at most seven.
 *
 * Auto-preselection:
 * - exact header match (field key or label) beats an alternate spelling
 * - on a tie the first column in file order keeps the field
 * - anything not resolved is left as `skip` with `needsReview`
 */
export class SchemaMapper {
  private readonly exact = new Map<string, CanonicalField>();
  private readonly alternate = new Map<string, CanonicalField>();

  constructor(aliases: FieldAliases) {
    for (const field of CANONICAL_FIELDS) {
      this.exact.set(normalizeHeader(field), field);
      this.exact.set(normalizeHeader(FIELD_LABELS[field]), field);
    }
    for (const [field, spellings] of aliases) {
      for (const spelling of spellings) {
        const key = normalizeHeader(spelling);
        if (!this.exact.has(key) && !this.alternate.has(key)) {
          this.alternate.set(key, field);
        }
      }
    }
  }

  /**
   * Propose a mapping for `headers`, showing up to three sample values per
   * column taken from `sampleRows`.
   */
  proposeMapping(headers: readonly string[], sampleRows: readonly (readonly string[])[]): ColumnMapping[] {
    if (headers.length === 0) {
      throw new SchemaError('Upload has no columns');
    }

    sampleRows.forEach((row, index) => {
      const lastFilled = lastNonEmptyIndex(row);
      if (lastFilled >= headers.length) {
        throw new SchemaError(
          `Sample row ${index + 1} has ${lastFilled + 1} columns but the header row has ${headers.length}`,
        );
      }
    });

    const samples = sampleRows.slice(0, MAX_SAMPLE_VALUES);
    const mapping = headers.map((header, columnIndex): ColumnMapping => ({
      columnIndex,
      header: header.trim(),
      samples: samples.map((row) => (row[columnIndex] ?? '').trim()),
      field: SKIP,
      match: 'none',
      needsReview: true,
    }));
    const guesses = mapping.map((column) => this.classifyHeader(column.header));

    for (const tier of ['exact', 'alternate'] as const) {
      mapping.forEach((column, index) => {
        const guess = guesses[index];
        if (!guess || guess.match !== tier) {
          return;
        }
        const holders = mapping.filter((other) => other.field === guess.field);
        if (holders.length < columnLimit(guess.field)) {
          column.field = guess.field;
          column.match = tier;
          column.needsReview = false;
        } else {
          column.conflictsWith = holders[0].columnIndex;
        }
      });
    }

    return mapping;
  }

  /**
   * Return a copy of `mapping` with `columnIndex` assigned to `target`.
   */
  assignField(mapping: readonly ColumnMapping[], columnIndex: number, target: MappingTarget): ColumnMapping[] {
    const column = mapping.find((c) => c.columnIndex === columnIndex);
    if (!column) {
      throw new SchemaError(`Column ${columnIndex + 1} does not exist`);
    }

    if (target !== SKIP) {
      const taken = mapping.filter((c) => c.columnIndex !== columnIndex && c.field === target);
      const limit = columnLimit(target);
      if (taken.length >= limit) {
        const message = limit === 1
          ? `${FIELD_LABELS[target]} is already mapped to column ${taken[0].columnIndex + 1} (${taken[0].header})`
          : `${FIELD_LABELS[target]} is already mapped to ${limit} columns`;
        throw new FieldConflictError(target, message, columnIndex);
      }
    }

    return mapping.map((c) => (
      c.columnIndex === columnIndex
        ? { ...c, field: target, needsReview: false, conflictsWith: undefined }
        : c
    ));
  }

  /**
   * Throw when any field is mapped to more columns than it allows.
   */
  validateMapping(mapping: readonly ColumnMapping[]): void {
    const seen = new Set<number>();
    for (const column of mapping) {
      if (seen.has(column.columnIndex)) {
        throw new SchemaError(`Column ${column.columnIndex + 1} is listed twice`);
      }
      seen.add(column.columnIndex);
    }

    for (const field of CANONICAL_FIELDS) {
      const columns = mapping.filter((c) => c.field === field);
      const limit = columnLimit(field);
      if (columns.length > limit) {
        throw new FieldConflictError(
          field,
          `${FIELD_LABELS[field]} is mapped to ${columns.length} columns (limit ${limit})`,
          columns[limit].columnIndex,
        );
      }
    }
  }

  /**
   * The choices a mapping screen offers for one column. A field is disabled
   * when other columns have used up its slots.
   */
  fieldOptions(mapping: readonly ColumnMapping[], columnIndex: number): FieldOption[] {
    return CANONICAL_FIELDS.map((field) => {
      const usedElsewhere = mapping.filter((c) => c.columnIndex !== columnIndex && c.field === field).length;
      return {
        field,
        label: FIELD_LABELS[field],
        disabled: usedElsewhere >= columnLimit(field),
      };
    });
  }

  /**
   * Guess whether the first row holds headers: at least one cell names a
   * field and no cell looks like data (a phone number or a zip code).
   */
  detectHeaderRow(rows: readonly (readonly string[])[]): boolean {
    const first = rows[0];
    if (!first || first.length === 0) {
      return false;
    }

    const looksLikeData = first.some((cell) => {
      const value = cell.trim();
      return looksLikePhone(value) || ZIP_PATTERN.test(value);
    });
    if (looksLikeData) {
      return false;
    }

    return first.some((cell) => this.classifyHeader(cell) !== null);
  }

  private classifyHeader(header: string): HeaderGuess | null {
    if (isBlank(header)) {
      return null;
    }
    const key = normalizeHeader(header);
    const exact = this.exact.get(key);
    if (exact) {
      return { field: exact, match: 'exact' };
    }
    const alternate = this.alternate.get(key);
    if (alternate) {
      return { field: alternate, match: 'alternate' };
    }
    return null;
  }
}

/**
 * Spreadsheet letters for files without a header row: A, B, ... Z, AA, AB ...
 */
export function columnLetters(count: number): string[] {
  return Array.from({ length: count }, (_, index) => {
    let n = index + 1;
    let name = '';
    while (n > 0) {
      const remainder = (n - 1) % 26;
      name = String.fromCharCode(65 + remainder) + name;
      n = Math.floor((n - 1) / 26);
    }
    return name;
  });
}

function lastNonEmptyIndex(row: readonly string[]): number {
  for (let i = row.length - 1; i >= 0; i--) {
    if (!isBlank(row[i])) {
      return i;
    }
  }
  return -1;
}
