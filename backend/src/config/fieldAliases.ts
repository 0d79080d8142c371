import fs from 'fs';
import { z } from 'zod';
import logger from 'jet-logger';

import defaultAliases from './fieldAliases.json';
import { CANONICAL_FIELDS, type CanonicalField } from '@src/common/constants/CanonicalSchema';

export type FieldAliases = ReadonlyMap<CanonicalField, readonly string[]>;

const AliasFileSchema = z.record(z.string(), z.array(z.string()));

/**
 * Alternate header spellings per canonical field. Unknown keys in the file are
 * ignored; fields the file leaves out get no alternates.
 */
export function parseFieldAliases(input: unknown): FieldAliases {
  const parsed = AliasFileSchema.parse(input);
  return new Map(
    CANONICAL_FIELDS.map((field): [CanonicalField, string[]] => [field, parsed[field] ?? []]),
  );
}

/**
 * Load the bundled alias table, or the file at `overridePath` when set.
 */
export function loadFieldAliases(overridePath?: string): FieldAliases {
  if (!overridePath) {
    return parseFieldAliases(defaultAliases);
  }

  const content = fs.readFileSync(overridePath, 'utf-8');
  logger.info(`📋 Loaded field aliases from ${overridePath}`);
  return parseFieldAliases(JSON.parse(content));
}
